/**
 * Offline problem source backed by a JSON file, so the app runs without a
 * remote service. Listing and detail work; the judge does not.
 */
import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { type Static, Type } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { isEnoent } from "@leetterm/utils";
import { ServiceError } from "./errors";
import type { AuthService, JudgeService, ProblemService } from "./services";
import type {
	ProblemDetail,
	ProblemPage,
	ProblemQuery,
	ProblemSummary,
	SubmissionResult,
	SubmitRequest,
	TestRequest,
	TestResult,
} from "./types";

const DifficultySchema = Type.Union([Type.Literal("Easy"), Type.Literal("Medium"), Type.Literal("Hard")]);
const StatusSchema = Type.Union([Type.Literal("solved"), Type.Literal("attempted"), Type.Literal("todo")]);

const SnippetSchema = Type.Object({
	language: Type.String(),
	languageName: Type.String(),
	code: Type.String(),
});

const CatalogProblemSchema = Type.Object({
	questionId: Type.String(),
	id: Type.String(),
	slug: Type.String({ minLength: 1 }),
	title: Type.String(),
	difficulty: DifficultySchema,
	acRate: Type.Number({ minimum: 0, maximum: 100 }),
	paidOnly: Type.Boolean(),
	status: Type.Optional(StatusSchema),
	tags: Type.Array(Type.String()),
	statement: Type.String(),
	snippets: Type.Array(SnippetSchema),
	sampleCases: Type.Array(Type.String()),
});

const CatalogSchema = Type.Object({
	problems: Type.Array(CatalogProblemSchema),
});

export type CatalogProblem = Static<typeof CatalogProblemSchema>;
export type CatalogFile = Static<typeof CatalogSchema>;

const validateCatalog = TypeCompiler.Compile(CatalogSchema);

/** The sample catalog shipped with the app. */
export const BUNDLED_CATALOG_PATH = fileURLToPath(new URL("../data/catalog.json", import.meta.url));

const NO_JUDGE = "No remote judge is configured; test and submit need a connected service";

function summarize(problem: CatalogProblem): ProblemSummary {
	return {
		id: problem.id,
		slug: problem.slug,
		title: problem.title,
		difficulty: problem.difficulty,
		acRate: problem.acRate,
		paidOnly: problem.paidOnly,
		status: problem.status ?? "todo",
		tags: problem.tags,
	};
}

/** Validate parsed JSON as a catalog. Throws ServiceError listing the first problems found. */
export function parseCatalog(json: unknown, source = "catalog"): CatalogFile {
	if (validateCatalog.Check(json)) return json;
	const details = Array.from(validateCatalog.Errors(json))
		.slice(0, 5)
		.map(e => `${e.path || "/"}: ${e.message}`);
	throw new ServiceError(`Invalid ${source}:\n  ${details.join("\n  ")}`, { source });
}

export class LocalCatalog implements ProblemService, JudgeService, AuthService {
	readonly #problems: readonly CatalogProblem[];

	constructor(problems: readonly CatalogProblem[]) {
		this.#problems = problems;
	}

	static fromFile(filePath: string = BUNDLED_CATALOG_PATH): LocalCatalog {
		let content: string;
		try {
			content = fs.readFileSync(filePath, "utf8");
		} catch (error) {
			if (isEnoent(error)) throw new ServiceError(`Catalog not found: ${filePath}`, { path: filePath });
			throw error;
		}
		let json: unknown;
		try {
			json = JSON.parse(content);
		} catch (error) {
			throw new ServiceError(`Failed to parse catalog ${filePath}: ${String(error)}`, { path: filePath });
		}
		return new LocalCatalog(parseCatalog(json, filePath).problems);
	}

	get size(): number {
		return this.#problems.length;
	}

	async listProblems(query: ProblemQuery): Promise<ProblemPage> {
		const search = query.search?.trim().toLowerCase() ?? "";
		const matching = this.#problems.filter(
			problem =>
				(!query.difficulty || problem.difficulty === query.difficulty) &&
				(!search ||
					problem.title.toLowerCase().includes(search) ||
					problem.slug.includes(search) ||
					problem.id === search),
		);
		return {
			problems: matching.slice(query.skip, query.skip + query.limit).map(summarize),
			total: matching.length,
		};
	}

	async getProblem(slug: string): Promise<ProblemDetail> {
		const problem = this.#problems.find(p => p.slug === slug);
		if (!problem) throw new ServiceError(`Unknown problem: ${slug}`, { slug });
		return {
			questionId: problem.questionId,
			id: problem.id,
			slug: problem.slug,
			title: problem.title,
			difficulty: problem.difficulty,
			tags: problem.tags,
			paidOnly: problem.paidOnly,
			statement: problem.statement,
			snippets: problem.snippets,
			sampleCases: problem.sampleCases,
		};
	}

	async test(_request: TestRequest): Promise<TestResult> {
		throw new ServiceError(NO_JUDGE);
	}

	async submit(_request: SubmitRequest): Promise<SubmissionResult> {
		throw new ServiceError(NO_JUDGE);
	}

	async validate(): Promise<string | null> {
		throw new ServiceError("The offline catalog has no accounts to sign in to");
	}
}

import type { Highlighter } from "@leetterm/tui";
import type {
	Credentials,
	ProblemDetail,
	ProblemPage,
	ProblemQuery,
	SubmissionResult,
	SubmitRequest,
	TestRequest,
	TestResult,
} from "./types";

export interface ProblemService {
	listProblems(query: ProblemQuery): Promise<ProblemPage>;
	getProblem(slug: string): Promise<ProblemDetail>;
}

export interface JudgeService {
	test(request: TestRequest): Promise<TestResult>;
	submit(request: SubmitRequest): Promise<SubmissionResult>;
}

export interface AuthService {
	/** Resolves with the username, or null when the credentials are not accepted. */
	validate(credentials: Credentials): Promise<string | null>;
}

/** Synchronous so a screen can persist its buffer on the way out without awaiting. */
export interface SolutionStore {
	load(problemSlug: string, language: string): string | undefined;
	save(problemSlug: string, language: string, code: string): void;
}

/** Everything the screens talk to outside the process. */
export interface Services {
	readonly problems: ProblemService;
	readonly judge: JudgeService;
	readonly auth: AuthService;
	readonly solutions: SolutionStore;
	readonly highlighter: Highlighter;
}

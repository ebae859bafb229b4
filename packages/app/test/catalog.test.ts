import { describe, expect, it } from "vitest";
import { LocalCatalog, parseCatalog } from "../src/catalog";
import { ServiceError } from "../src/errors";
import { PROBLEMS } from "./helpers";

describe("LocalCatalog", () => {
	const catalog = new LocalCatalog(PROBLEMS);

	it("pages through every problem", async () => {
		const first = await catalog.listProblems({ skip: 0, limit: 2 });
		expect(first.total).toBe(3);
		expect(first.problems.map(p => p.slug)).toEqual(["count-vowel-runs", "merge-slots"]);
		const second = await catalog.listProblems({ skip: 2, limit: 2 });
		expect(second.problems.map(p => p.slug)).toEqual(["vault-sequence"]);
	});

	it("filters by difficulty", async () => {
		const page = await catalog.listProblems({ skip: 0, limit: 50, difficulty: "Medium" });
		expect(page).toEqual({
			total: 1,
			problems: [
				{
					id: "2",
					slug: "merge-slots",
					title: "Merge Slots",
					difficulty: "Medium",
					acRate: 48.9,
					paidOnly: false,
					status: "todo",
					tags: ["Array"],
				},
			],
		});
	});

	it("searches titles case-insensitively and ids exactly", async () => {
		const byTitle = await catalog.listProblems({ skip: 0, limit: 50, search: "VOWEL" });
		expect(byTitle.problems.map(p => p.id)).toEqual(["1"]);
		const byId = await catalog.listProblems({ skip: 0, limit: 50, search: "3" });
		expect(byId.problems.map(p => p.id)).toEqual(["3"]);
	});

	it("returns the full detail of a problem", async () => {
		const detail = await catalog.getProblem("count-vowel-runs");
		expect(detail.questionId).toBe("101");
		expect(detail.snippets.map(s => s.language)).toEqual(["python3", "cpp"]);
		expect(detail.sampleCases).toEqual(['"aa"', '"bcd"']);
	});

	it("rejects unknown slugs", async () => {
		await expect(catalog.getProblem("no-such-problem")).rejects.toThrow("Unknown problem: no-such-problem");
	});

	it("has no judge", async () => {
		const request = { slug: "merge-slots", questionId: "102", language: "python3", code: "pass" };
		await expect(catalog.test({ ...request, input: "" })).rejects.toBeInstanceOf(ServiceError);
		await expect(catalog.submit(request)).rejects.toBeInstanceOf(ServiceError);
	});

	it("loads the bundled catalog", async () => {
		const bundled = LocalCatalog.fromFile();
		expect(bundled.size).toBe(7);
		const vault = await bundled.getProblem("vault-sequence");
		expect(vault.paidOnly).toBe(true);
	});

	it("reports a missing catalog file", () => {
		expect(() => LocalCatalog.fromFile("/nonexistent/catalog.json")).toThrow(
			"Catalog not found: /nonexistent/catalog.json",
		);
	});
});

describe("parseCatalog", () => {
	it("accepts a well-formed catalog", () => {
		expect(parseCatalog({ problems: PROBLEMS }).problems).toHaveLength(3);
	});

	it("rejects a problem with an unknown difficulty", () => {
		const broken = { problems: [{ ...PROBLEMS[0], difficulty: "Extreme" }] };
		expect(() => parseCatalog(broken, "test-catalog")).toThrow(ServiceError);
		expect(() => parseCatalog(broken, "test-catalog")).toThrow(/^Invalid test-catalog:/);
	});

	it("rejects a file without a problem list", () => {
		expect(() => parseCatalog([], "test-catalog")).toThrow(ServiceError);
	});
});

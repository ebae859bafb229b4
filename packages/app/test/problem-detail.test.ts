import { describe, expect, it, vi } from "vitest";
import { AuthenticationError } from "../src/errors";
import { ProblemDetailScreen } from "../src/screens/problem-detail";
import type { JudgeService } from "../src/services";
import { Settings } from "../src/settings";
import type { SubmissionResult, SubmitRequest, TestRequest, TestResult } from "../src/types";
import { type Deferred, deferred, type HarnessOptions, MemorySolutionStore, startApp } from "./helpers";

const PYTHON_SNIPPET = "class Solution:\n    pass";

const TEST_RESULT: TestResult = {
	runSuccess: true,
	statusMessage: "Accepted",
	cases: [
		{ input: '"aa"', expected: "1", actual: "1", passed: true },
		{ input: '"bcd"', expected: "0", actual: "1", passed: false },
	],
	runtime: "12 ms",
	memory: "16.2 MB",
};

const SUBMISSION: SubmissionResult = {
	statusCode: 10,
	verdict: "Accepted",
	accepted: true,
	totalCorrect: 20,
	totalTestcases: 20,
	runtime: "4 ms",
	runtimePercentile: 87.5,
	memory: "16 MB",
	memoryPercentile: 40,
};

/** A judge whose answers the test hands out by hand. */
function manualJudge() {
	const tests: Array<{ request: TestRequest; reply: Deferred<TestResult> }> = [];
	const submits: Array<{ request: SubmitRequest; reply: Deferred<SubmissionResult> }> = [];
	const judge: JudgeService = {
		test(request) {
			const reply = deferred<TestResult>();
			tests.push({ request, reply });
			return reply.promise;
		},
		submit(request) {
			const reply = deferred<SubmissionResult>();
			submits.push({ request, reply });
			return reply.promise;
		},
	};
	return { judge, tests, submits };
}

/** Start on the problem list and open the first problem. */
async function openProblem(options: HarnessOptions = {}) {
	const harness = await startApp(options);
	harness.press("\r");
	await harness.flush();
	const detail = harness.app.navigator.active;
	if (!(detail instanceof ProblemDetailScreen)) throw new Error("problem detail is not on top");
	return { ...harness, detail };
}

function kinds(screens: readonly { kind: string }[]): string[] {
	return screens.map(s => s.kind);
}

describe("ProblemDetailScreen", () => {
	it("starts from the snippet of the preferred language", async () => {
		const { detail } = await openProblem({ settings: Settings.isolated({ language: "cpp" }) });
		expect(detail.language).toBe("cpp");
		expect(detail.buffer?.getText()).toBe("class Solution {};");
	});

	it("falls back to the first snippet for a language the problem lacks", async () => {
		const { detail } = await openProblem({ settings: Settings.isolated({ language: "rust" }) });
		expect(detail.language).toBe("python3");
		expect(detail.buffer?.getText()).toBe(PYTHON_SNIPPET);
	});

	it("prefers a saved solution over the snippet", async () => {
		const solutions = new MemorySolutionStore();
		solutions.save("count-vowel-runs", "python3", "print(1)");
		const { detail } = await openProblem({ services: { solutions } });
		expect(detail.buffer?.getText()).toBe("print(1)");
	});

	it("saves the buffer when leaving with Esc", async () => {
		const solutions = new MemorySolutionStore();
		const { app, press } = await openProblem({ services: { solutions } });
		press("#", "\x1b");
		expect(kinds(app.navigator.screens)).toEqual(["problemList"]);
		expect(solutions.load("count-vowel-runs", "python3")).toBe(`#${PYTHON_SNIPPET}`);
	});

	it("saves the buffer on Ctrl+C", async () => {
		const solutions = new MemorySolutionStore();
		const { app, press } = await openProblem({ services: { solutions } });
		press("x", "\x03");
		expect(app.running).toBe(false);
		expect(solutions.load("count-vowel-runs", "python3")).toBe(`x${PYTHON_SNIPPET}`);
	});

	it("undoes and redoes edits", async () => {
		const { detail, press } = await openProblem();
		press("a", "\x1a");
		expect(detail.buffer?.getText()).toBe(PYTHON_SNIPPET);
		press("\x19");
		expect(detail.buffer?.getText()).toBe(`a${PYTHON_SNIPPET}`);
	});

	it("cycles split, editor and description views with Ctrl+D", async () => {
		const { detail, press, terminal } = await openProblem();
		expect(detail.mode).toBe("split");
		press("\x04");
		expect(detail.mode).toBe("editor");
		expect(terminal.getViewport()[1]).toBe(`─ python3 ${"─".repeat(70)}`);
		press("\x04");
		expect(detail.mode).toBe("description");
		expect(terminal.getViewport()[1]).toBe(`─ Count Vowel Runs ${"─".repeat(61)}`);
		// Typing is ignored while only the description shows
		press("z");
		expect(detail.buffer?.getText()).toBe(PYTHON_SNIPPET);
		press("\x04");
		expect(detail.mode).toBe("split");
	});

	it("switches language with Ctrl+L and keeps the old buffer", async () => {
		const solutions = new MemorySolutionStore();
		const settings = Settings.isolated();
		const { app, detail, press } = await openProblem({ services: { solutions }, settings });
		press("#", "\x0c");
		expect(detail.language).toBe("cpp");
		expect(detail.buffer?.getText()).toBe("class Solution {};");
		expect(solutions.load("count-vowel-runs", "python3")).toBe(`#${PYTHON_SNIPPET}`);
		expect(settings.get("language")).toBe("cpp");
		expect(app.notification).toEqual({ message: "Language: C++", tone: "info" });
	});

	it("refuses to test an empty buffer", async () => {
		const solutions = new MemorySolutionStore();
		solutions.save("count-vowel-runs", "python3", "");
		const { judge, tests } = manualJudge();
		const { app, press } = await openProblem({ services: { solutions, judge } });
		press("\x14");
		expect(tests).toEqual([]);
		expect(app.notification).toEqual({ message: "No code to test.", tone: "error" });
	});

	it("runs the sample cases and shows the result", async () => {
		const { judge, tests } = manualJudge();
		const { app, press, flush, terminal } = await openProblem({ services: { judge } });
		press("\x14");
		expect(tests.map(t => t.request)).toEqual([
			{
				slug: "count-vowel-runs",
				questionId: "101",
				language: "python3",
				code: PYTHON_SNIPPET,
				input: '"aa"\n"bcd"',
			},
		]);
		expect(app.notification).toEqual({ message: "Running tests...", tone: "info" });

		tests[0]?.reply.resolve(TEST_RESULT);
		await flush();
		expect(app.navigator.active?.kind).toBe("testResult");
		const viewport = terminal.getViewport();
		expect(viewport[0]).toBe(" Test Results: 1. Count Vowel Runs");
		expect(viewport[2]).toBe(" Test Results: 1/2 passed");
		expect(viewport[4]).toBe("   PASS  Case 1");
	});

	it("submits from the test result and returns to the list with q", async () => {
		const { judge, tests, submits } = manualJudge();
		const { app, press, flush } = await openProblem({ services: { judge } });
		press("\x14");
		tests[0]?.reply.resolve(TEST_RESULT);
		await flush();

		press("s");
		expect(app.navigator.active?.kind).toBe("problemDetail");
		expect(submits.map(s => s.request)).toEqual([
			{ slug: "count-vowel-runs", questionId: "101", language: "python3", code: PYTHON_SNIPPET },
		]);
		submits[0]?.reply.resolve(SUBMISSION);
		await flush();
		expect(kinds(app.navigator.screens)).toEqual(["problemList", "problemDetail", "submissionResult"]);

		press("q");
		expect(kinds(app.navigator.screens)).toEqual(["problemList"]);
	});

	it("returns to the editor from a test result", async () => {
		const { judge, tests } = manualJudge();
		const { app, press, flush } = await openProblem({ services: { judge } });
		press("\x14");
		tests[0]?.reply.resolve(TEST_RESULT);
		await flush();
		press("e");
		expect(kinds(app.navigator.screens)).toEqual(["problemList", "problemDetail"]);
	});

	it("ignores navigation from a result that lands while the screen is covered", async () => {
		const { judge, tests, submits } = manualJudge();
		const { app, press, flush } = await openProblem({ services: { judge } });
		press("\x14", "\x13");
		tests[0]?.reply.resolve(TEST_RESULT);
		await flush();
		submits[0]?.reply.resolve(SUBMISSION);
		await flush();
		expect(kinds(app.navigator.screens)).toEqual(["problemList", "problemDetail", "testResult"]);
	});

	it("drops results for a screen that was closed", async () => {
		const { judge, tests } = manualJudge();
		const { app, press, flush } = await openProblem({ services: { judge } });
		press("\x14", "\x1b");
		tests[0]?.reply.resolve(TEST_RESULT);
		await flush();
		expect(kinds(app.navigator.screens)).toEqual(["problemList"]);
	});

	it("returns to login when the session is rejected", async () => {
		const judge: JudgeService = {
			test: vi.fn(async (): Promise<TestResult> => {
				throw new AuthenticationError("session expired");
			}),
			submit: vi.fn(async (): Promise<SubmissionResult> => SUBMISSION),
		};
		const { app, press, flush } = await openProblem({ services: { judge } });
		press("\x14");
		await flush();
		expect(kinds(app.navigator.screens)).toEqual(["login"]);
		expect(app.notification).toEqual({ message: "Session expired: session expired", tone: "error" });
	});

	it("reports judge failures without leaving the screen", async () => {
		const { app, detail, press, flush } = await openProblem();
		press("\x14");
		await flush();
		expect(app.navigator.active).toBe(detail);
		expect(app.notification).toEqual({
			message: "Test error: No remote judge is configured; test and submit need a connected service",
			tone: "error",
		});
	});

	it("recomputes the panes and repaints everything on resize", async () => {
		const { app, detail, terminal } = await openProblem();
		expect(detail.layout?.editor?.body).toEqual({ row: 2, col: 33, width: 47, height: 21 });
		const repaints = app.renderer.fullRedraws;

		terminal.resize(120, 40);
		app.queue.push({ type: "resize", columns: 120, rows: 40 });
		app.processPending();

		expect(app.columns).toBe(120);
		expect(app.rows).toBe(40);
		expect(detail.layout?.description?.body).toEqual({ row: 2, col: 0, width: 48, height: 37 });
		expect(detail.layout?.editor?.body).toEqual({ row: 2, col: 49, width: 71, height: 37 });
		expect(app.renderer.fullRedraws).toBe(repaints + 1);
		expect(terminal.getViewport()[1]).toBe(`─ Count Vowel Runs ${"─".repeat(29)}│─ python3 ${"─".repeat(61)}`);
	});
});

import { describe, expect, it } from "vitest";
import { submissionLines } from "../src/screens/submission-result";
import { testResultLines } from "../src/screens/test-result";

describe("testResultLines", () => {
	it("lists every case with its verdict", () => {
		const lines = testResultLines({
			runSuccess: true,
			statusMessage: "Accepted",
			cases: [{ input: "[1,2]", expected: "3", actual: "4", passed: false }],
			runtime: "8 ms",
			memory: "17.1 MB",
		});
		expect(lines.map(l => l.text)).toEqual([
			"Test Results: 0/1 passed",
			"",
			"  FAIL  Case 1",
			"    input:    [1,2]",
			"    expected: 3",
			"    output:   4",
			"",
			"runtime: 8 ms  memory: 17.1 MB",
		]);
	});

	it("shows a compile error block", () => {
		const lines = testResultLines({
			runSuccess: false,
			statusMessage: "Compile Error",
			compileError: "Line 1: expected ';'\nint x",
			cases: [],
		});
		expect(lines.map(l => l.text)).toEqual(["Compile Error", "", "Compile Error:", "  Line 1: expected ';'", "  int x", ""]);
	});
});

describe("submissionLines", () => {
	it("reports percentiles for an accepted solution", () => {
		const lines = submissionLines({
			statusCode: 10,
			verdict: "Accepted",
			accepted: true,
			totalCorrect: 20,
			totalTestcases: 20,
			runtime: "4 ms",
			runtimePercentile: 87.5,
			memory: "16 MB",
			memoryPercentile: 40,
		});
		expect(lines.map(l => l.text)).toEqual([
			"Accepted",
			"",
			"  tests passed:  20/20",
			"  runtime:       4 ms (faster than 87.5%)",
			"  memory:        16 MB (less than 40.0%)",
		]);
	});

	it("shows the failing case of a wrong answer", () => {
		const lines = submissionLines({
			statusCode: 11,
			verdict: "Wrong Answer",
			accepted: false,
			totalCorrect: 3,
			totalTestcases: 20,
			input: "[1]",
			expectedOutput: "2",
			codeOutput: "1",
		});
		expect(lines.map(l => l.text)).toEqual([
			"Wrong Answer",
			"",
			"  tests passed:  3/20",
			"",
			"  input:     [1]",
			"  expected:  2",
			"  output:    1",
		]);
	});
});

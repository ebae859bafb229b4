import { describe, expect, it } from "vitest";
import { defaultSyntaxTheme, KeywordHighlighter, parseSyntaxTable } from "../src/keyword-highlighter";

const { keyword, string, number, comment } = defaultSyntaxTheme;

const highlighter = new KeywordHighlighter(
	parseSyntaxTable({
		python3: { keywords: ["def", "return"], lineComment: "#" },
		cpp: { keywords: ["int", "return"], lineComment: "//", blockComments: true },
	}),
);

describe("KeywordHighlighter", () => {
	it("marks keywords and trailing comments", () => {
		expect(highlighter.highlight(["def f(x):  # note"], "python3")).toEqual([
			[
				{ start: 0, end: 3, style: keyword },
				{ start: 11, end: 17, style: comment },
			],
		]);
	});

	it("skips escaped quotes inside strings", () => {
		expect(highlighter.highlight(['s = "a\\"b" + 12'], "python3")).toEqual([
			[
				{ start: 4, end: 10, style: string },
				{ start: 13, end: 15, style: number },
			],
		]);
	});

	it("does not treat a comment marker inside a string as a comment", () => {
		expect(highlighter.highlight(['x = "#"'], "python3")).toEqual([[{ start: 4, end: 7, style: string }]]);
	});

	it("carries block comments across lines", () => {
		expect(highlighter.highlight(["int a; /* start", "still */ return"], "cpp")).toEqual([
			[
				{ start: 0, end: 3, style: keyword },
				{ start: 7, end: 15, style: comment },
			],
			[
				{ start: 0, end: 8, style: comment },
				{ start: 9, end: 15, style: keyword },
			],
		]);
	});

	it("leaves unknown languages unstyled", () => {
		expect(highlighter.highlight(["def x", "return"], "brainfuck")).toEqual([[], []]);
	});

	it("loads the bundled keyword table", () => {
		const bundled = KeywordHighlighter.fromFile();
		expect(bundled.highlight(["return 1"], "python3")).toEqual([
			[
				{ start: 0, end: 6, style: keyword },
				{ start: 7, end: 8, style: number },
			],
		]);
	});
});

describe("parseSyntaxTable", () => {
	it("drops malformed entries and fills in defaults", () => {
		const table = parseSyntaxTable({ good: { keywords: ["if", 3] }, bad: "nope" });
		expect([...table.keys()]).toEqual(["good"]);
		const good = table.get("good");
		expect(good?.lineComment).toBe("//");
		expect(good?.blockComments).toBe(false);
		expect([...(good?.keywords ?? [])]).toEqual(["if"]);
	});
});

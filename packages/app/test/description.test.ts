import { describe, expect, it } from "vitest";
import { formatDescription } from "../src/description";

const STATEMENT = "Find it.\n\nExample 1:\nInput: a\nOutput: b\n\nConstraints:\n1 <= n";

function boxRow(text: string): string {
	return `│ ${text.padEnd(16)} │`;
}

describe("formatDescription", () => {
	it("wraps plain text in split view", () => {
		expect(formatDescription("one two three", 8, false)).toEqual(["one two", "three"]);
	});

	it("frames examples and constraints in description view", () => {
		expect(formatDescription(STATEMENT, 20, true)).toEqual([
			"Find it.",
			"",
			"───── Examples ─────",
			"",
			"┌─ Example 1 ──────┐",
			boxRow("Input: a"),
			boxRow("Output: b"),
			"└──────────────────┘",
			"",
			"┌─ Constraints ────┐",
			boxRow("1 <= n"),
			"└──────────────────┘",
		]);
	});

	it("prints the Examples banner once", () => {
		const lines = formatDescription("Example 1:\nx\nExample 2:\ny", 20, true);
		expect(lines.filter(l => l.includes("Examples"))).toHaveLength(1);
		expect(lines.filter(l => l.startsWith("┌─ Example "))).toEqual([
			"┌─ Example 1 ──────┐",
			"┌─ Example 2 ──────┐",
		]);
	});

	it("keeps text written on the heading line inside the box", () => {
		const lines = formatDescription("Example 1: Input: x", 20, true);
		expect(lines.slice(2)).toEqual(["┌─ Example 1 ──────┐", boxRow("Input: x"), "└──────────────────┘"]);
	});

	it("does not box panes too narrow for a frame", () => {
		expect(formatDescription("Example 1:\nx", 7, true)).toEqual(["Example", "1:", "x"]);
	});
});

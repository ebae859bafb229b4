import { describe, expect, it } from "vitest";
import {
	fitToWidth,
	graphemeWidth,
	isWordChar,
	sanitizeText,
	truncateToWidth,
	visibleWidth,
	wrapText,
} from "../src/utils";

describe("visibleWidth", () => {
	it("counts wide glyphs as two columns", () => {
		expect(visibleWidth("abc")).toBe(3);
		expect(visibleWidth("日本")).toBe(4);
		expect(graphemeWidth("日")).toBe(2);
		expect(graphemeWidth("a")).toBe(1);
	});
});

describe("wrapText", () => {
	it("breaks between words", () => {
		expect(wrapText("hello world foo", 11)).toEqual(["hello world", "foo"]);
	});

	it("keeps indentation on continuation lines", () => {
		expect(wrapText("  indented text here", 10)).toEqual(["  indented", "  text", "  here"]);
	});

	it("hard-breaks words longer than the width", () => {
		expect(wrapText("abcdefgh", 3)).toEqual(["abc", "def", "gh"]);
	});

	it("preserves blank lines", () => {
		expect(wrapText("a\n\nb", 10)).toEqual(["a", "", "b"]);
	});
});

describe("truncateToWidth", () => {
	it("appends an ellipsis when text is cut", () => {
		expect(truncateToWidth("hello world", 8)).toBe("hello w…");
		expect(truncateToWidth("short", 8)).toBe("short");
	});

	it("pads to an exact width", () => {
		expect(fitToWidth("ab", 4)).toBe("ab  ");
		expect(fitToWidth("abcdef", 4)).toBe("abc…");
	});
});

describe("text helpers", () => {
	it("replaces control characters with spaces", () => {
		expect(sanitizeText("a\tb\x1bc")).toBe("a b c");
	});

	it("recognizes word characters", () => {
		expect(isWordChar("é")).toBe(true);
		expect(isWordChar("_")).toBe(true);
		expect(isWordChar("-")).toBe(false);
	});
});

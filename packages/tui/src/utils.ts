import stringWidth from "string-width";

// Pre-allocated space buffer for padding
const SPACE_BUFFER = " ".repeat(512);

/**
 * Returns a string of n spaces.
 */
export function padding(n: number): string {
	if (n <= 0) return "";
	if (n <= 512) return SPACE_BUFFER.slice(0, n);
	return " ".repeat(n);
}

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** Split text into grapheme clusters. */
export function graphemes(text: string): string[] {
	const out: string[] = [];
	for (const { segment } of segmenter.segment(text)) {
		out.push(segment);
	}
	return out;
}

/**
 * Calculate the visible width of a string in terminal columns.
 */
export function visibleWidth(str: string): number {
	if (!str) return 0;
	// Fast path: pure ASCII printable
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			return stringWidth(str);
		}
	}
	return str.length;
}

/** Column width of one grapheme: 1 or 2 (wide CJK and emoji). Zero-width clusters still take a cell. */
export function graphemeWidth(grapheme: string): 1 | 2 {
	return visibleWidth(grapheme) >= 2 ? 2 : 1;
}

const makeBoolArray = (chars: string): ReadonlyArray<boolean> => {
	const table = Array.from({ length: 128 }, () => false);
	for (let i = 0; i < chars.length; i++) {
		const code = chars.charCodeAt(i);
		if (code < table.length) {
			table[code] = true;
		}
	}
	return table;
};

const ASCII_WHITESPACE = makeBoolArray("\x09\x0a\x0b\x0c\x0d\x20");

/**
 * Check if a character is whitespace.
 */
export function isWhitespaceChar(char: string): boolean {
	const code = char.codePointAt(0) || 0;
	return ASCII_WHITESPACE[code] ?? false;
}

const WORD_CHAR = /^[\p{L}\p{N}_]$/u;

/** Word characters for cursor movement: letters, digits and underscore. */
export function isWordChar(char: string): boolean {
	return WORD_CHAR.test(char);
}

/** Replace C0 controls, DEL and tabs with spaces so every cell holds a printable glyph. */
export function sanitizeText(text: string): string {
	return text.replace(/[\x00-\x1f\x7f]/g, " ");
}

/**
 * Truncate to at most `width` columns, appending `ellipsis` when cut.
 */
export function truncateToWidth(text: string, width: number, ellipsis = "…"): string {
	if (width <= 0) return "";
	if (visibleWidth(text) <= width) return text;
	const budget = width - visibleWidth(ellipsis);
	let out = "";
	let used = 0;
	for (const g of graphemes(text)) {
		const w = graphemeWidth(g);
		if (used + w > budget) break;
		out += g;
		used += w;
	}
	return budget > 0 ? out + ellipsis : ellipsis.slice(0, width);
}

/** Pad (or truncate) to exactly `width` columns. */
export function fitToWidth(text: string, width: number): string {
	const truncated = truncateToWidth(text, width);
	return truncated + padding(width - visibleWidth(truncated));
}

/**
 * Word-wrap plain text to `width` columns.
 * Keeps each line's leading indentation on its continuation lines and hard-breaks
 * words longer than the width. Blank input lines are preserved.
 */
export function wrapText(text: string, width: number): string[] {
	const result: string[] = [];
	const w = Math.max(1, width);
	for (const rawLine of text.split("\n")) {
		const line = rawLine.replace(/\t/g, "    ").trimEnd();
		if (line === "") {
			result.push("");
			continue;
		}
		const indentLength = line.length - line.trimStart().length;
		const indent = indentLength < w / 2 ? line.slice(0, indentLength) : "";
		const words = line.trimStart().split(/ +/);
		let current = indent;
		let currentWidth = visibleWidth(indent);
		let hasWord = false;
		for (const word of words) {
			const wordWidth = visibleWidth(word);
			const sep = hasWord ? 1 : 0;
			if (currentWidth + sep + wordWidth <= w) {
				current += (hasWord ? " " : "") + word;
				currentWidth += sep + wordWidth;
				hasWord = true;
				continue;
			}
			if (hasWord) {
				result.push(current);
				current = indent;
				currentWidth = visibleWidth(indent);
				hasWord = false;
			}
			// Hard-break words that cannot fit on an empty line
			let rest = word;
			while (currentWidth + visibleWidth(rest) > w) {
				let chunk = "";
				let chunkWidth = 0;
				for (const g of graphemes(rest)) {
					const gw = graphemeWidth(g);
					if (currentWidth + chunkWidth + gw > w) break;
					chunk += g;
					chunkWidth += gw;
				}
				if (chunk === "") {
					if (currentWidth > 0) {
						// Indentation alone fills the line
						current = "";
						currentWidth = 0;
						continue;
					}
					// A wide glyph in a one-column pane still gets its own line
					chunk = graphemes(rest)[0] ?? rest;
				}
				result.push(current + chunk);
				rest = rest.slice(chunk.length);
				current = indent;
				currentWidth = visibleWidth(indent);
			}
			current += rest;
			currentWidth += visibleWidth(rest);
			hasWord = rest.length > 0;
		}
		if (hasWord || current.trim() !== "") result.push(current);
	}
	return result;
}

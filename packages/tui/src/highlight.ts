import type { Style } from "./style";

/** A styled column range `[start, end)` within one line. */
export interface StyledSpan {
	readonly start: number;
	readonly end: number;
	readonly style: Style;
}

/** Syntax token source. Returns one span list per input line. */
export interface Highlighter {
	highlight(lines: readonly string[], languageId: string): StyledSpan[][];
}

/** No highlighting at all. */
export class PlainHighlighter implements Highlighter {
	highlight(lines: readonly string[]): StyledSpan[][] {
		return lines.map(() => []);
	}
}

/**
 * Memoizes a highlighter by (buffer version, language id), so unchanged text
 * is not re-tokenized on every frame.
 */
export class HighlightCache {
	#version = -1;
	#languageId = "";
	#spans: StyledSpan[][] = [];

	constructor(readonly highlighter: Highlighter) {}

	get(lines: readonly string[], version: number, languageId: string): StyledSpan[][] {
		if (version !== this.#version || languageId !== this.#languageId) {
			this.#spans = this.highlighter.highlight(lines, languageId);
			this.#version = version;
			this.#languageId = languageId;
		}
		return this.#spans;
	}
}

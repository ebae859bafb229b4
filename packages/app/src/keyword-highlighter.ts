import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { type Highlighter, type Style, style, type StyledSpan, Attr } from "@leetterm/tui";
import { isRecord, logger } from "@leetterm/utils";

export interface LanguageSyntax {
	readonly keywords: ReadonlySet<string>;
	/** Line comment prefix, e.g. "#" or "//". */
	readonly lineComment: string;
	/** Whether the language has C-style block comments. */
	readonly blockComments: boolean;
}

export interface SyntaxTheme {
	readonly keyword: Style;
	readonly string: Style;
	readonly number: Style;
	readonly comment: Style;
}

export const defaultSyntaxTheme: SyntaxTheme = {
	keyword: style({ fg: "magenta", attrs: Attr.BOLD }),
	string: style({ fg: "green" }),
	number: style({ fg: "cyan" }),
	comment: style({ fg: "brightBlack" }),
};

const KEYWORDS_PATH = fileURLToPath(new URL("../data/keywords.json", import.meta.url));

const WORD = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER = /\d[\d_]*(\.\d+)?([eE][+-]?\d+)?/y;

function toStringList(value: unknown): string[] {
	return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

/** Parse the keywords file: `{ "<language>": { "keywords": [...], "lineComment": "#", "blockComments": false } }`. */
export function parseSyntaxTable(json: unknown): Map<string, LanguageSyntax> {
	const table = new Map<string, LanguageSyntax>();
	if (!isRecord(json)) return table;
	for (const [language, entry] of Object.entries(json)) {
		if (!isRecord(entry)) continue;
		table.set(language, {
			keywords: new Set(toStringList(entry.keywords)),
			lineComment: typeof entry.lineComment === "string" ? entry.lineComment : "//",
			blockComments: entry.blockComments === true,
		});
	}
	return table;
}

/**
 * Token colouring for the editor: keywords, string literals, numbers and
 * comments. Languages missing from the table get no spans.
 */
export class KeywordHighlighter implements Highlighter {
	constructor(
		readonly syntax: ReadonlyMap<string, LanguageSyntax>,
		readonly theme: SyntaxTheme = defaultSyntaxTheme,
	) {}

	static fromFile(filePath: string = KEYWORDS_PATH): KeywordHighlighter {
		let json: unknown = {};
		try {
			json = JSON.parse(fs.readFileSync(filePath, "utf8"));
		} catch (error) {
			logger.warn("Keyword table unavailable, highlighting disabled", { path: filePath, error });
		}
		return new KeywordHighlighter(parseSyntaxTable(json));
	}

	highlight(lines: readonly string[], languageId: string): StyledSpan[][] {
		const syntax = this.syntax.get(languageId);
		if (!syntax) return lines.map(() => []);
		let inBlock = false;
		return lines.map(text => {
			const result = this.#line(text, syntax, inBlock);
			inBlock = result.inBlock;
			return result.spans;
		});
	}

	#line(text: string, syntax: LanguageSyntax, startInBlock: boolean): { spans: StyledSpan[]; inBlock: boolean } {
		const spans: StyledSpan[] = [];
		let i = 0;
		let inBlock = startInBlock;
		while (i < text.length) {
			if (inBlock) {
				const end = text.indexOf("*/", i);
				const stop = end === -1 ? text.length : end + 2;
				spans.push({ start: i, end: stop, style: this.theme.comment });
				i = stop;
				inBlock = end === -1;
				continue;
			}
			if (syntax.blockComments && text.startsWith("/*", i)) {
				inBlock = true;
				continue;
			}
			if (text.startsWith(syntax.lineComment, i)) {
				spans.push({ start: i, end: text.length, style: this.theme.comment });
				break;
			}
			const char = text[i] ?? "";
			if (char === '"' || char === "'" || char === "`") {
				let end = i + 1;
				while (end < text.length && text[end] !== char) end += text[end] === "\\" ? 2 : 1;
				end = Math.min(text.length, end + 1);
				spans.push({ start: i, end, style: this.theme.string });
				i = end;
				continue;
			}
			WORD.lastIndex = i;
			const word = WORD.exec(text);
			if (word) {
				if (syntax.keywords.has(word[0])) {
					spans.push({ start: i, end: i + word[0].length, style: this.theme.keyword });
				}
				i += word[0].length;
				continue;
			}
			NUMBER.lastIndex = i;
			const number = NUMBER.exec(text);
			if (number) {
				spans.push({ start: i, end: i + number[0].length, style: this.theme.number });
				i += number[0].length;
				continue;
			}
			i++;
		}
		return { spans, inBlock };
	}
}

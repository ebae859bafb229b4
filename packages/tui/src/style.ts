/**
 * Cell styling and its SGR encoding.
 */

export type NamedColor =
	| "black"
	| "red"
	| "green"
	| "yellow"
	| "blue"
	| "magenta"
	| "cyan"
	| "white"
	| "brightBlack"
	| "brightRed"
	| "brightGreen"
	| "brightYellow"
	| "brightBlue"
	| "brightMagenta"
	| "brightCyan"
	| "brightWhite";

/** `"default"` is the terminal's own color; numbers index the 256-color palette. */
export type Color = "default" | NamedColor | number;

export const Attr = {
	NONE: 0,
	BOLD: 1,
	DIM: 2,
	UNDERLINE: 4,
	REVERSE: 8,
} as const;

export interface Style {
	readonly fg: Color;
	readonly bg: Color;
	/** Bitmask of `Attr` flags. */
	readonly attrs: number;
}

export const DEFAULT_STYLE: Style = { fg: "default", bg: "default", attrs: Attr.NONE };

export function style(partial: Partial<Style> = {}): Style {
	return {
		fg: partial.fg ?? "default",
		bg: partial.bg ?? "default",
		attrs: partial.attrs ?? Attr.NONE,
	};
}

/** Same style with extra attribute bits set. */
export function withAttrs(base: Style, attrs: number): Style {
	return { fg: base.fg, bg: base.bg, attrs: base.attrs | attrs };
}

export function styleEquals(a: Style, b: Style): boolean {
	return a.fg === b.fg && a.bg === b.bg && a.attrs === b.attrs;
}

const NAMED_INDEX: Record<NamedColor, number> = {
	black: 0,
	red: 1,
	green: 2,
	yellow: 3,
	blue: 4,
	magenta: 5,
	cyan: 6,
	white: 7,
	brightBlack: 8,
	brightRed: 9,
	brightGreen: 10,
	brightYellow: 11,
	brightBlue: 12,
	brightMagenta: 13,
	brightCyan: 14,
	brightWhite: 15,
};

function colorCodes(color: Color, layer: "fg" | "bg"): string[] {
	if (color === "default") return [];
	if (typeof color === "number") {
		const index = Math.max(0, Math.min(255, Math.trunc(color)));
		return [layer === "fg" ? "38" : "48", "5", String(index)];
	}
	const index = NAMED_INDEX[color];
	if (index < 8) return [String((layer === "fg" ? 30 : 40) + index)];
	return [String((layer === "fg" ? 90 : 100) + index - 8)];
}

/**
 * Absolute SGR sequence for a style. Always starts from a reset so the result
 * does not depend on whatever the terminal had before.
 */
export function sgr(s: Style): string {
	const codes = ["0"];
	if (s.attrs & Attr.BOLD) codes.push("1");
	if (s.attrs & Attr.DIM) codes.push("2");
	if (s.attrs & Attr.UNDERLINE) codes.push("4");
	if (s.attrs & Attr.REVERSE) codes.push("7");
	codes.push(...colorCodes(s.fg, "fg"), ...colorCodes(s.bg, "bg"));
	return `\x1b[${codes.join(";")}m`;
}

import { codePointStart, comparePositions, type EditorBuffer, type Position } from "./editor-buffer";
import type { StyledSpan } from "./highlight";
import { Attr, DEFAULT_STYLE, type Style, style, styleEquals, withAttrs } from "./style";
import type { Surface } from "./surface";
import { graphemeWidth } from "./utils";

export interface EditorTheme {
	text: Style;
	lineNumber: Style;
	currentLineNumber: Style;
	/** Filler drawn on rows past the end of the buffer. */
	emptyLine: Style;
}

export const defaultEditorTheme: EditorTheme = {
	text: DEFAULT_STYLE,
	lineNumber: style({ attrs: Attr.DIM }),
	currentLineNumber: style({ attrs: Attr.BOLD }),
	emptyLine: style({ fg: "brightBlack" }),
};

export interface EditorViewOptions {
	theme?: EditorTheme;
	/** Per-line highlight spans, indexed like the buffer's lines. */
	spans?: readonly (readonly StyledSpan[])[];
	/** Draw the cursor cell. Off when the editor pane is not focused. */
	showCursor?: boolean;
}

/** Gutter width for a buffer: line-number digits plus two, at least four. */
export function gutterWidth(lineCount: number): number {
	return Math.max(4, String(lineCount).length + 2);
}

function spanStyleAt(spans: readonly StyledSpan[] | undefined, column: number, fallback: Style): Style {
	if (!spans) return fallback;
	for (const span of spans) {
		if (column >= span.start && column < span.end) return span.style;
	}
	return fallback;
}

function within(position: Position, range: { start: Position; end: Position } | undefined): boolean {
	if (!range) return false;
	return comparePositions(range.start, position) <= 0 && comparePositions(position, range.end) < 0;
}

/**
 * Draw the buffer into a surface: line-number gutter, highlighted text,
 * selection in reverse video and the cursor as a reverse-video cell.
 * Scrolls the buffer's viewport so the cursor stays visible.
 */
export function drawEditor(surface: Surface, buffer: EditorBuffer, options: EditorViewOptions = {}): void {
	const theme = options.theme ?? defaultEditorTheme;
	const showCursor = options.showCursor ?? true;
	const gutter = gutterWidth(buffer.lineCount);
	const textWidth = surface.width - gutter;
	if (surface.height <= 0 || textWidth <= 0) return;

	const { top, left } = buffer.ensureCursorVisible(surface.height, textWidth);
	const cursor = buffer.cursor;
	const selected = buffer.selectionRange();

	for (let row = 0; row < surface.height; row++) {
		const lineIndex = top + row;
		if (lineIndex >= buffer.lineCount) {
			surface.text(row, 0, "~", theme.emptyLine);
			continue;
		}
		const isCursorLine = lineIndex === cursor.line;
		const label = `${String(lineIndex + 1).padStart(gutter - 1)} `;
		surface.text(row, 0, label, isCursorLine ? theme.currentLineNumber : theme.lineNumber);

		const line = buffer.getLine(lineIndex);
		const spans = options.spans?.[lineIndex];
		let x = gutter;
		let pending = "";
		let pendingStyle: Style = theme.text;
		let pendingX = x;
		const emit = () => {
			if (pending) surface.text(row, pendingX, pending, pendingStyle);
			pending = "";
		};

		let column = codePointStart(line, left);
		while (column < line.length && x < surface.width) {
			const code = line.codePointAt(column) ?? 0x20;
			const char = String.fromCodePoint(code);
			const position = { line: lineIndex, column };
			let cellStyle = spanStyleAt(spans, column, theme.text);
			const isSelected = within(position, selected);
			if (isSelected) cellStyle = withAttrs(cellStyle, Attr.REVERSE);
			if (showCursor && isCursorLine && column === cursor.column) {
				cellStyle = isSelected ? withAttrs(theme.text, Attr.UNDERLINE) : withAttrs(cellStyle, Attr.REVERSE);
			}
			if (pending && !styleEquals(cellStyle, pendingStyle)) emit();
			if (!pending) {
				pendingStyle = cellStyle;
				pendingX = x;
			}
			pending += char;
			x += graphemeWidth(char);
			column += char.length;
		}
		emit();

		// Cursor past the last character gets a cell of its own
		if (showCursor && isCursorLine && cursor.column >= line.length && x < surface.width) {
			surface.text(row, x, " ", withAttrs(theme.text, Attr.REVERSE));
		}
	}
}

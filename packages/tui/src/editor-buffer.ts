import { BoundedStack } from "@leetterm/utils";
import { graphemeWidth, isWhitespaceChar, isWordChar } from "./utils";

export interface Position {
	readonly line: number;
	readonly column: number;
}

/** `anchor` is where the selection started, `head` follows the cursor. */
export interface Selection {
	readonly anchor: Position;
	readonly head: Position;
}

export interface Viewport {
	readonly top: number;
	readonly left: number;
}

export type UndoKind = "insert" | "delete" | "replace";

/**
 * One reversible edit: at `position`, `removedText` was replaced by
 * `insertedText`. Undo swaps them back and restores `cursorBefore`.
 */
export interface UndoEntry {
	readonly kind: UndoKind;
	readonly position: Position;
	readonly removedText: string;
	readonly insertedText: string;
	readonly cursorBefore: Position;
	readonly selectionBefore?: Selection;
	readonly cursorAfter: Position;
	readonly timestamp: number;
}

export type Direction = "left" | "right" | "up" | "down";
export type Granularity = "character" | "word" | "lineBoundary" | "page";

export interface EditorBufferOptions {
	/** Maximum undo entries kept; the oldest are discarded. Default 1000. */
	undoLimit?: number;
	/** Single-character inserts closer together than this merge into one undo entry. Default 500. */
	coalesceWindowMs?: number;
	/** Page size used until `ensureCursorVisible` reports the real pane height. Default 20. */
	pageLines?: number;
	/** Spaces inserted by `tab()` and substituted for tab characters. Default 4. */
	tabWidth?: number;
	/** Millisecond clock, injectable for tests. */
	clock?: () => number;
}

export const DEFAULT_UNDO_LIMIT = 1000;
export const DEFAULT_COALESCE_WINDOW_MS = 500;

export function comparePositions(a: Position, b: Position): number {
	return a.line !== b.line ? a.line - b.line : a.column - b.column;
}

function samePosition(a: Position, b: Position): boolean {
	return a.line === b.line && a.column === b.column;
}

/** Position reached after writing `text` starting at `start`. */
function advance(start: Position, text: string): Position {
	const parts = text.split("\n");
	if (parts.length === 1) return { line: start.line, column: start.column + text.length };
	return { line: start.line + parts.length - 1, column: (parts[parts.length - 1] ?? "").length };
}

/** Index of the code point boundary before `column`. */
function prevBoundary(line: string, column: number): number {
	if (column <= 0) return 0;
	const low = line.charCodeAt(column - 1);
	if (column >= 2 && low >= 0xdc00 && low <= 0xdfff) {
		const high = line.charCodeAt(column - 2);
		if (high >= 0xd800 && high <= 0xdbff) return column - 2;
	}
	return column - 1;
}

/** Index of the code point boundary after `column`. */
function nextBoundary(line: string, column: number): number {
	if (column >= line.length) return line.length;
	const code = line.codePointAt(column);
	return column + (code !== undefined && code > 0xffff ? 2 : 1);
}

/** Snap `column` back to the start of the code point it falls inside. */
export function codePointStart(line: string, column: number): number {
	if (column <= 0 || column >= line.length) return Math.max(0, column);
	const low = line.charCodeAt(column);
	const high = line.charCodeAt(column - 1);
	return low >= 0xdc00 && low <= 0xdfff && high >= 0xd800 && high <= 0xdbff ? column - 1 : column;
}

/** Terminal cells taken by `line` between two code point boundaries. */
function cellsBetween(line: string, from: number, to: number): number {
	let cells = 0;
	for (const char of line.slice(from, to)) cells += graphemeWidth(char);
	return cells;
}

/** Code point ending at `column`, scanning left. */
function charBefore(line: string, column: number): string {
	return line.slice(prevBoundary(line, column), column);
}

/** Code point starting at `column`, scanning right. */
function charAt(line: string, column: number): string {
	return line.slice(column, nextBoundary(line, column));
}

/**
 * Plain-text line buffer with a cursor, an optional selection, bounded
 * undo/redo history and a scroll viewport.
 *
 * Every edit funnels through a single replace-range primitive, which records
 * the undo entry, clears the redo stack, moves the cursor and bumps `version`.
 * Cursor and selection ends always satisfy
 * `0 <= line < lineCount` and `0 <= column <= lineLength(line)`.
 */
export class EditorBuffer {
	#lines: string[] = [""];
	#cursor: Position = { line: 0, column: 0 };
	#selection: Selection | undefined;
	#viewport: Viewport = { top: 0, left: 0 };
	#version = 0;

	// Sticky column for vertical movement
	#preferredColumn: number | undefined;
	#pageLines: number;

	#undo: BoundedStack<UndoEntry>;
	#redo: BoundedStack<UndoEntry>;
	// True while the top undo entry may still absorb the next typed character
	#coalesceOpen = false;

	readonly #coalesceWindowMs: number;
	readonly #tabWidth: number;
	readonly #clock: () => number;

	constructor(text = "", options: EditorBufferOptions = {}) {
		const undoLimit = Math.max(1, Math.floor(options.undoLimit ?? DEFAULT_UNDO_LIMIT));
		this.#undo = new BoundedStack(undoLimit);
		this.#redo = new BoundedStack(undoLimit);
		this.#coalesceWindowMs = options.coalesceWindowMs ?? DEFAULT_COALESCE_WINDOW_MS;
		this.#pageLines = Math.max(1, options.pageLines ?? 20);
		this.#tabWidth = Math.max(1, options.tabWidth ?? 4);
		this.#clock = options.clock ?? Date.now;
		this.setText(text);
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Accessors
	// ─────────────────────────────────────────────────────────────────────────

	get cursor(): Position {
		return this.#cursor;
	}

	get selection(): Selection | undefined {
		return this.#selection;
	}

	get viewport(): Viewport {
		return this.#viewport;
	}

	/** Incremented on every content change, including undo and redo. */
	get version(): number {
		return this.#version;
	}

	get lineCount(): number {
		return this.#lines.length;
	}

	get lines(): readonly string[] {
		return this.#lines;
	}

	get canUndo(): boolean {
		return !this.#undo.isEmpty;
	}

	get canRedo(): boolean {
		return !this.#redo.isEmpty;
	}

	get undoDepth(): number {
		return this.#undo.length;
	}

	getLine(line: number): string {
		return this.#lines[line] ?? "";
	}

	getText(): string {
		return this.#lines.join("\n");
	}

	/** Replace the whole content. Resets cursor, selection, viewport and history. */
	setText(text: string): void {
		this.#lines = this.#normalize(text).split("\n");
		this.#cursor = { line: 0, column: 0 };
		this.#selection = undefined;
		this.#viewport = { top: 0, left: 0 };
		this.#preferredColumn = undefined;
		this.#undo.clear();
		this.#redo.clear();
		this.#coalesceOpen = false;
		this.#version++;
	}

	/** Selection ends in document order, or undefined when nothing is selected. */
	selectionRange(): { start: Position; end: Position } | undefined {
		const sel = this.#selection;
		if (!sel || samePosition(sel.anchor, sel.head)) return undefined;
		return comparePositions(sel.anchor, sel.head) <= 0
			? { start: sel.anchor, end: sel.head }
			: { start: sel.head, end: sel.anchor };
	}

	getSelectedText(): string {
		const range = this.selectionRange();
		return range ? this.#textBetween(range.start, range.end) : "";
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Editing
	// ─────────────────────────────────────────────────────────────────────────

	/**
	 * Insert text at the cursor, replacing the selection if there is one.
	 * Line endings are normalized to LF and tabs to spaces.
	 */
	insert(text: string): void {
		const normalized = this.#normalize(text);
		if (normalized.length === 0 && !this.selectionRange()) return;
		const range = this.selectionRange();
		if (range) {
			this.#replaceRange(range.start, range.end, normalized, "replace", false);
			return;
		}
		const single = normalized !== "\n" && nextBoundary(normalized, 0) === normalized.length;
		this.#replaceRange(this.#cursor, this.#cursor, normalized, "insert", single);
	}

	/** Insert a line break, carrying over the current line's leading whitespace. */
	insertNewline(): void {
		const start = this.selectionRange()?.start ?? this.#cursor;
		const line = this.getLine(start.line);
		let indentLength = 0;
		while (indentLength < line.length && indentLength < start.column && isWhitespaceChar(line[indentLength] ?? "")) {
			indentLength++;
		}
		this.insert(`\n${line.slice(0, indentLength)}`);
	}

	/** Insert one indent's worth of spaces, replacing the selection if any. */
	tab(): void {
		this.insert(" ".repeat(this.#tabWidth));
	}

	/** Delete the selection, or the character before the cursor (joining lines at column 0). */
	deleteBackward(): void {
		const range = this.selectionRange();
		if (range) {
			this.#replaceRange(range.start, range.end, "", "delete", false);
			return;
		}
		const { line, column } = this.#cursor;
		if (column > 0) {
			const from = { line, column: prevBoundary(this.getLine(line), column) };
			this.#replaceRange(from, this.#cursor, "", "delete", false);
		} else if (line > 0) {
			const from = { line: line - 1, column: this.getLine(line - 1).length };
			this.#replaceRange(from, this.#cursor, "", "delete", false);
		} else {
			this.#breakCoalescing();
		}
	}

	/** Delete the selection, or the character under the cursor (joining lines at line end). */
	deleteForward(): void {
		const range = this.selectionRange();
		if (range) {
			this.#replaceRange(range.start, range.end, "", "delete", false);
			return;
		}
		const { line, column } = this.#cursor;
		const text = this.getLine(line);
		if (column < text.length) {
			this.#replaceRange(this.#cursor, { line, column: nextBoundary(text, column) }, "", "delete", false);
		} else if (line < this.#lines.length - 1) {
			this.#replaceRange(this.#cursor, { line: line + 1, column: 0 }, "", "delete", false);
		} else {
			this.#breakCoalescing();
		}
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Cursor and selection
	// ─────────────────────────────────────────────────────────────────────────

	/**
	 * Move the cursor and drop any selection. With a selection, plain
	 * left/right collapse it to its start/end instead of moving.
	 */
	moveCursor(direction: Direction, granularity: Granularity = "character"): void {
		this.#breakCoalescing();
		const range = this.selectionRange();
		this.#selection = undefined;
		if (range && granularity === "character" && (direction === "left" || direction === "right")) {
			this.#cursor = direction === "left" ? range.start : range.end;
			this.#preferredColumn = undefined;
			return;
		}
		this.#cursor = this.#target(direction, granularity);
	}

	/** Move the cursor and grow the selection from where it started. */
	extendSelection(direction: Direction, granularity: Granularity = "character"): void {
		this.#breakCoalescing();
		const anchor = this.#selection?.anchor ?? this.#cursor;
		this.#cursor = this.#target(direction, granularity);
		this.#selection = { anchor, head: this.#cursor };
	}

	selectAll(): void {
		this.#breakCoalescing();
		const lastLine = this.#lines.length - 1;
		this.#cursor = { line: lastLine, column: this.getLine(lastLine).length };
		this.#selection = { anchor: { line: 0, column: 0 }, head: this.#cursor };
		this.#preferredColumn = undefined;
	}

	/** Place the cursor, clamped into the buffer. Clears the selection. */
	setCursor(position: Position): void {
		this.#breakCoalescing();
		this.#selection = undefined;
		this.#preferredColumn = undefined;
		this.#cursor = this.#clamp(position);
	}

	/**
	 * Scroll the viewport by the minimum amount that keeps the cursor inside a
	 * `rows` × `columns` window. Also records `rows` as the page size.
	 */
	ensureCursorVisible(rows: number, columns: number): Viewport {
		const height = Math.max(1, rows);
		const width = Math.max(1, columns);
		this.#pageLines = height;
		let { top, left } = this.#viewport;
		const { line, column } = this.#cursor;
		if (line < top) top = line;
		else if (line >= top + height) top = line - height + 1;
		top = Math.max(0, Math.min(top, this.#lines.length - 1));
		// `left` is a code unit offset; the window is measured in cells
		const text = this.getLine(line);
		left = codePointStart(text, Math.max(0, left));
		if (column < left) {
			left = column;
		} else {
			// The cursor may sit one past the last character, so it needs its own cell
			const cursorCells = column < text.length ? graphemeWidth(charAt(text, column)) : 1;
			let cells = cellsBetween(text, left, column);
			while (left < column && cells + cursorCells > width) {
				const next = nextBoundary(text, left);
				cells -= cellsBetween(text, left, next);
				left = next;
			}
		}
		if (top !== this.#viewport.top || left !== this.#viewport.left) {
			this.#viewport = { top, left };
		}
		return this.#viewport;
	}

	// ─────────────────────────────────────────────────────────────────────────
	// History
	// ─────────────────────────────────────────────────────────────────────────

	/** Revert the most recent edit. No-op when there is nothing to undo. */
	undo(): boolean {
		this.#coalesceOpen = false;
		const entry = this.#undo.pop();
		if (!entry) return false;
		this.#splice(entry.position, advance(entry.position, entry.insertedText), entry.removedText);
		this.#cursor = this.#clamp(entry.cursorBefore);
		this.#selection = entry.selectionBefore;
		this.#preferredColumn = undefined;
		this.#redo.push(entry);
		return true;
	}

	/** Re-apply the most recently undone edit. No-op when there is nothing to redo. */
	redo(): boolean {
		this.#coalesceOpen = false;
		const entry = this.#redo.pop();
		if (!entry) return false;
		this.#splice(entry.position, advance(entry.position, entry.removedText), entry.insertedText);
		this.#cursor = this.#clamp(entry.cursorAfter);
		this.#selection = undefined;
		this.#preferredColumn = undefined;
		this.#undo.push(entry);
		return true;
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Internals
	// ─────────────────────────────────────────────────────────────────────────

	#normalize(text: string): string {
		return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ".repeat(this.#tabWidth));
	}

	#breakCoalescing(): void {
		this.#coalesceOpen = false;
	}

	#clamp(position: Position): Position {
		const line = Math.max(0, Math.min(Math.trunc(position.line), this.#lines.length - 1));
		const column = Math.max(0, Math.min(Math.trunc(position.column), this.getLine(line).length));
		return { line, column };
	}

	#textBetween(start: Position, end: Position): string {
		if (start.line === end.line) {
			return this.getLine(start.line).slice(start.column, end.column);
		}
		const parts = [this.getLine(start.line).slice(start.column)];
		for (let line = start.line + 1; line < end.line; line++) {
			parts.push(this.getLine(line));
		}
		parts.push(this.getLine(end.line).slice(0, end.column));
		return parts.join("\n");
	}

	/** Raw content replacement with no history or cursor bookkeeping. */
	#splice(start: Position, end: Position, text: string): void {
		const before = this.getLine(start.line).slice(0, start.column);
		const after = this.getLine(end.line).slice(end.column);
		const inserted = (before + text + after).split("\n");
		this.#lines.splice(start.line, end.line - start.line + 1, ...inserted);
		this.#version++;
	}

	/** The one mutation primitive used by every edit operation. */
	#replaceRange(start: Position, end: Position, text: string, kind: UndoKind, coalescable: boolean): void {
		const removedText = this.#textBetween(start, end);
		const cursorBefore = this.#cursor;
		const selectionBefore = this.#selection;
		this.#splice(start, end, text);
		const cursorAfter = advance(start, text);
		this.#cursor = cursorAfter;
		this.#selection = undefined;
		this.#preferredColumn = undefined;
		this.#redo.clear();

		const now = this.#clock();
		const top = this.#undo.peek();
		if (
			coalescable &&
			this.#coalesceOpen &&
			top &&
			top.kind === "insert" &&
			samePosition(top.cursorAfter, start) &&
			now - top.timestamp <= this.#coalesceWindowMs
		) {
			this.#undo.pop();
			this.#undo.push({ ...top, insertedText: top.insertedText + text, cursorAfter, timestamp: now });
		} else {
			const entry: UndoEntry = { kind, position: start, removedText, insertedText: text, cursorBefore, cursorAfter, timestamp: now };
			this.#undo.push(selectionBefore ? { ...entry, selectionBefore } : entry);
		}
		this.#coalesceOpen = coalescable;
	}

	/** Where the cursor lands for a movement, without applying it. */
	#target(direction: Direction, granularity: Granularity): Position {
		const { line, column } = this.#cursor;
		const text = this.getLine(line);
		const lastLine = this.#lines.length - 1;

		if (direction === "left" || direction === "right") {
			this.#preferredColumn = undefined;
			switch (granularity) {
				case "character":
				case "page":
					if (direction === "left") {
						if (column > 0) return { line, column: prevBoundary(text, column) };
						return line > 0 ? { line: line - 1, column: this.getLine(line - 1).length } : this.#cursor;
					}
					if (column < text.length) return { line, column: nextBoundary(text, column) };
					return line < lastLine ? { line: line + 1, column: 0 } : this.#cursor;
				case "word":
					return direction === "left" ? this.#wordLeft() : this.#wordRight();
				case "lineBoundary":
					return { line, column: direction === "left" ? 0 : text.length };
			}
		}

		// Vertical
		if (granularity === "lineBoundary") {
			this.#preferredColumn = undefined;
			return direction === "up" ? { line: 0, column: 0 } : { line: lastLine, column: this.getLine(lastLine).length };
		}
		const step = granularity === "page" ? this.#pageLines : 1;
		const targetLine = direction === "up" ? Math.max(0, line - step) : Math.min(lastLine, line + step);
		if (targetLine === line) return this.#cursor;
		const preferred = this.#preferredColumn ?? column;
		this.#preferredColumn = preferred;
		return { line: targetLine, column: Math.min(preferred, this.getLine(targetLine).length) };
	}

	/** Skip non-word characters, then word characters, to the left. Crosses to the previous line at column 0. */
	#wordLeft(): Position {
		const { line, column } = this.#cursor;
		if (column === 0) {
			return line > 0 ? { line: line - 1, column: this.getLine(line - 1).length } : this.#cursor;
		}
		const text = this.getLine(line);
		let col = column;
		while (col > 0 && !isWordChar(charBefore(text, col))) col = prevBoundary(text, col);
		while (col > 0 && isWordChar(charBefore(text, col))) col = prevBoundary(text, col);
		return { line, column: col };
	}

	/** Skip non-word characters, then word characters, to the right. Crosses to the next line at line end. */
	#wordRight(): Position {
		const { line, column } = this.#cursor;
		const text = this.getLine(line);
		if (column >= text.length) {
			return line < this.#lines.length - 1 ? { line: line + 1, column: 0 } : this.#cursor;
		}
		let col = column;
		while (col < text.length && !isWordChar(charAt(text, col))) col = nextBoundary(text, col);
		while (col < text.length && isWordChar(charAt(text, col))) col = nextBoundary(text, col);
		return { line, column: col };
	}
}

import type { Color, Style } from "./style";
import { graphemes, graphemeWidth, sanitizeText } from "./utils";

/**
 * One terminal cell. `char` is a single grapheme, or `""` for the right half
 * of a wide glyph that starts in the cell to its left.
 */
export interface Cell {
	readonly char: string;
	readonly fg: Color;
	readonly bg: Color;
	readonly attrs: number;
}

export const BLANK_CELL: Cell = { char: " ", fg: "default", bg: "default", attrs: 0 };

export function cellStyle(cell: Cell): Style {
	return { fg: cell.fg, bg: cell.bg, attrs: cell.attrs };
}

export function sameCell(a: Cell, b: Cell): boolean {
	return a.char === b.char && a.fg === b.fg && a.bg === b.bg && a.attrs === b.attrs;
}

/** Ordered drawing primitives. Coordinates are absolute, zero-based. */
export type DrawCommand =
	| { readonly op: "text"; readonly row: number; readonly col: number; readonly text: string; readonly style: Style }
	| {
			readonly op: "fill";
			readonly row: number;
			readonly col: number;
			readonly width: number;
			readonly height: number;
			readonly char: string;
			readonly style: Style;
	  }
	| {
			readonly op: "hline" | "vline";
			readonly row: number;
			readonly col: number;
			readonly length: number;
			readonly char: string;
			readonly style: Style;
	  };

/** A width × height grid of cells stamped with a generation id. */
export class FrameBuffer {
	#cells: Cell[];
	#generation = 0;

	constructor(
		readonly width: number,
		readonly height: number,
	) {
		this.#cells = new Array<Cell>(Math.max(0, width * height)).fill(BLANK_CELL);
	}

	/** Bumped on every clear; identifies which compose produced the contents. */
	get generation(): number {
		return this.#generation;
	}

	get(row: number, col: number): Cell {
		if (!this.#inBounds(row, col)) return BLANK_CELL;
		return this.#cells[row * this.width + col] ?? BLANK_CELL;
	}

	/** Returns false (and does nothing) outside the grid. */
	set(row: number, col: number, cell: Cell): boolean {
		if (!this.#inBounds(row, col)) return false;
		const index = row * this.width + col;
		// Overwriting half of a wide glyph blanks its other half
		const existing = this.#cells[index];
		if (existing?.char === "") {
			const left = col > 0 ? this.#cells[index - 1] : undefined;
			if (left) this.#cells[index - 1] = { ...left, char: " " };
		} else {
			const right = col + 1 < this.width ? this.#cells[index + 1] : undefined;
			if (right?.char === "") this.#cells[index + 1] = { ...right, char: " " };
		}
		this.#cells[index] = cell;
		return true;
	}

	clear(): void {
		this.#cells.fill(BLANK_CELL);
		this.#generation++;
	}

	/** Copy contents and generation from a buffer of the same size. */
	copyFrom(other: FrameBuffer): void {
		if (other.width !== this.width || other.height !== this.height) {
			throw new RangeError(
				`Cannot copy ${other.width}x${other.height} frame into ${this.width}x${this.height} frame`,
			);
		}
		for (let i = 0; i < this.#cells.length; i++) {
			this.#cells[i] = other.#cells[i] ?? BLANK_CELL;
		}
		this.#generation = other.#generation;
	}

	/** Plain text of one row, mostly for tests and debugging. */
	rowText(row: number): string {
		let out = "";
		for (let col = 0; col < this.width; col++) {
			out += this.get(row, col).char;
		}
		return out;
	}

	#inBounds(row: number, col: number): boolean {
		return Number.isInteger(row) && Number.isInteger(col) && row >= 0 && col >= 0 && row < this.height && col < this.width;
	}
}

function writeText(buffer: FrameBuffer, row: number, col: number, text: string, s: Style): void {
	if (row < 0 || row >= buffer.height) return;
	let x = col;
	for (const g of graphemes(sanitizeText(text))) {
		if (x >= buffer.width) break;
		const w = graphemeWidth(g);
		if (x >= 0) {
			if (w === 2 && x + 1 >= buffer.width) {
				// Wide glyph would straddle the right edge
				buffer.set(row, x, { char: " ", fg: s.fg, bg: s.bg, attrs: s.attrs });
			} else {
				buffer.set(row, x, { char: g, fg: s.fg, bg: s.bg, attrs: s.attrs });
				if (w === 2) buffer.set(row, x + 1, { char: "", fg: s.fg, bg: s.bg, attrs: s.attrs });
			}
		}
		x += w;
	}
}

function fillRect(buffer: FrameBuffer, row: number, col: number, width: number, height: number, char: string, s: Style): void {
	const glyph = graphemes(sanitizeText(char))[0] ?? " ";
	const cell: Cell = { char: graphemeWidth(glyph) === 1 ? glyph : " ", fg: s.fg, bg: s.bg, attrs: s.attrs };
	const top = Math.max(0, row);
	const left = Math.max(0, col);
	const bottom = Math.min(buffer.height, row + height);
	const right = Math.min(buffer.width, col + width);
	for (let r = top; r < bottom; r++) {
		for (let c = left; c < right; c++) {
			buffer.set(r, c, cell);
		}
	}
}

/** Apply one command. Anything outside the grid is clipped, never an error. */
export function applyDrawCommand(buffer: FrameBuffer, command: DrawCommand): void {
	switch (command.op) {
		case "text":
			writeText(buffer, command.row, command.col, command.text, command.style);
			return;
		case "fill":
			fillRect(buffer, command.row, command.col, command.width, command.height, command.char, command.style);
			return;
		case "hline":
			fillRect(buffer, command.row, command.col, command.length, 1, command.char, command.style);
			return;
		case "vline":
			fillRect(buffer, command.row, command.col, 1, command.length, command.char, command.style);
			return;
		default: {
			const exhaustive: never = command;
			throw new Error(`Unknown draw command: ${JSON.stringify(exhaustive)}`);
		}
	}
}

/** Clear the buffer and apply the commands in order. */
export function composeFrame(buffer: FrameBuffer, commands: Iterable<DrawCommand>): FrameBuffer {
	buffer.clear();
	for (const command of commands) {
		applyDrawCommand(buffer, command);
	}
	return buffer;
}

import { logger } from "@leetterm/utils";
import { type Cell, cellStyle, composeFrame, type DrawCommand, FrameBuffer, sameCell } from "./frame-buffer";
import { DEFAULT_STYLE, type Style, sgr, styleEquals } from "./style";
import type { Terminal } from "./terminal";

/** A horizontal span of changed cells that share one style. */
export interface Run {
	readonly row: number;
	readonly col: number;
	/** Concatenated glyphs; continuation halves of wide glyphs contribute nothing. */
	readonly text: string;
	/** Number of cells covered. */
	readonly width: number;
	readonly style: Style;
}

const SYNC_BEGIN = "\x1b[?2026h";
const SYNC_END = "\x1b[?2026l";
const RESET_AND_CLEAR = "\x1b[0m\x1b[2J";

function sameStyle(a: Cell, b: Cell): boolean {
	return a.fg === b.fg && a.bg === b.bg && a.attrs === b.attrs;
}

/**
 * Changed-cell runs between two frames, row-major.
 * A `null` previous frame means every cell counts as changed.
 */
export function diffFrames(candidate: FrameBuffer, previous: FrameBuffer | null): Run[] {
	const runs: Run[] = [];
	const base = previous && previous.width === candidate.width && previous.height === candidate.height ? previous : null;
	for (let row = 0; row < candidate.height; row++) {
		let start = -1;
		let text = "";
		let first: Cell | undefined;
		const close = (end: number) => {
			if (first) runs.push({ row, col: start, text, width: end - start, style: cellStyle(first) });
			start = -1;
			text = "";
			first = undefined;
		};
		for (let col = 0; col < candidate.width; col++) {
			const cell = candidate.get(row, col);
			const changed = !base || !sameCell(cell, base.get(row, col));
			if (!changed) {
				close(col);
				continue;
			}
			if (first && !sameStyle(first, cell)) close(col);
			if (!first) {
				first = cell;
				start = col;
			}
			text += cell.char;
		}
		close(candidate.width);
	}
	return runs;
}

/**
 * Terminal bytes for a list of runs: cursor position, SGR when the style
 * changes, then the glyphs. `currentStyle` is what the terminal is known to
 * have before the first run, or undefined if unknown.
 */
export function encodeRuns(runs: readonly Run[], currentStyle?: Style): string {
	let out = "";
	let active = currentStyle;
	for (const run of runs) {
		out += `\x1b[${run.row + 1};${run.col + 1}H`;
		if (!active || !styleEquals(active, run.style)) {
			out += sgr(run.style);
			active = run.style;
		}
		out += run.text;
	}
	return out;
}

/**
 * Double-buffered renderer: compose into `current`, diff against `previous`,
 * write only the delta, then promote `current` to `previous`.
 */
export class Renderer {
	#current: FrameBuffer;
	#previous: FrameBuffer;
	#previousValid = false;
	#fullRedraws = 0;

	constructor(
		readonly terminal: Terminal,
		columns: number = terminal.columns,
		rows: number = terminal.rows,
	) {
		this.#current = new FrameBuffer(columns, rows);
		this.#previous = new FrameBuffer(columns, rows);
	}

	get columns(): number {
		return this.#current.width;
	}

	get rows(): number {
		return this.#current.height;
	}

	/** Number of flushes that repainted every cell. */
	get fullRedraws(): number {
		return this.#fullRedraws;
	}

	/** The frame being built. Exposed read-only for inspection. */
	get current(): FrameBuffer {
		return this.#current;
	}

	compose(commands: Iterable<DrawCommand>): FrameBuffer {
		return composeFrame(this.#current, commands);
	}

	diff(): Run[] {
		return diffFrames(this.#current, this.#previousValid ? this.#previous : null);
	}

	/** Write the runs and promote `current` to `previous`. Returns the bytes written. */
	flush(runs: readonly Run[]): string {
		const full = !this.#previousValid;
		let output = "";
		if (full) {
			output = RESET_AND_CLEAR + encodeRuns(runs, DEFAULT_STYLE);
		} else if (runs.length > 0) {
			output = encodeRuns(runs);
		}
		if (output) {
			this.terminal.write(SYNC_BEGIN + output + SYNC_END);
		}
		this.#previous.copyFrom(this.#current);
		this.#previousValid = true;
		if (full) {
			this.#fullRedraws++;
			logger.debug("Full repaint", { columns: this.columns, rows: this.rows, count: this.#fullRedraws });
		}
		return output;
	}

	/** compose + diff + flush. */
	render(commands: Iterable<DrawCommand>): Run[] {
		this.compose(commands);
		const runs = this.diff();
		this.flush(runs);
		return runs;
	}

	/** Reallocate both frames; the next flush repaints everything. */
	resize(columns: number, rows: number): void {
		this.#current = new FrameBuffer(columns, rows);
		this.#previous = new FrameBuffer(columns, rows);
		this.#previousValid = false;
	}

	/** Forget what is on screen; the next flush repaints everything. */
	invalidate(): void {
		this.#previousValid = false;
	}
}

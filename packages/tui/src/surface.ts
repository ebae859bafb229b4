import type { DrawCommand } from "./frame-buffer";
import { DEFAULT_STYLE, type Style } from "./style";
import { graphemes, graphemeWidth, sanitizeText } from "./utils";

/** Absolute rectangle in terminal cells. */
export interface Rect {
	readonly row: number;
	readonly col: number;
	readonly width: number;
	readonly height: number;
}

export function intersectRect(a: Rect, b: Rect): Rect {
	const row = Math.max(a.row, b.row);
	const col = Math.max(a.col, b.col);
	const bottom = Math.min(a.row + a.height, b.row + b.height);
	const right = Math.min(a.col + a.width, b.col + b.width);
	return { row, col, width: Math.max(0, right - col), height: Math.max(0, bottom - row) };
}

/**
 * Drawing handle for one rectangular region. Coordinates passed to the draw
 * methods are local to the region; output is translated and clipped, then
 * recorded as draw commands shared with every surface cut from the same root.
 */
export class Surface {
	readonly #commands: DrawCommand[];

	constructor(
		readonly rect: Rect,
		commands: DrawCommand[] = [],
	) {
		this.#commands = commands;
	}

	get width(): number {
		return this.rect.width;
	}

	get height(): number {
		return this.rect.height;
	}

	get commands(): readonly DrawCommand[] {
		return this.#commands;
	}

	/** Child surface for a local rectangle, clipped to this one. */
	sub(local: Rect): Surface {
		const absolute = { row: this.rect.row + local.row, col: this.rect.col + local.col, width: local.width, height: local.height };
		return new Surface(intersectRect(this.rect, absolute), this.#commands);
	}

	/** Draw text on one row; anything outside the region is dropped. Returns the column after the text. */
	text(row: number, col: number, text: string, style: Style = DEFAULT_STYLE): number {
		let x = col;
		if (row < 0 || row >= this.height) {
			for (const g of graphemes(text)) x += graphemeWidth(g);
			return x;
		}
		let kept = "";
		let keptStart = -1;
		for (const g of graphemes(sanitizeText(text))) {
			const w = graphemeWidth(g);
			if (x >= 0 && x + w <= this.width) {
				if (keptStart < 0) keptStart = x;
				kept += g;
			}
			x += w;
		}
		if (keptStart >= 0) {
			this.#commands.push({ op: "text", row: this.rect.row + row, col: this.rect.col + keptStart, text: kept, style });
		}
		return x;
	}

	fill(row: number, col: number, width: number, height: number, char = " ", style: Style = DEFAULT_STYLE): void {
		const area = intersectRect(this.rect, {
			row: this.rect.row + row,
			col: this.rect.col + col,
			width,
			height,
		});
		if (area.width === 0 || area.height === 0) return;
		this.#commands.push({ op: "fill", ...area, char, style });
	}

	/** Fill the whole region. */
	clear(style: Style = DEFAULT_STYLE): void {
		this.fill(0, 0, this.width, this.height, " ", style);
	}

	hline(row: number, col: number, length: number, char: string, style: Style = DEFAULT_STYLE): void {
		const area = intersectRect(this.rect, { row: this.rect.row + row, col: this.rect.col + col, width: length, height: 1 });
		if (area.width === 0 || area.height === 0) return;
		this.#commands.push({ op: "hline", row: area.row, col: area.col, length: area.width, char, style });
	}

	vline(row: number, col: number, length: number, char: string, style: Style = DEFAULT_STYLE): void {
		const area = intersectRect(this.rect, { row: this.rect.row + row, col: this.rect.col + col, width: 1, height: length });
		if (area.width === 0 || area.height === 0) return;
		this.#commands.push({ op: "vline", row: area.row, col: area.col, length: area.height, char, style });
	}
}

import { type KeyEvent, matchesKey, type Style, type Surface, wrapText } from "@leetterm/tui";
import { theme } from "../theme";

export interface StyledLine {
	readonly text: string;
	readonly style: Style;
}

export function line(text: string, lineStyle: Style = theme.text): StyledLine {
	return { text, style: lineStyle };
}

/**
 * Read-only scrolling text body. Lines are word-wrapped to the surface width
 * at draw time; the offset is clamped so the last page stays full.
 */
export class ScrollView {
	readonly #lines: readonly StyledLine[];
	#offset = 0;
	#height = 1;
	#wrapped: StyledLine[] = [];
	#wrappedWidth = -1;

	constructor(lines: readonly StyledLine[] = []) {
		this.#lines = lines;
	}

	get offset(): number {
		return this.#offset;
	}

	/** Scroll keys: j/k, arrows, PageUp/PageDown, Home/End. Returns false for anything else. */
	handleKey(event: KeyEvent): boolean {
		if (matchesKey(event, "j") || matchesKey(event, "down")) this.scrollBy(1);
		else if (matchesKey(event, "k") || matchesKey(event, "up")) this.scrollBy(-1);
		else if (matchesKey(event, "pageDown")) this.scrollBy(this.#height);
		else if (matchesKey(event, "pageUp")) this.scrollBy(-this.#height);
		else if (matchesKey(event, "home")) this.#offset = 0;
		else if (matchesKey(event, "end")) this.#offset = this.#maxOffset();
		else return false;
		return true;
	}

	scrollBy(delta: number): void {
		this.#offset = Math.max(0, Math.min(this.#offset + delta, this.#maxOffset()));
	}

	draw(surface: Surface): void {
		this.#height = Math.max(1, surface.height);
		const wrapped = this.#wrap(surface.width);
		this.#offset = Math.min(this.#offset, this.#maxOffset());
		for (let row = 0; row < surface.height; row++) {
			const entry = wrapped[this.#offset + row];
			if (!entry) break;
			surface.text(row, 0, entry.text, entry.style);
		}
	}

	#maxOffset(): number {
		return Math.max(0, this.#wrapped.length - this.#height);
	}

	#wrap(width: number): StyledLine[] {
		if (width !== this.#wrappedWidth) {
			this.#wrapped = this.#lines.flatMap(entry => wrapText(entry.text, width).map(text => line(text, entry.style)));
			this.#wrappedWidth = width;
		}
		return this.#wrapped;
	}
}

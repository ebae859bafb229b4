import { EventEmitter } from "node:events";

const ESC = "\x1b";
const PASTE_START = "\x1b[200~";
const PASTE_END = "\x1b[201~";

export interface StdinBufferOptions {
	/**
	 * How long an unfinished escape sequence may wait for its next byte before
	 * it is flushed as-is. A lone ESC becomes the Escape key after this window.
	 */
	timeout?: number;
}

type Extracted = { kind: "complete"; sequence: string } | { kind: "incomplete" };

function codePointLength(text: string, index: number): number {
	const code = text.codePointAt(index);
	return code !== undefined && code > 0xffff ? 2 : 1;
}

/** Pull the first whole input sequence off the front of `buffer`. */
function extractSequence(buffer: string): Extracted {
	if (buffer[0] !== ESC) {
		return { kind: "complete", sequence: buffer.slice(0, codePointLength(buffer, 0)) };
	}
	if (buffer.length === 1) return { kind: "incomplete" };

	const next = buffer[1];
	if (next === "[") {
		// CSI: parameters and intermediates, then one final byte in @..~
		for (let i = 2; i < buffer.length; i++) {
			const code = buffer.charCodeAt(i);
			if (code >= 0x40 && code <= 0x7e) {
				return { kind: "complete", sequence: buffer.slice(0, i + 1) };
			}
			if (code < 0x20 || code > 0x3f) {
				// Not a parameter or intermediate byte: the sequence is malformed, cut it here
				return { kind: "complete", sequence: buffer.slice(0, i) };
			}
		}
		return { kind: "incomplete" };
	}
	if (next === "O") {
		if (buffer.length < 3) return { kind: "incomplete" };
		return { kind: "complete", sequence: buffer.slice(0, 3) };
	}
	if (next === ESC) {
		return { kind: "complete", sequence: ESC };
	}
	// Alt+key
	return { kind: "complete", sequence: buffer.slice(0, 1 + codePointLength(buffer, 1)) };
}

export interface StdinBuffer {
	on(event: "data", listener: (sequence: string) => void): this;
	on(event: "paste", listener: (content: string) => void): this;
	emit(event: "data", sequence: string): boolean;
	emit(event: "paste", content: string): boolean;
}

/**
 * Splits raw stdin chunks into individual key sequences.
 *
 * Terminals deliver bytes in arbitrary chunks: several keys in one read, or
 * one escape sequence spread across reads. Emits `data` once per complete
 * sequence and `paste` once per bracketed paste body.
 */
export class StdinBuffer extends EventEmitter {
	#buffer = "";
	#pasting = false;
	#pasteBuffer = "";
	#timer: NodeJS.Timeout | undefined;
	readonly #timeout: number;

	constructor(options: StdinBufferOptions = {}) {
		super();
		this.#timeout = options.timeout ?? 25;
	}

	process(data: string | Buffer): void {
		this.#clearTimer();
		this.#buffer += typeof data === "string" ? data : data.toString("utf8");
		this.#drain();
		if (this.#buffer.length > 0 && !this.#pasting) {
			this.#timer = setTimeout(() => {
				this.#timer = undefined;
				this.flush();
			}, this.#timeout);
		}
	}

	/** Emit whatever is pending as one sequence, complete or not. */
	flush(): void {
		this.#clearTimer();
		if (this.#pasting || this.#buffer.length === 0) return;
		const pending = this.#buffer;
		this.#buffer = "";
		this.emit("data", pending);
	}

	get pending(): string {
		return this.#buffer;
	}

	destroy(): void {
		this.#clearTimer();
		this.#buffer = "";
		this.#pasteBuffer = "";
		this.#pasting = false;
		this.removeAllListeners();
	}

	#drain(): void {
		while (this.#buffer.length > 0) {
			if (this.#pasting) {
				const end = this.#buffer.indexOf(PASTE_END);
				if (end === -1) {
					// Keep a possible partial end marker in the buffer
					const keep = this.#partialMarkerLength(this.#buffer);
					this.#pasteBuffer += this.#buffer.slice(0, this.#buffer.length - keep);
					this.#buffer = this.#buffer.slice(this.#buffer.length - keep);
					return;
				}
				const content = this.#pasteBuffer + this.#buffer.slice(0, end);
				this.#buffer = this.#buffer.slice(end + PASTE_END.length);
				this.#pasteBuffer = "";
				this.#pasting = false;
				this.emit("paste", content);
				continue;
			}
			if (this.#buffer.startsWith(PASTE_START)) {
				this.#buffer = this.#buffer.slice(PASTE_START.length);
				this.#pasting = true;
				continue;
			}
			const extracted = extractSequence(this.#buffer);
			if (extracted.kind === "incomplete") return;
			this.#buffer = this.#buffer.slice(extracted.sequence.length);
			this.emit("data", extracted.sequence);
		}
	}

	#partialMarkerLength(text: string): number {
		for (let len = Math.min(PASTE_END.length - 1, text.length); len > 0; len--) {
			if (PASTE_END.startsWith(text.slice(text.length - len))) return len;
		}
		return 0;
	}

	#clearTimer(): void {
		if (this.#timer) {
			clearTimeout(this.#timer);
			this.#timer = undefined;
		}
	}
}

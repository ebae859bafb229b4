import { logger } from "@leetterm/utils";
import type { InputEvent } from "./events";
import type { EventQueue } from "./event-queue";
import { parseKey } from "./keys";

const PASTE_START = "\x1b[200~";
const PASTE_END = "\x1b[201~";

/**
 * Turns raw sequences from a `Terminal` into `InputEvent`s on a queue.
 * Sequences that decode to nothing are dropped.
 */
export class InputDecoder<P> {
	constructor(readonly queue: EventQueue<InputEvent<P>>) {}

	/** Handler for `Terminal.start`'s input callback. */
	readonly onInput = (data: string): void => {
		if (data.startsWith(PASTE_START) && data.endsWith(PASTE_END)) {
			const text = data.slice(PASTE_START.length, data.length - PASTE_END.length);
			this.queue.push({ type: "paste", text: text.replace(/\r\n?/g, "\n") });
			return;
		}
		const event = parseKey(data);
		if (!event) {
			logger.debug("Discarding unrecognized input", { sequence: JSON.stringify(data) });
			return;
		}
		this.queue.push(event);
	};

	/** Queue a resize event with the terminal's new dimensions. */
	resize(columns: number, rows: number): void {
		this.queue.push({ type: "resize", columns, rows });
	}
}

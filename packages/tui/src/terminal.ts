import { logger } from "@leetterm/utils";
import { TerminalUnsupportedError } from "./errors";
import { StdinBuffer } from "./stdin-buffer";

/**
 * Minimal terminal interface for the UI engine.
 */
export interface Terminal {
	/** Take over the terminal and start delivering input sequences. */
	start(onInput: (data: string) => void, onResize: () => void): void;

	/** Undo everything `start` changed. Safe to call more than once. */
	stop(): void;

	write(data: string): void;

	get columns(): number;
	get rows(): number;

	hideCursor(): void;
	showCursor(): void;
}

// Track active terminal for emergency cleanup on crash
let activeTerminal: Terminal | null = null;
// Track if a terminal was ever started (for emergency restore logic)
let terminalEverStarted = false;

/** Make `terminal` the one `emergencyTerminalRestore` stops. */
export function trackTerminal(terminal: Terminal): void {
	activeTerminal = terminal;
	terminalEverStarted = true;
}

/** Forget `terminal` if it is the tracked one. */
export function untrackTerminal(terminal: Terminal): void {
	if (activeTerminal === terminal) {
		activeTerminal = null;
	}
}

const ENTER_ALT_SCREEN = "\x1b[?1049h";
const LEAVE_ALT_SCREEN = "\x1b[?1049l";
const ENABLE_BRACKETED_PASTE = "\x1b[?2004h";
const DISABLE_BRACKETED_PASTE = "\x1b[?2004l";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const RESET_STYLE = "\x1b[0m";

/**
 * Emergency terminal restore - call this from signal/crash handlers.
 * Resets terminal state without requiring access to the ProcessTerminal instance.
 * Never throws.
 */
export function emergencyTerminalRestore(): void {
	try {
		const terminal = activeTerminal;
		if (terminal) {
			terminal.stop();
		} else if (terminalEverStarted) {
			// Blind restore only if we know a terminal was started but lost track of it
			process.stdout.write(RESET_STYLE + DISABLE_BRACKETED_PASTE + SHOW_CURSOR + LEAVE_ALT_SCREEN);
			if (process.stdin.isTTY) {
				process.stdin.setRawMode(false);
			}
		}
	} catch (err) {
		// Terminal may already be dead during crash cleanup
		logger.warn("Emergency terminal restore failed", { error: err });
	}
}

export interface ProcessTerminalOptions {
	/** Lone-ESC disambiguation window in milliseconds. */
	escapeTimeoutMs?: number;
}

/**
 * Real terminal using process.stdin/stdout.
 */
export class ProcessTerminal implements Terminal {
	#wasRaw = false;
	#started = false;
	#dead = false;
	#inputHandler?: (data: string) => void;
	#resizeHandler?: () => void;
	#stdinBuffer?: StdinBuffer;
	#stdinDataHandler?: (data: string) => void;
	readonly #escapeTimeoutMs: number;

	constructor(options: ProcessTerminalOptions = {}) {
		this.#escapeTimeoutMs = options.escapeTimeoutMs ?? 25;
	}

	/** Fails with TerminalUnsupportedError when stdin/stdout is not an ANSI-capable TTY. */
	static assertSupported(): void {
		if (!process.stdin.isTTY || !process.stdout.isTTY) {
			throw new TerminalUnsupportedError("leetterm needs an interactive terminal (stdin and stdout must be a TTY)", {
				stdin: Boolean(process.stdin.isTTY),
				stdout: Boolean(process.stdout.isTTY),
			});
		}
		if (process.env.TERM === "dumb") {
			throw new TerminalUnsupportedError("TERM=dumb does not support cursor positioning", { term: "dumb" });
		}
	}

	start(onInput: (data: string) => void, onResize: () => void): void {
		if (this.#started) return;
		ProcessTerminal.assertSupported();
		this.#inputHandler = onInput;
		this.#resizeHandler = onResize;

		trackTerminal(this);
		this.#started = true;

		// Save previous state and enable raw mode
		this.#wasRaw = process.stdin.isRaw || false;
		process.stdin.setRawMode(true);
		process.stdin.setEncoding("utf8");
		process.stdin.resume();

		this.#safeWrite(ENTER_ALT_SCREEN + ENABLE_BRACKETED_PASTE + HIDE_CURSOR);

		process.stdout.on("resize", this.#resizeHandler);

		this.#stdinBuffer = new StdinBuffer({ timeout: this.#escapeTimeoutMs });
		this.#stdinBuffer.on("data", sequence => {
			this.#inputHandler?.(sequence);
		});
		// Re-wrap paste content with bracketed paste markers so the decoder sees one unit
		this.#stdinBuffer.on("paste", content => {
			this.#inputHandler?.(`\x1b[200~${content}\x1b[201~`);
		});
		const buffer = this.#stdinBuffer;
		this.#stdinDataHandler = (data: string) => {
			buffer.process(data);
		};
		process.stdin.on("data", this.#stdinDataHandler);
	}

	stop(): void {
		if (!this.#started) return;
		this.#started = false;
		untrackTerminal(this);

		this.#safeWrite(RESET_STYLE + DISABLE_BRACKETED_PASTE + SHOW_CURSOR + LEAVE_ALT_SCREEN);

		if (this.#stdinBuffer) {
			this.#stdinBuffer.destroy();
			this.#stdinBuffer = undefined;
		}
		if (this.#stdinDataHandler) {
			process.stdin.removeListener("data", this.#stdinDataHandler);
			this.#stdinDataHandler = undefined;
		}
		this.#inputHandler = undefined;
		if (this.#resizeHandler) {
			process.stdout.removeListener("resize", this.#resizeHandler);
			this.#resizeHandler = undefined;
		}

		// Pause stdin so buffered keystrokes are not replayed into the parent shell
		process.stdin.pause();
		if (process.stdin.isTTY) {
			process.stdin.setRawMode(this.#wasRaw);
		}
	}

	write(data: string): void {
		this.#safeWrite(data);
	}

	#safeWrite(data: string): void {
		if (this.#dead) return;
		try {
			process.stdout.write(data);
		} catch (err) {
			// Any write failure means terminal is dead - no recovery possible
			this.#dead = true;
			logger.warn("terminal is dead - no recovery possible", { error: err, bytes: data.length });
		}
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	hideCursor(): void {
		this.#safeWrite(HIDE_CURSOR);
	}

	showCursor(): void {
		this.#safeWrite(SHOW_CURSOR);
	}
}

/**
 * Run `fn` with the terminal started; the terminal is stopped on every exit
 * path, including a thrown error.
 */
export async function withTerminal<T>(
	terminal: Terminal,
	onInput: (data: string) => void,
	onResize: () => void,
	fn: () => Promise<T>,
): Promise<T> {
	terminal.start(onInput, onResize);
	try {
		return await fn();
	} finally {
		terminal.stop();
	}
}

/**
 * Restore the terminal on process exit, termination signals and crashes.
 * Returns a function that removes the handlers again.
 */
export function installTerminalGuards(): () => void {
	const onExit = () => emergencyTerminalRestore();
	const onSignal = (signal: NodeJS.Signals) => {
		emergencyTerminalRestore();
		logger.warn("Terminated by signal", { signal });
		process.exit(signal === "SIGINT" ? 130 : 143);
	};
	const onCrash = (err: unknown) => {
		emergencyTerminalRestore();
		logger.error("Uncaught error", { error: err });
		process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
		process.exit(1);
	};
	const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];
	process.on("exit", onExit);
	for (const signal of signals) process.on(signal, onSignal);
	process.on("uncaughtException", onCrash);
	process.on("unhandledRejection", onCrash);
	return () => {
		process.off("exit", onExit);
		for (const signal of signals) process.off(signal, onSignal);
		process.off("uncaughtException", onCrash);
		process.off("unhandledRejection", onCrash);
	};
}

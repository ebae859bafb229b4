/** Smallest terminal the screens can lay out in. */
export const MIN_COLUMNS = 40;
export const MIN_ROWS = 10;

/** stdin/stdout is not an interactive terminal, or it cannot interpret ANSI sequences. */
export class TerminalUnsupportedError extends Error {
	constructor(
		message: string,
		readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = "TerminalUnsupportedError";
	}
}

export class TerminalTooSmallError extends Error {
	constructor(
		readonly columns: number,
		readonly rows: number,
	) {
		super(`Terminal is ${columns}x${rows}; at least ${MIN_COLUMNS}x${MIN_ROWS} is required`);
		this.name = "TerminalTooSmallError";
	}
}

export function assertTerminalSize(columns: number, rows: number): void {
	if (columns < MIN_COLUMNS || rows < MIN_ROWS) {
		throw new TerminalTooSmallError(columns, rows);
	}
}

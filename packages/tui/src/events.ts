/**
 * Events consumed by the UI loop. Every source (keyboard, paste, terminal
 * resize, finished background request) funnels into this one union so the
 * loop has a single, totally ordered input stream.
 */

export type FunctionKey =
	| "f1"
	| "f2"
	| "f3"
	| "f4"
	| "f5"
	| "f6"
	| "f7"
	| "f8"
	| "f9"
	| "f10"
	| "f11"
	| "f12";

export type NamedKey =
	| "enter"
	| "tab"
	| "backspace"
	| "delete"
	| "insert"
	| "escape"
	| "up"
	| "down"
	| "left"
	| "right"
	| "home"
	| "end"
	| "pageUp"
	| "pageDown"
	| FunctionKey;

/** `"char"` is a printable character; its text is in `KeyEvent.text`. */
export type KeyName = NamedKey | "char";

export interface KeyEvent {
	readonly type: "key";
	readonly key: KeyName;
	/** The character for `"char"` keys. Lowercase letter for Ctrl combinations. */
	readonly text?: string;
	readonly ctrl: boolean;
	readonly alt: boolean;
	readonly shift: boolean;
}

export interface PasteEvent {
	readonly type: "paste";
	readonly text: string;
}

export interface ResizeEvent {
	readonly type: "resize";
	readonly columns: number;
	readonly rows: number;
}

/** A background request settled. `payload` is opaque to the engine. */
export interface CompletionEvent<P> {
	readonly type: "completion";
	readonly requestId: number;
	readonly payload: P;
}

export type InputEvent<P = unknown> = KeyEvent | PasteEvent | ResizeEvent | CompletionEvent<P>;

export function keyEvent(
	key: KeyName,
	modifiers: { text?: string; ctrl?: boolean; alt?: boolean; shift?: boolean } = {},
): KeyEvent {
	const event: KeyEvent = {
		type: "key",
		key,
		ctrl: modifiers.ctrl ?? false,
		alt: modifiers.alt ?? false,
		shift: modifiers.shift ?? false,
	};
	return modifiers.text === undefined ? event : { ...event, text: modifiers.text };
}

/** Text to insert for a plain printable key, or undefined for anything else. */
export function printableText(event: KeyEvent): string | undefined {
	if (event.key !== "char" || event.ctrl || event.alt) return undefined;
	return event.text;
}

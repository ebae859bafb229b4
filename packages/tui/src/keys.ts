/**
 * Decoding of single input sequences into key events, and key-id matching.
 *
 * Key ids are written the way users read them: "ctrl+t", "shift+left",
 * "ctrl+shift+right", "pageDown", "j", "/". Modifiers come first, in the
 * order ctrl, alt, shift.
 */
import { type FunctionKey, type KeyEvent, keyEvent, type NamedKey } from "./events";

const CSI_PATTERN = /^\x1b\[(\d*(?:;\d*)*)([A-Za-z~])$/;
const SS3_PATTERN = /^\x1bO([A-DHFPQRS])$/;

const CSI_LETTER_KEYS: Record<string, NamedKey> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
	P: "f1",
	Q: "f2",
	R: "f3",
	S: "f4",
};

const TILDE_KEYS: Record<number, NamedKey> = {
	1: "home",
	2: "insert",
	3: "delete",
	4: "end",
	5: "pageUp",
	6: "pageDown",
	7: "home",
	8: "end",
	11: "f1",
	12: "f2",
	13: "f3",
	14: "f4",
	15: "f5",
	17: "f6",
	18: "f7",
	19: "f8",
	20: "f9",
	21: "f10",
	23: "f11",
	24: "f12",
};

const FUNCTION_KEYS: ReadonlySet<string> = new Set<FunctionKey>([
	"f1",
	"f2",
	"f3",
	"f4",
	"f5",
	"f6",
	"f7",
	"f8",
	"f9",
	"f10",
	"f11",
	"f12",
]);

const NAMED_KEYS: ReadonlySet<string> = new Set<string>([
	"enter",
	"tab",
	"backspace",
	"delete",
	"insert",
	"escape",
	"up",
	"down",
	"left",
	"right",
	"home",
	"end",
	"pageUp",
	"pageDown",
	...FUNCTION_KEYS,
]);

interface Modifiers {
	ctrl: boolean;
	alt: boolean;
	shift: boolean;
}

/** xterm modifier parameter: 1 + (shift=1 | alt=2 | ctrl=4). */
function decodeModifier(param: string | undefined): Modifiers {
	const value = param ? Number.parseInt(param, 10) : 1;
	const bits = Number.isFinite(value) && value > 1 ? value - 1 : 0;
	return { shift: (bits & 1) !== 0, alt: (bits & 2) !== 0, ctrl: (bits & 4) !== 0 };
}

function parseControl(code: number): KeyEvent | undefined {
	switch (code) {
		case 0x0d:
		case 0x0a:
			return keyEvent("enter");
		case 0x09:
			return keyEvent("tab");
		case 0x7f:
		case 0x08:
			return keyEvent("backspace");
		case 0x1b:
			return keyEvent("escape");
		case 0x00:
			return keyEvent("char", { text: " ", ctrl: true });
	}
	if (code >= 0x01 && code <= 0x1a) {
		return keyEvent("char", { text: String.fromCharCode(code + 0x60), ctrl: true });
	}
	return undefined;
}

function parseCsi(params: string, final: string): KeyEvent | undefined {
	const parts = params.split(";");
	if (final === "~") {
		const key = TILDE_KEYS[Number.parseInt(parts[0] ?? "", 10)];
		if (!key) return undefined;
		return keyEvent(key, decodeModifier(parts[1]));
	}
	if (final === "Z") return keyEvent("tab", { shift: true });
	const key = CSI_LETTER_KEYS[final];
	if (!key) return undefined;
	// `CSI 1;5A` carries the modifier in the second parameter
	return keyEvent(key, decodeModifier(parts.length > 1 ? parts[1] : undefined));
}

function isSingleCodePoint(text: string): boolean {
	const code = text.codePointAt(0);
	if (code === undefined) return false;
	return text.length === (code > 0xffff ? 2 : 1);
}

/**
 * Decode one complete input sequence. Returns undefined for anything that is
 * not a recognizable key; the caller discards those.
 */
export function parseKey(sequence: string): KeyEvent | undefined {
	if (sequence.length === 0) return undefined;

	if (sequence.length === 1) {
		const code = sequence.charCodeAt(0);
		if (code < 0x20 || code === 0x7f) return parseControl(code);
		return keyEvent("char", { text: sequence });
	}

	const csi = CSI_PATTERN.exec(sequence);
	if (csi) return parseCsi(csi[1] ?? "", csi[2] ?? "");

	const ss3 = SS3_PATTERN.exec(sequence);
	if (ss3) {
		const key = CSI_LETTER_KEYS[ss3[1] ?? ""];
		return key ? keyEvent(key) : undefined;
	}

	if (sequence[0] === "\x1b") {
		const rest = sequence.slice(1);
		if (rest === "[" || !isSingleCodePoint(rest)) return undefined;
		const inner = parseKey(rest);
		if (!inner || inner.key === "escape") return undefined;
		return { ...inner, alt: true };
	}

	// A lone astral code point (emoji); longer strings are not keys
	if (isSingleCodePoint(sequence) && sequence.charCodeAt(0) >= 0x20) {
		return keyEvent("char", { text: sequence });
	}
	return undefined;
}

/** Canonical id of an event, e.g. "ctrl+shift+left" or "J". */
export function keyId(event: KeyEvent): string {
	const prefix = `${event.ctrl ? "ctrl+" : ""}${event.alt ? "alt+" : ""}${event.shift ? "shift+" : ""}`;
	if (event.key === "char") {
		const text = event.text ?? "";
		return prefix + (text === " " ? "space" : text);
	}
	return prefix + event.key;
}

/**
 * Match an event against a key id such as "ctrl+z", "shift+tab" or "q".
 * Modifiers must match exactly; letter case is significant for plain keys only.
 */
export function matchesKey(event: KeyEvent, id: string): boolean {
	const parts = id.split("+");
	const base = parts.pop() ?? "";
	const wanted: Modifiers = { ctrl: false, alt: false, shift: false };
	for (const part of parts) {
		if (part === "ctrl" || part === "alt" || part === "shift") wanted[part] = true;
		else return false;
	}
	if (wanted.ctrl !== event.ctrl || wanted.alt !== event.alt || wanted.shift !== event.shift) return false;
	if (NAMED_KEYS.has(base)) return event.key === base;
	if (event.key !== "char") return false;
	const text = event.text === " " ? "space" : (event.text ?? "");
	return event.ctrl ? text.toLowerCase() === base.toLowerCase() : text === base;
}

import { describe, expect, it } from "vitest";
import { keyEvent } from "../src/events";
import { keyId, matchesKey, parseKey } from "../src/keys";

describe("parseKey", () => {
	it("decodes plain and modified arrows", () => {
		expect(parseKey("\x1b[A")).toEqual(keyEvent("up"));
		expect(parseKey("\x1bOB")).toEqual(keyEvent("down"));
		expect(parseKey("\x1b[1;5C")).toEqual(keyEvent("right", { ctrl: true }));
		expect(parseKey("\x1b[1;2D")).toEqual(keyEvent("left", { shift: true }));
		expect(parseKey("\x1b[1;6C")).toEqual(keyEvent("right", { ctrl: true, shift: true }));
		expect(parseKey("\x1b[1;3A")).toEqual(keyEvent("up", { alt: true }));
	});

	it("decodes tilde keys", () => {
		expect(parseKey("\x1b[3~")).toEqual(keyEvent("delete"));
		expect(parseKey("\x1b[5~")).toEqual(keyEvent("pageUp"));
		expect(parseKey("\x1b[6~")).toEqual(keyEvent("pageDown"));
		expect(parseKey("\x1b[1~")).toEqual(keyEvent("home"));
		expect(parseKey("\x1b[4~")).toEqual(keyEvent("end"));
		expect(parseKey("\x1b[15~")).toEqual(keyEvent("f5"));
		expect(parseKey("\x1b[3;5~")).toEqual(keyEvent("delete", { ctrl: true }));
	});

	it("decodes home/end, function keys and shift+tab", () => {
		expect(parseKey("\x1b[H")).toEqual(keyEvent("home"));
		expect(parseKey("\x1b[F")).toEqual(keyEvent("end"));
		expect(parseKey("\x1b[1;5H")).toEqual(keyEvent("home", { ctrl: true }));
		expect(parseKey("\x1bOP")).toEqual(keyEvent("f1"));
		expect(parseKey("\x1b[Z")).toEqual(keyEvent("tab", { shift: true }));
	});

	it("decodes control bytes", () => {
		expect(parseKey("\r")).toEqual(keyEvent("enter"));
		expect(parseKey("\t")).toEqual(keyEvent("tab"));
		expect(parseKey("\x7f")).toEqual(keyEvent("backspace"));
		expect(parseKey("\x1b")).toEqual(keyEvent("escape"));
		expect(parseKey("\x14")).toEqual(keyEvent("char", { text: "t", ctrl: true }));
		expect(parseKey("\x1a")).toEqual(keyEvent("char", { text: "z", ctrl: true }));
	});

	it("decodes printable characters and alt combinations", () => {
		expect(parseKey("j")).toEqual(keyEvent("char", { text: "j" }));
		expect(parseKey("é")).toEqual(keyEvent("char", { text: "é" }));
		expect(parseKey("😀")).toEqual(keyEvent("char", { text: "😀" }));
		expect(parseKey("\x1bx")).toEqual(keyEvent("char", { text: "x", alt: true }));
		expect(parseKey("\x1b\x7f")).toEqual(keyEvent("backspace", { alt: true }));
	});

	it("returns undefined for unrecognized sequences", () => {
		expect(parseKey("")).toBeUndefined();
		expect(parseKey("\x1b[")).toBeUndefined();
		expect(parseKey("\x1b[99~")).toBeUndefined();
		expect(parseKey("\x1b[200~")).toBeUndefined();
		expect(parseKey("\x1b[1;5X")).toBeUndefined();
		expect(parseKey("abc")).toBeUndefined();
		expect(parseKey("\x1c")).toBeUndefined();
	});
});

describe("keyId / matchesKey", () => {
	it("builds ids with modifiers in ctrl, alt, shift order", () => {
		expect(keyId(keyEvent("right", { ctrl: true, shift: true }))).toBe("ctrl+shift+right");
		expect(keyId(keyEvent("char", { text: "t", ctrl: true }))).toBe("ctrl+t");
		expect(keyId(keyEvent("char", { text: "L" }))).toBe("L");
		expect(keyId(keyEvent("char", { text: " " }))).toBe("space");
		expect(keyId(keyEvent("pageDown"))).toBe("pageDown");
	});

	it("requires modifiers to match exactly", () => {
		const ctrlLeft = keyEvent("left", { ctrl: true });
		expect(matchesKey(ctrlLeft, "ctrl+left")).toBe(true);
		expect(matchesKey(ctrlLeft, "left")).toBe(false);
		expect(matchesKey(ctrlLeft, "ctrl+shift+left")).toBe(false);
	});

	it("compares plain characters case-sensitively", () => {
		expect(matchesKey(keyEvent("char", { text: "J" }), "j")).toBe(false);
		expect(matchesKey(keyEvent("char", { text: "L" }), "L")).toBe(true);
		expect(matchesKey(keyEvent("char", { text: "z", ctrl: true }), "ctrl+z")).toBe(true);
	});

	it("rejects unknown modifier names", () => {
		expect(matchesKey(keyEvent("char", { text: "a" }), "hyper+a")).toBe(false);
	});
});

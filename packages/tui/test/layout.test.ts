import { describe, expect, it } from "vitest";
import { composeLayout, nextViewMode } from "../src/layout";

describe("nextViewMode", () => {
	it("cycles split, editor, description", () => {
		expect(nextViewMode("split")).toBe("editor");
		expect(nextViewMode("editor")).toBe("description");
		expect(nextViewMode("description")).toBe("split");
	});
});

describe("composeLayout", () => {
	it("splits 80 columns into 32 + divider + 47", () => {
		const layout = composeLayout("split", 80, 24);
		expect(layout.description).toEqual({
			header: { row: 1, col: 0, width: 32, height: 1 },
			body: { row: 2, col: 0, width: 32, height: 21 },
		});
		expect(layout.divider).toEqual({ row: 1, col: 32, width: 1, height: 22 });
		expect(layout.editor).toEqual({
			header: { row: 1, col: 33, width: 47, height: 1 },
			body: { row: 2, col: 33, width: 47, height: 21 },
		});
	});

	it("splits 120 columns into 48 + divider + 71", () => {
		const layout = composeLayout("split", 120, 40);
		expect(layout.description?.body.width).toBe(48);
		expect(layout.divider?.col).toBe(48);
		expect(layout.editor?.body).toEqual({ row: 2, col: 49, width: 71, height: 37 });
	});

	it("gives a single pane the full width", () => {
		const editor = composeLayout("editor", 80, 24);
		expect(editor.description).toBeUndefined();
		expect(editor.divider).toBeUndefined();
		expect(editor.editor?.body).toEqual({ row: 2, col: 0, width: 80, height: 21 });

		const description = composeLayout("description", 80, 24);
		expect(description.editor).toBeUndefined();
		expect(description.description?.header).toEqual({ row: 1, col: 0, width: 80, height: 1 });
	});

	it("honours custom reserved rows", () => {
		const layout = composeLayout("editor", 40, 10, { top: 0, bottom: 0 });
		expect(layout.editor?.header).toEqual({ row: 0, col: 0, width: 40, height: 1 });
		expect(layout.editor?.body.height).toBe(9);
	});
});

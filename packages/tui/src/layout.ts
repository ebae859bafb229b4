import type { Rect } from "./surface";

export type ViewMode = "split" | "editor" | "description";

const VIEW_MODE_CYCLE: readonly ViewMode[] = ["split", "editor", "description"];

/** Split → Editor → Description → Split. */
export function nextViewMode(mode: ViewMode): ViewMode {
	const index = VIEW_MODE_CYCLE.indexOf(mode);
	return VIEW_MODE_CYCLE[(index + 1) % VIEW_MODE_CYCLE.length] ?? "split";
}

/** A titled region: one header row above the body. */
export interface Pane {
	readonly header: Rect;
	readonly body: Rect;
}

export interface Layout {
	readonly mode: ViewMode;
	readonly description?: Pane;
	readonly editor?: Pane;
	/** One-column separator between the panes in split mode. */
	readonly divider?: Rect;
}

export interface ReservedRows {
	/** Rows taken above the panes (screen header). */
	top: number;
	/** Rows taken below the panes (status line). */
	bottom: number;
}

function pane(row: number, col: number, width: number, height: number): Pane {
	const headerHeight = Math.min(1, height);
	return {
		header: { row, col, width, height: headerHeight },
		body: { row: row + headerHeight, col, width, height: Math.max(0, height - headerHeight) },
	};
}

/**
 * Pane geometry for a view mode. Split gives the description two fifths of
 * the width (rounded down), one divider column, and the editor the rest.
 */
export function composeLayout(
	mode: ViewMode,
	columns: number,
	rows: number,
	reserved: ReservedRows = { top: 1, bottom: 1 },
): Layout {
	const top = Math.max(0, reserved.top);
	const height = Math.max(0, rows - top - Math.max(0, reserved.bottom));
	switch (mode) {
		case "split": {
			const descWidth = Math.floor((columns * 2) / 5);
			const editorWidth = Math.max(0, columns - descWidth - 1);
			return {
				mode,
				description: pane(top, 0, descWidth, height),
				divider: { row: top, col: descWidth, width: 1, height },
				editor: pane(top, descWidth + 1, editorWidth, height),
			};
		}
		case "editor":
			return { mode, editor: pane(top, 0, columns, height) };
		case "description":
			return { mode, description: pane(top, 0, columns, height) };
		default: {
			const exhaustive: never = mode;
			throw new Error(`Unknown view mode: ${String(exhaustive)}`);
		}
	}
}

import { fitToWidth, GLYPHS, type Style, type Surface } from "@leetterm/tui";
import type { ScreenContext } from "../screen";
import { notificationStyle, theme } from "../theme";

/** Full-width text on one row, padded so stale cells are overwritten. */
export function drawRow(surface: Surface, row: number, text: string, rowStyle: Style = theme.text): void {
	surface.text(row, 0, fitToWidth(text, surface.width), rowStyle);
}

/** Bottom row: the live notification if there is one, otherwise key hints. */
export function drawStatusLine(surface: Surface, ctx: ScreenContext, hints: string): void {
	const row = surface.height - 1;
	const notification = ctx.notification;
	if (notification) {
		drawRow(surface, row, ` ${notification.message}`, notificationStyle(notification.tone));
	} else {
		drawRow(surface, row, ` ${hints}`, theme.dim);
	}
}

/** Pane header: "─ label ───…" */
export function drawPaneHeader(surface: Surface, label: string, headerStyle: Style = theme.dim): void {
	if (surface.height <= 0) return;
	const end = surface.text(0, 0, `${GLYPHS.rule} ${label} `, headerStyle);
	if (end < surface.width) surface.hline(0, end, surface.width - end, GLYPHS.rule, headerStyle);
}

/** Short centered message, used while a request is in flight. */
export function drawCentered(surface: Surface, text: string, textStyle: Style = theme.dim): void {
	const row = Math.floor(surface.height / 2);
	const col = Math.max(0, Math.floor((surface.width - text.length) / 2));
	surface.text(row, col, text, textStyle);
}

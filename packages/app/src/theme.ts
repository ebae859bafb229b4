import { Attr, type NamedColor, type Style, style } from "@leetterm/tui";
import type { NotificationTone } from "./screen";
import type { Difficulty, ProblemStatus } from "./types";

export const theme = {
	text: style(),
	title: style({ attrs: Attr.BOLD }),
	dim: style({ attrs: Attr.DIM }),
	border: style({ fg: "brightBlack" }),
	selected: style({ attrs: Attr.REVERSE }),
	success: style({ fg: "green", attrs: Attr.BOLD }),
	failure: style({ fg: "red", attrs: Attr.BOLD }),
	label: style({ fg: "cyan" }),
	accent: style({ fg: "yellow" }),
} as const;

const DIFFICULTY_COLORS: Record<Difficulty, NamedColor> = {
	Easy: "green",
	Medium: "yellow",
	Hard: "red",
};

export function difficultyStyle(difficulty: Difficulty): Style {
	return style({ fg: DIFFICULTY_COLORS[difficulty] });
}

export function statusStyle(status: ProblemStatus): Style {
	switch (status) {
		case "solved":
			return style({ fg: "green" });
		case "attempted":
			return style({ fg: "yellow" });
		case "todo":
			return theme.dim;
	}
}

export function notificationStyle(tone: NotificationTone): Style {
	switch (tone) {
		case "error":
			return style({ fg: "red" });
		case "success":
			return style({ fg: "green" });
		case "info":
			return theme.dim;
	}
}

import {
	fitToWidth,
	GLYPHS,
	type KeyEvent,
	matchesKey,
	printableText,
	type Surface,
	truncateToWidth,
} from "@leetterm/tui";
import type { Completion, Result } from "../requests";
import {
	type AppEvent,
	CONTINUE,
	push,
	QUIT,
	reset,
	type ScreenAction,
	type ScreenContext,
} from "../screen";
import { difficultyStyle, statusStyle, theme } from "../theme";
import { DIFFICULTIES, type Difficulty, type ProblemStatus, type ProblemSummary } from "../types";
import { ScreenBase } from "./base";
import { drawRow, drawStatusLine } from "./chrome";
import { LoginScreen } from "./login";
import { ProblemDetailScreen } from "./problem-detail";

export const PAGE_SIZE = 50;

// Header, filter bar and column titles above the table; status line below
const TABLE_TOP = 3;

const ID_WIDTH = 7;
const DIFFICULTY_WIDTH = 12;

const STATUS_ICONS: Record<ProblemStatus, string> = {
	solved: GLYPHS.check,
	attempted: GLYPHS.attempted,
	todo: " ",
};

/** Next difficulty filter: All → Easy → Medium → Hard → All. */
export function nextDifficulty(current: Difficulty | undefined): Difficulty | undefined {
	if (current === undefined) return DIFFICULTIES[0];
	return DIFFICULTIES[DIFFICULTIES.indexOf(current) + 1];
}

/**
 * Paged problem table with a difficulty filter and title search.
 */
export class ProblemListScreen extends ScreenBase {
	readonly kind = "problemList" as const;

	#problems: readonly ProblemSummary[] = [];
	#total = 0;
	#page = 0;
	#cursor = 0;
	#scroll = 0;
	#difficulty: Difficulty | undefined;
	#search = "";
	/** Search text being typed; undefined when not in search input. */
	#searchInput: string | undefined;
	#loading = false;

	constructor(readonly username?: string) {
		super();
	}

	get problems(): readonly ProblemSummary[] {
		return this.#problems;
	}

	get cursor(): number {
		return this.#cursor;
	}

	get page(): number {
		return this.#page;
	}

	get difficulty(): Difficulty | undefined {
		return this.#difficulty;
	}

	get search(): string {
		return this.#search;
	}

	get loading(): boolean {
		return this.#loading;
	}

	get pageCount(): number {
		return Math.max(1, Math.ceil(this.#total / PAGE_SIZE));
	}

	onEnter(ctx: ScreenContext): ScreenAction {
		this.#fetch(ctx);
		return CONTINUE;
	}

	handle(event: AppEvent, ctx: ScreenContext): ScreenAction {
		switch (event.type) {
			case "completion":
				this.#onCompletion(event.requestId, event.payload, ctx);
				return CONTINUE;
			case "paste":
				if (this.#searchInput !== undefined) this.#searchInput += event.text.replace(/\s+/g, " ");
				return CONTINUE;
			case "resize":
				return CONTINUE;
			case "key":
				return this.#searchInput !== undefined ? this.#onSearchKey(event, ctx) : this.#onKey(event, ctx);
		}
	}

	#onSearchKey(event: KeyEvent, ctx: ScreenContext): ScreenAction {
		const input = this.#searchInput ?? "";
		if (matchesKey(event, "enter")) {
			this.#search = input.trim();
			this.#searchInput = undefined;
			this.#page = 0;
			this.#fetch(ctx);
		} else if (matchesKey(event, "escape")) {
			this.#searchInput = undefined;
		} else if (matchesKey(event, "backspace")) {
			this.#searchInput = input.slice(0, -1);
		} else {
			const text = printableText(event);
			if (text !== undefined) this.#searchInput = input + text;
		}
		return CONTINUE;
	}

	#onKey(event: KeyEvent, ctx: ScreenContext): ScreenAction {
		if (matchesKey(event, "j") || matchesKey(event, "down")) {
			this.#moveCursor(1);
		} else if (matchesKey(event, "k") || matchesKey(event, "up")) {
			this.#moveCursor(-1);
		} else if (matchesKey(event, "pageDown")) {
			if ((this.#page + 1) * PAGE_SIZE < this.#total) {
				this.#page++;
				this.#fetch(ctx);
			}
		} else if (matchesKey(event, "pageUp")) {
			if (this.#page > 0) {
				this.#page--;
				this.#fetch(ctx);
			}
		} else if (matchesKey(event, "/")) {
			this.#searchInput = this.#search;
		} else if (matchesKey(event, "d")) {
			this.#difficulty = nextDifficulty(this.#difficulty);
			this.#page = 0;
			this.#fetch(ctx);
		} else if (matchesKey(event, "r")) {
			this.#fetch(ctx);
		} else if (matchesKey(event, "enter")) {
			return this.#open(ctx);
		} else if (matchesKey(event, "L")) {
			ctx.settings.set("credentials.session", "");
			ctx.settings.set("credentials.csrfToken", "");
			ctx.notify("Logged out");
			return reset(new LoginScreen({ autoValidate: false }));
		} else if (matchesKey(event, "q") || matchesKey(event, "escape")) {
			return QUIT;
		}
		return CONTINUE;
	}

	#open(ctx: ScreenContext): ScreenAction {
		const problem = this.#problems[this.#cursor];
		if (!problem) return CONTINUE;
		if (problem.paidOnly) {
			ctx.notify(`${problem.title} requires a premium subscription`, "error");
			return CONTINUE;
		}
		return push(new ProblemDetailScreen(problem.slug, problem.title));
	}

	#moveCursor(delta: number): void {
		const last = Math.max(0, this.#problems.length - 1);
		this.#cursor = Math.max(0, Math.min(this.#cursor + delta, last));
	}

	#fetch(ctx: ScreenContext): void {
		this.#loading = true;
		const id = this.requests.begin("problems");
		const query = {
			skip: this.#page * PAGE_SIZE,
			limit: PAGE_SIZE,
			...(this.#difficulty ? { difficulty: this.#difficulty } : {}),
			...(this.#search ? { search: this.#search } : {}),
		};
		ctx.track(
			id,
			ctx.services.problems.listProblems(query).then(value => ({ kind: "problems" as const, value })),
		);
	}

	#onCompletion(requestId: number, payload: Result<Completion>, ctx: ScreenContext): void {
		if (this.requests.settle(requestId) !== "problems") return;
		this.#loading = false;
		if (!payload.ok) {
			ctx.notify(`Failed to load problems: ${payload.error.message}`, "error");
			return;
		}
		if (payload.value.kind !== "problems") return;
		this.#problems = payload.value.value.problems;
		this.#total = payload.value.value.total;
		this.#cursor = 0;
		this.#scroll = 0;
	}

	draw(surface: Surface, ctx: ScreenContext): void {
		const user = this.username ? `  ${this.username}` : "";
		drawRow(surface, 0, ` leetterm${user}`, theme.title);

		const searchText = this.#searchInput !== undefined ? `${this.#searchInput}_` : this.#search || "-";
		const filter = ` Difficulty: ${this.#difficulty ?? "All"}   Search: ${searchText}`;
		drawRow(surface, 1, filter, this.#searchInput !== undefined ? theme.accent : theme.label);

		const width = surface.width;
		// Four columns of pointer and status icon; AC% gets the last seven
		const titleWidth = Math.max(10, width - 4 - ID_WIDTH - DIFFICULTY_WIDTH - 7);
		drawRow(
			surface,
			2,
			`    ${fitToWidth("#", ID_WIDTH)}${fitToWidth("Title", titleWidth)}${fitToWidth("Difficulty", DIFFICULTY_WIDTH)}AC%`,
			theme.dim,
		);

		const bodyHeight = Math.max(0, surface.height - TABLE_TOP - 1);
		if (this.#loading && this.#problems.length === 0) {
			surface.text(TABLE_TOP + 1, 2, "loading...", theme.dim);
		} else if (this.#problems.length === 0) {
			surface.text(TABLE_TOP + 1, 2, "No problems match the current filters.", theme.dim);
		}

		if (this.#cursor < this.#scroll) this.#scroll = this.#cursor;
		else if (this.#cursor >= this.#scroll + bodyHeight) this.#scroll = this.#cursor - bodyHeight + 1;

		for (let row = 0; row < bodyHeight; row++) {
			const index = this.#scroll + row;
			const problem = this.#problems[index];
			if (!problem) break;
			const y = TABLE_TOP + row;
			const selected = index === this.#cursor;
			if (selected) surface.fill(y, 0, width, 1, " ", theme.selected);
			const base = selected ? theme.selected : theme.text;
			let x = surface.text(y, 0, selected ? `${GLYPHS.pointer} ` : "  ", base);
			surface.text(y, x, STATUS_ICONS[problem.status], selected ? base : statusStyle(problem.status));
			x += 2;
			x = surface.text(y, x, fitToWidth(problem.id, ID_WIDTH), base);
			const title = problem.paidOnly ? `${problem.title} ${GLYPHS.lock}` : problem.title;
			x = surface.text(y, x, fitToWidth(title, titleWidth), base);
			x = surface.text(y, x, fitToWidth(problem.difficulty, DIFFICULTY_WIDTH), selected ? base : difficultyStyle(problem.difficulty));
			surface.text(y, x, `${problem.acRate.toFixed(1)}%`, base);
		}

		const hints = this.#searchInput !== undefined
			? "type to search  enter apply  esc cancel"
			: `${this.#total} problems  page ${this.#page + 1}/${this.pageCount}  j/k move  pgup/pgdn page  / search  d difficulty  r refresh  L logout  q quit`;
		drawStatusLine(surface, ctx, truncateToWidth(hints, Math.max(1, surface.width - 1)));
	}
}

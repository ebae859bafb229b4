import {
	composeLayout,
	drawEditor,
	EditorBuffer,
	GLYPHS,
	HighlightCache,
	type KeyEvent,
	type Layout,
	matchesKey,
	nextViewMode,
	printableText,
	type Surface,
	truncateToWidth,
	type ViewMode,
} from "@leetterm/tui";
import { logger } from "@leetterm/utils";
import { formatDescription } from "../description";
import { languageName } from "../languages";
import type { Completion, Result } from "../requests";
import {
	type AppEvent,
	CONTINUE,
	pop,
	type PopResult,
	push,
	type ScreenAction,
	type ScreenContext,
} from "../screen";
import { difficultyStyle, theme } from "../theme";
import type { ProblemDetail } from "../types";
import { ScreenBase } from "./base";
import { drawCentered, drawPaneHeader, drawRow, drawStatusLine } from "./chrome";
import { SubmissionResultScreen } from "./submission-result";
import { TestResultScreen } from "./test-result";

const HINTS: Record<ViewMode, string> = {
	split: "^t test  ^s submit  ^l lang  ^d editor  ^z/^y undo/redo  c-up/dn scroll  esc back",
	editor: "^t test  ^s submit  ^l lang  ^d description  ^z/^y undo/redo  esc back",
	description: "^d split view  arrows scroll  esc back",
};

/**
 * One problem: statement on the left, solution editor on the right. Ctrl+D
 * cycles between the split and the two single-pane modes.
 */
export class ProblemDetailScreen extends ScreenBase {
	readonly kind = "problemDetail" as const;

	#detail: ProblemDetail | undefined;
	#loading = false;
	#buffer: EditorBuffer | undefined;
	#language = "";
	#mode: ViewMode = "split";
	#descScroll = 0;
	#descCache: { width: number; boxed: boolean; lines: string[] } | undefined;
	#highlight: HighlightCache | undefined;
	#layout: Layout | undefined;

	constructor(
		readonly slug: string,
		readonly title: string = slug,
	) {
		super();
	}

	get detail(): ProblemDetail | undefined {
		return this.#detail;
	}

	get buffer(): EditorBuffer | undefined {
		return this.#buffer;
	}

	get language(): string {
		return this.#language;
	}

	get mode(): ViewMode {
		return this.#mode;
	}

	get descriptionScroll(): number {
		return this.#descScroll;
	}

	/** Pane geometry from the last draw. */
	get layout(): Layout | undefined {
		return this.#layout;
	}

	onEnter(ctx: ScreenContext): ScreenAction {
		this.#loading = true;
		const id = this.requests.begin("detail");
		ctx.track(id, ctx.services.problems.getProblem(this.slug).then(value => ({ kind: "detail" as const, value })));
		return CONTINUE;
	}

	onResume(result: PopResult | undefined, ctx: ScreenContext): ScreenAction {
		if (result === "submit") {
			this.#submit(ctx);
			return CONTINUE;
		}
		if (result === "list") {
			this.#persist(ctx);
			return pop();
		}
		return CONTINUE;
	}

	onExit(ctx: ScreenContext): void {
		this.#persist(ctx);
		super.onExit(ctx);
	}

	handle(event: AppEvent, ctx: ScreenContext): ScreenAction {
		switch (event.type) {
			case "completion":
				return this.#onCompletion(event.requestId, event.payload, ctx);
			case "paste":
				if (this.#buffer && this.#mode !== "description") this.#buffer.insert(event.text);
				return CONTINUE;
			case "resize":
				this.#descCache = undefined;
				return CONTINUE;
			case "key":
				return this.#onKey(event, ctx);
		}
	}

	#onKey(event: KeyEvent, ctx: ScreenContext): ScreenAction {
		if (matchesKey(event, "escape")) {
			this.#persist(ctx);
			return pop();
		}
		if (matchesKey(event, "ctrl+d")) {
			this.#mode = nextViewMode(this.#mode);
			return CONTINUE;
		}
		if (matchesKey(event, "ctrl+t")) {
			this.#test(ctx);
			return CONTINUE;
		}
		if (matchesKey(event, "ctrl+s")) {
			this.#submit(ctx);
			return CONTINUE;
		}
		if (matchesKey(event, "ctrl+l")) {
			this.#nextLanguage(ctx);
			return CONTINUE;
		}
		if (matchesKey(event, "ctrl+up")) {
			this.#scrollDescription(-1);
			return CONTINUE;
		}
		if (matchesKey(event, "ctrl+down")) {
			this.#scrollDescription(1);
			return CONTINUE;
		}
		if (this.#mode === "description") {
			this.#onDescriptionKey(event);
			return CONTINUE;
		}
		if (this.#buffer) this.#onEditorKey(event, this.#buffer);
		return CONTINUE;
	}

	#onDescriptionKey(event: KeyEvent): void {
		const page = Math.max(1, (this.#layout?.description?.body.height ?? 10) - 1);
		if (matchesKey(event, "up") || matchesKey(event, "k")) this.#scrollDescription(-1);
		else if (matchesKey(event, "down") || matchesKey(event, "j")) this.#scrollDescription(1);
		else if (matchesKey(event, "pageUp")) this.#scrollDescription(-page);
		else if (matchesKey(event, "pageDown")) this.#scrollDescription(page);
	}

	#onEditorKey(event: KeyEvent, buffer: EditorBuffer): void {
		if (matchesKey(event, "ctrl+z") || matchesKey(event, "ctrl+u")) buffer.undo();
		else if (matchesKey(event, "ctrl+y") || matchesKey(event, "ctrl+r")) buffer.redo();
		else if (matchesKey(event, "ctrl+a")) buffer.selectAll();
		else if (matchesKey(event, "ctrl+shift+left")) buffer.extendSelection("left", "word");
		else if (matchesKey(event, "ctrl+shift+right")) buffer.extendSelection("right", "word");
		else if (matchesKey(event, "shift+left")) buffer.extendSelection("left");
		else if (matchesKey(event, "shift+right")) buffer.extendSelection("right");
		else if (matchesKey(event, "shift+up")) buffer.extendSelection("up");
		else if (matchesKey(event, "shift+down")) buffer.extendSelection("down");
		else if (matchesKey(event, "shift+home")) buffer.extendSelection("left", "lineBoundary");
		else if (matchesKey(event, "shift+end")) buffer.extendSelection("right", "lineBoundary");
		else if (matchesKey(event, "ctrl+left")) buffer.moveCursor("left", "word");
		else if (matchesKey(event, "ctrl+right")) buffer.moveCursor("right", "word");
		else if (matchesKey(event, "ctrl+home")) buffer.moveCursor("up", "lineBoundary");
		else if (matchesKey(event, "ctrl+end")) buffer.moveCursor("down", "lineBoundary");
		else if (matchesKey(event, "left")) buffer.moveCursor("left");
		else if (matchesKey(event, "right")) buffer.moveCursor("right");
		else if (matchesKey(event, "up")) buffer.moveCursor("up");
		else if (matchesKey(event, "down")) buffer.moveCursor("down");
		else if (matchesKey(event, "home")) buffer.moveCursor("left", "lineBoundary");
		else if (matchesKey(event, "end")) buffer.moveCursor("right", "lineBoundary");
		else if (matchesKey(event, "pageUp")) buffer.moveCursor("up", "page");
		else if (matchesKey(event, "pageDown")) buffer.moveCursor("down", "page");
		else if (matchesKey(event, "tab")) buffer.tab();
		else if (matchesKey(event, "enter")) buffer.insertNewline();
		else if (matchesKey(event, "backspace")) buffer.deleteBackward();
		else if (matchesKey(event, "delete")) buffer.deleteForward();
		else {
			const text = printableText(event);
			if (text !== undefined) buffer.insert(text);
		}
	}

	#scrollDescription(delta: number): void {
		const total = this.#descCache?.lines.length ?? 0;
		const height = this.#layout?.description?.body.height ?? 1;
		this.#descScroll = Math.max(0, Math.min(this.#descScroll + delta, Math.max(0, total - height)));
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Requests
	// ─────────────────────────────────────────────────────────────────────────

	#onCompletion(requestId: number, payload: Result<Completion>, ctx: ScreenContext): ScreenAction {
		const kind = this.requests.settle(requestId);
		if (!kind) return CONTINUE;
		if (kind === "detail") this.#loading = false;
		if (!payload.ok) {
			const verb = kind === "detail" ? "Failed to load problem" : kind === "test" ? "Test error" : "Submit error";
			ctx.notify(`${verb}: ${payload.error.message}`, "error");
			return CONTINUE;
		}
		const completion = payload.value;
		switch (completion.kind) {
			case "detail":
				this.#open(completion.value, ctx);
				return CONTINUE;
			case "test":
				return push(new TestResultScreen(completion.value, this.#headerTitle()));
			case "submit":
				return push(new SubmissionResultScreen(completion.value, this.#headerTitle()));
			default:
				return CONTINUE;
		}
	}

	#open(detail: ProblemDetail, ctx: ScreenContext): void {
		this.#detail = detail;
		this.#descCache = undefined;
		this.#descScroll = 0;
		const preferred = ctx.settings.get("language");
		const snippet = detail.snippets.find(s => s.language === preferred) ?? detail.snippets[0];
		this.#language = snippet?.language ?? preferred;
		this.#buffer = new EditorBuffer(this.#loadCode(ctx), {
			undoLimit: ctx.settings.get("editor.undoLimit"),
			coalesceWindowMs: ctx.settings.get("editor.coalesceWindowMs"),
			pageLines: ctx.settings.get("editor.pageLines"),
		});
		this.#highlight = new HighlightCache(ctx.services.highlighter);
	}

	/** Saved solution for the current language, else the starter snippet. */
	#loadCode(ctx: ScreenContext): string {
		const detail = this.#detail;
		if (!detail) return "";
		try {
			const saved = ctx.services.solutions.load(detail.slug, this.#language);
			if (saved !== undefined) return saved;
		} catch (error) {
			logger.warn("Failed to load saved solution", { slug: detail.slug, language: this.#language, error });
			ctx.notify("Could not read the saved solution; starting from the template", "error");
		}
		return detail.snippets.find(s => s.language === this.#language)?.code ?? "";
	}

	#persist(ctx: ScreenContext): void {
		const detail = this.#detail;
		const buffer = this.#buffer;
		if (!detail || !buffer) return;
		try {
			ctx.services.solutions.save(detail.slug, this.#language, buffer.getText());
		} catch (error) {
			logger.warn("Failed to save solution", { slug: detail.slug, language: this.#language, error });
			ctx.notify("Could not save the solution", "error");
		}
	}

	#codeForJudge(ctx: ScreenContext, action: string): { detail: ProblemDetail; code: string } | undefined {
		const detail = this.#detail;
		const buffer = this.#buffer;
		if (!detail || !buffer) return undefined;
		const code = buffer.getText();
		if (!code.trim()) {
			ctx.notify(`No code to ${action}.`, "error");
			return undefined;
		}
		this.#persist(ctx);
		return { detail, code };
	}

	#test(ctx: ScreenContext): void {
		const target = this.#codeForJudge(ctx, "test");
		if (!target) return;
		const { detail, code } = target;
		ctx.notify("Running tests...");
		const id = this.requests.begin("test");
		const request = {
			slug: detail.slug,
			questionId: detail.questionId,
			language: this.#language,
			code,
			input: detail.sampleCases.join("\n"),
		};
		ctx.track(id, ctx.services.judge.test(request).then(value => ({ kind: "test" as const, value })));
	}

	#submit(ctx: ScreenContext): void {
		const target = this.#codeForJudge(ctx, "submit");
		if (!target) return;
		const { detail, code } = target;
		ctx.notify("Submitting...");
		const id = this.requests.begin("submit");
		const request = { slug: detail.slug, questionId: detail.questionId, language: this.#language, code };
		ctx.track(id, ctx.services.judge.submit(request).then(value => ({ kind: "submit" as const, value })));
	}

	#nextLanguage(ctx: ScreenContext): void {
		const detail = this.#detail;
		const buffer = this.#buffer;
		if (!detail || !buffer || detail.snippets.length === 0) return;
		this.#persist(ctx);
		const index = detail.snippets.findIndex(s => s.language === this.#language);
		const next = detail.snippets[(index + 1) % detail.snippets.length];
		if (!next) return;
		this.#language = next.language;
		buffer.setText(this.#loadCode(ctx));
		ctx.settings.set("language", next.language);
		ctx.notify(`Language: ${next.languageName}`);
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Drawing
	// ─────────────────────────────────────────────────────────────────────────

	#headerTitle(): string {
		const detail = this.#detail;
		return detail ? `${detail.id}. ${detail.title}` : this.title;
	}

	draw(surface: Surface, ctx: ScreenContext): void {
		const detail = this.#detail;
		if (!detail) {
			drawRow(surface, 0, ` ${this.title}`, theme.title);
			drawCentered(surface, this.#loading ? "loading..." : "No data.");
			drawStatusLine(surface, ctx, "esc back");
			return;
		}

		// Header: "id. title  Difficulty  tags"
		let x = surface.text(0, 1, this.#headerTitle(), theme.title);
		x = surface.text(0, x + 2, detail.difficulty, difficultyStyle(detail.difficulty));
		if (detail.tags.length > 0) {
			surface.text(0, x + 2, truncateToWidth(detail.tags.slice(0, 5).join(", "), Math.max(0, surface.width - x - 2)), theme.dim);
		}

		const layout = composeLayout(this.#mode, surface.width, surface.height);
		this.#layout = layout;

		if (layout.description) {
			drawPaneHeader(surface.sub(layout.description.header), detail.title);
			this.#drawDescription(surface.sub(layout.description.body), detail);
		}
		if (layout.divider) {
			const { row, col, height } = layout.divider;
			surface.vline(row, col, height, GLYPHS.divider, theme.border);
		}
		if (layout.editor && this.#buffer) {
			drawPaneHeader(surface.sub(layout.editor.header), languageName(this.#language).toLowerCase());
			const spans = this.#highlight?.get(this.#buffer.lines, this.#buffer.version, this.#language);
			drawEditor(surface.sub(layout.editor.body), this.#buffer, spans ? { spans } : {});
		}

		drawStatusLine(surface, ctx, HINTS[this.#mode]);
	}

	#drawDescription(body: Surface, detail: ProblemDetail): void {
		// One column of margin on each side
		const inner = body.sub({ row: 0, col: 1, width: Math.max(1, body.width - 2), height: body.height });
		if (!detail.statement) {
			const notice = detail.paidOnly ? "This problem is for premium subscribers." : "No description available.";
			inner.text(0, 0, truncateToWidth(notice, inner.width), theme.dim);
			return;
		}
		const boxed = this.#mode === "description";
		if (!this.#descCache || this.#descCache.width !== inner.width || this.#descCache.boxed !== boxed) {
			this.#descCache = { width: inner.width, boxed, lines: formatDescription(detail.statement, inner.width, boxed) };
		}
		const lines = this.#descCache.lines;
		this.#descScroll = Math.max(0, Math.min(this.#descScroll, Math.max(0, lines.length - inner.height)));
		for (let row = 0; row < inner.height; row++) {
			const text = lines[this.#descScroll + row];
			if (text === undefined) break;
			inner.text(row, 0, text);
		}
		const remaining = lines.length - this.#descScroll - inner.height;
		if (remaining > 0) {
			const hint = `[${remaining} more]`;
			inner.text(inner.height - 1, Math.max(0, inner.width - hint.length), hint, theme.dim);
		}
	}
}

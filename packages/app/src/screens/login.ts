import {
	BOX_ROUND,
	GLYPHS,
	type KeyEvent,
	matchesKey,
	printableText,
	type Surface,
	truncateToWidth,
} from "@leetterm/tui";
import { logger } from "@leetterm/utils";
import type { Completion, Result } from "../requests";
import { type AppEvent, CONTINUE, QUIT, replace, type ScreenAction, type ScreenContext } from "../screen";
import { theme } from "../theme";
import type { Credentials } from "../types";
import { ScreenBase } from "./base";
import { drawRow, drawStatusLine } from "./chrome";
import { ProblemListScreen } from "./problem-list";

export type LoginStep = "menu" | "session" | "csrf" | "validating";

const MENU = ["Enter session cookies", "Quit"] as const;

export interface LoginOptions {
	/** Validate stored credentials on entry. Off after a rejected session. */
	autoValidate?: boolean;
}

/**
 * Credential entry. Steps: method menu, session cookie, CSRF token, then
 * validation against the auth service. Input is masked.
 */
export class LoginScreen extends ScreenBase {
	readonly kind = "login" as const;

	#step: LoginStep = "menu";
	#menuIndex = 0;
	#session = "";
	#csrf = "";
	#pending: Credentials | undefined;
	#error = "";
	readonly #autoValidate: boolean;

	constructor(options: LoginOptions = {}) {
		super();
		this.#autoValidate = options.autoValidate ?? true;
	}

	get step(): LoginStep {
		return this.#step;
	}

	get error(): string {
		return this.#error;
	}

	onEnter(ctx: ScreenContext): ScreenAction {
		const session = ctx.settings.get("credentials.session");
		const csrfToken = ctx.settings.get("credentials.csrfToken");
		if (this.#autoValidate && session && csrfToken) {
			this.#validate({ session, csrfToken }, ctx);
		}
		return CONTINUE;
	}

	handle(event: AppEvent, ctx: ScreenContext): ScreenAction {
		switch (event.type) {
			case "completion":
				return this.#onCompletion(event.requestId, event.payload, ctx);
			case "paste":
				if (this.#step === "session" || this.#step === "csrf") {
					this.#appendInput(event.text.replace(/\s+/g, ""));
				}
				return CONTINUE;
			case "resize":
				return CONTINUE;
			case "key":
				return this.#onKey(event, ctx);
		}
	}

	#onKey(event: KeyEvent, ctx: ScreenContext): ScreenAction {
		const step = this.#step;
		switch (step) {
			case "menu":
				if (matchesKey(event, "up") || matchesKey(event, "k")) {
					this.#menuIndex = (this.#menuIndex + MENU.length - 1) % MENU.length;
				} else if (matchesKey(event, "down") || matchesKey(event, "j")) {
					this.#menuIndex = (this.#menuIndex + 1) % MENU.length;
				} else if (matchesKey(event, "enter")) {
					if (this.#menuIndex === 1) return QUIT;
					this.#error = "";
					this.#session = "";
					this.#step = "session";
				} else if (matchesKey(event, "escape")) {
					return QUIT;
				}
				return CONTINUE;
			case "session":
			case "csrf":
				return this.#onInputKey(event, ctx);
			case "validating":
				if (matchesKey(event, "escape")) {
					this.requests.invalidate("auth");
					this.#pending = undefined;
					this.#step = "menu";
				}
				return CONTINUE;
		}
	}

	#onInputKey(event: KeyEvent, ctx: ScreenContext): ScreenAction {
		if (matchesKey(event, "escape")) {
			this.#step = "menu";
			return CONTINUE;
		}
		if (matchesKey(event, "backspace")) {
			if (this.#step === "session") this.#session = this.#session.slice(0, -1);
			else this.#csrf = this.#csrf.slice(0, -1);
			return CONTINUE;
		}
		if (matchesKey(event, "enter")) {
			if (this.#step === "session") {
				if (!this.#session) {
					this.#error = "Session cookie is required";
					return CONTINUE;
				}
				this.#error = "";
				this.#csrf = "";
				this.#step = "csrf";
				return CONTINUE;
			}
			if (!this.#csrf) {
				this.#error = "CSRF token is required";
				return CONTINUE;
			}
			this.#validate({ session: this.#session, csrfToken: this.#csrf }, ctx);
			return CONTINUE;
		}
		const text = printableText(event);
		if (text !== undefined) this.#appendInput(text);
		return CONTINUE;
	}

	#appendInput(text: string): void {
		if (this.#step === "session") this.#session += text;
		else if (this.#step === "csrf") this.#csrf += text;
	}

	#validate(credentials: Credentials, ctx: ScreenContext): void {
		this.#error = "";
		this.#pending = credentials;
		this.#step = "validating";
		const id = this.requests.begin("auth");
		ctx.track(
			id,
			ctx.services.auth.validate(credentials).then(value => ({ kind: "auth" as const, value })),
		);
	}

	#onCompletion(requestId: number, payload: Result<Completion>, ctx: ScreenContext): ScreenAction {
		if (this.requests.settle(requestId) !== "auth") return CONTINUE;
		const credentials = this.#pending;
		this.#pending = undefined;
		this.#step = "menu";
		if (!payload.ok) {
			this.#error = `Login failed: ${payload.error.message}`;
			logger.warn("Credential validation failed", { error: payload.error });
			return CONTINUE;
		}
		const { value } = payload;
		if (value.kind !== "auth" || !credentials) return CONTINUE;
		if (value.value === null) {
			this.#error = "Invalid credentials";
			return CONTINUE;
		}
		ctx.settings.set("credentials.session", credentials.session);
		ctx.settings.set("credentials.csrfToken", credentials.csrfToken);
		ctx.notify(`Signed in as ${value.value}`, "success");
		logger.info("Signed in", { username: value.value });
		return replace(new ProblemListScreen(value.value));
	}

	draw(surface: Surface, ctx: ScreenContext): void {
		drawRow(surface, 0, " leetterm", theme.title);
		const width = Math.min(50, surface.width - 4);
		const col = Math.max(0, Math.floor((surface.width - width) / 2));
		const top = Math.max(2, Math.floor(surface.height / 2) - 4);
		const body = surface.sub({ row: top, col, width, height: 7 });
		drawFrame(body, "Sign in");

		const inner = body.sub({ row: 1, col: 2, width: width - 4, height: 5 });
		switch (this.#step) {
			case "menu":
				MENU.forEach((label, index) => {
					const active = index === this.#menuIndex;
					inner.text(index + 1, 0, `${active ? GLYPHS.pointer : " "} ${label}`, active ? theme.selected : theme.text);
				});
				break;
			case "session":
			case "csrf": {
				const label = this.#step === "session" ? "Session cookie:" : "CSRF token:";
				const value = this.#step === "session" ? this.#session : this.#csrf;
				inner.text(1, 0, label, theme.label);
				inner.text(2, 0, truncateToWidth(`${"*".repeat(value.length)}_`, inner.width), theme.text);
				inner.text(4, 0, "Enter to continue, Esc to go back", theme.dim);
				break;
			}
			case "validating":
				inner.text(2, 0, "Validating credentials...", theme.dim);
				break;
		}

		if (this.#error) {
			surface.text(top + 8, col, truncateToWidth(this.#error, width), theme.failure);
		}
		drawStatusLine(surface, ctx, "j/k select  enter confirm  esc back/quit");
	}
}

function drawFrame(surface: Surface, title: string): void {
	const { topLeft, topRight, bottomLeft, bottomRight, horizontal, vertical } = BOX_ROUND;
	const right = surface.width - 1;
	const bottom = surface.height - 1;
	surface.hline(0, 1, surface.width - 2, horizontal, theme.border);
	surface.hline(bottom, 1, surface.width - 2, horizontal, theme.border);
	surface.vline(1, 0, surface.height - 2, vertical, theme.border);
	surface.vline(1, right, surface.height - 2, vertical, theme.border);
	surface.text(0, 0, topLeft, theme.border);
	surface.text(0, right, topRight, theme.border);
	surface.text(bottom, 0, bottomLeft, theme.border);
	surface.text(bottom, right, bottomRight, theme.border);
	surface.text(0, 2, ` ${title} `, theme.title);
}

import { logger } from "@leetterm/utils";
import { AuthenticationError } from "./errors";
import type { AppEvent, Screen, ScreenAction, ScreenContext } from "./screen";

export type NavigatorState = "running" | "quit";

/** Human-readable screen name for logs. */
export function describeScreen(screen: Screen): string {
	switch (screen.kind) {
		case "login":
			return "Login";
		case "problemList":
			return "ProblemList";
		case "problemDetail":
			return `ProblemDetail(${screen.slug})`;
		case "testResult":
			return "TestResult";
		case "submissionResult":
			return "SubmissionResult";
		default: {
			const exhaustive: never = screen;
			throw new Error(`Unknown screen: ${String(exhaustive)}`);
		}
	}
}

/**
 * Owns the screen stack. Input goes to the top screen; completions go to the
 * screen holding the request id, wherever it sits on the stack.
 */
export class Navigator {
	#stack: Screen[] = [];

	/** @param loginScreen Builds the screen to fall back to when credentials are rejected. */
	constructor(readonly loginScreen: () => Screen) {}

	get active(): Screen | undefined {
		return this.#stack[this.#stack.length - 1];
	}

	get screens(): readonly Screen[] {
		return this.#stack;
	}

	start(root: Screen, ctx: ScreenContext): NavigatorState {
		return this.apply({ type: "push", screen: root }, ctx);
	}

	dispatch(event: AppEvent, ctx: ScreenContext): NavigatorState {
		if (event.type !== "completion") {
			const active = this.active;
			return active ? this.apply(active.handle(event, ctx), ctx) : "quit";
		}

		const owner = this.#owner(event.requestId);
		if (!owner) {
			logger.debug("Discarding stale completion", { requestId: event.requestId });
			return "running";
		}
		const { payload } = event;
		if (!payload.ok && payload.error instanceof AuthenticationError && owner.kind !== "login") {
			owner.requests.settle(event.requestId);
			logger.warn("Credentials rejected, returning to login", { screen: describeScreen(owner) });
			ctx.notify(`Session expired: ${payload.error.message}`, "error");
			return this.apply({ type: "reset", screen: this.loginScreen() }, ctx);
		}
		const action = owner.handle(event, ctx);
		if (owner !== this.active && action.type !== "continue") {
			logger.info("Ignoring navigation from a suspended screen", {
				screen: describeScreen(owner),
				action: action.type,
			});
			return "running";
		}
		return this.apply(action, ctx);
	}

	apply(action: ScreenAction, ctx: ScreenContext): NavigatorState {
		switch (action.type) {
			case "continue":
				return "running";
			case "push":
				logger.info("Screen push", { screen: describeScreen(action.screen) });
				this.#stack.push(action.screen);
				return this.apply(action.screen.onEnter(ctx), ctx);
			case "replace": {
				const top = this.#stack.pop();
				if (top) top.onExit(ctx);
				logger.info("Screen replace", {
					from: top ? describeScreen(top) : undefined,
					screen: describeScreen(action.screen),
				});
				this.#stack.push(action.screen);
				return this.apply(action.screen.onEnter(ctx), ctx);
			}
			case "reset":
				this.shutdown(ctx);
				logger.info("Screen reset", { screen: describeScreen(action.screen) });
				this.#stack.push(action.screen);
				return this.apply(action.screen.onEnter(ctx), ctx);
			case "pop": {
				const top = this.#stack.pop();
				if (top) {
					top.onExit(ctx);
					logger.info("Screen pop", { screen: describeScreen(top), result: action.result });
				}
				const below = this.active;
				if (!below) return "quit";
				return this.apply(below.onResume(action.result, ctx), ctx);
			}
			case "quit":
				return "quit";
			default: {
				const exhaustive: never = action;
				throw new Error(`Unknown screen action: ${JSON.stringify(exhaustive)}`);
			}
		}
	}

	/** Exit every screen, top first, and empty the stack. */
	shutdown(ctx: ScreenContext): void {
		for (let screen = this.#stack.pop(); screen; screen = this.#stack.pop()) {
			screen.onExit(ctx);
		}
	}

	#owner(requestId: number): Screen | undefined {
		for (let i = this.#stack.length - 1; i >= 0; i--) {
			const screen = this.#stack[i];
			if (screen?.requests.owns(requestId)) return screen;
		}
		return undefined;
	}
}

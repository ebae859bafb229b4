import type { InputEvent, Surface } from "@leetterm/tui";
import type { Completion, Result } from "./requests";
import type { LoginScreen } from "./screens/login";
import type { ProblemDetailScreen } from "./screens/problem-detail";
import type { ProblemListScreen } from "./screens/problem-list";
import type { SubmissionResultScreen } from "./screens/submission-result";
import type { TestResultScreen } from "./screens/test-result";
import type { Services } from "./services";
import type { Settings } from "./settings";

/** Everything the loop feeds to screens. */
export type AppEvent = InputEvent<Result<Completion>>;

export type Screen = LoginScreen | ProblemListScreen | ProblemDetailScreen | TestResultScreen | SubmissionResultScreen;

export type ScreenKind = Screen["kind"];

/** Value a result screen hands back to the screen below it when popped. */
export type PopResult = "submit" | "list";

export type ScreenAction =
	| { readonly type: "continue" }
	| { readonly type: "push"; readonly screen: Screen }
	| { readonly type: "replace"; readonly screen: Screen }
	| { readonly type: "reset"; readonly screen: Screen }
	| { readonly type: "pop"; readonly result?: PopResult }
	| { readonly type: "quit" };

export const CONTINUE: ScreenAction = { type: "continue" };
export const QUIT: ScreenAction = { type: "quit" };

export function push(screen: Screen): ScreenAction {
	return { type: "push", screen };
}

export function replace(screen: Screen): ScreenAction {
	return { type: "replace", screen };
}

export function reset(screen: Screen): ScreenAction {
	return { type: "reset", screen };
}

export function pop(result?: PopResult): ScreenAction {
	return result === undefined ? { type: "pop" } : { type: "pop", result };
}

export type NotificationTone = "info" | "success" | "error";

export interface Notification {
	readonly message: string;
	readonly tone: NotificationTone;
}

/** What a screen may use while handling an event or drawing. */
export interface ScreenContext {
	readonly services: Services;
	readonly settings: Settings;
	readonly columns: number;
	readonly rows: number;
	/** The live status-line message, if one has not expired yet. */
	readonly notification: Notification | undefined;
	notify(message: string, tone?: NotificationTone): void;
	/** Deliver the settled `work` back through the event queue as a completion for `requestId`. */
	track(requestId: number, work: Promise<Completion>): void;
}

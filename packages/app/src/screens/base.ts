import type { Surface } from "@leetterm/tui";
import { PendingRequests } from "../requests";
import { type AppEvent, CONTINUE, type PopResult, type ScreenAction, type ScreenContext } from "../screen";

/**
 * Shared lifecycle for every screen. Subclasses implement `handle` and `draw`
 * and override the hooks they care about.
 */
export abstract class ScreenBase {
	/** Requests this screen is waiting on; the navigator routes completions by these ids. */
	readonly requests = new PendingRequests();

	/** First activation. May start requests. */
	onEnter(_ctx: ScreenContext): ScreenAction {
		return CONTINUE;
	}

	/** The screen above was popped, possibly with a result. */
	onResume(_result: PopResult | undefined, _ctx: ScreenContext): ScreenAction {
		return CONTINUE;
	}

	/** Popped, replaced, reset away or shut down. Anything still in flight becomes stale. */
	onExit(_ctx: ScreenContext): void {
		this.requests.invalidateAll();
	}

	abstract handle(event: AppEvent, ctx: ScreenContext): ScreenAction;

	abstract draw(surface: Surface, ctx: ScreenContext): void;
}

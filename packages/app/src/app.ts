import {
	assertTerminalSize,
	EventQueue,
	InputDecoder,
	matchesKey,
	Renderer,
	Surface,
	type Terminal,
	withTerminal,
} from "@leetterm/tui";
import { logger, toError } from "@leetterm/utils";
import { Navigator, type NavigatorState } from "./navigator";
import type { Completion, Result } from "./requests";
import type { AppEvent, Notification, NotificationTone, Screen, ScreenContext } from "./screen";
import { LoginScreen } from "./screens/login";
import type { Services } from "./services";
import type { Settings } from "./settings";

export const NOTIFICATION_MS = 3000;

export interface AppOptions {
	terminal: Terminal;
	services: Services;
	settings: Settings;
	/** First screen. Defaults to Login. */
	initialScreen?: Screen;
	/** Millisecond clock for notification expiry, injectable for tests. */
	clock?: () => number;
}

interface LiveNotification extends Notification {
	readonly expiresAt: number;
}

/**
 * The event loop. Every input, resize and settled request arrives on one
 * queue; each burst of queued events is handled in order and then drawn once.
 * The app is also the context screens see while handling and drawing.
 */
export class App implements ScreenContext {
	readonly queue = new EventQueue<AppEvent>();
	readonly navigator: Navigator;
	readonly renderer: Renderer;
	readonly services: Services;
	readonly settings: Settings;
	readonly #terminal: Terminal;
	readonly #decoder: InputDecoder<Result<Completion>>;
	readonly #clock: () => number;
	readonly #initialScreen: Screen;
	#notification: LiveNotification | undefined;
	#running = false;

	constructor(options: AppOptions) {
		this.#terminal = options.terminal;
		this.services = options.services;
		this.settings = options.settings;
		this.#clock = options.clock ?? Date.now;
		this.#initialScreen = options.initialScreen ?? new LoginScreen();
		this.#decoder = new InputDecoder(this.queue);
		this.renderer = new Renderer(options.terminal);
		this.navigator = new Navigator(() => new LoginScreen({ autoValidate: false }));
	}

	get running(): boolean {
		return this.#running;
	}

	get columns(): number {
		return this.renderer.columns;
	}

	get rows(): number {
		return this.renderer.rows;
	}

	get notification(): Notification | undefined {
		const live = this.#liveNotification();
		return live ? { message: live.message, tone: live.tone } : undefined;
	}

	notify(message: string, tone: NotificationTone = "info"): void {
		this.#notification = { message, tone, expiresAt: this.#clock() + NOTIFICATION_MS };
	}

	track(requestId: number, work: Promise<Completion>): void {
		void work.then(
			value => this.queue.push({ type: "completion", requestId, payload: { ok: true, value } }),
			(error: unknown) => this.queue.push({ type: "completion", requestId, payload: { ok: false, error: toError(error) } }),
		);
	}

	/** Take over the terminal and run until a screen quits. The terminal is restored on every exit path. */
	async run(): Promise<void> {
		try {
			await withTerminal(this.#terminal, this.#decoder.onInput, this.#onResize, async () => {
				this.start();
				while (this.#running) {
					const event = await this.#nextEvent();
					if (event) this.#process(event);
					this.processPending();
				}
			});
		} finally {
			await this.settings.flush();
		}
	}

	/** Size the frames, enter the first screen and paint it. */
	start(): void {
		const { columns, rows } = this.#terminal;
		assertTerminalSize(columns, rows);
		this.renderer.resize(columns, rows);
		this.#running = true;
		this.#terminal.hideCursor();
		this.#settle(this.navigator.start(this.#initialScreen, this));
		this.render();
	}

	/** Handle everything already queued, then draw once. */
	processPending(): void {
		for (let event = this.queue.poll(); event && this.#running; event = this.queue.poll()) {
			this.#process(event);
		}
		if (this.#running) this.render();
	}

	render(): void {
		const surface = new Surface({ row: 0, col: 0, width: this.renderer.columns, height: this.renderer.rows });
		const active = this.navigator.active;
		if (active) {
			logger.time("draw", () => active.draw(surface, this));
		}
		this.renderer.render(surface.commands);
	}

	/** Quit as if by Ctrl+C: every screen persists its state on the way out. */
	quit(): void {
		this.navigator.shutdown(this);
		this.#running = false;
	}

	#process(event: AppEvent): void {
		if (event.type === "key" && matchesKey(event, "ctrl+c")) {
			logger.info("Quit requested");
			this.quit();
			return;
		}
		if (event.type === "resize") {
			assertTerminalSize(event.columns, event.rows);
			this.renderer.resize(event.columns, event.rows);
		}
		this.#settle(this.navigator.dispatch(event, this));
	}

	#settle(state: NavigatorState): void {
		if (state === "quit") this.quit();
	}

	#liveNotification(): LiveNotification | undefined {
		const live = this.#notification;
		if (live && this.#clock() >= live.expiresAt) {
			this.#notification = undefined;
			return undefined;
		}
		return live;
	}

	#nextEvent(): Promise<AppEvent | undefined> {
		const live = this.#liveNotification();
		if (!live) return this.queue.next();
		// Wake up when the notification expires so the status line is redrawn
		return this.queue.nextWithin(live.expiresAt - this.#clock());
	}

	readonly #onResize = (): void => {
		this.#decoder.resize(this.#terminal.columns, this.#terminal.rows);
	};
}

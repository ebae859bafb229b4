/**
 * Settings with sync get/set and background persistence to config.yml.
 *
 * Usage:
 *   const settings = await Settings.load();
 *   const limit = settings.get("editor.undoLimit");   // sync read, typed
 *   settings.set("language", "cpp");                   // sync write, saves in background
 *   await settings.flush();                            // before exit
 *
 * For tests:
 *   const isolated = Settings.isolated({ language: "rust" });
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { getConfigPath, isEnoent, isRecord, logger } from "@leetterm/utils";
import * as yaml from "js-yaml";

// ═══════════════════════════════════════════════════════════════════════════
// Schema
// ═══════════════════════════════════════════════════════════════════════════

export interface SettingValues {
	language: string;
	"editor.undoLimit": number;
	"editor.coalesceWindowMs": number;
	"editor.pageLines": number;
	"input.escapeTimeoutMs": number;
	"credentials.session": string;
	"credentials.csrfToken": string;
	"catalog.path": string;
}

export type SettingPath = keyof SettingValues;

export interface SettingDef<T> {
	readonly default: T;
	readonly description: string;
	/** Accept a raw YAML value, or return undefined so the default applies. */
	readonly parse: (raw: unknown) => T | undefined;
}

function text(defaultValue: string, description: string): SettingDef<string> {
	return { default: defaultValue, description, parse: raw => (typeof raw === "string" ? raw : undefined) };
}

function integer(defaultValue: number, min: number, description: string): SettingDef<number> {
	return {
		default: defaultValue,
		description,
		parse: raw => (typeof raw === "number" && Number.isInteger(raw) && raw >= min ? raw : undefined),
	};
}

export const SETTINGS_SCHEMA: { readonly [P in SettingPath]: SettingDef<SettingValues[P]> } = {
	language: text("python3", "Preferred solution language slug"),
	"editor.undoLimit": integer(1000, 1, "Maximum undo entries per buffer"),
	"editor.coalesceWindowMs": integer(500, 0, "Typed characters closer together than this undo as one step"),
	"editor.pageLines": integer(20, 1, "Page size before the editor knows its height"),
	"input.escapeTimeoutMs": integer(25, 1, "How long a lone ESC waits for the rest of a sequence"),
	"credentials.session": text("", "Session cookie"),
	"credentials.csrfToken": text("", "CSRF token"),
	"catalog.path": text("", "Offline problem catalog (JSON)"),
};

export function getDefault<P extends SettingPath>(settingPath: P): SettingValues[P] {
	return SETTINGS_SCHEMA[settingPath].default;
}

// ═══════════════════════════════════════════════════════════════════════════
// Path Utilities
// ═══════════════════════════════════════════════════════════════════════════

/** Raw settings object as stored in YAML */
export interface RawSettings {
	[key: string]: unknown;
}

function getByPath(obj: RawSettings, segments: readonly string[]): unknown {
	let current: unknown = obj;
	for (const segment of segments) {
		if (!isRecord(current)) return undefined;
		current = current[segment];
	}
	return current;
}

/** Creates intermediate objects as needed. */
function setByPath(obj: RawSettings, segments: readonly string[], value: unknown): void {
	let current = obj;
	for (const segment of segments.slice(0, -1)) {
		const next = current[segment];
		if (isRecord(next)) {
			current = next;
		} else {
			const created: RawSettings = {};
			current[segment] = created;
			current = created;
		}
	}
	const last = segments[segments.length - 1];
	if (last !== undefined) current[last] = value;
}

// ═══════════════════════════════════════════════════════════════════════════
// Settings Class
// ═══════════════════════════════════════════════════════════════════════════

export interface SettingsOptions {
	/** Defaults to `<configDir>/config.yml`. */
	configPath?: string;
	/** Don't persist to disk (for tests) */
	inMemory?: boolean;
	/** Runtime overrides, never persisted */
	overrides?: Partial<SettingValues>;
}

const SAVE_DEBOUNCE_MS = 100;

export class Settings {
	readonly #configPath: string | null;

	/** Everything read from config.yml, unknown keys included */
	#global: RawSettings = {};
	/** Runtime overrides (not persisted) */
	#overrides: RawSettings = {};
	/** Paths modified during this session (for partial save) */
	#modified = new Set<SettingPath>();

	#saveTimer?: NodeJS.Timeout;
	#savePromise?: Promise<void>;

	private constructor(options: SettingsOptions) {
		this.#configPath = options.inMemory ? null : (options.configPath ?? getConfigPath());
		for (const [key, value] of Object.entries(options.overrides ?? {})) {
			setByPath(this.#overrides, key.split("."), value);
		}
	}

	/** Read config.yml. A missing or malformed file yields the defaults. */
	static async load(options: Omit<SettingsOptions, "inMemory"> = {}): Promise<Settings> {
		const instance = new Settings(options);
		if (instance.#configPath) {
			instance.#global = await readYaml(instance.#configPath);
		}
		return instance;
	}

	/** In-memory instance for tests. */
	static isolated(overrides: Partial<SettingValues> = {}): Settings {
		return new Settings({ inMemory: true, overrides });
	}

	get configPath(): string | null {
		return this.#configPath;
	}

	/** Override, then stored value, then default. Values of the wrong type are skipped. */
	get<P extends SettingPath>(settingPath: P): SettingValues[P] {
		const def = SETTINGS_SCHEMA[settingPath];
		const segments = settingPath.split(".");
		return (
			def.parse(getByPath(this.#overrides, segments)) ?? def.parse(getByPath(this.#global, segments)) ?? def.default
		);
	}

	/** Update the stored value and queue a background save. */
	set<P extends SettingPath>(settingPath: P, value: SettingValues[P]): void {
		setByPath(this.#global, settingPath.split("."), value);
		this.#modified.add(settingPath);
		this.#queueSave();
	}

	/** Flush any pending save to disk. */
	async flush(): Promise<void> {
		if (this.#saveTimer) {
			clearTimeout(this.#saveTimer);
			this.#saveTimer = undefined;
			this.#startSave();
		}
		if (this.#savePromise) await this.#savePromise;
	}

	#queueSave(): void {
		if (!this.#configPath) return;
		if (this.#saveTimer) clearTimeout(this.#saveTimer);
		this.#saveTimer = setTimeout(() => {
			this.#saveTimer = undefined;
			this.#startSave();
		}, SAVE_DEBOUNCE_MS);
	}

	/** Saves run one after another so an older write never lands last. */
	#startSave(): void {
		const previous = this.#savePromise ?? Promise.resolve();
		this.#savePromise = previous.then(() => this.#saveNow());
	}

	async #saveNow(): Promise<void> {
		const configPath = this.#configPath;
		if (!configPath || this.#modified.size === 0) return;
		const modifiedPaths = [...this.#modified];
		this.#modified.clear();
		try {
			// Re-read so edits made by hand while the app ran are kept
			const current = await readYaml(configPath);
			// Paths set during the read are still in #modified and go out with the next save
			for (const modified of [...modifiedPaths, ...this.#modified]) {
				const segments = modified.split(".");
				setByPath(current, segments, getByPath(this.#global, segments));
			}
			this.#global = current;
			const content = yaml.dump(current, { indent: 2 });
			await fs.mkdir(path.dirname(configPath), { recursive: true });
			await fs.writeFile(configPath, content);
		} catch (error) {
			logger.warn("Settings: save failed", { path: configPath, error: String(error) });
			// Re-add failed paths for retry
			for (const modified of modifiedPaths) {
				this.#modified.add(modified);
			}
		}
	}
}

async function readYaml(filePath: string): Promise<RawSettings> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (error) {
		if (isEnoent(error)) {
			logger.warn("Settings: no config file, using defaults", { path: filePath });
		} else {
			logger.warn("Settings: failed to read", { path: filePath, error: String(error) });
		}
		return {};
	}
	try {
		const parsed: unknown = yaml.load(content);
		if (isRecord(parsed)) return parsed;
		if (parsed !== undefined && parsed !== null) {
			logger.warn("Settings: config is not a mapping, using defaults", { path: filePath });
		}
	} catch (error) {
		logger.warn("Settings: failed to parse", { path: filePath, error: String(error) });
	}
	return {};
}

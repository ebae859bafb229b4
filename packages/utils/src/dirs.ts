/**
 * Path helpers for the leetterm config root.
 *
 * Uses LEETTERM_CONFIG_DIR when set, otherwise ~/.leetterm.
 */

import * as os from "node:os";
import * as path from "node:path";

/** App name (e.g. "leetterm") */
export const APP_NAME: string = "leetterm";

/** Config directory name under the home directory */
export const CONFIG_DIR_NAME: string = ".leetterm";

let configRootOverride: string | undefined;

/** Get the config root directory (~/.leetterm). */
export function getConfigRootDir(): string {
	if (configRootOverride) return configRootOverride;
	const fromEnv = process.env.LEETTERM_CONFIG_DIR;
	if (fromEnv) return path.resolve(fromEnv);
	return path.join(os.homedir(), CONFIG_DIR_NAME);
}

/** Point the config root somewhere else for the rest of the process. */
export function setConfigRootDir(dir: string): void {
	configRootOverride = path.resolve(dir);
}

/** Get the logs directory (~/.leetterm/logs). */
export function getLogsDir(): string {
	return path.join(getConfigRootDir(), "logs");
}

/** Get the solutions directory (~/.leetterm/solutions). */
export function getSolutionsDir(): string {
	return path.join(getConfigRootDir(), "solutions");
}

/** Get the settings file path (~/.leetterm/config.yml). */
export function getConfigPath(): string {
	return path.join(getConfigRootDir(), "config.yml");
}

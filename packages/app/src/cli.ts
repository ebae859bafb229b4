#!/usr/bin/env tsx
/**
 * leetterm entry point: parse flags, load settings, wire the offline
 * collaborators and run the app under the terminal guards.
 */
import * as fs from "node:fs";
import { installTerminalGuards, ProcessTerminal } from "@leetterm/tui";
import { APP_NAME, isRecord, logger, setConfigRootDir, toError } from "@leetterm/utils";
import chalk from "chalk";
import { Command } from "commander";
import { App } from "./app";
import { BUNDLED_CATALOG_PATH, LocalCatalog } from "./catalog";
import { KeywordHighlighter } from "./keyword-highlighter";
import { isKnownLanguage } from "./languages";
import { ProblemListScreen } from "./screens/problem-list";
import type { Services } from "./services";
import { Settings } from "./settings";
import { FileSolutionStore } from "./solution-store";

interface CliOptions {
	config?: string;
	catalog?: string;
	language?: string;
}

function readVersion(): string {
	const packageJson: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"));
	return isRecord(packageJson) && typeof packageJson.version === "string" ? packageJson.version : "0.0.0";
}

const program = new Command()
	.name(APP_NAME)
	.description("Browse coding problems and edit solutions in the terminal")
	.version(readVersion(), "-V, --version", "Print version")
	.option("-c, --config <dir>", "config directory (default: ~/.leetterm)")
	.option("--catalog <file>", "offline problem catalog (JSON)")
	.option("-l, --language <slug>", "starting solution language, e.g. python3 or cpp");

async function launch(options: CliOptions): Promise<void> {
	if (options.config) setConfigRootDir(options.config);
	const settings = await Settings.load();
	if (options.language) {
		if (!isKnownLanguage(options.language)) program.error(`Unknown language: ${options.language}`);
		settings.set("language", options.language);
	}

	const catalogPath = options.catalog ?? (settings.get("catalog.path") || BUNDLED_CATALOG_PATH);
	const catalog = LocalCatalog.fromFile(catalogPath);
	logger.info("Starting", { catalog: catalogPath, problems: catalog.size, config: settings.configPath });

	const services: Services = {
		problems: catalog,
		judge: catalog,
		auth: catalog,
		solutions: new FileSolutionStore(),
		highlighter: KeywordHighlighter.fromFile(),
	};
	const terminal = new ProcessTerminal({ escapeTimeoutMs: settings.get("input.escapeTimeoutMs") });
	// The offline catalog has no accounts, so there is nothing to sign in to
	const app = new App({ terminal, services, settings, initialScreen: new ProblemListScreen() });

	const removeGuards = installTerminalGuards();
	try {
		await app.run();
	} finally {
		removeGuards();
	}
}

program.parse();

void launch(program.opts<CliOptions>())
	.catch((error: unknown) => {
		const err = toError(error);
		logger.error("Fatal error", { error: err });
		process.stderr.write(`${chalk.red(`${err.name}: ${err.message}`)}\n`);
		process.exitCode = 1;
	})
	.finally(() => logger.close());

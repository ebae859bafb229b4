import * as fs from "node:fs";
import * as path from "node:path";
import { getSolutionsDir, isEnoent, logger } from "@leetterm/utils";
import { languageExtension } from "./languages";
import type { SolutionStore } from "./services";

/** Solutions as plain files: `<dir>/<problemSlug><ext>`, the extension picked by language. */
export class FileSolutionStore implements SolutionStore {
	constructor(readonly dir: string = getSolutionsDir()) {}

	pathFor(problemSlug: string, language: string): string {
		// Slugs come from the service; keep them from climbing out of the directory
		const safeSlug = problemSlug.replace(/[^A-Za-z0-9_-]/g, "_");
		return path.join(this.dir, `${safeSlug}${languageExtension(language)}`);
	}

	load(problemSlug: string, language: string): string | undefined {
		try {
			return fs.readFileSync(this.pathFor(problemSlug, language), "utf8");
		} catch (error) {
			if (isEnoent(error)) return undefined;
			throw error;
		}
	}

	save(problemSlug: string, language: string, code: string): void {
		const file = this.pathFor(problemSlug, language);
		fs.mkdirSync(this.dir, { recursive: true });
		fs.writeFileSync(file, code);
		logger.debug("Saved solution", { file, bytes: code.length });
	}
}

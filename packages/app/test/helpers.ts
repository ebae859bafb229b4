import { type KeyEvent, parseKey, PlainHighlighter } from "@leetterm/tui";
import { VirtualTerminal } from "../../tui/test/virtual-terminal";
import { App } from "../src/app";
import { type CatalogProblem, LocalCatalog } from "../src/catalog";
import type { Screen } from "../src/screen";
import { ProblemListScreen } from "../src/screens/problem-list";
import type { Services, SolutionStore } from "../src/services";
import { Settings } from "../src/settings";

export const PROBLEMS: CatalogProblem[] = [
	{
		questionId: "101",
		id: "1",
		slug: "count-vowel-runs",
		title: "Count Vowel Runs",
		difficulty: "Easy",
		acRate: 71.4,
		paidOnly: false,
		status: "solved",
		tags: ["String"],
		statement: "Return the number of vowel runs.\n\nExample 1:\nInput: s = \"aa\"\nOutput: 1",
		snippets: [
			{ language: "python3", languageName: "Python3", code: "class Solution:\n    pass" },
			{ language: "cpp", languageName: "C++", code: "class Solution {};" },
		],
		sampleCases: ['"aa"', '"bcd"'],
	},
	{
		questionId: "102",
		id: "2",
		slug: "merge-slots",
		title: "Merge Slots",
		difficulty: "Medium",
		acRate: 48.9,
		paidOnly: false,
		tags: ["Array"],
		statement: "Merge the slots.",
		snippets: [{ language: "python3", languageName: "Python3", code: "def merge():\n    pass" }],
		sampleCases: ["[[1,2]]"],
	},
	{
		questionId: "103",
		id: "3",
		slug: "vault-sequence",
		title: "Vault Sequence",
		difficulty: "Hard",
		acRate: 31,
		paidOnly: true,
		tags: [],
		statement: "",
		snippets: [],
		sampleCases: [],
	},
];

/** Solutions kept in a map, keyed by slug and language. */
export class MemorySolutionStore implements SolutionStore {
	readonly files = new Map<string, string>();

	load(problemSlug: string, language: string): string | undefined {
		return this.files.get(`${problemSlug}:${language}`);
	}

	save(problemSlug: string, language: string, code: string): void {
		this.files.set(`${problemSlug}:${language}`, code);
	}
}

export function makeServices(overrides: Partial<Services> = {}): Services {
	const catalog = new LocalCatalog(PROBLEMS);
	return {
		problems: catalog,
		judge: catalog,
		auth: catalog,
		solutions: new MemorySolutionStore(),
		highlighter: new PlainHighlighter(),
		...overrides,
	};
}

export interface Deferred<T> {
	readonly promise: Promise<T>;
	resolve(value: T): void;
	reject(error: Error): void;
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (error: Error) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

/** Let every already-settled promise chain run. */
export function settle(): Promise<void> {
	return new Promise(resolve => setImmediate(resolve));
}

export function key(sequence: string): KeyEvent {
	const event = parseKey(sequence);
	if (!event) throw new Error(`Not a key: ${JSON.stringify(sequence)}`);
	return event;
}

export interface Harness {
	readonly app: App;
	readonly terminal: VirtualTerminal;
	/** Queue the keys and handle them. */
	press(...sequences: string[]): void;
	/** Deliver settled requests and handle them. */
	flush(): Promise<void>;
}

export interface HarnessOptions {
	columns?: number;
	rows?: number;
	services?: Partial<Services>;
	settings?: Settings;
	initialScreen?: Screen;
	clock?: () => number;
}

/** An app on a virtual terminal, started and with its first requests delivered. */
export async function startApp(options: HarnessOptions = {}): Promise<Harness> {
	const terminal = new VirtualTerminal(options.columns ?? 80, options.rows ?? 24);
	const app = new App({
		terminal,
		services: makeServices(options.services),
		settings: options.settings ?? Settings.isolated(),
		initialScreen: options.initialScreen ?? new ProblemListScreen(),
		...(options.clock ? { clock: options.clock } : {}),
	});
	const harness: Harness = {
		app,
		terminal,
		press(...sequences) {
			for (const sequence of sequences) app.queue.push(key(sequence));
			app.processPending();
		},
		async flush() {
			await settle();
			app.processPending();
		},
	};
	app.start();
	await harness.flush();
	return harness;
}

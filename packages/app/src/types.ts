/**
 * Domain models exchanged with the problem, judge and auth collaborators.
 */

export type Difficulty = "Easy" | "Medium" | "Hard";

export const DIFFICULTIES: readonly Difficulty[] = ["Easy", "Medium", "Hard"];

/** Per-user progress on a problem. */
export type ProblemStatus = "solved" | "attempted" | "todo";

export interface ProblemSummary {
	/** Public problem number, e.g. "1". */
	readonly id: string;
	readonly slug: string;
	readonly title: string;
	readonly difficulty: Difficulty;
	/** Acceptance rate in percent. */
	readonly acRate: number;
	readonly paidOnly: boolean;
	readonly status: ProblemStatus;
	readonly tags: readonly string[];
}

export interface ProblemPage {
	readonly problems: readonly ProblemSummary[];
	readonly total: number;
}

export interface ProblemQuery {
	readonly skip: number;
	readonly limit: number;
	readonly difficulty?: Difficulty;
	readonly search?: string;
}

export interface CodeSnippet {
	/** Language slug, e.g. "python3". */
	readonly language: string;
	readonly languageName: string;
	readonly code: string;
}

export interface ProblemDetail {
	/** Internal id the judge expects. */
	readonly questionId: string;
	readonly id: string;
	readonly slug: string;
	readonly title: string;
	readonly difficulty: Difficulty;
	readonly tags: readonly string[];
	readonly paidOnly: boolean;
	/** Plain-text statement. Empty for paid-only problems the user cannot open. */
	readonly statement: string;
	readonly snippets: readonly CodeSnippet[];
	/** Sample input, one case per entry. */
	readonly sampleCases: readonly string[];
}

export interface TestCaseResult {
	readonly input: string;
	readonly expected: string;
	readonly actual: string;
	readonly passed: boolean;
}

export interface TestResult {
	readonly runSuccess: boolean;
	readonly statusMessage: string;
	readonly cases: readonly TestCaseResult[];
	readonly compileError?: string;
	readonly runtimeError?: string;
	readonly runtime?: string;
	readonly memory?: string;
}

export interface SubmissionResult {
	readonly statusCode: number;
	readonly verdict: string;
	readonly accepted: boolean;
	readonly totalCorrect: number;
	readonly totalTestcases: number;
	readonly runtime?: string;
	readonly runtimePercentile?: number;
	readonly memory?: string;
	readonly memoryPercentile?: number;
	readonly compileError?: string;
	readonly runtimeError?: string;
	/** Failing input, when the verdict is a wrong answer. */
	readonly input?: string;
	readonly expectedOutput?: string;
	readonly codeOutput?: string;
}

export interface Credentials {
	readonly session: string;
	readonly csrfToken: string;
}

export interface TestRequest {
	readonly slug: string;
	readonly questionId: string;
	readonly language: string;
	readonly code: string;
	readonly input: string;
}

export type SubmitRequest = Omit<TestRequest, "input">;

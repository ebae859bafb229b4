import { matchesKey, type Surface } from "@leetterm/tui";
import { type AppEvent, CONTINUE, pop, type ScreenAction, type ScreenContext } from "../screen";
import { theme } from "../theme";
import type { SubmissionResult } from "../types";
import { ScreenBase } from "./base";
import { drawRow, drawStatusLine } from "./chrome";
import { line, ScrollView, type StyledLine } from "./scroll-view";
import { errorBlock } from "./test-result";

function percentile(value: number | undefined, label: string): string {
	return value === undefined ? "" : ` (${label} ${value.toFixed(1)}%)`;
}

export function submissionLines(result: SubmissionResult): StyledLine[] {
	const lines: StyledLine[] = [
		line(result.verdict, result.accepted ? theme.success : theme.failure),
		line(""),
		line(`  tests passed:  ${result.totalCorrect}/${result.totalTestcases}`),
	];
	if (result.accepted) {
		lines.push(line(`  runtime:       ${result.runtime ?? "-"}${percentile(result.runtimePercentile, "faster than")}`));
		lines.push(line(`  memory:        ${result.memory ?? "-"}${percentile(result.memoryPercentile, "less than")}`));
		return lines;
	}
	if (result.runtime) lines.push(line(`  runtime:       ${result.runtime}`));
	if (result.compileError) lines.push(line(""), ...errorBlock("Compile Error:", result.compileError));
	if (result.runtimeError) lines.push(line(""), ...errorBlock("Runtime Error:", result.runtimeError));
	if (result.input) lines.push(line(""), line(`  input:     ${result.input}`));
	if (result.expectedOutput) lines.push(line(`  expected:  ${result.expectedOutput}`));
	if (result.codeOutput) lines.push(line(`  output:    ${result.codeOutput}`));
	return lines;
}

/** Verdict of a submission. Esc returns to the problem, `q` to the problem list. */
export class SubmissionResultScreen extends ScreenBase {
	readonly kind = "submissionResult" as const;
	readonly view: ScrollView;

	constructor(
		readonly result: SubmissionResult,
		readonly title: string,
	) {
		super();
		this.view = new ScrollView(submissionLines(result));
	}

	handle(event: AppEvent, _ctx: ScreenContext): ScreenAction {
		if (event.type !== "key") return CONTINUE;
		if (matchesKey(event, "escape")) return pop();
		if (matchesKey(event, "q")) return pop("list");
		this.view.handleKey(event);
		return CONTINUE;
	}

	draw(surface: Surface, ctx: ScreenContext): void {
		drawRow(surface, 0, ` Submission Result: ${this.title}`, theme.title);
		this.view.draw(surface.sub({ row: 2, col: 1, width: surface.width - 2, height: surface.height - 3 }));
		drawStatusLine(surface, ctx, "esc back to problem  q problem list  j/k scroll");
	}
}

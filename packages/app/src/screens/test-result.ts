import { matchesKey, type Surface } from "@leetterm/tui";
import { type AppEvent, CONTINUE, pop, type ScreenAction, type ScreenContext } from "../screen";
import { theme } from "../theme";
import type { TestResult } from "../types";
import { ScreenBase } from "./base";
import { drawRow, drawStatusLine } from "./chrome";
import { line, ScrollView, type StyledLine } from "./scroll-view";

export function errorBlock(title: string, text: string): StyledLine[] {
	return [line(title, theme.failure), ...text.split("\n").map(row => line(`  ${row}`, theme.failure)), line("")];
}

export function testResultLines(result: TestResult): StyledLine[] {
	const lines: StyledLine[] = [];
	if (result.runSuccess) {
		const passed = result.cases.filter(c => c.passed).length;
		const total = result.cases.length;
		lines.push(line(`Test Results: ${passed}/${total} passed`, passed === total ? theme.success : theme.accent));
	} else {
		lines.push(line(result.statusMessage, theme.failure));
	}
	lines.push(line(""));
	if (result.compileError) lines.push(...errorBlock("Compile Error:", result.compileError));
	if (result.runtimeError) lines.push(...errorBlock("Runtime Error:", result.runtimeError));
	result.cases.forEach((testCase, index) => {
		lines.push(
			line(`  ${testCase.passed ? "PASS" : "FAIL"}  Case ${index + 1}`, testCase.passed ? theme.success : theme.failure),
		);
		if (testCase.input) lines.push(line(`    input:    ${testCase.input}`));
		lines.push(line(`    expected: ${testCase.expected}`));
		lines.push(line(`    output:   ${testCase.actual}`));
		lines.push(line(""));
	});
	if (result.runtime) {
		lines.push(line(`runtime: ${result.runtime}  memory: ${result.memory ?? "-"}`, theme.dim));
	}
	return lines;
}

/** Outcome of running the sample cases. `s` submits, `e`/Esc returns to the editor. */
export class TestResultScreen extends ScreenBase {
	readonly kind = "testResult" as const;
	readonly view: ScrollView;

	constructor(
		readonly result: TestResult,
		readonly title: string,
	) {
		super();
		this.view = new ScrollView(testResultLines(result));
	}

	handle(event: AppEvent, _ctx: ScreenContext): ScreenAction {
		if (event.type !== "key") return CONTINUE;
		if (matchesKey(event, "s")) return pop("submit");
		if (matchesKey(event, "e") || matchesKey(event, "escape")) return pop();
		this.view.handleKey(event);
		return CONTINUE;
	}

	draw(surface: Surface, ctx: ScreenContext): void {
		drawRow(surface, 0, ` Test Results: ${this.title}`, theme.title);
		this.view.draw(surface.sub({ row: 2, col: 1, width: surface.width - 2, height: surface.height - 3 }));
		drawStatusLine(surface, ctx, "s submit  e edit  esc back  j/k scroll");
	}
}

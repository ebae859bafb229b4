import { BOX_SHARP, padding, visibleWidth, wrapText } from "@leetterm/tui";

const EXAMPLE_HEADING = /^Example\s+\d+\s*:/;
const CONSTRAINTS_HEADING = /^Constraints?\s*:?$/i;
const CONSTRAINTS_START = /^Constraints?\s*:?/i;
const TRAILER_HEADING = /^(Follow[\s-]?up|Note)\s*:/i;

function box(title: string, content: readonly string[], width: number): string[] {
	const { topLeft, topRight, bottomLeft, bottomRight, horizontal, vertical } = BOX_SHARP;
	const inner = Math.max(1, width - 4);
	const heading = `${horizontal} ${title} `;
	const out = [topLeft + heading + horizontal.repeat(Math.max(0, width - 2 - visibleWidth(heading))) + topRight];
	for (const raw of content) {
		for (const wrapped of wrapText(raw, inner)) {
			out.push(`${vertical} ${wrapped}${padding(inner - visibleWidth(wrapped))} ${vertical}`);
		}
	}
	out.push(bottomLeft + horizontal.repeat(Math.max(0, width - 2)) + bottomRight);
	return out;
}

function trimBlankEdges(lines: string[]): string[] {
	let start = 0;
	let end = lines.length;
	while (start < end && lines[start]?.trim() === "") start++;
	while (end > start && lines[end - 1]?.trim() === "") end--;
	return lines.slice(start, end);
}

/**
 * Lay out a problem statement for a pane `width` columns wide.
 * With `boxed`, "Example N:" and "Constraints:" sections are framed.
 */
export function formatDescription(statement: string, width: number, boxed: boolean): string[] {
	const w = Math.max(1, width);
	if (!boxed || w < 8) return wrapText(statement, w);

	const lines = statement.split("\n");
	const out: string[] = [];
	let examplesSeen = false;
	let i = 0;
	while (i < lines.length) {
		const current = lines[i] ?? "";
		const stripped = current.trim();

		if (EXAMPLE_HEADING.test(stripped)) {
			if (!examplesSeen) {
				examplesSeen = true;
				const label = " Examples ";
				const left = Math.max(0, Math.floor((w - label.length) / 2));
				out.push(BOX_SHARP.horizontal.repeat(left) + label + BOX_SHARP.horizontal.repeat(Math.max(0, w - left - label.length)), "");
			}
			const title = stripped.replace(/\s*:.*$/, "");
			const content: string[] = [];
			// Text after the colon on the heading line belongs to the example
			const inline = stripped.slice(stripped.indexOf(":") + 1).trim();
			if (inline) content.push(inline);
			i++;
			while (i < lines.length) {
				const next = (lines[i] ?? "").trim();
				if (EXAMPLE_HEADING.test(next) || CONSTRAINTS_START.test(next)) break;
				content.push(lines[i] ?? "");
				i++;
			}
			out.push(...box(title, trimBlankEdges(content), w), "");
			continue;
		}

		if (CONSTRAINTS_HEADING.test(stripped)) {
			const content: string[] = [];
			i++;
			while (i < lines.length && !TRAILER_HEADING.test((lines[i] ?? "").trim())) {
				content.push(lines[i] ?? "");
				i++;
			}
			out.push(...box("Constraints", trimBlankEdges(content), w), "");
			continue;
		}

		out.push(...wrapText(current, w));
		i++;
	}
	return trimBlankEdges(out);
}

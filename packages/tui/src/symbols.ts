export interface BoxSymbols {
	topLeft: string;
	topRight: string;
	bottomLeft: string;
	bottomRight: string;
	horizontal: string;
	vertical: string;
}

export const BOX_ROUND: BoxSymbols = {
	topLeft: "╭",
	topRight: "╮",
	bottomLeft: "╰",
	bottomRight: "╯",
	horizontal: "─",
	vertical: "│",
};

export const BOX_SHARP: BoxSymbols = {
	topLeft: "┌",
	topRight: "┐",
	bottomLeft: "└",
	bottomRight: "┘",
	horizontal: "─",
	vertical: "│",
};

/** Glyphs used by the screens outside of boxes. */
export const GLYPHS = {
	divider: "│",
	rule: "─",
	pointer: "›",
	check: "✓",
	attempted: "●",
	lock: "$",
	pass: "✓",
	fail: "✗",
} as const;

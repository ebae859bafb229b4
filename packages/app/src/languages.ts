export interface LanguageInfo {
	readonly slug: string;
	readonly name: string;
	readonly extension: string;
}

const LANGUAGES: readonly LanguageInfo[] = [
	{ slug: "cpp", name: "C++", extension: ".cpp" },
	{ slug: "java", name: "Java", extension: ".java" },
	{ slug: "python3", name: "Python3", extension: ".py" },
	{ slug: "python", name: "Python", extension: ".py" },
	{ slug: "javascript", name: "JavaScript", extension: ".js" },
	{ slug: "typescript", name: "TypeScript", extension: ".ts" },
	{ slug: "csharp", name: "C#", extension: ".cs" },
	{ slug: "c", name: "C", extension: ".c" },
	{ slug: "golang", name: "Go", extension: ".go" },
	{ slug: "kotlin", name: "Kotlin", extension: ".kt" },
	{ slug: "swift", name: "Swift", extension: ".swift" },
	{ slug: "rust", name: "Rust", extension: ".rs" },
	{ slug: "ruby", name: "Ruby", extension: ".rb" },
	{ slug: "php", name: "PHP", extension: ".php" },
	{ slug: "dart", name: "Dart", extension: ".dart" },
	{ slug: "scala", name: "Scala", extension: ".scala" },
	{ slug: "elixir", name: "Elixir", extension: ".ex" },
	{ slug: "erlang", name: "Erlang", extension: ".erl" },
	{ slug: "racket", name: "Racket", extension: ".rkt" },
];

const BY_SLUG = new Map(LANGUAGES.map(language => [language.slug, language]));

export function getLanguage(slug: string): LanguageInfo | undefined {
	return BY_SLUG.get(slug);
}

export function languageName(slug: string): string {
	return BY_SLUG.get(slug)?.name ?? slug;
}

/** Solution file extension; unknown languages get ".txt". */
export function languageExtension(slug: string): string {
	return BY_SLUG.get(slug)?.extension ?? ".txt";
}

export function isKnownLanguage(slug: string): boolean {
	return BY_SLUG.has(slug);
}

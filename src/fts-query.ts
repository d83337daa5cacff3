/**
 * Compiles user search text into an FTS5 MATCH expression.
 *
 * User text never reaches the query grammar as-is: it is split into word
 * tokens and each token becomes a double-quoted FTS5 string, so operators
 * (AND, OR, NOT, NEAR), column filters, prefix stars, and parentheses
 * typed by the user are matched as plain words or dropped.
 */

/** Columns a search looks at. Other text stages would duplicate hits. */
export const SEARCH_COLUMNS = ["title", "raw_transcription"] as const;

/** How a query was compiled. */
export type SearchMode = "term" | "phrase";

/** A compiled MATCH expression. */
export interface CompiledSearchQuery {
	mode: SearchMode;
	tokens: string[];
	/** Selects every hit. */
	match: string;
	/** Selects the hits holding the tokens as one phrase; these rank first. */
	phrase: string;
}

/** Runs of letters, digits, and intra-word apostrophes. */
const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu;

/**
 * Split search text into word tokens.
 *
 * @param query - Raw user input
 * @returns Tokens in input order
 */
export function tokenizeQuery(query: string): string[] {
	return query.match(TOKEN_PATTERN) ?? [];
}

/**
 * Quote a token as an FTS5 string literal.
 *
 * @param token - Word token
 * @returns `"token"` with embedded quotes doubled
 */
export function quoteFtsString(token: string): string {
	return `"${token.replaceAll('"', '""')}"`;
}

/**
 * Compile search text.
 *
 * - One token → term search: `{title raw_transcription} : "word"`.
 * - Several tokens → the exact phrase, OR every token present (AND).
 *   `phrase` keeps the phrase alone so the index can put exact-phrase
 *   hits ahead of rows that only hold the words apart.
 *
 * @param query - Raw user input
 * @returns Compiled query, or null when the input has no word characters
 */
export function compileSearchQuery(query: string): CompiledSearchQuery | null {
	const tokens = tokenizeQuery(query);
	if (tokens.length === 0) return null;

	const columns = `{${SEARCH_COLUMNS.join(" ")}}`;

	if (tokens.length === 1) {
		const term = `${columns} : ${quoteFtsString(tokens[0])}`;
		return { mode: "term", tokens, match: term, phrase: term };
	}

	const phrase = `${columns} : ${quoteFtsString(tokens.join(" "))}`;
	const allTerms = tokens.map((token) => `${columns} : ${quoteFtsString(token)}`).join(" AND ");
	return { mode: "phrase", tokens, match: `${phrase} OR (${allTerms})`, phrase };
}

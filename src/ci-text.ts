/**
 * Character-level text folding for case- and whitespace-insensitive equality.
 *
 * Both operate one character (code point) at a time, so a character whose
 * upper-case form is longer than itself ("ß" → "SS") folds to itself rather
 * than changing the text's length.
 */

/** Upper-case one character using the runtime locale. */
export function foldChar(ch: string): string {
	const upper = ch.toLocaleUpperCase();
	return [...upper].length === 1 ? upper : ch;
}

export function foldCase(text: string): string {
	return Array.from(text, foldChar).join("");
}

export function equalsIgnoringCase(expected: string, actual: string): boolean {
	return foldCase(expected) === foldCase(actual);
}

const WHITESPACE = /^\s$/u;

export function isWhitespace(ch: string): boolean {
	return WHITESPACE.test(ch);
}

/** Remove every character classified as whitespace. */
export function stripWhitespace(text: string): string {
	return Array.from(text)
		.filter((ch) => !isWhitespace(ch))
		.join("");
}

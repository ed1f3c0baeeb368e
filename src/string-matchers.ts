import { RE2JS } from "re2js";

import { equalsIgnoringCase, stripWhitespace } from "./ci-text.ts";
import { Matcher, MatcherError, type Policy } from "./matcher.ts";
import type { Description } from "./render.ts";

/** Equality after folding each character to upper case. */
export class IsEqualIgnoringCase implements Policy<string> {
	matches(expected: string, actual: unknown): boolean {
		if (typeof actual !== "string") return false;
		return equalsIgnoringCase(expected, actual);
	}

	describe(out: Description, expected: string): void {
		out.append("Equal to ").appendQuoted(expected).append(" ignoring case");
	}
}

/** Equality after removing all whitespace from both sides. */
export class IsEqualIgnoringWhiteSpace implements Policy<string> {
	matches(expected: string, actual: unknown): boolean {
		if (typeof actual !== "string") return false;
		return stripWhitespace(expected) === stripWhitespace(actual);
	}

	describe(out: Description, expected: string): void {
		out.append("Equal to ").appendQuoted(expected).append(" ignoring white space");
	}
}

/** Literal prefix match. */
export class StringStartsWith implements Policy<string> {
	matches(prefix: string, actual: unknown): boolean {
		if (typeof actual !== "string") return false;
		return actual.startsWith(prefix);
	}

	describe(out: Description, prefix: string): void {
		out.append("starts with ").appendQuoted(prefix);
	}
}

/** Literal suffix match. A suffix longer than the text never matches. */
export class StringEndsWith implements Policy<string> {
	matches(suffix: string, actual: unknown): boolean {
		if (typeof actual !== "string") return false;
		return actual.endsWith(suffix);
	}

	describe(out: Description, suffix: string): void {
		out.append("ends with ").appendQuoted(suffix);
	}
}

/** A pattern compiled once, when the matcher is built. */
export interface CompiledPattern {
	readonly source: string;
	readonly regex: RE2JS;
}

/**
 * Full-string regular expression match using RE2 for guaranteed linear-time
 * matching. Uses RE2JS.compile().matcher().matches(), which succeeds only when
 * the whole input matches (unlike find(), which searches anywhere).
 *
 * RE2 does not support backreferences or lookahead/lookbehind because they
 * require backtracking. Patterns using them are rejected at compile time.
 */
export class MatchesPattern implements Policy<CompiledPattern> {
	matches(pattern: CompiledPattern, actual: unknown): boolean {
		if (typeof actual !== "string") return false;
		return pattern.regex.matcher(actual).matches();
	}

	describe(out: Description, pattern: CompiledPattern): void {
		out.append("a string matching the pattern ").append(pattern.source);
	}
}

/** @throws MatcherError when the pattern does not compile. */
export function compilePattern(source: string): CompiledPattern {
	try {
		return { source, regex: RE2JS.compile(source) };
	} catch (e) {
		throw new MatcherError(
			`invalid regex pattern "${source}": ${e instanceof Error ? e.message : String(e)}`,
		);
	}
}

const IS_EQUAL_IGNORING_CASE = new IsEqualIgnoringCase();
const IS_EQUAL_IGNORING_WHITE_SPACE = new IsEqualIgnoringWhiteSpace();
const STARTS_WITH = new StringStartsWith();
const ENDS_WITH = new StringEndsWith();
const MATCHES_PATTERN = new MatchesPattern();

export function equalToIgnoringCase(text: string): Matcher<string> {
	return new Matcher<string, string>(IS_EQUAL_IGNORING_CASE, text);
}

export function equalToIgnoringWhiteSpace(text: string): Matcher<string> {
	return new Matcher<string, string>(IS_EQUAL_IGNORING_WHITE_SPACE, text);
}

export function startsWith(prefix: string): Matcher<string> {
	return new Matcher<string, string>(STARTS_WITH, prefix);
}

export function endsWith(suffix: string): Matcher<string> {
	return new Matcher<string, string>(ENDS_WITH, suffix);
}

/**
 * Text that matches `pattern` in full.
 *
 * @throws MatcherError when the pattern is invalid.
 */
export function matchesPattern(pattern: string): Matcher<string> {
	return new Matcher<string, CompiledPattern>(MATCHES_PATTERN, compilePattern(pattern));
}

/** Alias of `matchesPattern`. */
export const matches = matchesPattern;

import { Matcher, type Policy } from "./matcher.ts";
import type { Description } from "./render.ts";

/** Two sub-matchers, possibly of different actual types. */
export type MatcherPair = readonly [Matcher<unknown>, Matcher<unknown>];

/**
 * Both sub-matchers must match.
 *
 * Both are always evaluated, with no short-circuit, so neither may rely on the
 * other being skipped.
 */
export class AllOf implements Policy<MatcherPair> {
	matches([first, second]: MatcherPair, actual: unknown): boolean {
		const a = first.test(actual);
		const b = second.test(actual);
		return a && b;
	}

	describe(out: Description, [first, second]: MatcherPair): void {
		out.append("all of ").appendDescriptionOf(first).append(" and ").appendDescriptionOf(second);
	}
}

/** At least one sub-matcher must match. Both are always evaluated. */
export class AnyOf implements Policy<MatcherPair> {
	matches([first, second]: MatcherPair, actual: unknown): boolean {
		const a = first.test(actual);
		const b = second.test(actual);
		return a || b;
	}

	describe(out: Description, [first, second]: MatcherPair): void {
		out.append("any of ").appendDescriptionOf(first).append(" or ").appendDescriptionOf(second);
	}
}

const ALL_OF = new AllOf();
const ANY_OF = new AnyOf();

/** The actual value must satisfy both matchers, so it must be both `A` and `B`. */
export function allOf<A, B>(first: Matcher<A>, second: Matcher<B>): Matcher<A & B> {
	return new Matcher<A & B, MatcherPair>(ALL_OF, [first, second]);
}

/** The actual value must satisfy either matcher, so it may be an `A` or a `B`. */
export function anyOf<A, B>(first: Matcher<A>, second: Matcher<B>): Matcher<A | B> {
	return new Matcher<A | B, MatcherPair>(ANY_OF, [first, second]);
}

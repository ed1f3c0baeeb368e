import { type Matcher, normalize } from "./matcher.ts";
import { type OutputStrategy, StandardOutput } from "./output.ts";
import { renderValue } from "./render.ts";

/** An assertion bound to one output strategy. */
export type AssertThat<R> = <A>(actual: A, matcher: Matcher<A>) => R;

/**
 * Evaluate `matcher` against `actual` and hand the outcome to `output`.
 *
 * The matcher is always evaluated and both sides are always rendered, so the
 * strategy receives a well-formed triple on success as well as failure.
 */
export function assertResult<A, R>(output: OutputStrategy<R>, actual: A, matcher: Matcher<A>): R {
	const value = normalize(actual);
	const passed = matcher.test(value);
	return output.report(matcher.toString(), renderValue(value), passed);
}

export function createAssertThat<R>(output: OutputStrategy<R>): AssertThat<R> {
	return (actual, matcher) => assertResult(output, actual, matcher);
}

/** Prints the diagnostic on failure and returns the outcome. */
export const assertThat: AssertThat<boolean> = createAssertThat(new StandardOutput());

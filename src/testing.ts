import { assertResult } from "./assert.ts";
import type { Matcher } from "./matcher.ts";
import { type AssertionResult, ResultOutput } from "./output.ts";

const output = new ResultOutput();

/**
 * Custom assertions for a host test framework's `expect.extend`.
 *
 *   import { expect } from "vitest";
 *   expect.extend(matcherAssertions);
 *   expect("Hello").toSatisfyMatcher(startsWith("He"));
 */
export const matcherAssertions = {
	toSatisfyMatcher<A>(received: A, matcher: Matcher<A>): AssertionResult {
		return assertResult(output, received, matcher);
	},
};

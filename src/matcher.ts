import { isTypedArray } from "./capabilities.ts";
import { Description, type SelfDescribing, isIterable } from "./render.ts";

/** Base class for errors raised while building or loading matchers. */
export class MatcherError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MatcherError";
	}
}

/**
 * One stateless matching rule.
 *
 * `matches` receives the matcher's stored expected value and an already
 * normalized actual value. A value of the wrong runtime shape is a non-match,
 * not an error.
 */
export interface Policy<E> {
	matches(expected: E, actual: unknown): boolean;
	describe(out: Description, expected: E): void;
}

/**
 * A policy bound to its expected value.
 *
 * `A` is the type of actual values the matcher accepts. It only constrains
 * callers; policies narrow the value they receive themselves.
 */
export class Matcher<A, E = unknown> implements SelfDescribing {
	constructor(
		readonly policy: Policy<E>,
		readonly expected: E,
	) {
		Object.freeze(this);
	}

	/** Normalize `actual`, then apply the policy. */
	matches(actual: A): boolean {
		return this.test(normalize(actual));
	}

	/** Apply the policy to a value that has already been normalized. */
	test(value: unknown): boolean {
		return this.policy.matches(this.expected, value);
	}

	describeTo(out: Description): void {
		this.policy.describe(out, this.expected);
	}

	toString(): string {
		return new Description().appendDescriptionOf(this).toString();
	}
}

/**
 * Bring a value into the shape policies work with.
 *
 * - `String` objects become primitive text.
 * - Typed arrays become plain arrays of their elements.
 * - One-shot iterators (generators, `map.keys()`) are drained into arrays, so
 *   matching and rendering see the same elements.
 *
 * Everything else is returned unchanged.
 */
export function normalize(value: unknown): unknown {
	if (value instanceof String) return value.valueOf();
	if (isTypedArray(value)) return [...value];
	if (isIterator(value)) return Array.from(value);
	return value;
}

function isIterator(value: unknown): value is IterableIterator<unknown> {
	return (
		isIterable(value) &&
		!Array.isArray(value) &&
		"next" in value &&
		typeof value.next === "function" &&
		value[Symbol.iterator]() === value
	);
}

import {
	type Comparable,
	type Orderable,
	type Widen,
	areEqual,
	compareOrder,
	equalityCapability,
} from "./capabilities.ts";
import { Matcher, MatcherError, type Policy, normalize } from "./matcher.ts";
import { type Description, renderValue } from "./render.ts";

/** Thrown when an equality matcher is built for a value with no equality. */
export class IncomparableValueError extends MatcherError {
	readonly value: string;

	constructor(value: unknown) {
		const rendered = renderValue(value);
		super(`equality is not defined for ${rendered}`);
		this.name = "IncomparableValueError";
		this.value = rendered;
	}
}

// ── Identity / negation ─────────────────────────────────────────────

/** Decorates another matcher's description with "is". */
export class Is implements Policy<Matcher<unknown>> {
	matches(inner: Matcher<unknown>, actual: unknown): boolean {
		return inner.test(actual);
	}

	describe(out: Description, inner: Matcher<unknown>): void {
		out.append("is ").appendDescriptionOf(inner);
	}
}

/** Inverts another matcher. */
export class IsNot implements Policy<Matcher<unknown>> {
	matches(inner: Matcher<unknown>, actual: unknown): boolean {
		return !inner.test(actual);
	}

	describe(out: Description, inner: Matcher<unknown>): void {
		out.append("not ").appendDescriptionOf(inner);
	}
}

/** `null` and `undefined` are both the null marker. */
export class IsNull implements Policy<null> {
	matches(expected: null, actual: unknown): boolean {
		return actual === expected || actual === undefined;
	}

	describe(out: Description): void {
		out.append("null");
	}
}

// ── Equality ────────────────────────────────────────────────────────

export class IsEqual implements Policy<unknown> {
	matches(expected: unknown, actual: unknown): boolean {
		return areEqual(expected, actual);
	}

	describe(out: Description, expected: unknown): void {
		out.appendLiteral(expected);
	}
}

/** Reference identity, for objects compared by address rather than content. */
export class IsSame implements Policy<unknown> {
	matches(expected: unknown, actual: unknown): boolean {
		return expected === actual;
	}

	describe(out: Description, expected: unknown): void {
		out.append("same instance as ").appendValue(expected);
	}
}

// ── Numbers and ordering ────────────────────────────────────────────

export interface Tolerance {
	readonly value: number;
	readonly delta: number;
}

export class IsCloseTo implements Policy<Tolerance> {
	matches(expected: Tolerance, actual: unknown): boolean {
		if (typeof actual !== "number") return false;
		return Math.abs(actual - expected.value) <= expected.delta;
	}

	describe(out: Description, expected: Tolerance): void {
		out
			.append("a numeric value within +/-")
			.appendValue(expected.delta)
			.append(" of ")
			.appendValue(expected.value);
	}
}

export type Ordering = "lt" | "le" | "gt" | "ge";

const ORDERING_TEXT: Record<Ordering, string> = {
	lt: "a value less than ",
	le: "a value less than or equal to ",
	gt: "a value greater than ",
	ge: "a value equal to or greater than ",
};

export class OrderingComparison implements Policy<Orderable> {
	constructor(readonly ordering: Ordering) {}

	matches(expected: Orderable, actual: unknown): boolean {
		const order = compareOrder(actual, expected);
		if (order === null) return false;
		switch (this.ordering) {
			case "lt":
				return order < 0;
			case "le":
				return order <= 0;
			case "gt":
				return order > 0;
			case "ge":
				return order >= 0;
		}
	}

	describe(out: Description, expected: Orderable): void {
		out.append(ORDERING_TEXT[this.ordering]).appendLiteral(expected);
	}
}

const IS = new Is();
const IS_NOT = new IsNot();
const IS_NULL = new IsNull();
const IS_EQUAL = new IsEqual();
const IS_SAME = new IsSame();
const IS_CLOSE_TO = new IsCloseTo();
const ORDERINGS: Record<Ordering, OrderingComparison> = {
	lt: new OrderingComparison("lt"),
	le: new OrderingComparison("le"),
	gt: new OrderingComparison("gt"),
	ge: new OrderingComparison("ge"),
};

// ── Factories ───────────────────────────────────────────────────────

/** Sugar: same outcome as `matcher`, described as "is ...". */
export function is<A>(matcher: Matcher<A>): Matcher<A> {
	return new Matcher<A, Matcher<unknown>>(IS, matcher);
}

export function not<A>(matcher: Matcher<A>): Matcher<A> {
	return new Matcher<A, Matcher<unknown>>(IS_NOT, matcher);
}

export function isNull(): Matcher<unknown> {
	return new Matcher<unknown, null>(IS_NULL, null);
}

/**
 * Equality using the strongest comparison the value supports: `equals()` or
 * `===` first, structural comparison for plain data, and a compile error for
 * anything else (functions, objects with methods but no `equals`).
 *
 * @throws IncomparableValueError when static types were bypassed and the value
 * has no equality at all.
 */
export function equalTo<T>(value: T & Comparable<T>): Matcher<Widen<T>> {
	return equalToValue(value);
}

/** `equalTo` for values whose type is only known at run time. */
export function equalToValue<A = unknown>(value: unknown): Matcher<A> {
	const expected = normalize(value);
	if (equalityCapability(expected) === "none") {
		throw new IncomparableValueError(value);
	}
	return new Matcher<A>(IS_EQUAL, expected);
}

export function sameInstance<T>(instance: T): Matcher<T> {
	return new Matcher<T>(IS_SAME, instance);
}

export function closeTo(value: number, delta: number): Matcher<number> {
	return new Matcher<number, Tolerance>(IS_CLOSE_TO, { value, delta });
}

export function greaterThan<T extends Orderable>(value: T): Matcher<Widen<T>> {
	return ordering("gt", value);
}

export function greaterThanOrEqualTo<T extends Orderable>(value: T): Matcher<Widen<T>> {
	return ordering("ge", value);
}

export function lessThan<T extends Orderable>(value: T): Matcher<Widen<T>> {
	return ordering("lt", value);
}

export function lessThanOrEqualTo<T extends Orderable>(value: T): Matcher<Widen<T>> {
	return ordering("le", value);
}

export function ordering<A>(kind: Ordering, value: Orderable): Matcher<A> {
	return new Matcher<A, Orderable>(ORDERINGS[kind], value);
}

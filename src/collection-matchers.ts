import { type Widen, areEqual } from "./capabilities.ts";
import { Matcher, type Policy, normalize } from "./matcher.ts";
import { type Description, isIterable, isPlainObject } from "./render.ts";

/** Key/value collections: maps and plain records. */
export type Keyed<K, V> = ReadonlyMap<K, V> | { readonly [key: string]: V };

/**
 * Element containment.
 *
 * When both sides are text this is a substring check; otherwise the actual
 * value must be iterable and is scanned for an element equal to the expected
 * one. The scan stops at the first match.
 */
export class IsContaining implements Policy<unknown> {
	matches(expected: unknown, actual: unknown): boolean {
		if (typeof expected === "string" && typeof actual === "string") {
			return actual.includes(expected);
		}
		if (!isIterable(actual)) return false;
		for (const item of actual) {
			if (areEqual(expected, normalize(item))) return true;
		}
		return false;
	}

	describe(out: Description, expected: unknown): void {
		out.append("contains ").appendLiteral(expected);
	}
}

/** Every element of an iterable satisfies the item matcher. Empty is true. */
export class EveryItem implements Policy<Matcher<unknown>> {
	matches(itemMatcher: Matcher<unknown>, actual: unknown): boolean {
		if (!isIterable(actual)) return false;
		for (const item of actual) {
			if (!itemMatcher.test(normalize(item))) return false;
		}
		return true;
	}

	describe(out: Description, itemMatcher: Matcher<unknown>): void {
		out.append("every item is ").appendDescriptionOf(itemMatcher);
	}
}

/** Some entry of a map or record has the expected key. */
export class IsContainingKey implements Policy<unknown> {
	matches(key: unknown, actual: unknown): boolean {
		const entries = entriesOf(actual);
		if (entries === null) return false;
		const wanted = keyFor(key, actual);
		for (const [k] of entries) {
			if (areEqual(wanted, k)) return true;
		}
		return false;
	}

	describe(out: Description, key: unknown): void {
		out.append("has key ").appendValue(key);
	}
}

export type Entry = readonly [unknown, unknown];

/** Some entry of a map or record equals the expected key/value pair. */
export class IsContainingEntry implements Policy<Entry> {
	matches([key, value]: Entry, actual: unknown): boolean {
		const entries = entriesOf(actual);
		if (entries === null) return false;
		const wanted = keyFor(key, actual);
		for (const [k, v] of entries) {
			if (areEqual(wanted, k) && areEqual(value, normalize(v))) return true;
		}
		return false;
	}

	describe(out: Description, entry: Entry): void {
		out.append("contains (").appendValue(entry[0]).append(", ").appendValue(entry[1]).append(")");
	}
}

/** The actual value is one of the expected elements. Scans in declaration order. */
export class IsIn implements Policy<readonly unknown[]> {
	matches(candidates: readonly unknown[], actual: unknown): boolean {
		return candidates.some((candidate) => areEqual(candidate, actual));
	}

	describe(out: Description, candidates: readonly unknown[]): void {
		out.append("one of ").appendValue(candidates);
	}
}

/** Record keys are strings, so a numeric key is looked up by its text. */
function keyFor(key: unknown, actual: unknown): unknown {
	return typeof key === "number" && isPlainObject(actual) ? String(key) : key;
}

function entriesOf(value: unknown): Iterable<Entry> | null {
	if (value instanceof Map) return value.entries();
	if (isPlainObject(value)) return Object.entries(value);
	return null;
}

const IS_CONTAINING = new IsContaining();
const EVERY_ITEM = new EveryItem();
const IS_CONTAINING_KEY = new IsContainingKey();
const IS_CONTAINING_ENTRY = new IsContainingEntry();
const IS_IN = new IsIn();

/**
 * `contains(element)` matches text containing a substring, or an iterable
 * holding an equal element. `contains(key, value)` matches a map or record
 * holding that entry.
 */
export function contains<T>(element: T): Matcher<Iterable<Widen<T>>>;
export function contains<K, V>(key: K, value: V): Matcher<Keyed<Widen<K>, Widen<V>>>;
export function contains(first: unknown, ...rest: [] | [unknown]): Matcher<unknown> {
	if (rest.length === 1) {
		return new Matcher<unknown, Entry>(IS_CONTAINING_ENTRY, [normalize(first), normalize(rest[0])]);
	}
	return new Matcher<unknown>(IS_CONTAINING, normalize(first));
}

export function everyItem<T>(itemMatcher: Matcher<T>): Matcher<Iterable<T>> {
	return new Matcher<Iterable<T>, Matcher<unknown>>(EVERY_ITEM, itemMatcher);
}

export function hasKey<K>(key: K): Matcher<Keyed<Widen<K>, unknown>> {
	return new Matcher<Keyed<Widen<K>, unknown>>(IS_CONTAINING_KEY, normalize(key));
}

/** The actual value equals one of the elements of `collection`. */
export function isIn<T>(collection: Iterable<T>): Matcher<Widen<T>> {
	return new Matcher<Widen<T>, readonly unknown[]>(IS_IN, Array.from(collection, normalize));
}

export function oneOf<T>(...items: T[]): Matcher<Widen<T>> {
	return isIn(items);
}

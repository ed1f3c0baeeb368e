/**
 * Capability traits: which values support equality and which support ordering.
 *
 * Each capability exists twice. At the type level, `Comparable<T>` and
 * `Orderable` decide which factories accept a value, so an equality check on a
 * type without one is rejected by the compiler. At run time,
 * `equalityCapability()` resolves the same facts in the same priority order:
 *
 *   1. value:      primitives (`===`) and `Equatable` objects (`equals`)
 *   2. structural: dates, arrays, typed arrays and plain data objects
 *   3. none:       functions, and objects with methods but no `equals`
 *
 * Value equality always wins over structural equality when both would apply.
 */

import { isPlainObject } from "./render.ts";

export type Primitive = string | number | bigint | boolean | symbol | null | undefined;

/** Objects that define their own equality. */
export interface Equatable {
	equals(other: unknown): boolean;
}

/** Objects that define their own ordering; negative means `this` sorts first. */
export interface Ordered {
	compareTo(other: unknown): number;
}

/** Values supporting `<`. */
export type Orderable = number | bigint | string | Date | Ordered;

type TypedArray = InstanceType<(typeof TYPED_ARRAYS)[number]>;

const TYPED_ARRAYS = [
	Int8Array,
	Uint8Array,
	Uint8ClampedArray,
	Int16Array,
	Uint16Array,
	Int32Array,
	Uint32Array,
	Float32Array,
	Float64Array,
	BigInt64Array,
	BigUint64Array,
] as const;

type IsNever<T> = [T] extends [never] ? true : false;

type IncomparableKeys<T> = {
	[K in keyof T]-?: IsNever<Comparable<T[K]>> extends true ? K : never;
}[keyof T];

/** `T` when equality is defined for it, otherwise `never`. */
export type Comparable<T> = T extends Primitive
	? T
	: T extends Equatable
		? T
		: T extends (...args: never[]) => unknown
			? never
			: T extends Date | TypedArray
				? T
				: T extends readonly (infer E)[]
					? IsNever<E> extends true
						? T
						: IsNever<Comparable<E>> extends true
							? never
							: T
					: T extends object
						? IsNever<IncomparableKeys<T>> extends true
							? T
							: never
						: never;

/** Literal types widened to their base primitive. */
export type Widen<T> = T extends string
	? string
	: T extends number
		? number
		: T extends bigint
			? bigint
			: T extends boolean
				? boolean
				: T;

export type EqualityCapability = "value" | "structural" | "none";

export function isPrimitive(value: unknown): value is Primitive {
	return value === null || (typeof value !== "object" && typeof value !== "function");
}

export function isEquatable(value: unknown): value is Equatable {
	return (
		typeof value === "object" &&
		value !== null &&
		"equals" in value &&
		typeof value.equals === "function"
	);
}

export function isOrdered(value: unknown): value is Ordered {
	return (
		typeof value === "object" &&
		value !== null &&
		"compareTo" in value &&
		typeof value.compareTo === "function"
	);
}

export function isTypedArray(value: unknown): value is TypedArray {
	return TYPED_ARRAYS.some((ctor) => value instanceof ctor);
}

/** Arrays, dates, typed arrays, and objects carrying data but no functions. */
export function isStructural(value: unknown): boolean {
	if (Array.isArray(value) || value instanceof Date || isTypedArray(value)) return true;
	if (typeof value !== "object" || value === null) return false;
	if (value instanceof Map || value instanceof Set) return false;
	if (!isPlainObject(value) && hasMethods(value)) return false;
	return Object.values(value).every((v) => typeof v !== "function");
}

function hasMethods(value: object): boolean {
	let proto: object | null = Object.getPrototypeOf(value);
	while (proto !== null && proto !== Object.prototype) {
		for (const key of Object.getOwnPropertyNames(proto)) {
			if (key === "constructor") continue;
			const descriptor = Object.getOwnPropertyDescriptor(proto, key);
			if (descriptor !== undefined && typeof descriptor.value === "function") return true;
		}
		proto = Object.getPrototypeOf(proto);
	}
	return false;
}

export function equalityCapability(value: unknown): EqualityCapability {
	if (isPrimitive(value) || isEquatable(value)) return "value";
	if (isStructural(value)) return "structural";
	return "none";
}

/** Does the value support `==` (primitive or `Equatable`)? */
export function supportsEquality(value: unknown): boolean {
	return equalityCapability(value) === "value";
}

/** Does the value support `<`? */
export function supportsOrdering(value: unknown): value is Orderable {
	switch (typeof value) {
		case "number":
		case "bigint":
		case "string":
			return true;
	}
	return value instanceof Date || isOrdered(value);
}

/** Equality with the strongest comparison the expected value supports. */
export function areEqual(expected: unknown, actual: unknown): boolean {
	return equalWith(expected, actual, new WeakMap());
}

// Pairs whose structural comparison is in progress, expected -> actuals.
type Pending = WeakMap<object, WeakSet<object>>;

function equalWith(expected: unknown, actual: unknown, pending: Pending): boolean {
	switch (equalityCapability(expected)) {
		case "value":
			return isEquatable(expected) ? expected.equals(actual) : expected === actual;
		case "structural":
			return structurallyEqual(expected, actual, pending);
		case "none":
			return expected === actual;
	}
}

function structurallyEqual(expected: unknown, actual: unknown, pending: Pending): boolean {
	if (expected === actual) return true;
	if (typeof expected !== "object" || expected === null) return false;
	if (typeof actual !== "object" || actual === null) return false;

	// A pair met again while it is still being compared: equal so far.
	let actuals = pending.get(expected);
	if (actuals?.has(actual)) return true;
	if (actuals === undefined) {
		actuals = new WeakSet();
		pending.set(expected, actuals);
	}
	actuals.add(actual);
	try {
		return compareContents(expected, actual, pending);
	} finally {
		actuals.delete(actual);
	}
}

function compareContents(expected: object, actual: object, pending: Pending): boolean {
	const left = isTypedArray(expected) ? [...expected] : expected;
	const right = isTypedArray(actual) ? [...actual] : actual;

	if (Array.isArray(left)) {
		if (!Array.isArray(right) || right.length !== left.length) return false;
		return left.every((item, i) => equalWith(item, right[i], pending));
	}
	if (left instanceof Date) {
		return right instanceof Date && right.getTime() === left.getTime();
	}
	if (Object.getPrototypeOf(left) !== Object.getPrototypeOf(right)) return false;

	const expectedEntries = Object.entries(left);
	const actualEntries = new Map(Object.entries(right));
	if (expectedEntries.length !== actualEntries.size) return false;
	return expectedEntries.every(
		([key, value]) => actualEntries.has(key) && equalWith(value, actualEntries.get(key), pending),
	);
}

/**
 * Order `actual` relative to `expected`: negative when it sorts first, zero when
 * equal, positive when it sorts after. `null` when the two are not ordered with
 * respect to each other.
 */
export function compareOrder(actual: unknown, expected: Orderable): number | null {
	if (isOrdered(expected)) {
		const result = expected.compareTo(actual);
		return Number.isNaN(result) ? null : -Math.sign(result);
	}
	if (expected instanceof Date) {
		if (!(actual instanceof Date)) return null;
		return compareNumeric(actual.getTime(), expected.getTime());
	}
	if (typeof expected === "string") {
		if (typeof actual !== "string") return null;
		return actual < expected ? -1 : actual > expected ? 1 : 0;
	}
	if (typeof actual === "number" || typeof actual === "bigint") {
		return compareNumeric(actual, expected);
	}
	return null;
}

// number and bigint order against each other; NaN orders against nothing.
function compareNumeric(a: number | bigint, b: number | bigint): number | null {
	if (a < b) return -1;
	if (a > b) return 1;
	if (a == b) return 0;
	return null;
}

import { describe, expect, expectTypeOf, it } from "vitest";
import {
	IncomparableValueError,
	closeTo,
	equalTo,
	equalToValue,
	greaterThan,
	greaterThanOrEqualTo,
	is,
	isNull,
	lessThan,
	lessThanOrEqualTo,
	not,
	sameInstance,
} from "../src/core-matchers.ts";
import { type Matcher, MatcherError } from "../src/matcher.ts";

class Money {
	constructor(readonly cents: number) {}

	equals(other: unknown): boolean {
		return other instanceof Money && other.cents === this.cents;
	}
}

class Version {
	constructor(readonly major: number) {}

	compareTo(other: unknown): number {
		return other instanceof Version ? this.major - other.major : Number.NaN;
	}
}

class Counter {
	count = 0;

	increment(): void {
		this.count++;
	}
}

describe("equalTo", () => {
	it("matches equal primitives", () => {
		expect(equalTo(5).matches(5)).toBe(true);
		expect(equalTo("Hello").matches("Hello")).toBe(true);
	});

	it("rejects different values", () => {
		expect(equalTo(5).matches(6)).toBe(false);
		expect(equalTo("a").test(97)).toBe(false);
	});

	it("uses equals() when defined", () => {
		expect(equalTo(new Money(100)).matches(new Money(100))).toBe(true);
		expect(equalTo(new Money(100)).matches(new Money(1))).toBe(false);
	});

	it("compares plain data structurally", () => {
		expect(equalTo({ a: 1, b: [2] }).matches({ a: 1, b: [2] })).toBe(true);
		expect(equalTo([1, 2]).matches([1, 2, 3])).toBe(false);
	});

	it("compares typed arrays by their elements", () => {
		const m = equalTo(new Uint8Array([1, 2]));
		expect(m.matches(new Uint8Array([1, 2]))).toBe(true);
		expect(m.test([1, 2])).toBe(true);
		expect(m.toString()).toBe("[1, 2]");
	});

	it("describes text quoted and numbers bare", () => {
		expect(equalTo(6).toString()).toBe("6");
		expect(equalTo("x").toString()).toBe('"x"');
	});

	it("widens literal types", () => {
		expectTypeOf(equalTo(5)).toEqualTypeOf<Matcher<number>>();
		expectTypeOf(equalTo("a")).toEqualTypeOf<Matcher<string>>();
	});

	it("rejects types without equality at compile time", () => {
		expectTypeOf<Parameters<typeof equalTo<() => void>>[0]>().toBeNever();
		expectTypeOf<Parameters<typeof equalTo<Counter>>[0]>().toBeNever();
	});
});

describe("equalToValue", () => {
	it("throws IncomparableValueError for values without equality", () => {
		expect(() => equalToValue(new Counter())).toThrow(IncomparableValueError);
		expect(() => equalToValue(() => 1)).toThrow(MatcherError);
	});

	it("names the value in the error", () => {
		expect(() => equalToValue(new Map([["k", 1]]))).toThrow(
			"equality is not defined for [(k, 1)]",
		);
	});

	it("matches self-referencing records", () => {
		const a: Record<string, unknown> = { id: 1 };
		a.self = a;
		const b: Record<string, unknown> = { id: 1 };
		b.self = b;
		expect(equalToValue(a).matches(b)).toBe(true);
		expect(equalToValue(a).matches({ id: 1, self: { id: 2 } })).toBe(false);
	});

	it("accepts anything with equality", () => {
		expect(equalToValue([1]).matches([1])).toBe(true);
	});
});

describe("is", () => {
	it("has the inner matcher's outcome", () => {
		expect(is(equalTo(5)).matches(5)).toBe(true);
		expect(is(equalTo(5)).matches(6)).toBe(false);
	});

	it("decorates the description", () => {
		expect(is(equalTo(5)).toString()).toBe("is 5");
	});
});

describe("not", () => {
	it("inverts true to false", () => {
		expect(not(equalTo(5)).matches(5)).toBe(false);
	});

	it("inverts false to true", () => {
		expect(not(equalTo(5)).matches(6)).toBe(true);
	});

	it("double negation restores the outcome", () => {
		const m = not(not(equalTo(5)));
		expect(m.matches(5)).toBe(true);
		expect(m.matches(6)).toBe(false);
		expect(m.toString()).toBe("not not 5");
	});

	it("describes itself", () => {
		expect(not(equalTo("a")).toString()).toBe('not "a"');
	});
});

describe("isNull", () => {
	it("matches null and undefined", () => {
		expect(isNull().matches(null)).toBe(true);
		expect(isNull().matches(undefined)).toBe(true);
	});

	it("rejects falsy values", () => {
		expect(isNull().matches(0)).toBe(false);
		expect(isNull().matches("")).toBe(false);
		expect(isNull().matches(false)).toBe(false);
	});

	it("describes itself", () => {
		expect(isNull().toString()).toBe("null");
		expect(not(isNull()).toString()).toBe("not null");
	});
});

describe("sameInstance", () => {
	it("matches only the same reference", () => {
		const value = { a: 1 };
		expect(sameInstance(value).matches(value)).toBe(true);
		expect(sameInstance(value).matches({ a: 1 })).toBe(false);
	});

	it("describes itself", () => {
		expect(sameInstance({ a: 1 }).toString()).toBe("same instance as {a: 1}");
	});
});

describe("closeTo", () => {
	it("matches within the delta, inclusive", () => {
		const m = closeTo(1, 0.5);
		expect(m.matches(1)).toBe(true);
		expect(m.matches(1.5)).toBe(true);
		expect(m.matches(0.5)).toBe(true);
	});

	it("rejects outside the delta", () => {
		expect(closeTo(1, 0.5).matches(1.75)).toBe(false);
		expect(closeTo(1, 0.5).matches(0.25)).toBe(false);
	});

	it("rejects non-numbers", () => {
		expect(closeTo(1, 0.5).test("1")).toBe(false);
		expect(closeTo(1, 0.5).test(Number.NaN)).toBe(false);
	});

	it("describes itself", () => {
		expect(closeTo(1, 0.5).toString()).toBe("a numeric value within +/-0.5 of 1");
	});
});

describe("ordering comparisons", () => {
	it("greaterThan", () => {
		expect(greaterThan(5).matches(6)).toBe(true);
		expect(greaterThan(5).matches(5)).toBe(false);
		expect(greaterThan(5).toString()).toBe("a value greater than 5");
	});

	it("greaterThanOrEqualTo", () => {
		expect(greaterThanOrEqualTo(5).matches(5)).toBe(true);
		expect(greaterThanOrEqualTo(5).matches(4)).toBe(false);
		expect(greaterThanOrEqualTo(5).toString()).toBe("a value equal to or greater than 5");
	});

	it("lessThan", () => {
		expect(lessThan("b").matches("a")).toBe(true);
		expect(lessThan("b").matches("c")).toBe(false);
		expect(lessThan("b").toString()).toBe('a value less than "b"');
	});

	it("lessThanOrEqualTo", () => {
		expect(lessThanOrEqualTo(new Date(1000)).matches(new Date(1000))).toBe(true);
		expect(lessThanOrEqualTo(new Date(1000)).matches(new Date(1001))).toBe(false);
		expect(lessThanOrEqualTo(2).toString()).toBe("a value less than or equal to 2");
	});

	it("uses compareTo", () => {
		expect(greaterThan(new Version(2)).matches(new Version(3))).toBe(true);
		expect(greaterThan(new Version(2)).matches(new Version(1))).toBe(false);
	});

	it("unordered values never match", () => {
		expect(greaterThan(5).test("6")).toBe(false);
		expect(lessThan(5).test(Number.NaN)).toBe(false);
		expect(greaterThan(new Version(1)).test(2)).toBe(false);
	});
});

/**
 * Security tests: inherited keys, prototype pollution, and pattern blow-up.
 */

import { describe, expect, it } from "vitest";
import { contains, hasKey } from "../src/collection-matchers.ts";
import { parseMatcherConfig } from "../src/config.ts";
import { RegistryBuilder } from "../src/registry.ts";
import { matchesPattern } from "../src/string-matchers.ts";

describe("inherited properties", () => {
	it("hasKey ignores keys from the prototype chain", () => {
		expect(hasKey("toString").matches({ a: 1 })).toBe(false);
		expect(hasKey("hasOwnProperty").matches({})).toBe(false);
	});

	it("contains ignores inherited entries", () => {
		expect(contains("constructor", Object).test({})).toBe(false);
	});

	it("an own __proto__ key from parsed data is an ordinary key", () => {
		const data: unknown = JSON.parse('{"__proto__": "evil"}');
		expect(hasKey("__proto__").test(data)).toBe(true);
		expect(contains("__proto__", "evil").test(data)).toBe(true);
		// Object.prototype was not modified
		expect(Object.getPrototypeOf({})).toBe(Object.prototype);
		expect(Object.hasOwn(Object.prototype, "evil")).toBe(false);
	});
});

describe("pattern blow-up", () => {
	it("nested quantifiers run in linear time", () => {
		const m = matchesPattern("(a+)+$");
		const start = performance.now();
		expect(m.matches(`${"a".repeat(5000)}!`)).toBe(false);
		expect(performance.now() - start).toBeLessThan(1000);
	});

	it("config-loaded patterns use the same engine", () => {
		const registry = new RegistryBuilder().build();
		const m = registry.loadMatcher(parseMatcherConfig({ type: "matchesPattern", value: "(a|aa)*b" }));
		expect(m.matches("a".repeat(5000))).toBe(false);
	});
});

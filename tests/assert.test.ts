import { afterEach, describe, expect, it, vi } from "vitest";
import { assertResult, assertThat, createAssertThat } from "../src/assert.ts";
import { contains, everyItem } from "../src/collection-matchers.ts";
import { allOf } from "../src/combinators.ts";
import { equalTo, greaterThan, is, isNull, not } from "../src/core-matchers.ts";
import { AssertionFailure, ResultOutput, StandardOutput, ThrowingOutput } from "../src/output.ts";
import { endsWith, startsWith } from "../src/string-matchers.ts";

describe("assertThat", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("returns true and prints nothing on success", () => {
		const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
		expect(assertThat("Hello", startsWith("He"))).toBe(true);
		expect(write).not.toHaveBeenCalled();
	});

	it("prints the diagnostic to stdout on failure", () => {
		const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
		expect(assertThat(5, equalTo(6))).toBe(false);
		expect(write).toHaveBeenCalledWith("Expected: 6\n but got: 5\n");
	});
});

describe("createAssertThat", () => {
	it("binds the standard strategy to a writer", () => {
		const lines: string[] = [];
		const check = createAssertThat(new StandardOutput((text) => lines.push(text)));

		expect(check("Hello", startsWith("lo"))).toBe(false);
		expect(check("Hello", endsWith("lo"))).toBe(true);
		expect(lines).toEqual(['Expected: starts with "lo"\n but got: Hello\n']);
	});

	it("binds the throwing strategy", () => {
		const check = createAssertThat(new ThrowingOutput());

		expect(() => check(5, is(equalTo(5)))).not.toThrow();
		expect(() => check(5, equalTo(6))).toThrow(AssertionFailure);
		expect(() => check(5, equalTo(6))).toThrow("Expected: 6\n but got: 5");
	});

	it("binds the result strategy", () => {
		const check = createAssertThat(new ResultOutput());
		const result = check([1, 2, 3], everyItem(greaterThan(1)));

		expect(result.pass).toBe(false);
		expect(result.expected).toBe("every item is a value greater than 1");
		expect(result.actual).toBe("[1, 2, 3]");
	});
});

describe("assertResult", () => {
	const output = new ResultOutput();

	it("renders both sides on success too", () => {
		const result = assertResult(output, "Hello", allOf(startsWith("He"), endsWith("lo")));
		expect(result.pass).toBe(true);
		expect(result.message()).toBe(
			'Expected: all of starts with "He" and ends with "lo"\n but got: Hello',
		);
	});

	it("renders the elements a generator produced", () => {
		function* numbers() {
			yield 1;
			yield 2;
		}
		const result = assertResult(output, numbers(), contains(3));
		expect(result.pass).toBe(false);
		expect(result.message()).toBe("Expected: contains 3\n but got: [1, 2]");
	});

	it("renders null and undefined", () => {
		expect(assertResult(output, undefined, isNull()).pass).toBe(true);
		expect(assertResult(output, null, not(isNull())).message()).toBe(
			"Expected: not null\n but got: null",
		);
	});

	it("renders values without a text form as the placeholder", () => {
		class Opaque {}
		const result = assertResult(output, new Opaque(), isNull());
		expect(result.actual).toBe("<unknown-type>");
	});

	it("normalizes String objects before rendering", () => {
		const result = assertResult(output, new String("Hello"), startsWith("He"));
		expect(result.pass).toBe(true);
		expect(result.actual).toBe("Hello");
	});
});

import { describe, expect, it } from "vitest";
import { assertResult } from "../src/assert.ts";
import { ResultOutput } from "../src/output.ts";
import { loadFixtures } from "./helpers/fixture-loader.ts";

const fixtures = loadFixtures();
const output = new ResultOutput();

describe("conformance", () => {
	it("loads fixtures", () => {
		expect(fixtures.length).toBeGreaterThan(0);
	});

	for (const fixture of fixtures) {
		it(`${fixture.fixtureName}::${fixture.caseName}`, () => {
			const result = assertResult(output, fixture.actual, fixture.matcher);
			expect(result.pass).toBe(fixture.expect);
			if (fixture.description !== null) {
				expect(result.expected).toBe(fixture.description);
			}
		});
	}
});

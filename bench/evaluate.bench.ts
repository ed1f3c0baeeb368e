/**
 * Evaluate benchmarks.
 *
 * Measures the hot path: leaf matchers, combinators, collection scans,
 * config loading, and the assertion entry point with each output strategy.
 *
 * Run: npm run bench
 */

import { bench, run, summary } from "mitata";

import {
	RegistryBuilder,
	ResultOutput,
	StandardOutput,
	allOf,
	anyOf,
	assertResult,
	contains,
	equalTo,
	everyItem,
	greaterThan,
	lessThan,
	matchesPattern,
	not,
	parseMatcherConfig,
	startsWith,
} from "../src/index.ts";

// ── Leaf matchers ────────────────────────────────────────────────────────────

summary(() => {
	const m = equalTo(5);
	bench("equal_to_number_hit", () => m.matches(5));
	bench("equal_to_number_miss", () => m.matches(6));
});

summary(() => {
	const m = equalTo({ name: "alice", roles: ["admin", "dev"] });
	const value = { name: "alice", roles: ["admin", "dev"] };
	bench("equal_to_record", () => m.matches(value));
});

summary(() => {
	const m = startsWith("/api/");
	bench("starts_with_hit", () => m.matches("/api/v2/users/123"));
	bench("starts_with_miss", () => m.matches("/other/path"));
});

summary(() => {
	const m = matchesPattern(String.raw`/api/v\d+/users/\d+`);
	bench("pattern_hit", () => m.matches("/api/v2/users/12345"));
	bench("pattern_miss", () => m.matches("/other/path"));
});

// ── Combinators ──────────────────────────────────────────────────────────────

summary(() => {
	const both = allOf(greaterThan(0), lessThan(10));
	const either = anyOf(equalTo(5), equalTo(6));
	const nested = anyOf(allOf(greaterThan(0), lessThan(10)), not(equalTo(100)));

	bench("all_of_hit", () => both.matches(5));
	bench("any_of_first_matches", () => either.matches(5));
	bench("nested_combinators", () => nested.matches(50));
});

// ── Scaling: collection size ─────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 100, 1000]) {
		const items = Array.from({ length: n }, (_, i) => i);
		const last = contains(n - 1);
		const every = everyItem(greaterThan(-1));
		bench(`contains_last_of_${n}`, () => last.matches(items));
		bench(`every_item_of_${n}`, () => every.matches(items));
	}
});

// ── Config loading ───────────────────────────────────────────────────────────

summary(() => {
	const registry = new RegistryBuilder().build();
	const data = {
		type: "allOf",
		matchers: [
			{ type: "startsWith", value: "He" },
			{ type: "not", matcher: { type: "endsWith", value: "x" } },
		],
	};
	bench("parse_and_load", () => registry.loadMatcher(parseMatcherConfig(data)));
});

// ── Assertions ───────────────────────────────────────────────────────────────

summary(() => {
	const m = equalTo(6);
	const result = new ResultOutput();
	const silent = new StandardOutput(() => {});

	bench("assert_result_failure", () => assertResult(result, 5, m));
	bench("assert_standard_failure", () => assertResult(silent, 5, m));
});

await run();

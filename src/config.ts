/**
 * Config types for declarative matcher construction.
 *
 * An optional layer over the typed factories: the same matcher expressions
 * they build in code can be described as plain JSON/YAML data, and loading
 * calls those factories. Code that knows its matchers at compile time uses
 * the factories directly and keeps their static types.
 *
 *   data -> parseMatcherConfig() -> MatcherConfig -> Registry.loadMatcher() -> Matcher
 *
 * Shapes:
 *
 * | Data                                          | Config type         |
 * |-----------------------------------------------|---------------------|
 * | `{ type: isNull }`                            | NullMatchConfig     |
 * | `{ type: startsWith, value: "He" }`           | ValueMatchConfig    |
 * | `{ type: closeTo, value: 1, delta: 0.5 }`     | CloseToConfig       |
 * | `{ type: containsEntry, key: a, value: 1 }`   | EntryMatchConfig    |
 * | `{ type: not, matcher: {...} }`               | UnaryMatchConfig    |
 * | `{ type: allOf, matchers: [{...}, {...}] }`   | PairMatchConfig     |
 * | `{ type: custom, type_url: x, config: {} }`   | CustomMatchConfig   |
 */

// =====================================================================
// Config types
// =====================================================================

/** Reference to a registered custom matcher with its configuration. */
export class TypedConfig {
	constructor(
		readonly typeUrl: string,
		readonly config: Record<string, unknown> = {},
	) {}
}

export const VALUE_VARIANTS = [
	"equalTo",
	"contains",
	"hasKey",
	"isIn",
	"equalToIgnoringCase",
	"equalToIgnoringWhiteSpace",
	"startsWith",
	"endsWith",
	"matchesPattern",
	"greaterThan",
	"greaterThanOrEqualTo",
	"lessThan",
	"lessThanOrEqualTo",
] as const;

export type ValueVariant = (typeof VALUE_VARIANTS)[number];

export const UNARY_VARIANTS = ["is", "not", "everyItem"] as const;

export type UnaryVariant = (typeof UNARY_VARIANTS)[number];

export const PAIR_VARIANTS = ["allOf", "anyOf"] as const;

export type PairVariant = (typeof PAIR_VARIANTS)[number];

/** Matches null or undefined. */
export class NullMatchConfig {}

/** A factory taking a single expected value. */
export class ValueMatchConfig {
	constructor(
		readonly variant: ValueVariant,
		readonly value: unknown,
	) {}
}

export class CloseToConfig {
	constructor(
		readonly value: number,
		readonly delta: number,
	) {}
}

/** Key/value containment in a map or record. */
export class EntryMatchConfig {
	constructor(
		readonly key: unknown,
		readonly value: unknown,
	) {}
}

/** Wraps one nested matcher. */
export class UnaryMatchConfig {
	constructor(
		readonly variant: UnaryVariant,
		readonly matcher: MatcherConfig,
	) {}
}

/** Combines exactly two nested matchers. */
export class PairMatchConfig {
	constructor(
		readonly variant: PairVariant,
		readonly first: MatcherConfig,
		readonly second: MatcherConfig,
	) {}
}

/** Custom matcher resolved via the registry's matcher factories. */
export class CustomMatchConfig {
	constructor(readonly typedConfig: TypedConfig) {}
}

export type MatcherConfig =
	| NullMatchConfig
	| ValueMatchConfig
	| CloseToConfig
	| EntryMatchConfig
	| UnaryMatchConfig
	| PairMatchConfig
	| CustomMatchConfig;

// =====================================================================
// Parsing (unknown -> config types)
// =====================================================================

/** Error parsing a config dict into config types. */
export class ConfigParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

function isRecord(data: unknown): data is Record<string, unknown> {
	return typeof data === "object" && data !== null && !Array.isArray(data);
}

function describeType(data: unknown): string {
	if (data === null) return "null";
	return Array.isArray(data) ? "array" : typeof data;
}

function includes<T extends string>(variants: readonly T[], value: string): value is T {
	return variants.some((v) => v === value);
}

/**
 * Parse an unknown value into a MatcherConfig.
 *
 * This is the main entry point for config loading; `data` is typically the
 * result of JSON.parse or a YAML loader.
 */
export function parseMatcherConfig(data: unknown): MatcherConfig {
	if (!isRecord(data)) {
		throw new ConfigParseError(`matcher must be an object, got ${describeType(data)}`);
	}

	const type = data.type;
	if (type === undefined) {
		throw new ConfigParseError("matcher missing required field 'type'");
	}
	if (typeof type !== "string") {
		throw new ConfigParseError(`matcher 'type' must be a string, got ${describeType(type)}`);
	}

	if (type === "isNull") {
		return new NullMatchConfig();
	}
	if (includes(VALUE_VARIANTS, type)) {
		return new ValueMatchConfig(type, requireField(data, type, "value"));
	}
	if (type === "closeTo") {
		return new CloseToConfig(requireNumber(data, type, "value"), requireNumber(data, type, "delta"));
	}
	if (type === "containsEntry") {
		return new EntryMatchConfig(requireField(data, type, "key"), requireField(data, type, "value"));
	}
	if (includes(UNARY_VARIANTS, type)) {
		return new UnaryMatchConfig(type, parseMatcherConfig(requireField(data, type, "matcher")));
	}
	if (includes(PAIR_VARIANTS, type)) {
		const [first, second] = parsePair(type, requireField(data, type, "matchers"));
		return new PairMatchConfig(type, first, second);
	}
	if (type === "custom") {
		return new CustomMatchConfig(parseTypedConfig(data));
	}

	throw new ConfigParseError(`unknown matcher type: "${type}"`);
}

function requireField(data: Record<string, unknown>, type: string, field: string): unknown {
	if (!(field in data)) {
		throw new ConfigParseError(`${type} matcher missing required field '${field}'`);
	}
	return data[field];
}

function requireNumber(data: Record<string, unknown>, type: string, field: string): number {
	const value = requireField(data, type, field);
	if (typeof value !== "number") {
		throw new ConfigParseError(`${type} '${field}' must be a number, got ${describeType(value)}`);
	}
	return value;
}

function parsePair(type: string, data: unknown): [MatcherConfig, MatcherConfig] {
	if (!Array.isArray(data)) {
		throw new ConfigParseError(`${type} 'matchers' must be an array, got ${describeType(data)}`);
	}
	if (data.length !== 2) {
		throw new ConfigParseError(`${type} 'matchers' must hold exactly 2 matchers, got ${data.length}`);
	}
	return [parseMatcherConfig(data[0]), parseMatcherConfig(data[1])];
}

function parseTypedConfig(data: Record<string, unknown>): TypedConfig {
	const typeUrl = requireField(data, "custom", "type_url");
	if (typeof typeUrl !== "string") {
		throw new ConfigParseError(`type_url must be a string, got ${describeType(typeUrl)}`);
	}

	const config = data.config ?? {};
	if (!isRecord(config)) {
		throw new ConfigParseError(`config must be an object, got ${describeType(config)}`);
	}

	return new TypedConfig(typeUrl, config);
}

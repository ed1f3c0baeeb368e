// Core types
export { Matcher, MatcherError, normalize } from "./matcher.ts";
export type { Policy } from "./matcher.ts";
export { Description, UNKNOWN_TYPE, renderValue } from "./render.ts";
export type { SelfDescribing } from "./render.ts";

// Capabilities
export {
	areEqual,
	compareOrder,
	equalityCapability,
	supportsEquality,
	supportsOrdering,
} from "./capabilities.ts";
export type {
	Comparable,
	EqualityCapability,
	Equatable,
	Orderable,
	Ordered,
	Primitive,
	Widen,
} from "./capabilities.ts";

// Assertions and output strategies
export { assertResult, assertThat, createAssertThat } from "./assert.ts";
export type { AssertThat } from "./assert.ts";
export {
	AssertionFailure,
	ResultOutput,
	StandardOutput,
	ThrowingOutput,
	formatDiagnostic,
} from "./output.ts";
export type { AssertionResult, OutputStrategy, Writer } from "./output.ts";

// Core matchers
export {
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
} from "./core-matchers.ts";

// String matchers
export {
	endsWith,
	equalToIgnoringCase,
	equalToIgnoringWhiteSpace,
	matches,
	matchesPattern,
	startsWith,
} from "./string-matchers.ts";

// Collection matchers
export { contains, everyItem, hasKey, isIn, oneOf } from "./collection-matchers.ts";
export type { Keyed } from "./collection-matchers.ts";

// Combinators
export { allOf, anyOf } from "./combinators.ts";

// Config
export {
	CloseToConfig,
	ConfigParseError,
	CustomMatchConfig,
	EntryMatchConfig,
	NullMatchConfig,
	PairMatchConfig,
	TypedConfig,
	UnaryMatchConfig,
	ValueMatchConfig,
	parseMatcherConfig,
} from "./config.ts";
export type { MatcherConfig, PairVariant, UnaryVariant, ValueVariant } from "./config.ts";

// Registry
export {
	DepthExceededError,
	InvalidConfigError,
	MAX_DEPTH,
	MAX_PATTERN_LENGTH,
	MAX_REGEX_PATTERN_LENGTH,
	PatternTooLongError,
	Registry,
	RegistryBuilder,
	UnknownTypeUrlError,
} from "./registry.ts";
export type { MatcherFactory } from "./registry.ts";

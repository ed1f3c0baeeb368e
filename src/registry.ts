/**
 * Type registry for config-driven matcher construction.
 *
 * The registry turns parsed config into runtime matchers by calling the
 * typed factories, so a loaded matcher is the one the factory builds, typed
 * `Matcher<unknown>`. Built-in matcher types are always available; custom
 * ones are registered by type URL:
 * - RegistryBuilder -> .build() -> Registry (immutable)
 * - Factories are plain functions: (config) -> Matcher
 * - loadMatcher() walks the config tree and constructs the matchers
 *
 * Example:
 *
 *   const registry = new RegistryBuilder()
 *     .matcher("example.v1.EvenNumber", () => evenNumber())
 *     .build();
 *
 *   const matcher = registry.loadMatcher(parseMatcherConfig(jsonData));
 */

import type { Orderable } from "./capabilities.ts";
import { contains, everyItem, hasKey, isIn } from "./collection-matchers.ts";
import { allOf, anyOf } from "./combinators.ts";
import {
	CloseToConfig,
	CustomMatchConfig,
	EntryMatchConfig,
	type MatcherConfig,
	NullMatchConfig,
	PairMatchConfig,
	UnaryMatchConfig,
	ValueMatchConfig,
	type ValueVariant,
} from "./config.ts";
import { closeTo, equalToValue, is, isNull, not, type Ordering, ordering } from "./core-matchers.ts";
import { type Matcher, MatcherError } from "./matcher.ts";
import {
	endsWith,
	equalToIgnoringCase,
	equalToIgnoringWhiteSpace,
	matchesPattern,
	startsWith,
} from "./string-matchers.ts";

// =====================================================================
// Limits
// =====================================================================

export const MAX_DEPTH = 32;
export const MAX_PATTERN_LENGTH = 8192;
export const MAX_REGEX_PATTERN_LENGTH = 4096;

// =====================================================================
// Error types
// =====================================================================

/** A type_url was not found in the registry. */
export class UnknownTypeUrlError extends MatcherError {
	readonly typeUrl: string;
	readonly available: string[];

	constructor(typeUrl: string, available: string[]) {
		const sorted = [...available].sort();
		const msg =
			sorted.length > 0
				? `unknown matcher type_url: "${typeUrl}" (registered: ${sorted.join(", ")})`
				: `unknown matcher type_url: "${typeUrl}" (no matcher types are registered)`;
		super(msg);
		this.name = "UnknownTypeUrlError";
		this.typeUrl = typeUrl;
		this.available = sorted;
	}
}

/** A config payload was malformed or semantically invalid. */
export class InvalidConfigError extends MatcherError {
	readonly source: string;

	constructor(source: string) {
		super(`invalid config: ${source}`);
		this.name = "InvalidConfigError";
		this.source = source;
	}
}

/** A text or pattern value exceeds the length limit. */
export class PatternTooLongError extends MatcherError {
	readonly length: number;
	readonly max: number;

	constructor(length: number, max: number) {
		super(`pattern length ${length} exceeds maximum ${max}`);
		this.name = "PatternTooLongError";
		this.length = length;
		this.max = max;
	}
}

/** Matcher config nested deeper than MAX_DEPTH. */
export class DepthExceededError extends MatcherError {
	readonly depth: number;
	readonly max: number;

	constructor(depth: number, max: number) {
		super(`matcher depth ${depth} exceeds maximum allowed depth ${max}`);
		this.name = "DepthExceededError";
		this.depth = depth;
		this.max = max;
	}
}

// =====================================================================
// Builder
// =====================================================================

export type MatcherFactory = (config: Record<string, unknown>) => Matcher<unknown>;

/**
 * Builder for constructing a Registry.
 *
 * Register custom matcher factories with type URLs, then call build() to
 * produce an immutable Registry.
 */
export class RegistryBuilder {
	private readonly matcherFactories = new Map<string, MatcherFactory>();

	/** Register a matcher factory with a type URL. */
	matcher(typeUrl: string, factory: MatcherFactory): this {
		this.matcherFactories.set(typeUrl, factory);
		return this;
	}

	/** Freeze the registry. No further registration is possible. */
	build(): Registry {
		return new Registry(new Map(this.matcherFactories));
	}
}

// =====================================================================
// Registry
// =====================================================================

const ORDERING_VARIANTS: Partial<Record<ValueVariant, Ordering>> = {
	greaterThan: "gt",
	greaterThanOrEqualTo: "ge",
	lessThan: "lt",
	lessThanOrEqualTo: "le",
};

/**
 * Immutable registry of custom matcher factories.
 *
 * Constructed via RegistryBuilder. Use loadMatcher() to compile config into
 * a runtime Matcher.
 */
export class Registry {
	private readonly matcherFactories: ReadonlyMap<string, MatcherFactory>;

	constructor(matcherFactories: Map<string, MatcherFactory>) {
		this.matcherFactories = matcherFactories;
		Object.freeze(this);
	}

	/**
	 * Load a Matcher from configuration.
	 *
	 * Walks the config tree, building built-in matchers directly and custom
	 * ones through their registered factories, and enforces the depth and
	 * length limits.
	 */
	loadMatcher(config: MatcherConfig): Matcher<unknown> {
		return this.load(config, 1);
	}

	/** Number of registered custom matcher types. */
	get matcherCount(): number {
		return this.matcherFactories.size;
	}

	/** Check if a matcher type URL is registered. */
	containsMatcher(typeUrl: string): boolean {
		return this.matcherFactories.has(typeUrl);
	}

	/** Return all registered matcher type URLs (sorted). */
	matcherTypeUrls(): string[] {
		return [...this.matcherFactories.keys()].sort();
	}

	// -- Private loading methods -------------------------------------------

	private load(config: MatcherConfig, depth: number): Matcher<unknown> {
		if (depth > MAX_DEPTH) {
			throw new DepthExceededError(depth, MAX_DEPTH);
		}
		if (config instanceof NullMatchConfig) {
			return isNull();
		}
		if (config instanceof ValueMatchConfig) {
			return loadValueMatch(config);
		}
		if (config instanceof CloseToConfig) {
			return closeTo(config.value, config.delta);
		}
		if (config instanceof EntryMatchConfig) {
			return contains(config.key, config.value);
		}
		if (config instanceof UnaryMatchConfig) {
			const inner = this.load(config.matcher, depth + 1);
			switch (config.variant) {
				case "is":
					return is(inner);
				case "not":
					return not(inner);
				case "everyItem":
					return everyItem(inner);
			}
		}
		if (config instanceof PairMatchConfig) {
			const first = this.load(config.first, depth + 1);
			const second = this.load(config.second, depth + 1);
			return config.variant === "allOf" ? allOf(first, second) : anyOf(first, second);
		}
		if (config instanceof CustomMatchConfig) {
			return this.loadCustom(config);
		}
		throw new InvalidConfigError("unknown matcher config type");
	}

	private loadCustom(config: CustomMatchConfig): Matcher<unknown> {
		const { typeUrl, config: payload } = config.typedConfig;
		const factory = this.matcherFactories.get(typeUrl);
		if (factory === undefined) {
			throw new UnknownTypeUrlError(typeUrl, [...this.matcherFactories.keys()]);
		}
		try {
			return factory(payload);
		} catch (e) {
			throw new InvalidConfigError(errorMessage(e));
		}
	}
}

// =====================================================================
// Built-in matcher compilation
// =====================================================================

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

function requireText(variant: ValueVariant, value: unknown): string {
	if (typeof value !== "string") {
		throw new InvalidConfigError(`${variant} value must be a string, got ${typeof value}`);
	}
	const max = variant === "matchesPattern" ? MAX_REGEX_PATTERN_LENGTH : MAX_PATTERN_LENGTH;
	if (value.length > max) {
		throw new PatternTooLongError(value.length, max);
	}
	return value;
}

function requireOrderable(variant: ValueVariant, value: unknown): Orderable {
	if (typeof value === "number" || typeof value === "string" || value instanceof Date) {
		return value;
	}
	throw new InvalidConfigError(`${variant} value must be a number, string or date, got ${typeof value}`);
}

function loadValueMatch(config: ValueMatchConfig): Matcher<unknown> {
	const { variant, value } = config;
	const orderingKind = ORDERING_VARIANTS[variant];
	if (orderingKind !== undefined) {
		return ordering(orderingKind, requireOrderable(variant, value));
	}

	switch (variant) {
		case "equalTo":
			try {
				return equalToValue(value);
			} catch (e) {
				throw new InvalidConfigError(errorMessage(e));
			}
		case "contains":
			return contains(value);
		case "hasKey":
			return hasKey(value);
		case "isIn":
			if (!Array.isArray(value)) {
				throw new InvalidConfigError(`isIn value must be an array, got ${typeof value}`);
			}
			return isIn(value);
		case "equalToIgnoringCase":
			return equalToIgnoringCase(requireText(variant, value));
		case "equalToIgnoringWhiteSpace":
			return equalToIgnoringWhiteSpace(requireText(variant, value));
		case "startsWith":
			return startsWith(requireText(variant, value));
		case "endsWith":
			return endsWith(requireText(variant, value));
		case "matchesPattern":
			try {
				return matchesPattern(requireText(variant, value));
			} catch (e) {
				if (e instanceof PatternTooLongError) throw e;
				throw new InvalidConfigError(errorMessage(e));
			}
		default:
			throw new InvalidConfigError(`unknown built-in matcher: "${variant}"`);
	}
}

/**
 * Value-to-text rendering for descriptions and diagnostics.
 *
 * Text renders as-is, containers render their elements recursively, and any
 * value without a known rendering falls back to UNKNOWN_TYPE instead of
 * throwing.
 */

/** Placeholder for values that have no textual rendering. */
export const UNKNOWN_TYPE = "<unknown-type>";

/** Anything that can write its own description. Matchers implement this. */
export interface SelfDescribing {
	describeTo(out: Description): void;
}

/** Append-only text sink passed to policies' `describe`. */
export class Description {
	private readonly parts: string[] = [];

	append(text: string): this {
		this.parts.push(text);
		return this;
	}

	/** Append text wrapped in double quotes. */
	appendQuoted(text: string): this {
		this.parts.push(`"${text}"`);
		return this;
	}

	appendValue(value: unknown): this {
		this.parts.push(renderValue(value));
		return this;
	}

	/** Append a value, quoting it when it is text. */
	appendLiteral(value: unknown): this {
		return typeof value === "string" ? this.appendQuoted(value) : this.appendValue(value);
	}

	appendDescriptionOf(item: SelfDescribing): this {
		item.describeTo(this);
		return this;
	}

	toString(): string {
		return this.parts.join("");
	}
}

export function isSelfDescribing(value: unknown): value is SelfDescribing {
	return (
		typeof value === "object" &&
		value !== null &&
		"describeTo" in value &&
		typeof value.describeTo === "function"
	);
}

/** Render any value to text. Never throws. */
export function renderValue(value: unknown): string {
	return render(value, new WeakSet());
}

function render(value: unknown, seen: WeakSet<object>): string {
	switch (typeof value) {
		case "string":
			return value;
		case "number":
		case "bigint":
		case "boolean":
		case "undefined":
			return String(value);
		case "symbol":
			return value.toString();
		case "function":
			return UNKNOWN_TYPE;
	}
	if (value === null) return "null";

	if (isSelfDescribing(value)) {
		return new Description().appendDescriptionOf(value).toString();
	}
	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
	}

	if (seen.has(value)) return "[Circular]";
	seen.add(value);
	try {
		return renderObject(value, seen);
	} finally {
		seen.delete(value);
	}
}

function renderObject(value: object, seen: WeakSet<object>): string {
	if (value instanceof Map) {
		const entries = [...value].map(([k, v]) => `(${render(k, seen)}, ${render(v, seen)})`);
		return `[${entries.join(", ")}]`;
	}
	if (value instanceof Set) {
		return `{${[...value].map((item) => render(item, seen)).join(", ")}}`;
	}
	if (Array.isArray(value)) {
		return `[${value.map((item) => render(item, seen)).join(", ")}]`;
	}
	if (isIterable(value)) {
		return `[${Array.from(value, (item) => render(item, seen)).join(", ")}]`;
	}
	if (isPlainObject(value)) {
		const entries = Object.entries(value).map(([k, v]) => `${k}: ${render(v, seen)}`);
		return `{${entries.join(", ")}}`;
	}
	if (hasOwnToString(value)) {
		return String(value);
	}
	return UNKNOWN_TYPE;
}

export function isIterable(value: unknown): value is Iterable<unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		Symbol.iterator in value &&
		typeof value[Symbol.iterator] === "function"
	);
}

/** Object literal or `Object.create(null)`. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto: object | null = Object.getPrototypeOf(value);
	return proto === null || proto === Object.prototype;
}

// A toString defined anywhere below Object.prototype in the chain.
function hasOwnToString(value: object): boolean {
	let proto: object | null = Object.getPrototypeOf(value);
	while (proto !== null && proto !== Object.prototype) {
		if (Object.hasOwn(proto, "toString")) return true;
		proto = Object.getPrototypeOf(proto);
	}
	return false;
}

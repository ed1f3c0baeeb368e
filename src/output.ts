/**
 * Output strategies: what an assertion produces once its outcome is known.
 *
 * A strategy is chosen once, when the assertion function is created, never per
 * matcher. All strategies share the same diagnostic text.
 */

import { MatcherError } from "./matcher.ts";

export function formatDiagnostic(expected: string, actual: string): string {
	return `Expected: ${expected}\n but got: ${actual}`;
}

export interface OutputStrategy<R> {
	report(expected: string, actual: string, passed: boolean): R;
}

/** Destination for the standard strategy's diagnostic lines. */
export type Writer = (text: string) => void;

const stdout: Writer = (text) => {
	process.stdout.write(text);
};

/** Writes the diagnostic line on failure and returns the outcome. */
export class StandardOutput implements OutputStrategy<boolean> {
	constructor(private readonly write: Writer = stdout) {}

	report(expected: string, actual: string, passed: boolean): boolean {
		if (!passed) {
			this.write(`${formatDiagnostic(expected, actual)}\n`);
		}
		return passed;
	}
}

/** Raised by ThrowingOutput when an assertion fails. */
export class AssertionFailure extends MatcherError {
	readonly expected: string;
	readonly actual: string;

	constructor(expected: string, actual: string) {
		super(formatDiagnostic(expected, actual));
		this.name = "AssertionFailure";
		this.expected = expected;
		this.actual = actual;
	}
}

/** Throws AssertionFailure on failure; returns nothing on success. */
export class ThrowingOutput implements OutputStrategy<void> {
	report(expected: string, actual: string, passed: boolean): void {
		if (!passed) {
			throw new AssertionFailure(expected, actual);
		}
	}
}

/**
 * Outcome in the shape test frameworks take from custom matchers
 * (Vitest's and Jest's `expect.extend`).
 */
export interface AssertionResult {
	readonly pass: boolean;
	readonly message: () => string;
	readonly expected: string;
	readonly actual: string;
}

/** Returns an AssertionResult for success and failure alike. */
export class ResultOutput implements OutputStrategy<AssertionResult> {
	report(expected: string, actual: string, passed: boolean): AssertionResult {
		const message = formatDiagnostic(expected, actual);
		return { pass: passed, message: () => message, expected, actual };
	}
}

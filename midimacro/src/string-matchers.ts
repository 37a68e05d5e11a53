import { RE2JS } from "re2js";

import { AnyMatcher } from "./any-matcher.ts";
import { type MatchingData, assertNever } from "./types.ts";

/** Thrown when a matcher cannot be constructed from its pattern. */
export class MatcherError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MatcherError";
	}
}

/**
 * A fixed pattern compared against the window string. With `ignoreCase` both
 * sides are lowercased; the pattern once, here.
 */
abstract class FixedPatternMatcher {
	abstract readonly kind: "equals" | "starts_with" | "ends_with" | "contains";
	private readonly folded: string;

	constructor(
		readonly pattern: string,
		readonly ignoreCase: boolean = false,
	) {
		this.folded = ignoreCase ? pattern.toLowerCase() : pattern;
	}

	matches(value: MatchingData): boolean {
		if (typeof value !== "string") return false;
		return this.compare(this.ignoreCase ? value.toLowerCase() : value, this.folded);
	}

	protected abstract compare(input: string, pattern: string): boolean;
}

export class ExactMatcher extends FixedPatternMatcher {
	readonly kind = "equals";

	protected compare(input: string, pattern: string): boolean {
		return input === pattern;
	}
}

export class PrefixMatcher extends FixedPatternMatcher {
	readonly kind = "starts_with";

	protected compare(input: string, pattern: string): boolean {
		return input.startsWith(pattern);
	}
}

export class SuffixMatcher extends FixedPatternMatcher {
	readonly kind = "ends_with";

	protected compare(input: string, pattern: string): boolean {
		return input.endsWith(pattern);
	}
}

export class ContainsMatcher extends FixedPatternMatcher {
	readonly kind = "contains";

	protected compare(input: string, pattern: string): boolean {
		return input.includes(pattern);
	}
}

/**
 * Regular expression match using RE2 for guaranteed linear-time matching.
 * Searches anywhere in the string; anchor with ^ and $ for a full match.
 *
 * RE2 does not support backreferences or lookaround. Patterns using them
 * are rejected at construction.
 */
export class RegexMatcher {
	readonly kind = "regex";
	private readonly compiled: RE2JS;

	constructor(
		readonly pattern: string,
		readonly ignoreCase: boolean = false,
	) {
		try {
			this.compiled = RE2JS.compile(ignoreCase ? `(?i)${pattern}` : pattern);
		} catch (e) {
			throw new MatcherError(
				`invalid regex pattern "${pattern}": ${e instanceof Error ? e.message : String(e)}`,
			);
		}
	}

	matches(value: MatchingData): boolean {
		if (typeof value !== "string") return false;
		return this.compiled.matcher(value).find();
	}
}

/** Every way a configured string field can test a window identity. */
export type StringMatcher =
	| ExactMatcher
	| ContainsMatcher
	| PrefixMatcher
	| SuffixMatcher
	| RegexMatcher
	| AnyMatcher;

/** Render a matcher the way it is written in a config, e.g. `contains "firefox" (ignore case)`. */
export function describeStringMatcher(matcher: StringMatcher): string {
	switch (matcher.kind) {
		case "any":
			return "any";
		case "equals":
		case "starts_with":
		case "ends_with":
		case "contains":
		case "regex": {
			const text = `${matcher.kind} ${JSON.stringify(matcher.pattern)}`;
			return matcher.ignoreCase ? `${text} (ignore case)` : text;
		}
		default:
			return assertNever(matcher);
	}
}

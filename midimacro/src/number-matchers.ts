import { AnyMatcher } from "./any-matcher.ts";
import type { MatchingData } from "./types.ts";

/** Exact integer equality. */
export class ValueMatcher {
	readonly kind = "value";

	constructor(readonly value: number) {}

	matches(value: MatchingData): boolean {
		return typeof value === "number" && value === this.value;
	}
}

/** Inclusive range: `min <= value <= max`. An inverted range matches nothing. */
export class RangeMatcher {
	readonly kind = "range";

	constructor(
		readonly min: number,
		readonly max: number,
	) {}

	matches(value: MatchingData): boolean {
		return typeof value === "number" && value >= this.min && value <= this.max;
	}
}

export type NumberMatcher = ValueMatcher | RangeMatcher | AnyMatcher;

/** `null` is "don't care": an absent field matcher accepts every value. */
export function matchesOptional(matcher: NumberMatcher | null, value: number): boolean {
	return matcher === null || matcher.matches(value);
}

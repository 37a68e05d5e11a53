import type { MatchingData } from "./types.ts";

/** Accepts every candidate. Shared by the string and number matcher families. */
export class AnyMatcher {
	readonly kind = "any";

	matches(_value: MatchingData): boolean {
		return true;
	}
}

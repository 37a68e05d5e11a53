/**
 * The erased scalar type every match checker accepts. Event fields are
 * numbers, window identities are strings. `null` means "not available" and
 * makes a single predicate evaluate to `false`.
 */
export type MatchingData = string | number | boolean | null;

/**
 * Extract a value from a domain-specific context.
 *
 * Generic over the context type (`Ctx`): a MIDI message, the focused window.
 */
export interface DataInput<Ctx> {
	get(ctx: Ctx): MatchingData;
}

/**
 * Match against a type-erased value.
 *
 * Intentionally non-generic: the same RangeMatcher works for a controller
 * value, a note number or a channel.
 */
export interface InputMatcher {
	matches(value: MatchingData): boolean;
}

/** Exhaustiveness guard for switches over tagged unions. */
export function assertNever(value: never): never {
	throw new Error(`unhandled variant: ${JSON.stringify(value)}`);
}

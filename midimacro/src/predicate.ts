import type { DataInput, InputMatcher, MatchingData } from "./types.ts";

/** Pairs a domain-specific input with a domain-agnostic matcher. */
export class SinglePredicate<Ctx> {
	constructor(
		readonly input: DataInput<Ctx>,
		readonly matcher: InputMatcher,
	) {}

	evaluate(ctx: Ctx): boolean {
		const value: MatchingData = this.input.get(ctx);
		if (value === null) return false;
		return this.matcher.matches(value);
	}
}

/** All predicates must be true. Empty AND is vacuously true. */
export class And<Ctx> {
	constructor(readonly predicates: readonly Predicate<Ctx>[]) {}

	evaluate(ctx: Ctx): boolean {
		return this.predicates.every((p) => p.evaluate(ctx));
	}
}

/** Discriminated union of all predicate types. */
export type Predicate<Ctx> = SinglePredicate<Ctx> | And<Ctx>;

/**
 * Compose predicates with AND semantics.
 *
 * - Empty → And([]) (no conditions = match everything)
 * - Single → unwrapped
 * - Multiple → And(predicates)
 */
export function andPredicate<Ctx>(predicates: readonly Predicate<Ctx>[]): Predicate<Ctx> {
	const [first] = predicates;
	if (predicates.length === 1 && first !== undefined) return first;
	return new And(predicates);
}

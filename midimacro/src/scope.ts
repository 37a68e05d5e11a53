import { type Predicate, SinglePredicate, andPredicate } from "./predicate.ts";
import { type StringMatcher, describeStringMatcher } from "./string-matchers.ts";
import type { MatchingData } from "./types.ts";

/** Identity of the window that currently has keyboard focus. Empty strings when unknown. */
export type FocusedWindow = {
	readonly windowClass: string;
	readonly windowName: string;
};

export const NO_FOCUSED_WINDOW: FocusedWindow = Object.freeze({ windowClass: "", windowName: "" });

export class WindowClassInput {
	get(ctx: FocusedWindow): MatchingData {
		return ctx.windowClass;
	}
}

export class WindowNameInput {
	get(ctx: FocusedWindow): MatchingData {
		return ctx.windowName;
	}
}

/**
 * Restricts a macro to windows whose class and/or name match.
 * With neither matcher set the scope is global.
 */
export class Scope {
	private readonly predicate: Predicate<FocusedWindow>;

	constructor(
		readonly windowClass: StringMatcher | null = null,
		readonly windowName: StringMatcher | null = null,
	) {
		const predicates: SinglePredicate<FocusedWindow>[] = [];
		if (windowClass !== null) {
			predicates.push(new SinglePredicate(new WindowClassInput(), windowClass));
		}
		if (windowName !== null) {
			predicates.push(new SinglePredicate(new WindowNameInput(), windowName));
		}
		this.predicate = andPredicate(predicates);
		Object.freeze(this);
	}

	get isGlobal(): boolean {
		return this.windowClass === null && this.windowName === null;
	}

	matches(window: FocusedWindow): boolean {
		return this.predicate.evaluate(window);
	}

	/** e.g. `window_class contains "firefox", window_name any`, or `global`. */
	describe(): string {
		const parts: string[] = [];
		if (this.windowClass !== null) {
			parts.push(`window_class ${describeStringMatcher(this.windowClass)}`);
		}
		if (this.windowName !== null) {
			parts.push(`window_name ${describeStringMatcher(this.windowName)}`);
		}
		return parts.length === 0 ? "global" : parts.join(", ");
	}
}

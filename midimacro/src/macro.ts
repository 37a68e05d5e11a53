import type { Action } from "./actions.ts";
import type { Event, EventMatcher } from "./events.ts";
import type { Precondition } from "./preconditions.ts";
import type { Scope } from "./scope.ts";
import type { State } from "./state.ts";

/** Misuse of MacroBuilder: no event matchers, or reuse after build(). */
export class MacroBuildError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MacroBuildError";
	}
}

/**
 * One rule: event matchers, gates, and the actions to run.
 *
 * Immutable after construction. Build through MacroBuilder.
 */
export class Macro {
	readonly matchEvents: readonly EventMatcher[];
	readonly requiredPreconditions: readonly Precondition[] | null;
	readonly actions: readonly Action[];

	/** The lists are copied; later changes to the caller's arrays do not reach the macro. */
	constructor(
		readonly name: string | null,
		matchEvents: readonly EventMatcher[],
		requiredPreconditions: readonly Precondition[] | null,
		readonly scope: Scope | null,
		actions: readonly Action[],
	) {
		this.matchEvents = Object.freeze([...matchEvents]);
		if (this.matchEvents.length === 0) {
			throw new MacroBuildError(`macro ${macroLabel(name)} has no event matchers and can never fire`);
		}
		this.requiredPreconditions =
			requiredPreconditions === null ? null : Object.freeze([...requiredPreconditions]);
		this.actions = Object.freeze([...actions]);
		Object.freeze(this);
	}

	/**
	 * Evaluate an incoming event. Returns this macro's actions when the scope,
	 * every precondition and at least one event matcher accept, otherwise null.
	 *
	 * Checks run scope, then preconditions, then event matchers.
	 */
	evaluate(event: Event, state: State): readonly Action[] | null {
		if (!state.matchesScope(this.scope)) return null;

		if (this.requiredPreconditions !== null) {
			if (this.requiredPreconditions.some((p) => !state.matches(p))) return null;
		}

		return this.matchesEvent(event, state) ? this.actions : null;
	}

	private matchesEvent(event: Event, state: State): boolean {
		return this.matchEvents.some((m) => m.matches(event, state));
	}
}

/**
 * Staging area for a Macro.
 *
 * Setters return the builder for chaining. build() consumes it: any later
 * call throws MacroBuildError.
 */
export class MacroBuilder {
	private name: string | null = null;
	private matchEvents: EventMatcher[] = [];
	private requiredPreconditions: Precondition[] | null = null;
	private scope: Scope | null = null;
	private actions: Action[] = [];
	private consumed = false;

	static fromEventMatcher(matcher: EventMatcher): MacroBuilder {
		return new MacroBuilder().addEventMatcher(matcher);
	}

	static fromEventMatchers(matchers: readonly EventMatcher[]): MacroBuilder {
		return new MacroBuilder().setEventMatchers(matchers);
	}

	setName(name: string): this {
		this.checkOpen();
		this.name = name;
		return this;
	}

	setEventMatchers(matchers: readonly EventMatcher[]): this {
		this.checkOpen();
		this.matchEvents = [...matchers];
		return this;
	}

	addEventMatcher(matcher: EventMatcher): this {
		this.checkOpen();
		this.matchEvents.push(matcher);
		return this;
	}

	setPreconditions(preconditions: readonly Precondition[]): this {
		this.checkOpen();
		this.requiredPreconditions = [...preconditions];
		return this;
	}

	addPrecondition(precondition: Precondition): this {
		this.checkOpen();
		this.requiredPreconditions = [...(this.requiredPreconditions ?? []), precondition];
		return this;
	}

	setScope(scope: Scope): this {
		this.checkOpen();
		this.scope = scope;
		return this;
	}

	setActions(actions: readonly Action[]): this {
		this.checkOpen();
		this.actions = [...actions];
		return this;
	}

	addAction(action: Action): this {
		this.checkOpen();
		this.actions.push(action);
		return this;
	}

	build(): Macro {
		this.checkOpen();
		this.consumed = true;
		return new Macro(
			this.name,
			this.matchEvents,
			this.requiredPreconditions,
			this.scope,
			this.actions,
		);
	}

	private checkOpen(): void {
		if (this.consumed) {
			throw new MacroBuildError("MacroBuilder was already consumed by build()");
		}
	}
}

function macroLabel(name: string | null): string {
	return name === null ? "(unnamed)" : `"${name}"`;
}

/**
 * Runtime state the scope and precondition gates are evaluated against.
 *
 * Producers (the focus tracker, the device listener) never mutate a
 * snapshot: they publish a new one to the StateStore. The engine takes one
 * snapshot per event and evaluates every macro against it.
 */

import type { FocusTracker } from "./adapters/types.ts";
import type { Event } from "./events.ts";
import { MidiState } from "./midi/state.ts";
import { type Precondition, evaluatePrecondition } from "./preconditions.ts";
import { type FocusedWindow, NO_FOCUSED_WINDOW, type Scope } from "./scope.ts";
import { assertNever } from "./types.ts";

/** Read-only queries over one consistent view of the runtime state. */
export interface State {
	matchesScope(scope: Scope | null): boolean;
	matches(precondition: Precondition): boolean;
}

export class StateSnapshot implements State {
	static readonly INITIAL = new StateSnapshot(NO_FOCUSED_WINDOW, MidiState.EMPTY);

	constructor(
		readonly focus: FocusedWindow,
		readonly midi: MidiState,
	) {
		Object.freeze(this);
	}

	matchesScope(scope: Scope | null): boolean {
		return scope === null || scope.matches(this.focus);
	}

	matches(precondition: Precondition): boolean {
		return evaluatePrecondition(precondition, this);
	}

	withFocus(focus: FocusedWindow): StateSnapshot {
		return new StateSnapshot(Object.freeze({ ...focus }), this.midi);
	}

	withEvent(event: Event): StateSnapshot {
		switch (event.type) {
			case "midi": {
				const midi = this.midi.record(event.message);
				return midi === this.midi ? this : new StateSnapshot(this.focus, midi);
			}
			default:
				return assertNever(event.type);
		}
	}
}

/** Holder of the current snapshot. Updates swap the reference, never the contents. */
export class StateStore {
	private snapshot: StateSnapshot;

	constructor(
		private readonly focusTracker: FocusTracker | null = null,
		initial: StateSnapshot = StateSnapshot.INITIAL,
	) {
		this.snapshot = initial;
	}

	current(): StateSnapshot {
		return this.snapshot;
	}

	publishFocus(focus: FocusedWindow): void {
		this.snapshot = this.snapshot.withFocus(focus);
	}

	record(event: Event): void {
		this.snapshot = this.snapshot.withEvent(event);
	}

	/** Query the focus tracker, if any, and publish what it reports. */
	async refreshFocus(): Promise<void> {
		if (this.focusTracker === null) return;
		this.publishFocus(await this.focusTracker.focusedWindow());
	}
}

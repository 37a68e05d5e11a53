import type { MidiState } from "./midi/state.ts";
import type { NumberMatcher } from "./number-matchers.ts";
import { assertNever } from "./types.ts";

/** A key on `channel` is currently held down. */
export type NoteHeldCondition = {
	readonly kind: "note_held";
	readonly channel: NumberMatcher | null;
	readonly key: NumberMatcher | null;
};

/** The last value seen for a controller. */
export type ControlCondition = {
	readonly kind: "control";
	readonly channel: NumberMatcher | null;
	readonly control: NumberMatcher | null;
	readonly value: NumberMatcher | null;
};

/** The program last selected on a channel. */
export type ProgramCondition = {
	readonly kind: "program";
	readonly channel: NumberMatcher | null;
	readonly program: NumberMatcher | null;
};

/** The pitch bend position last seen on a channel. */
export type PitchBendCondition = {
	readonly kind: "pitch_bend";
	readonly channel: NumberMatcher | null;
	readonly value: NumberMatcher | null;
};

export type MidiCondition =
	| NoteHeldCondition
	| ControlCondition
	| ProgramCondition
	| PitchBendCondition;

export type MidiConditionKind = MidiCondition["kind"];

export const MIDI_CONDITION_FIELDS: {
	readonly [K in MidiConditionKind]: readonly Exclude<
		keyof Extract<MidiCondition, { kind: K }>,
		"kind"
	>[];
} = {
	note_held: ["channel", "key"],
	control: ["channel", "control", "value"],
	program: ["channel", "program"],
	pitch_bend: ["channel", "value"],
};

/**
 * Gate over tracked device state, independent of the triggering event.
 * Absent field matchers are "don't care"; `invert` negates the outcome.
 */
export type Precondition = {
	readonly type: "midi";
	readonly condition: MidiCondition;
	readonly invert: boolean;
};

export function midiPrecondition(condition: MidiCondition, invert = false): Precondition {
	return Object.freeze({ type: "midi", condition: Object.freeze({ ...condition }), invert });
}

/** Snapshot-side view the preconditions are checked against. */
export interface PreconditionContext {
	readonly midi: MidiState;
}

export function evaluatePrecondition(precondition: Precondition, ctx: PreconditionContext): boolean {
	switch (precondition.type) {
		case "midi":
			return ctx.midi.satisfies(precondition.condition) !== precondition.invert;
		default:
			return assertNever(precondition.type);
	}
}

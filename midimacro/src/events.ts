import {
	type MidiField,
	type MidiMessage,
	type MidiMessageType,
	midiFieldsOf,
	readMidiField,
} from "./midi/message.ts";
import type { NumberMatcher } from "./number-matchers.ts";
import { type Predicate, SinglePredicate, andPredicate } from "./predicate.ts";
import type { State } from "./state.ts";
import { type MatchingData, assertNever } from "./types.ts";

/** A message received from a MIDI device. */
export type MidiEvent = {
	readonly type: "midi";
	readonly message: MidiMessage;
};

/** Everything the engine can be asked to react to. One producer today. */
export type Event = MidiEvent;

export function midiEvent(message: MidiMessage): MidiEvent {
	return Object.freeze({ type: "midi", message: Object.freeze({ ...message }) });
}

/**
 * Predicate over an incoming event.
 *
 * State is passed for matchers that depend on history; the MIDI matchers
 * only compare the event's own fields.
 */
export interface EventMatcher {
	matches(event: Event, state: State): boolean;
}

/** Extract one named field from a MIDI message. */
export class MidiFieldInput {
	constructor(readonly field: MidiField) {}

	get(ctx: MidiMessage): MatchingData {
		return readMidiField(ctx, this.field);
	}
}

/** Optional number matcher per field; absent = don't care. */
export type MidiFieldMatchers = {
	readonly [F in MidiField]?: NumberMatcher | null;
};

/**
 * Matches MIDI events of one message type.
 *
 * Conjunctive over the present field matchers; with none present every
 * message of `messageType` matches. Matchers for fields the message type
 * does not carry are ignored.
 */
export class MidiEventMatcher implements EventMatcher {
	private readonly predicate: Predicate<MidiMessage>;

	constructor(
		readonly messageType: MidiMessageType,
		readonly fields: MidiFieldMatchers = {},
	) {
		const predicates: SinglePredicate<MidiMessage>[] = [];
		for (const field of midiFieldsOf(messageType)) {
			const matcher = fields[field];
			if (matcher !== undefined && matcher !== null) {
				predicates.push(new SinglePredicate(new MidiFieldInput(field), matcher));
			}
		}
		this.predicate = andPredicate(predicates);
	}

	matches(event: Event, _state: State): boolean {
		switch (event.type) {
			case "midi":
				return this.matchesMessage(event.message);
			default:
				return assertNever(event.type);
		}
	}

	matchesMessage(message: MidiMessage): boolean {
		return message.type === this.messageType && this.predicate.evaluate(message);
	}
}

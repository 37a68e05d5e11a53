import { matchesOptional } from "../number-matchers.ts";
import type { MidiCondition } from "../preconditions.ts";
import { assertNever } from "../types.ts";
import type { MidiMessage } from "./message.ts";

type ChannelState = {
	/** key → velocity of the note-on that pressed it */
	readonly heldNotes: ReadonlyMap<number, number>;
	/** controller → last value */
	readonly controls: ReadonlyMap<number, number>;
	readonly program: number | null;
	readonly pitchBend: number | null;
};

const EMPTY_CHANNEL: ChannelState = Object.freeze({
	heldNotes: new Map<number, number>(),
	controls: new Map<number, number>(),
	program: null,
	pitchBend: null,
});

/**
 * Immutable record of what the device has reported so far.
 *
 * `record()` returns a new state and leaves the receiver untouched, so a
 * snapshot handed to the engine never changes under it.
 */
export class MidiState {
	static readonly EMPTY = new MidiState(new Map());

	private constructor(private readonly channels: ReadonlyMap<number, ChannelState>) {
		Object.freeze(this);
	}

	record(message: MidiMessage): MidiState {
		const current = this.channels.get(message.channel) ?? EMPTY_CHANNEL;
		const next = applyMessage(current, message);
		if (next === current) return this;

		const channels = new Map(this.channels);
		channels.set(message.channel, next);
		return new MidiState(channels);
	}

	isNoteHeld(channel: number, key: number): boolean {
		return this.channels.get(channel)?.heldNotes.has(key) ?? false;
	}

	controlValue(channel: number, control: number): number | null {
		return this.channels.get(channel)?.controls.get(control) ?? null;
	}

	program(channel: number): number | null {
		return this.channels.get(channel)?.program ?? null;
	}

	pitchBend(channel: number): number | null {
		return this.channels.get(channel)?.pitchBend ?? null;
	}

	/** True when any tracked channel satisfies every present field of the condition. */
	satisfies(condition: MidiCondition): boolean {
		for (const [channel, state] of this.channels) {
			if (!matchesOptional(condition.channel, channel)) continue;
			if (channelSatisfies(state, condition)) return true;
		}
		return false;
	}
}

function channelSatisfies(state: ChannelState, condition: MidiCondition): boolean {
	switch (condition.kind) {
		case "note_held":
			for (const key of state.heldNotes.keys()) {
				if (matchesOptional(condition.key, key)) return true;
			}
			return false;
		case "control":
			for (const [control, value] of state.controls) {
				if (matchesOptional(condition.control, control) && matchesOptional(condition.value, value)) {
					return true;
				}
			}
			return false;
		case "program":
			return state.program !== null && matchesOptional(condition.program, state.program);
		case "pitch_bend":
			return state.pitchBend !== null && matchesOptional(condition.value, state.pitchBend);
		default:
			return assertNever(condition);
	}
}

function applyMessage(state: ChannelState, message: MidiMessage): ChannelState {
	switch (message.type) {
		case "note_on": {
			const heldNotes = new Map(state.heldNotes);
			heldNotes.set(message.key, message.velocity);
			return { ...state, heldNotes };
		}
		case "note_off": {
			if (!state.heldNotes.has(message.key)) return state;
			const heldNotes = new Map(state.heldNotes);
			heldNotes.delete(message.key);
			return { ...state, heldNotes };
		}
		case "control_change": {
			const controls = new Map(state.controls);
			controls.set(message.control, message.value);
			return { ...state, controls };
		}
		case "program_change":
			return { ...state, program: message.program };
		case "pitch_bend":
			return { ...state, pitchBend: message.value };
		case "poly_aftertouch":
		case "channel_aftertouch":
			return state;
		default:
			return assertNever(message);
	}
}

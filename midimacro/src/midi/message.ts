/**
 * MIDI channel voice messages.
 *
 * Channels are numbered 1-16 as printed on devices; data values are 0-127,
 * pitch bend is the assembled 14-bit value (0-16383, 8192 = centre).
 */

export type NoteOff = {
	readonly type: "note_off";
	readonly channel: number;
	readonly key: number;
	readonly velocity: number;
};

export type NoteOn = {
	readonly type: "note_on";
	readonly channel: number;
	readonly key: number;
	readonly velocity: number;
};

export type PolyAftertouch = {
	readonly type: "poly_aftertouch";
	readonly channel: number;
	readonly key: number;
	readonly value: number;
};

export type ControlChange = {
	readonly type: "control_change";
	readonly channel: number;
	readonly control: number;
	readonly value: number;
};

export type ProgramChange = {
	readonly type: "program_change";
	readonly channel: number;
	readonly program: number;
};

export type ChannelAftertouch = {
	readonly type: "channel_aftertouch";
	readonly channel: number;
	readonly value: number;
};

export type PitchBend = {
	readonly type: "pitch_bend";
	readonly channel: number;
	readonly value: number;
};

export type MidiMessage =
	| NoteOff
	| NoteOn
	| PolyAftertouch
	| ControlChange
	| ProgramChange
	| ChannelAftertouch
	| PitchBend;

export type MidiMessageType = MidiMessage["type"];

/** Field names of one message type, `type` excluded. */
export type MidiFieldOf<T extends MidiMessageType> = Exclude<
	keyof Extract<MidiMessage, { type: T }>,
	"type"
>;

export type MidiField = { [T in MidiMessageType]: MidiFieldOf<T> }[MidiMessageType];

/** Matchable fields per message type, in display order. */
export const MIDI_MESSAGE_FIELDS: { readonly [T in MidiMessageType]: readonly MidiFieldOf<T>[] } = {
	note_off: ["channel", "key", "velocity"],
	note_on: ["channel", "key", "velocity"],
	poly_aftertouch: ["channel", "key", "value"],
	control_change: ["channel", "control", "value"],
	program_change: ["channel", "program"],
	channel_aftertouch: ["channel", "value"],
	pitch_bend: ["channel", "value"],
};

export const MIDI_MESSAGE_TYPES = Object.keys(MIDI_MESSAGE_FIELDS).filter(isMidiMessageType);

export function isMidiMessageType(value: string): value is MidiMessageType {
	return Object.hasOwn(MIDI_MESSAGE_FIELDS, value);
}

export function midiFieldsOf(type: MidiMessageType): readonly MidiField[] {
	return MIDI_MESSAGE_FIELDS[type];
}

/** Whether `field` is one of the matchable fields of message type `type`. */
export function isMidiFieldOf(type: MidiMessageType, field: string): field is MidiField {
	const fields: readonly string[] = midiFieldsOf(type);
	return fields.includes(field);
}

/** Inclusive bounds of a field's values. */
export type FieldRange = { readonly min: number; readonly max: number };

export const CHANNEL_RANGE: FieldRange = Object.freeze({ min: 1, max: 16 });
export const DATA_RANGE: FieldRange = Object.freeze({ min: 0, max: 127 });
export const PITCH_BEND_RANGE: FieldRange = Object.freeze({ min: 0, max: 16383 });

/**
 * Values a field can carry: channels 1-16, pitch bend 14 bits, everything else 7 bits.
 * `type` is a message type or a state condition kind.
 */
export function midiFieldRange(type: string, field: string): FieldRange {
	if (field === "channel") return CHANNEL_RANGE;
	return type === "pitch_bend" ? PITCH_BEND_RANGE : DATA_RANGE;
}

/** Read a field by name; `null` when this message type has no such field. */
export function readMidiField(message: MidiMessage, field: MidiField): number | null {
	const record: Readonly<Record<string, unknown>> = message;
	const value = record[field];
	return typeof value === "number" ? value : null;
}

/** Render a message for logs, e.g. `control_change ch=1 control=7 value=40`. */
export function formatMidiMessage(message: MidiMessage): string {
	const parts: string[] = [message.type];
	for (const field of midiFieldsOf(message.type)) {
		parts.push(`${field === "channel" ? "ch" : field}=${readMidiField(message, field)}`);
	}
	return parts.join(" ");
}

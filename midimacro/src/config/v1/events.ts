import { type EventMatcher, MidiEventMatcher } from "../../events.ts";
import {
	type MidiField,
	MIDI_MESSAGE_TYPES,
	isMidiFieldOf,
	isMidiMessageType,
	midiFieldRange,
	midiFieldsOf,
} from "../../midi/message.ts";
import type { NumberMatcher } from "../../number-matchers.ts";
import type { RawValue } from "../document.ts";
import { InvalidConfigError } from "../errors.ts";
import { MapReader } from "../fields.ts";
import { resolveNumberMatcher } from "./matchers.ts";

const EVENT_TYPES = ["midi"] as const;

/**
 * Resolve one entry of `matching_events` (or `global.stop_event`):
 *
 *   type: midi
 *   data:
 *     message_type: control_change
 *     control: 7
 *     value: { min: 0, max: 63 }
 */
export function resolveEventMatcher(value: RawValue, path: string): EventMatcher {
	const reader = new MapReader(value, path);
	reader.allowOnly(["type", "data"]);

	const type = reader.string("type");
	switch (type) {
		case "midi":
			return resolveMidiEventMatcher(reader.required("data"), reader.fieldPath("data"));
		default:
			throw new InvalidConfigError(
				reader.fieldPath("type"),
				`unknown event type "${type}" (expected one of: ${EVENT_TYPES.join(", ")})`,
			);
	}
}

function resolveMidiEventMatcher(value: RawValue, path: string): MidiEventMatcher {
	const reader = new MapReader(value, path);
	const messageType = reader.string("message_type");
	if (!isMidiMessageType(messageType)) {
		throw new InvalidConfigError(
			reader.fieldPath("message_type"),
			`unknown MIDI message type "${messageType}" (expected one of: ${MIDI_MESSAGE_TYPES.join(", ")})`,
		);
	}

	const fields: { -readonly [F in MidiField]?: NumberMatcher } = {};
	for (const [key, item] of reader.entries) {
		if (key === "message_type" || item.kind === "null") continue;
		if (!isMidiFieldOf(messageType, key)) {
			throw new InvalidConfigError(
				reader.fieldPath(key),
				`${messageType} has no field "${key}" (fields: ${midiFieldsOf(messageType).join(", ")})`,
			);
		}
		fields[key] = resolveNumberMatcher(
			item,
			reader.fieldPath(key),
			midiFieldRange(messageType, key),
		);
	}

	return new MidiEventMatcher(messageType, fields);
}

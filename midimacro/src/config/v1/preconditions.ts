import { midiFieldRange } from "../../midi/message.ts";
import type { NumberMatcher } from "../../number-matchers.ts";
import {
	MIDI_CONDITION_FIELDS,
	type MidiCondition,
	type MidiConditionKind,
	type Precondition,
	midiPrecondition,
} from "../../preconditions.ts";
import { assertNever } from "../../types.ts";
import type { RawValue } from "../document.ts";
import { InvalidConfigError } from "../errors.ts";
import { MapReader } from "../fields.ts";
import { resolveNumberMatcher } from "./matchers.ts";

const CONDITION_KINDS = Object.keys(MIDI_CONDITION_FIELDS);

function isConditionKind(value: string): value is MidiConditionKind {
	return Object.hasOwn(MIDI_CONDITION_FIELDS, value);
}

/**
 * Resolve one entry of `required_preconditions`:
 *
 *   type: midi
 *   invert: false              # optional
 *   data:
 *     condition_type: control  # note_held | control | program | pitch_bend
 *     control: 64
 *     value: { min: 64, max: 127 }
 */
export function resolvePrecondition(value: RawValue, path: string): Precondition {
	const reader = new MapReader(value, path);
	reader.allowOnly(["type", "invert", "data"]);

	const type = reader.string("type");
	if (type !== "midi") {
		throw new InvalidConfigError(
			reader.fieldPath("type"),
			`unknown precondition type "${type}" (expected: midi)`,
		);
	}
	const invert = reader.optionalBool("invert", false);
	const condition = resolveMidiCondition(reader.required("data"), reader.fieldPath("data"));
	return midiPrecondition(condition, invert);
}

function resolveMidiCondition(value: RawValue, path: string): MidiCondition {
	const reader = new MapReader(value, path);
	const kind = reader.string("condition_type");
	if (!isConditionKind(kind)) {
		throw new InvalidConfigError(
			reader.fieldPath("condition_type"),
			`unknown condition type "${kind}" (expected one of: ${CONDITION_KINDS.join(", ")})`,
		);
	}
	reader.allowOnly(["condition_type", ...MIDI_CONDITION_FIELDS[kind]]);

	const field = (name: string): NumberMatcher | null => {
		const item = reader.optional(name);
		return item === null
			? null
			: resolveNumberMatcher(item, reader.fieldPath(name), midiFieldRange(kind, name));
	};

	switch (kind) {
		case "note_held":
			return { kind, channel: field("channel"), key: field("key") };
		case "control":
			return { kind, channel: field("channel"), control: field("control"), value: field("value") };
		case "program":
			return { kind, channel: field("channel"), program: field("program") };
		case "pitch_bend":
			return { kind, channel: field("channel"), value: field("value") };
		default:
			return assertNever(kind);
	}
}

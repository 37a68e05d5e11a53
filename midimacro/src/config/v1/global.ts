import { DEFAULT_KEY_DELAY_US } from "../../runner.ts";
import type { RawValue } from "../document.ts";
import { InvalidConfigError } from "../errors.ts";
import { MapReader } from "../fields.ts";
import type { GlobalSettings } from "../types.ts";
import { resolveEventMatcher } from "./events.ts";

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = Object.freeze({
	midiPort: null,
	stopEvent: null,
	keyDelayUs: DEFAULT_KEY_DELAY_US,
});

/**
 * Resolve the optional `global` section:
 *
 *   global:
 *     midi_port: "nanoKONTROL"  # default: none
 *     key_delay_us: 100         # default: 100
 *     stop_event: { type: midi, data: { message_type: control_change, control: 51, value: 127 } }
 */
export function resolveGlobalSettings(value: RawValue | null, path: string): GlobalSettings {
	if (value === null) return DEFAULT_GLOBAL_SETTINGS;

	const reader = new MapReader(value, path);
	reader.allowOnly(["midi_port", "key_delay_us", "stop_event"]);

	const keyDelayUs = reader.optionalInteger("key_delay_us", DEFAULT_KEY_DELAY_US);
	if (keyDelayUs < 0) {
		throw new InvalidConfigError(
			reader.fieldPath("key_delay_us"),
			`key_delay_us should be 0 or more, found ${keyDelayUs}`,
		);
	}

	const stopEvent = reader.optional("stop_event");
	return Object.freeze({
		midiPort: reader.optionalString("midi_port"),
		stopEvent:
			stopEvent === null ? null : resolveEventMatcher(stopEvent, reader.fieldPath("stop_event")),
		keyDelayUs,
	});
}

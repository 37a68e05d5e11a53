/**
 * Tests for configuration resolution (src/config/).
 *
 * Documents are written as YAML, the way users write them, and go through
 * parseConfigText() before resolveConfig().
 */

import { describe, expect, it } from "vitest";
import { combination, enterText, keySequence, shell } from "../src/actions.ts";
import {
	type Config,
	ConfigError,
	DEFAULT_GLOBAL_SETTINGS,
	InvalidConfigError,
	UnsupportedVersionError,
	parseConfigText,
	raw,
	resolveConfig,
	supportedVersions,
} from "../src/config/index.ts";
import { StateSnapshot } from "../src/state.ts";
import { controlChange, noteOn, pitchBend, programChange } from "../src/testing.ts";

function resolve(yaml: string) {
	const { document, version } = parseConfigText(yaml, "test.yml");
	return resolveConfig(document, version);
}

function resolveOk(yaml: string): Config {
	const result = resolve(yaml);
	if (!result.ok) throw result.error;
	return result.config;
}

function resolveError(yaml: string): ConfigError {
	const result = resolve(yaml);
	if (result.ok) throw new Error("expected the config to be rejected");
	return result.error;
}

function invalid(yaml: string): InvalidConfigError {
	const error = resolveError(yaml);
	if (!(error instanceof InvalidConfigError)) throw error;
	return error;
}

/** Wrap one macro's YAML (indented by four spaces) in a version 1 document. */
function withMacro(macro: string): string {
	return `version: 1\nmacros:\n  - ${macro.trim().replace(/\n/g, "\n    ")}\n`;
}

const CC7_EVENT = `matching_events:
  - type: midi
    data: { message_type: control_change, control: 7 }`;

const FULL = `
version: 1
global:
  midi_port: nanoKONTROL
  key_delay_us: 250
  stop_event:
    type: midi
    data: { message_type: control_change, control: 51, value: 127 }
macros:
  - name: volume down
    matching_events:
      - type: midi
        data: { message_type: control_change, control: 7, value: { min: 0, max: 63 } }
    scope:
      window_class: { contains: firefox, ignore_case: true }
    actions:
      - type: key_sequence
        data: ctrl+shift+t
  - matching_events:
      - type: midi
        data: { message_type: note_on, key: 36 }
    required_preconditions:
      - type: midi
        invert: true
        data: { condition_type: control, control: 64, value: { min: 64, max: 127 } }
    actions:
      - type: enter_text
        data: { text: hello, count: 2 }
      - type: shell
        data:
          command: /usr/bin/notify-send
          args: [volume, 40, true]
          env_vars: { LEVEL: 1.5 }
      - type: combination
        data:
          - type: key_sequence
            data: { sequence: ctrl+s, count: 0 }
`;

describe("resolveConfig: version 1", () => {
	it("resolves every section", () => {
		const config = resolveOk(FULL);
		expect(config.settings.midiPort).toBe("nanoKONTROL");
		expect(config.settings.keyDelayUs).toBe(250);
		expect(config.macros).toHaveLength(2);

		const [volume, text] = config.macros;
		expect(volume?.name).toBe("volume down");
		expect(volume?.actions).toEqual([keySequence("ctrl+shift+t")]);
		expect(text?.name).toBeNull();
		expect(text?.requiredPreconditions).toHaveLength(1);
		expect(text?.actions).toEqual([
			enterText("hello", 2),
			shell("/usr/bin/notify-send", ["volume", "40", "true"], [["LEVEL", "1.5"]]),
			combination([keySequence("ctrl+s", 0)]),
		]);
	});

	it("resolved matchers behave as declared", () => {
		const config = resolveOk(FULL);
		const [volume, text] = config.macros;
		const inFirefox = StateSnapshot.INITIAL.withFocus({ windowClass: "Firefox", windowName: "" });

		expect(volume?.evaluate(controlChange(1, 7, 40), inFirefox)).toEqual([
			keySequence("ctrl+shift+t"),
		]);
		expect(volume?.evaluate(controlChange(1, 7, 100), inFirefox)).toBeNull();
		expect(volume?.evaluate(controlChange(1, 7, 40), StateSnapshot.INITIAL)).toBeNull();

		// inverted: fires only while the sustain pedal is up
		expect(text?.evaluate(noteOn(1, 36), StateSnapshot.INITIAL)).not.toBeNull();
		const pedalDown = StateSnapshot.INITIAL.withEvent(controlChange(1, 64, 127));
		expect(text?.evaluate(noteOn(1, 36), pedalDown)).toBeNull();

		expect(config.settings.stopEvent?.matches(controlChange(3, 51, 127), inFirefox)).toBe(true);
		expect(config.settings.stopEvent?.matches(controlChange(3, 51, 0), inFirefox)).toBe(false);
	});

	it("global settings default when the section is absent", () => {
		const config = resolveOk("version: 1\nmacros: []\n");
		expect(config.settings).toEqual(DEFAULT_GLOBAL_SETTINGS);
		expect(config.settings).toEqual({ midiPort: null, stopEvent: null, keyDelayUs: 100 });
		expect(config.macros).toEqual([]);
	});

	it("accepts the version as a string", () => {
		expect(resolveOk('version: "1"\nmacros: []\n').macros).toEqual([]);
	});

	it("shorthand forms", () => {
		const config = resolveOk(
			withMacro(`
matching_events:
  - type: midi
    data: { message_type: note_on, channel: { value: 10 }, velocity: { any: true } }
scope:
  window_class: code
actions:
  - type: enter_text
    data: plain text
  - type: shell
    data: /usr/bin/true
  - type: key_sequence
    data: { sequence: Return }
`),
		);
		const [macro] = config.macros;
		expect(macro?.actions).toEqual([enterText("plain text"), shell("/usr/bin/true"), keySequence("Return")]);
		const inCode = StateSnapshot.INITIAL.withFocus({ windowClass: "code", windowName: "x" });
		expect(macro?.evaluate(noteOn(10, 1, 1), inCode)).not.toBeNull();
		expect(macro?.evaluate(noteOn(9, 1, 1), inCode)).toBeNull();
	});

	it("null optional fields count as absent", () => {
		const config = resolveOk(
			withMacro(`
name: ~
${CC7_EVENT}
required_preconditions: ~
scope: ~
actions: []
`),
		);
		expect(config.macros[0]?.name).toBeNull();
		expect(config.macros[0]?.scope).toBeNull();
		expect(config.macros[0]?.requiredPreconditions).toBeNull();
	});
});

describe("resolveConfig: structural errors", () => {
	it("missing macros", () => {
		expect(invalid("version: 1\n").message).toBe("invalid config: macros: required field is missing");
	});

	it("unknown top-level field", () => {
		expect(invalid("version: 1\nmacro: []\n").message).toBe(
			"invalid config: macro: unknown field (expected one of: version, global, macros)",
		);
	});

	it("wrong shape names what was expected", () => {
		const error = invalid("version: 1\nmacros: everything\n");
		expect(error.path).toBe("macros");
		expect(error.detail).toBe("expected a list, got a string");
	});

	it("unknown macro field", () => {
		const error = invalid(withMacro(`${CC7_EVENT}\nmatching_event: []\nactions: []`));
		expect(error.path).toBe("macros[0].matching_event");
	});

	it("missing actions", () => {
		const error = invalid(withMacro(CC7_EVENT));
		expect(error.message).toBe("invalid config: macros[0].actions: required field is missing");
	});

	it("empty matching_events", () => {
		const error = invalid(withMacro("matching_events: []\nactions: []"));
		expect(error.message).toBe(
			"invalid config: macros[0].matching_events: at least one event matcher is required",
		);
	});

	it("unknown event type", () => {
		const error = invalid(
			withMacro("matching_events:\n  - type: osc\n    data: {}\nactions: []"),
		);
		expect(error.path).toBe("macros[0].matching_events[0].type");
		expect(error.detail).toBe('unknown event type "osc" (expected one of: midi)');
	});

	it("unknown MIDI message type", () => {
		const error = invalid(
			withMacro(
				"matching_events:\n  - type: midi\n    data: { message_type: sysex }\nactions: []",
			),
		);
		expect(error.path).toBe("macros[0].matching_events[0].data.message_type");
		expect(error.detail).toBe(
			'unknown MIDI message type "sysex" (expected one of: note_off, note_on, poly_aftertouch, control_change, program_change, channel_aftertouch, pitch_bend)',
		);
	});

	it("field the message type does not carry", () => {
		const error = invalid(
			withMacro(
				"matching_events:\n  - type: midi\n    data: { message_type: note_on, control: 7 }\nactions: []",
			),
		);
		expect(error.path).toBe("macros[0].matching_events[0].data.control");
		expect(error.detail).toBe('note_on has no field "control" (fields: channel, key, velocity)');
	});

	it("unknown action type", () => {
		const error = invalid(withMacro(`${CC7_EVENT}\nactions:\n  - type: mouse_click\n    data: left`));
		expect(error.path).toBe("macros[0].actions[0].type");
		expect(error.detail).toBe(
			'unknown action type "mouse_click" (expected one of: key_sequence, enter_text, shell, combination)',
		);
	});

	it("errors inside combinations carry the nested path", () => {
		const error = invalid(
			withMacro(`${CC7_EVENT}
actions:
  - type: combination
    data:
      - type: enter_text
        data: { txt: hi }`),
		);
		expect(error.path).toBe("macros[0].actions[0].data[0].data.txt");
	});

	it("unknown precondition field for the condition type", () => {
		const error = invalid(
			withMacro(`${CC7_EVENT}
required_preconditions:
  - type: midi
    data: { condition_type: program, key: 1 }
actions: []`),
		);
		expect(error.path).toBe("macros[0].required_preconditions[0].data.key");
		expect(error.detail).toBe("unknown field (expected one of: condition_type, channel, program)");
	});
});

describe("resolveConfig: semantic errors", () => {
	it("negative count", () => {
		const error = invalid(
			withMacro(`${CC7_EVENT}\nactions:\n  - type: key_sequence\n    data: { sequence: a, count: -1 }`),
		);
		expect(error.message).toBe(
			"invalid config: macros[0].actions[0].data.count: count should be 0 or more, found -1",
		);
	});

	it("float where an integer is required", () => {
		const error = invalid(
			withMacro(`${CC7_EVENT}\nactions:\n  - type: enter_text\n    data: { text: a, count: 1.5 }`),
		);
		expect(error.path).toBe("macros[0].actions[0].data.count");
		expect(error.detail).toBe("expected an integer, got a float");
	});

	it("float in a number matcher", () => {
		const error = invalid(
			withMacro(
				"matching_events:\n  - type: midi\n    data: { message_type: note_on, key: 60.5 }\nactions: []",
			),
		);
		expect(error.path).toBe("macros[0].matching_events[0].data.key");
	});

	it("range with min above max", () => {
		const error = invalid(
			withMacro(
				"matching_events:\n  - type: midi\n    data: { message_type: control_change, value: { min: 10, max: 1 } }\nactions: []",
			),
		);
		expect(error.detail).toBe("range min 10 is greater than max 1");
	});

	it("any: false is rejected", () => {
		const error = invalid(
			withMacro(
				"matching_events:\n  - type: midi\n    data: { message_type: control_change, value: { any: false } }\nactions: []",
			),
		);
		expect(error.path).toBe("macros[0].matching_events[0].data.value.any");
	});

	it("string matcher with two variants", () => {
		const error = invalid(
			withMacro(`${CC7_EVENT}\nscope:\n  window_class: { equals: a, contains: b }\nactions: []`),
		);
		expect(error.path).toBe("macros[0].scope.window_class");
		expect(error.detail).toBe(
			"expected exactly one of: equals, contains, starts_with, ends_with, regex, any, found 2",
		);
	});

	it("invalid regex", () => {
		const error = invalid(withMacro(`${CC7_EVENT}\nscope:\n  window_name: { regex: "(a" }\nactions: []`));
		expect(error.path).toBe("macros[0].scope.window_name.regex");
		expect(error.detail).toMatch(/^invalid regex pattern "\(a"/);
	});

	it("empty shell command", () => {
		const error = invalid(withMacro(`${CC7_EVENT}\nactions:\n  - type: shell\n    data: { command: "" }`));
		expect(error.message).toBe(
			"invalid config: macros[0].actions[0].data.command: command must not be empty",
		);
	});

	it("env var values must be scalars", () => {
		const error = invalid(
			withMacro(
				`${CC7_EVENT}\nactions:\n  - type: shell\n    data: { command: /bin/true, env_vars: { A: [1] } }`,
			),
		);
		expect(error.path).toBe("macros[0].actions[0].data.env_vars.A");
		expect(error.detail).toBe("expected a string, number or boolean, got a list");
	});

	it("negative key delay", () => {
		const error = invalid("version: 1\nglobal: { key_delay_us: -5 }\nmacros: []\n");
		expect(error.message).toBe(
			"invalid config: global.key_delay_us: key_delay_us should be 0 or more, found -5",
		);
	});

	it("one invalid macro rejects the whole config", () => {
		const result = resolve(
			`version: 1\nmacros:\n  - ${CC7_EVENT.replace(/\n/g, "\n    ")}\n    actions: []\n  - matching_events: []\n    actions: []\n`,
		);
		expect(result.ok).toBe(false);
	});
});

describe("resolveConfig: field ranges", () => {
	const event = (data: string) =>
		withMacro(`matching_events:\n  - type: midi\n    data: ${data}\nactions: []`);

	it("channel 0", () => {
		const error = invalid(event("{ message_type: control_change, channel: 0 }"));
		expect(error.message).toBe(
			"invalid config: macros[0].matching_events[0].data.channel: 0 is outside 1-16",
		);
	});

	it("control above 127", () => {
		const error = invalid(event("{ message_type: control_change, control: 300 }"));
		expect(error.path).toBe("macros[0].matching_events[0].data.control");
		expect(error.detail).toBe("300 is outside 0-127");
	});

	it("range ends outside the data byte", () => {
		const error = invalid(event("{ message_type: control_change, value: { min: 200, max: 999 } }"));
		expect(error.path).toBe("macros[0].matching_events[0].data.value.min");
		expect(error.detail).toBe("200 is outside 0-127");

		const upper = invalid(event("{ message_type: control_change, value: { min: 0, max: 128 } }"));
		expect(upper.path).toBe("macros[0].matching_events[0].data.value.max");
	});

	it("value form above 127", () => {
		const error = invalid(event("{ message_type: note_on, velocity: { value: 128 } }"));
		expect(error.path).toBe("macros[0].matching_events[0].data.velocity.value");
		expect(error.detail).toBe("128 is outside 0-127");
	});

	it("pitch bend takes 14 bits, not 7", () => {
		const error = invalid(event("{ message_type: pitch_bend, value: 16384 }"));
		expect(error.detail).toBe("16384 is outside 0-16383");
	});

	it("precondition fields", () => {
		const error = invalid(
			withMacro(
				`${CC7_EVENT}\nrequired_preconditions:\n  - type: midi\n    data: { condition_type: note_held, channel: 17 }\nactions: []`,
			),
		);
		expect(error.message).toBe(
			"invalid config: macros[0].required_preconditions[0].data.channel: 17 is outside 1-16",
		);
	});

	it("accepts the bounds themselves", () => {
		const config = resolveOk(
			withMacro(`matching_events:
  - type: midi
    data: { message_type: pitch_bend, channel: 16, value: 16383 }
required_preconditions:
  - type: midi
    data: { condition_type: program, channel: 16, program: 127 }
actions:
  - type: key_sequence
    data: ctrl+z`),
		);
		const [macro] = config.macros;
		const patched = StateSnapshot.INITIAL.withEvent(programChange(16, 127));
		expect(macro?.evaluate(pitchBend(16, 16383), patched)).toEqual([keySequence("ctrl+z")]);
		expect(macro?.evaluate(pitchBend(16, 16383), StateSnapshot.INITIAL)).toBeNull();
		expect(macro?.evaluate(pitchBend(16, 0), patched)).toBeNull();
	});
});

describe("resolveConfig: versions", () => {
	it("lists supported versions", () => {
		expect(supportedVersions()).toEqual(["1"]);
	});

	it("rejects an unknown version", () => {
		const error = resolveError("version: 2\nmacros: []\n");
		expect(error).toBeInstanceOf(UnsupportedVersionError);
		expect(error.message).toBe('unsupported config version "2" (supported: 1)');
	});

	it("the root must be a map", () => {
		const result = resolveConfig(raw.list([]), "1");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("invalid config: <root>: expected a map, got a list");
	});
});

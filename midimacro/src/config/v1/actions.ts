import { type Action, combination, enterText, keySequence, shell } from "../../actions.ts";
import type { RawValue } from "../document.ts";
import { InvalidConfigError } from "../errors.ts";
import { MapReader, coerceString, expectList, expectString, mapItems } from "../fields.ts";

const ACTION_TYPES = ["key_sequence", "enter_text", "shell", "combination"] as const;

/** Repeat count when none is given. */
export const DEFAULT_COUNT = 1;

/**
 * Resolve one entry of `actions`: a map with `type` and `data`.
 *
 *   - type: key_sequence
 *     data: "ctrl+shift+t"              # or { sequence, count }
 *   - type: enter_text
 *     data: { text: "hello", count: 2 } # or a plain string
 *   - type: shell
 *     data: { command: /usr/bin/notify-send, args: [hi], env_vars: { A: "1" } }
 *   - type: combination
 *     data: [ ...actions ]
 */
export function resolveAction(value: RawValue, path: string): Action {
	const reader = new MapReader(value, path);
	reader.allowOnly(["type", "data"]);

	const type = reader.string("type");
	const data = reader.required("data");
	const dataPath = reader.fieldPath("data");

	switch (type) {
		case "key_sequence": {
			const [sequence, count] = resolveRepeated(data, dataPath, "sequence");
			return keySequence(sequence, count);
		}
		case "enter_text": {
			const [text, count] = resolveRepeated(data, dataPath, "text");
			return enterText(text, count);
		}
		case "shell":
			return resolveShell(data, dataPath);
		case "combination":
			return combination(mapItems(expectList(data, dataPath), dataPath, resolveAction));
		default:
			throw new InvalidConfigError(
				reader.fieldPath("type"),
				`unknown action type "${type}" (expected one of: ${ACTION_TYPES.join(", ")})`,
			);
	}
}

/**
 * `data` is either the string itself (count 1), or a map holding the string
 * under `key` and an optional non-negative `count`.
 */
function resolveRepeated(data: RawValue, path: string, key: string): [string, number] {
	if (data.kind === "string") return [data.value, DEFAULT_COUNT];
	if (data.kind !== "map") {
		throw new InvalidConfigError(path, `expected a string or a map with '${key}'`);
	}

	const reader = new MapReader(data, path);
	reader.allowOnly([key, "count"]);
	const text = reader.string(key);
	const count = reader.optionalInteger("count", DEFAULT_COUNT);
	if (count < 0) {
		throw new InvalidConfigError(reader.fieldPath("count"), `count should be 0 or more, found ${count}`);
	}
	return [text, count];
}

/** `data` is the command path alone, or a map with `command`, `args` and `env_vars`. */
function resolveShell(data: RawValue, path: string): Action {
	if (data.kind === "string") return shell(resolveCommand(data, path));

	const reader = new MapReader(data, path);
	reader.allowOnly(["command", "args", "env_vars"]);
	const command = resolveCommand(reader.required("command"), reader.fieldPath("command"));

	const rawArgs = reader.optionalList("args");
	const args =
		rawArgs === null ? null : mapItems(rawArgs, reader.fieldPath("args"), coerceString);

	const rawEnv = reader.optional("env_vars");
	let envVars: [string, string][] | null = null;
	if (rawEnv !== null) {
		const env = new MapReader(rawEnv, reader.fieldPath("env_vars"));
		envVars = [...env.entries].map(([key, value]): [string, string] => [
			key,
			coerceString(value, env.fieldPath(key)),
		]);
	}

	return shell(command, args, envVars);
}

function resolveCommand(value: RawValue, path: string): string {
	const command = expectString(value, path);
	if (command === "") throw new InvalidConfigError(path, "command must not be empty");
	return command;
}

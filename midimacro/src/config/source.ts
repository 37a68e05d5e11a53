import { readFile } from "node:fs/promises";
import { YAMLException, load } from "js-yaml";
import { type RawValue, toRawValue } from "./document.ts";
import { ConfigParseError, InvalidConfigError } from "./errors.ts";

/** A parsed document and the schema version it declares. */
export interface ConfigSource {
	readonly document: RawValue;
	readonly version: string;
}

/**
 * Parse YAML (or JSON, which is YAML) text into a RawValue document and
 * read its top-level `version`. `origin` names the text in error messages.
 */
export function parseConfigText(text: string, origin: string): ConfigSource {
	let data: unknown;
	try {
		data = load(text, { filename: origin });
	} catch (err) {
		if (err instanceof YAMLException) throw new ConfigParseError(origin, err.message);
		throw err;
	}

	const document = toRawValue(data);
	if (document.kind !== "map") {
		throw new InvalidConfigError("", "expected a map at the top level");
	}

	const version = document.entries.get("version");
	if (version === undefined || version.kind === "null") {
		throw new InvalidConfigError("version", "required field is missing");
	}
	if (version.kind !== "integer" && version.kind !== "string") {
		throw new InvalidConfigError("version", "expected an integer or a string");
	}
	return { document, version: String(version.value) };
}

export async function loadConfigFile(path: string): Promise<ConfigSource> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new ConfigParseError(path, reason);
	}
	return parseConfigText(text, path);
}

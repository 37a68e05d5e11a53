/**
 * Configuration resolution: version-tagged RawValue documents → Config.
 *
 * Each schema version has its own resolver. Resolvers throw ConfigError;
 * resolveConfig turns that into a ConfigResult so callers branch on `ok`
 * instead of catching.
 */

import type { RawValue } from "./document.ts";
import { ConfigError, UnsupportedVersionError } from "./errors.ts";
import { loadConfigFile } from "./source.ts";
import type { Config, ConfigResolver, ConfigResult } from "./types.ts";
import { resolveVersion1 } from "./v1/index.ts";

const RESOLVERS: ReadonlyMap<string, ConfigResolver> = new Map([["1", resolveVersion1]]);

/** Schema versions this build understands, ascending. */
export function supportedVersions(): string[] {
	return [...RESOLVERS.keys()].sort();
}

export function resolveConfig(document: RawValue, version: string): ConfigResult {
	const resolver = RESOLVERS.get(version);
	if (resolver === undefined) {
		return { ok: false, error: new UnsupportedVersionError(version, supportedVersions()) };
	}
	try {
		return { ok: true, config: resolver(document) };
	} catch (err) {
		if (err instanceof ConfigError) return { ok: false, error: err };
		throw err;
	}
}

/** Read, parse and resolve a configuration file. Throws ConfigError. */
export async function loadConfig(path: string): Promise<Config> {
	const { document, version } = await loadConfigFile(path);
	const result = resolveConfig(document, version);
	if (!result.ok) throw result.error;
	return result.config;
}

export {
	type RawKind,
	type RawList,
	type RawMap,
	type RawValue,
	describeKind,
	raw,
	toRawValue,
} from "./document.ts";
export {
	ConfigError,
	ConfigParseError,
	InvalidConfigError,
	UnsupportedVersionError,
} from "./errors.ts";
export type { Config, ConfigResolver, ConfigResult, GlobalSettings } from "./types.ts";
export { DEFAULT_GLOBAL_SETTINGS } from "./v1/global.ts";
export { loadConfigFile, parseConfigText } from "./source.ts";
export type { ConfigSource } from "./source.ts";

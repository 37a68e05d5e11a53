/**
 * Schema version 1.
 *
 *   version: 1
 *   global: { ... }     # optional, see global.ts
 *   macros: [ ... ]     # required, see macros.ts
 */

import type { RawValue } from "../document.ts";
import { MapReader, mapItems } from "../fields.ts";
import type { Config } from "../types.ts";
import { resolveGlobalSettings } from "./global.ts";
import { resolveMacro } from "./macros.ts";

export function resolveVersion1(document: RawValue): Config {
	const reader = new MapReader(document, "");
	reader.allowOnly(["version", "global", "macros"]);

	const settings = resolveGlobalSettings(reader.optional("global"), reader.fieldPath("global"));
	const macros = mapItems(reader.list("macros"), reader.fieldPath("macros"), resolveMacro);

	return Object.freeze({ macros: Object.freeze(macros), settings });
}

import type { EventMatcher } from "../events.ts";
import type { Macro } from "../macro.ts";
import type { RawValue } from "./document.ts";
import type { ConfigError } from "./errors.ts";

/** Process-wide settings outside any single macro. */
export interface GlobalSettings {
	/** Substring of the MIDI port name to listen on; `null` lets the caller choose. */
	readonly midiPort: string | null;
	/** Event that ends listening; `null` keeps listening until the process is stopped. */
	readonly stopEvent: EventMatcher | null;
	/** Delay between synthesized keystrokes, in microseconds. */
	readonly keyDelayUs: number;
}

/** A fully resolved configuration: macros in declaration order plus global settings. */
export interface Config {
	readonly macros: readonly Macro[];
	readonly settings: GlobalSettings;
}

export type ConfigResult =
	| { readonly ok: true; readonly config: Config }
	| { readonly ok: false; readonly error: ConfigError };

/** Resolves one schema version. Throws ConfigError on any invalid field. */
export type ConfigResolver = (document: RawValue) => Config;

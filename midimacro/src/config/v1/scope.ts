import { Scope } from "../../scope.ts";
import type { RawValue } from "../document.ts";
import { MapReader } from "../fields.ts";
import { resolveStringMatcher } from "./matchers.ts";

/**
 * Resolve a macro's `scope`. Both fields are optional string matchers; an
 * empty scope is global.
 */
export function resolveScope(value: RawValue, path: string): Scope {
	const reader = new MapReader(value, path);
	reader.allowOnly(["window_class", "window_name"]);

	const windowClass = reader.optional("window_class");
	const windowName = reader.optional("window_name");
	return new Scope(
		windowClass === null
			? null
			: resolveStringMatcher(windowClass, reader.fieldPath("window_class")),
		windowName === null ? null : resolveStringMatcher(windowName, reader.fieldPath("window_name")),
	);
}

import { type Macro, MacroBuilder } from "../../macro.ts";
import type { RawValue } from "../document.ts";
import { InvalidConfigError } from "../errors.ts";
import { MapReader, mapItems } from "../fields.ts";
import { resolveAction } from "./actions.ts";
import { resolveEventMatcher } from "./events.ts";
import { resolvePrecondition } from "./preconditions.ts";
import { resolveScope } from "./scope.ts";

const MACRO_FIELDS = ["name", "matching_events", "required_preconditions", "scope", "actions"];

/**
 * Resolve one entry of `macros`. The builder is only built once every
 * section resolved, so an invalid macro never reaches the rule set.
 */
export function resolveMacro(value: RawValue, path: string): Macro {
	const reader = new MapReader(value, path);
	reader.allowOnly(MACRO_FIELDS);

	const builder = new MacroBuilder();

	const name = reader.optionalString("name");
	if (name !== null) builder.setName(name);

	const eventsPath = reader.fieldPath("matching_events");
	const events = mapItems(reader.list("matching_events"), eventsPath, resolveEventMatcher);
	if (events.length === 0) {
		throw new InvalidConfigError(eventsPath, "at least one event matcher is required");
	}
	builder.setEventMatchers(events);

	const preconditions = reader.optionalList("required_preconditions");
	if (preconditions !== null) {
		builder.setPreconditions(
			mapItems(preconditions, reader.fieldPath("required_preconditions"), resolvePrecondition),
		);
	}

	const scope = reader.optional("scope");
	if (scope !== null) builder.setScope(resolveScope(scope, reader.fieldPath("scope")));

	builder.setActions(mapItems(reader.list("actions"), reader.fieldPath("actions"), resolveAction));

	return builder.build();
}

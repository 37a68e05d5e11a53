/**
 * Typed access to RawValue trees for resolvers.
 *
 * Every failure is an InvalidConfigError naming the field path and what was
 * expected there. An explicit `null` counts as absent.
 */

import {
	type RawList,
	type RawMap,
	type RawValue,
	describeKind,
	indexPath,
	joinPath,
} from "./document.ts";
import { InvalidConfigError } from "./errors.ts";

export function expectMap(value: RawValue, path: string): RawMap {
	if (value.kind !== "map") throw wrongShape(value, path, "a map");
	return value;
}

export function expectList(value: RawValue, path: string): RawList {
	if (value.kind !== "list") throw wrongShape(value, path, "a list");
	return value;
}

export function expectString(value: RawValue, path: string): string {
	if (value.kind !== "string") throw wrongShape(value, path, "a string");
	return value.value;
}

export function expectInteger(value: RawValue, path: string): number {
	if (value.kind !== "integer") throw wrongShape(value, path, "an integer");
	return value.value;
}

export function expectBool(value: RawValue, path: string): boolean {
	if (value.kind !== "bool") throw wrongShape(value, path, "a boolean");
	return value.value;
}

/**
 * Scalars that may stand in for text (process arguments, environment
 * values): strings as-is, numbers and booleans in their canonical form.
 */
export function coerceString(value: RawValue, path: string): string {
	switch (value.kind) {
		case "string":
			return value.value;
		case "integer":
		case "float":
		case "bool":
			return String(value.value);
		default:
			throw wrongShape(value, path, "a string, number or boolean");
	}
}

/** Resolve every list item with its own indexed path. */
export function mapItems<T>(
	list: RawList,
	path: string,
	resolve: (item: RawValue, itemPath: string) => T,
): T[] {
	return list.items.map((item, i) => resolve(item, indexPath(path, i)));
}

function wrongShape(value: RawValue, path: string, expected: string): InvalidConfigError {
	return new InvalidConfigError(path, `expected ${expected}, got ${describeKind(value.kind)}`);
}

/** Field access on one map node. */
export class MapReader {
	readonly entries: ReadonlyMap<string, RawValue>;

	constructor(
		value: RawValue,
		readonly path: string,
	) {
		this.entries = expectMap(value, path).entries;
	}

	fieldPath(key: string): string {
		return joinPath(this.path, key);
	}

	/** Whether the key is present with a non-null value. */
	has(key: string): boolean {
		return this.optional(key) !== null;
	}

	optional(key: string): RawValue | null {
		const value = this.entries.get(key);
		return value === undefined || value.kind === "null" ? null : value;
	}

	required(key: string): RawValue {
		const value = this.optional(key);
		if (value === null) {
			throw new InvalidConfigError(this.fieldPath(key), "required field is missing");
		}
		return value;
	}

	string(key: string): string {
		return expectString(this.required(key), this.fieldPath(key));
	}

	optionalString(key: string): string | null {
		const value = this.optional(key);
		return value === null ? null : expectString(value, this.fieldPath(key));
	}

	optionalInteger(key: string, fallback: number): number {
		const value = this.optional(key);
		return value === null ? fallback : expectInteger(value, this.fieldPath(key));
	}

	optionalBool(key: string, fallback: boolean): boolean {
		const value = this.optional(key);
		return value === null ? fallback : expectBool(value, this.fieldPath(key));
	}

	list(key: string): RawList {
		return expectList(this.required(key), this.fieldPath(key));
	}

	optionalList(key: string): RawList | null {
		const value = this.optional(key);
		return value === null ? null : expectList(value, this.fieldPath(key));
	}

	/** Reject keys outside `allowed`; catches typos such as `matching_event`. */
	allowOnly(allowed: readonly string[]): void {
		for (const key of this.entries.keys()) {
			if (!allowed.includes(key)) {
				throw new InvalidConfigError(
					this.fieldPath(key),
					`unknown field (expected one of: ${allowed.join(", ")})`,
				);
			}
		}
	}
}

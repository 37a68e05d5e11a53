/**
 * Untyped document model: the parsed configuration tree before resolution.
 *
 * Mirrors the generic structured-document shape of YAML and JSON. Integers
 * and floats stay distinct so a resolver can reject `count: 1.5`.
 */

import { assertNever } from "../types.ts";
import { InvalidConfigError } from "./errors.ts";

export type RawNull = { readonly kind: "null" };
export type RawBool = { readonly kind: "bool"; readonly value: boolean };
export type RawInteger = { readonly kind: "integer"; readonly value: number };
export type RawFloat = { readonly kind: "float"; readonly value: number };
export type RawString = { readonly kind: "string"; readonly value: string };
export type RawList = { readonly kind: "list"; readonly items: readonly RawValue[] };
export type RawMap = { readonly kind: "map"; readonly entries: ReadonlyMap<string, RawValue> };

export type RawValue = RawNull | RawBool | RawInteger | RawFloat | RawString | RawList | RawMap;

export type RawKind = RawValue["kind"];

const NULL: RawNull = Object.freeze({ kind: "null" });

export const raw = {
	null: (): RawNull => NULL,
	bool: (value: boolean): RawBool => Object.freeze({ kind: "bool", value }),
	integer: (value: number): RawInteger => Object.freeze({ kind: "integer", value }),
	float: (value: number): RawFloat => Object.freeze({ kind: "float", value }),
	string: (value: string): RawString => Object.freeze({ kind: "string", value }),
	list: (items: readonly RawValue[]): RawList =>
		Object.freeze({ kind: "list", items: Object.freeze([...items]) }),
	map: (entries: Iterable<readonly [string, RawValue]>): RawMap =>
		Object.freeze({ kind: "map", entries: new Map(entries) }),
};

/**
 * Convert the output of a YAML/JSON parser into a RawValue.
 *
 * Safe integers become `integer`, other finite numbers `float`, dates
 * their ISO text. Anything a document cannot hold is rejected.
 */
export function toRawValue(data: unknown, path = ""): RawValue {
	if (data === null || data === undefined) return NULL;

	switch (typeof data) {
		case "boolean":
			return raw.bool(data);
		case "string":
			return raw.string(data);
		case "number":
			if (Number.isSafeInteger(data)) return raw.integer(data);
			if (Number.isFinite(data)) return raw.float(data);
			throw new InvalidConfigError(path, `non-finite number ${data} is not supported`);
		case "object":
			if (Array.isArray(data)) {
				return raw.list(data.map((item: unknown, i) => toRawValue(item, `${path}[${i}]`)));
			}
			if (data instanceof Date) return raw.string(data.toISOString());
			if (isPlainObject(data)) {
				return raw.map(
					Object.entries(data).map(([key, value]): [string, RawValue] => [
						key,
						toRawValue(value, joinPath(path, key)),
					]),
				);
			}
			throw new InvalidConfigError(path, "unsupported object in document");
		default:
			throw new InvalidConfigError(path, `unsupported ${typeof data} in document`);
	}
}

function isPlainObject(data: object): data is Record<string, unknown> {
	const proto: unknown = Object.getPrototypeOf(data);
	return proto === Object.prototype || proto === null;
}

/** Human wording for error messages: "an integer", "a map", ... */
export function describeKind(kind: RawKind): string {
	switch (kind) {
		case "null":
			return "null";
		case "bool":
			return "a boolean";
		case "integer":
			return "an integer";
		case "float":
			return "a float";
		case "string":
			return "a string";
		case "list":
			return "a list";
		case "map":
			return "a map";
		default:
			return assertNever(kind);
	}
}

export function joinPath(path: string, key: string): string {
	return path === "" ? key : `${path}.${key}`;
}

export function indexPath(path: string, index: number): string {
	return `${path}[${index}]`;
}

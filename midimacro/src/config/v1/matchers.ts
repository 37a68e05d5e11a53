import { AnyMatcher } from "../../any-matcher.ts";
import type { FieldRange } from "../../midi/message.ts";
import { type NumberMatcher, RangeMatcher, ValueMatcher } from "../../number-matchers.ts";
import {
	ContainsMatcher,
	ExactMatcher,
	MatcherError,
	PrefixMatcher,
	RegexMatcher,
	type StringMatcher,
	SuffixMatcher,
} from "../../string-matchers.ts";
import type { RawValue } from "../document.ts";
import { InvalidConfigError } from "../errors.ts";
import { MapReader, expectBool, expectInteger, expectString } from "../fields.ts";

export const MAX_PATTERN_LENGTH = 8192;
export const MAX_REGEX_PATTERN_LENGTH = 4096;

const STRING_MATCH_VARIANTS = [
	"equals",
	"contains",
	"starts_with",
	"ends_with",
	"regex",
	"any",
] as const;

type StringMatchVariant = (typeof STRING_MATCH_VARIANTS)[number];

/**
 * Number matcher forms:
 *
 *   7                    exact value
 *   { value: 7 }         exact value
 *   { min: 0, max: 63 }  inclusive range, min <= max
 *   { any: true }        any value
 *
 * Every number given must lie within `range`, the values the field can carry.
 */
export function resolveNumberMatcher(
	value: RawValue,
	path: string,
	range: FieldRange,
): NumberMatcher {
	if (value.kind === "integer") return new ValueMatcher(inRange(value.value, range, path));
	if (value.kind !== "map") {
		throw new InvalidConfigError(
			path,
			"expected an integer or a map with 'value', 'min'/'max' or 'any'",
		);
	}

	const reader = new MapReader(value, path);
	if (reader.has("any")) {
		reader.allowOnly(["any"]);
		requireTrue(reader.required("any"), reader.fieldPath("any"));
		return new AnyMatcher();
	}
	if (reader.has("value")) {
		reader.allowOnly(["value"]);
		const valuePath = reader.fieldPath("value");
		const n = expectInteger(reader.required("value"), valuePath);
		return new ValueMatcher(inRange(n, range, valuePath));
	}
	if (reader.has("min") || reader.has("max")) {
		reader.allowOnly(["min", "max"]);
		const minPath = reader.fieldPath("min");
		const maxPath = reader.fieldPath("max");
		const min = inRange(expectInteger(reader.required("min"), minPath), range, minPath);
		const max = inRange(expectInteger(reader.required("max"), maxPath), range, maxPath);
		if (min > max) {
			throw new InvalidConfigError(path, `range min ${min} is greater than max ${max}`);
		}
		return new RangeMatcher(min, max);
	}
	throw new InvalidConfigError(path, "expected one of 'value', 'min'/'max' or 'any'");
}

/**
 * String matcher forms:
 *
 *   "firefox"                                  exact, case-sensitive
 *   { contains: "Mozilla", ignore_case: true } one of equals, contains,
 *                                              starts_with, ends_with,
 *                                              regex, any (any: true)
 */
export function resolveStringMatcher(value: RawValue, path: string): StringMatcher {
	if (value.kind === "string") return compileStringMatcher("equals", value.value, false, path);
	if (value.kind !== "map") {
		throw new InvalidConfigError(
			path,
			`expected a string or a map with one of: ${STRING_MATCH_VARIANTS.join(", ")}`,
		);
	}

	const reader = new MapReader(value, path);
	reader.allowOnly([...STRING_MATCH_VARIANTS, "ignore_case"]);

	const present = STRING_MATCH_VARIANTS.filter((variant) => reader.has(variant));
	const [variant] = present;
	if (present.length !== 1 || variant === undefined) {
		throw new InvalidConfigError(
			path,
			`expected exactly one of: ${STRING_MATCH_VARIANTS.join(", ")}, found ${present.length}`,
		);
	}

	const ignoreCase = reader.optionalBool("ignore_case", false);
	if (variant === "any") {
		requireTrue(reader.required("any"), reader.fieldPath("any"));
		return new AnyMatcher();
	}
	const pattern = expectString(reader.required(variant), reader.fieldPath(variant));
	return compileStringMatcher(variant, pattern, ignoreCase, reader.fieldPath(variant));
}

function compileStringMatcher(
	variant: Exclude<StringMatchVariant, "any">,
	pattern: string,
	ignoreCase: boolean,
	path: string,
): StringMatcher {
	const limit = variant === "regex" ? MAX_REGEX_PATTERN_LENGTH : MAX_PATTERN_LENGTH;
	if (pattern.length > limit) {
		throw new InvalidConfigError(path, `pattern length ${pattern.length} exceeds maximum ${limit}`);
	}

	switch (variant) {
		case "equals":
			return new ExactMatcher(pattern, ignoreCase);
		case "contains":
			return new ContainsMatcher(pattern, ignoreCase);
		case "starts_with":
			return new PrefixMatcher(pattern, ignoreCase);
		case "ends_with":
			return new SuffixMatcher(pattern, ignoreCase);
		case "regex":
			try {
				return new RegexMatcher(pattern, ignoreCase);
			} catch (e) {
				if (e instanceof MatcherError) throw new InvalidConfigError(path, e.message);
				throw e;
			}
	}
}

function inRange(n: number, range: FieldRange, path: string): number {
	if (n < range.min || n > range.max) {
		throw new InvalidConfigError(path, `${n} is outside ${range.min}-${range.max}`);
	}
	return n;
}

function requireTrue(value: RawValue, path: string): void {
	if (!expectBool(value, path)) {
		throw new InvalidConfigError(path, "'any' only accepts true; omit the field to match anything");
	}
}

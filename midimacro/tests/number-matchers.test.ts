import { describe, expect, it } from "vitest";
import { AnyMatcher } from "../src/any-matcher.ts";
import { RangeMatcher, ValueMatcher, matchesOptional } from "../src/number-matchers.ts";

describe("ValueMatcher", () => {
	it("matches equal value", () => {
		expect(new ValueMatcher(7).matches(7)).toBe(true);
	});

	it("rejects other values", () => {
		expect(new ValueMatcher(7).matches(8)).toBe(false);
	});

	it("returns false for non-number", () => {
		expect(new ValueMatcher(7).matches("7")).toBe(false);
		expect(new ValueMatcher(7).matches(null)).toBe(false);
	});
});

describe("RangeMatcher", () => {
	it("is inclusive at both ends", () => {
		const m = new RangeMatcher(0, 63);
		expect(m.matches(0)).toBe(true);
		expect(m.matches(63)).toBe(true);
		expect(m.matches(64)).toBe(false);
		expect(m.matches(-1)).toBe(false);
	});

	it("single-value range", () => {
		const m = new RangeMatcher(5, 5);
		expect(m.matches(5)).toBe(true);
		expect(m.matches(4)).toBe(false);
	});

	it("inverted range matches nothing", () => {
		const m = new RangeMatcher(10, 1);
		expect(m.matches(1)).toBe(false);
		expect(m.matches(5)).toBe(false);
		expect(m.matches(10)).toBe(false);
	});

	it("returns false for non-number", () => {
		expect(new RangeMatcher(0, 127).matches("64")).toBe(false);
	});
});

describe("matchesOptional", () => {
	it("null matcher accepts every value", () => {
		expect(matchesOptional(null, 0)).toBe(true);
		expect(matchesOptional(null, 127)).toBe(true);
	});

	it("delegates to a present matcher", () => {
		expect(matchesOptional(new ValueMatcher(3), 3)).toBe(true);
		expect(matchesOptional(new ValueMatcher(3), 4)).toBe(false);
		expect(matchesOptional(new AnyMatcher(), 4)).toBe(true);
	});
});

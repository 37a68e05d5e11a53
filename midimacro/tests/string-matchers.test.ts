import { describe, expect, it } from "vitest";
import { AnyMatcher } from "../src/any-matcher.ts";
import {
	ContainsMatcher,
	ExactMatcher,
	MatcherError,
	PrefixMatcher,
	RegexMatcher,
	SuffixMatcher,
	describeStringMatcher,
} from "../src/string-matchers.ts";

describe("ExactMatcher", () => {
	it("matches exact string", () => {
		expect(new ExactMatcher("firefox").matches("firefox")).toBe(true);
	});

	it("is case-sensitive by default", () => {
		expect(new ExactMatcher("firefox").matches("Firefox")).toBe(false);
	});

	it("supports ignore_case", () => {
		const m = new ExactMatcher("Firefox", true);
		expect(m.matches("FIREFOX")).toBe(true);
		expect(m.matches("firefox")).toBe(true);
	});

	it("returns false for non-string", () => {
		expect(new ExactMatcher("42").matches(42)).toBe(false);
		expect(new ExactMatcher("42").matches(null)).toBe(false);
	});

	it("rejects partial match", () => {
		expect(new ExactMatcher("code").matches("code-insiders")).toBe(false);
	});

	it("empty pattern matches only the empty string", () => {
		const m = new ExactMatcher("");
		expect(m.matches("")).toBe(true);
		expect(m.matches("a")).toBe(false);
	});
});

describe("PrefixMatcher", () => {
	it("matches prefix", () => {
		expect(new PrefixMatcher("Mozilla").matches("Mozilla Firefox")).toBe(true);
	});

	it("rejects non-match", () => {
		expect(new PrefixMatcher("Mozilla").matches("Chromium")).toBe(false);
	});

	it("supports ignore_case", () => {
		expect(new PrefixMatcher("MOZ", true).matches("mozilla")).toBe(true);
	});
});

describe("SuffixMatcher", () => {
	it("matches suffix", () => {
		expect(new SuffixMatcher("- Visual Studio Code").matches("main.ts - Visual Studio Code")).toBe(
			true,
		);
	});

	it("rejects non-match", () => {
		expect(new SuffixMatcher(".ts").matches("main.rs")).toBe(false);
	});

	it("supports ignore_case", () => {
		expect(new SuffixMatcher(".TS", true).matches("main.ts")).toBe(true);
	});
});

describe("ContainsMatcher", () => {
	it("matches substring", () => {
		expect(new ContainsMatcher("Terminal").matches("gnome-Terminal-server")).toBe(true);
	});

	it("rejects non-match", () => {
		expect(new ContainsMatcher("Terminal").matches("konsole")).toBe(false);
	});

	it("supports ignore_case", () => {
		expect(new ContainsMatcher("terminal", true).matches("gnome-Terminal-server")).toBe(true);
	});
});

describe("RegexMatcher", () => {
	it("searches anywhere in the string", () => {
		expect(new RegexMatcher("[0-9]+").matches("tab 12")).toBe(true);
	});

	it("respects anchors", () => {
		const m = new RegexMatcher("^code$");
		expect(m.matches("code")).toBe(true);
		expect(m.matches("vscode")).toBe(false);
	});

	it("supports ignore_case", () => {
		expect(new RegexMatcher("^firefox", true).matches("Firefox Nightly")).toBe(true);
		expect(new RegexMatcher("^firefox").matches("Firefox Nightly")).toBe(false);
	});

	it("returns false for non-string", () => {
		expect(new RegexMatcher(".*").matches(7)).toBe(false);
	});

	it("rejects backreferences with MatcherError", () => {
		expect(() => new RegexMatcher("(a)\\1")).toThrow(MatcherError);
	});

	it("rejects unbalanced groups", () => {
		expect(() => new RegexMatcher("(abc")).toThrow(/invalid regex pattern "\(abc"/);
	});
});

describe("AnyMatcher", () => {
	it("accepts every candidate", () => {
		const m = new AnyMatcher();
		expect(m.matches("")).toBe(true);
		expect(m.matches("anything")).toBe(true);
		expect(m.matches(0)).toBe(true);
		expect(m.matches(null)).toBe(true);
	});
});

describe("describeStringMatcher", () => {
	it("names each kind with its pattern", () => {
		expect(describeStringMatcher(new ExactMatcher("firefox"))).toBe('equals "firefox"');
		expect(describeStringMatcher(new PrefixMatcher("Mozilla"))).toBe('starts_with "Mozilla"');
		expect(describeStringMatcher(new SuffixMatcher(" - Code"))).toBe('ends_with " - Code"');
		expect(describeStringMatcher(new RegexMatcher("^term"))).toBe('regex "^term"');
		expect(describeStringMatcher(new AnyMatcher())).toBe("any");
	});

	it("keeps the pattern as written under ignore_case", () => {
		expect(describeStringMatcher(new ContainsMatcher("FireFox", true))).toBe(
			'contains "FireFox" (ignore case)',
		);
	});
});

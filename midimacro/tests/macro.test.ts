import { describe, expect, it } from "vitest";
import { enterText, keySequence } from "../src/actions.ts";
import { MidiEventMatcher } from "../src/events.ts";
import { Macro, MacroBuildError, MacroBuilder } from "../src/macro.ts";
import { ValueMatcher } from "../src/number-matchers.ts";
import { midiPrecondition } from "../src/preconditions.ts";
import { Scope } from "../src/scope.ts";
import { type State, StateSnapshot } from "../src/state.ts";
import { ExactMatcher } from "../src/string-matchers.ts";
import { controlChange, noteOn } from "../src/testing.ts";

const cc7 = new MidiEventMatcher("control_change", { control: new ValueMatcher(7) });
const noteC = new MidiEventMatcher("note_on", { key: new ValueMatcher(60) });

describe("MacroBuilder", () => {
	it("builds a macro with defaults", () => {
		const macro = MacroBuilder.fromEventMatcher(cc7).build();
		expect(macro).toBeInstanceOf(Macro);
		expect(macro.name).toBeNull();
		expect(macro.matchEvents).toEqual([cc7]);
		expect(macro.requiredPreconditions).toBeNull();
		expect(macro.scope).toBeNull();
		expect(macro.actions).toEqual([]);
	});

	it("setters chain", () => {
		const scope = new Scope(new ExactMatcher("firefox"));
		const macro = new MacroBuilder()
			.setName("volume")
			.addEventMatcher(cc7)
			.addEventMatcher(noteC)
			.setScope(scope)
			.addAction(keySequence("ctrl+c"))
			.addAction(enterText("hi"))
			.build();
		expect(macro.name).toBe("volume");
		expect(macro.matchEvents).toHaveLength(2);
		expect(macro.scope).toBe(scope);
		expect(macro.actions).toEqual([keySequence("ctrl+c"), enterText("hi")]);
	});

	it("addPrecondition accumulates", () => {
		const held = midiPrecondition({ kind: "note_held", channel: null, key: null });
		const macro = MacroBuilder.fromEventMatchers([cc7])
			.addPrecondition(held)
			.addPrecondition(held)
			.build();
		expect(macro.requiredPreconditions).toHaveLength(2);
	});

	it("refuses to build without event matchers", () => {
		expect(() => new MacroBuilder().setName("empty").build()).toThrow(MacroBuildError);
		expect(() => new MacroBuilder().build()).toThrow(/has no event matchers/);
	});

	it("is consumed by build()", () => {
		const builder = MacroBuilder.fromEventMatcher(cc7);
		builder.build();
		expect(() => builder.build()).toThrow(MacroBuildError);
		expect(() => builder.setName("again")).toThrow(/already consumed/);
	});

	it("later builder changes do not reach the built macro", () => {
		const matchers = [cc7];
		const macro = MacroBuilder.fromEventMatchers(matchers).build();
		matchers.push(noteC);
		expect(macro.matchEvents).toHaveLength(1);
	});

	it("built macros are frozen", () => {
		const macro = MacroBuilder.fromEventMatcher(cc7).addAction(keySequence("a")).build();
		expect(Object.isFrozen(macro)).toBe(true);
		expect(Object.isFrozen(macro.actions)).toBe(true);
	});
});

describe("Macro", () => {
	it("copies the lists it is constructed from", () => {
		const matchers = [cc7];
		const held = midiPrecondition({ kind: "note_held", channel: null, key: null });
		const preconditions = [held];
		const actions = [keySequence("ctrl+c")];
		const macro = new Macro("copy", matchers, preconditions, null, actions);

		matchers.pop();
		preconditions.pop();
		actions.push(keySequence("ctrl+v"));

		expect(macro.matchEvents).toEqual([cc7]);
		expect(macro.requiredPreconditions).toEqual([held]);
		expect(macro.actions).toEqual([keySequence("ctrl+c")]);
		expect(Object.isFrozen(macro.matchEvents)).toBe(true);
		expect(Object.isFrozen(macro.requiredPreconditions)).toBe(true);
		const pressed = StateSnapshot.INITIAL.withEvent(noteOn(1, 60));
		expect(macro.evaluate(controlChange(1, 7, 1), pressed)).toEqual([keySequence("ctrl+c")]);
	});

	it("refuses an empty matcher list", () => {
		expect(() => new Macro("never", [], null, null, [])).toThrow(
			'macro "never" has no event matchers and can never fire',
		);
	});
});

describe("Macro.evaluate", () => {
	const actions = [keySequence("ctrl+c")];

	it("returns actions when an event matcher matches", () => {
		const macro = MacroBuilder.fromEventMatchers([noteC, cc7]).setActions(actions).build();
		expect(macro.evaluate(controlChange(1, 7, 10), StateSnapshot.INITIAL)).toEqual(actions);
	});

	it("returns null when no event matcher matches", () => {
		const macro = MacroBuilder.fromEventMatcher(cc7).setActions(actions).build();
		expect(macro.evaluate(noteOn(1, 61), StateSnapshot.INITIAL)).toBeNull();
	});

	it("returns null outside its scope", () => {
		const macro = MacroBuilder.fromEventMatcher(cc7)
			.setScope(new Scope(new ExactMatcher("firefox")))
			.build();
		const state = StateSnapshot.INITIAL.withFocus({ windowClass: "code", windowName: "" });
		expect(macro.evaluate(controlChange(1, 7, 10), state)).toBeNull();
	});

	it("returns null when a precondition fails", () => {
		const macro = MacroBuilder.fromEventMatcher(cc7)
			.addPrecondition(
				midiPrecondition({ kind: "note_held", channel: null, key: new ValueMatcher(36) }),
			)
			.build();
		expect(macro.evaluate(controlChange(1, 7, 10), StateSnapshot.INITIAL)).toBeNull();
		const held = StateSnapshot.INITIAL.withEvent(noteOn(10, 36));
		expect(macro.evaluate(controlChange(1, 7, 10), held)).toEqual([]);
	});

	it("checks scope, then preconditions, then events", () => {
		const calls: string[] = [];
		const state: State = {
			matchesScope: () => {
				calls.push("scope");
				return true;
			},
			matches: () => {
				calls.push("precondition");
				return true;
			},
		};
		const macro = MacroBuilder.fromEventMatcher({
			matches: () => {
				calls.push("event");
				return true;
			},
		})
			.addPrecondition(midiPrecondition({ kind: "program", channel: null, program: null }))
			.build();
		macro.evaluate(noteOn(1, 1), state);
		expect(calls).toEqual(["scope", "precondition", "event"]);
	});

	it("stops at the first failing gate", () => {
		const calls: string[] = [];
		const state: State = {
			matchesScope: () => {
				calls.push("scope");
				return false;
			},
			matches: () => {
				calls.push("precondition");
				return true;
			},
		};
		const macro = MacroBuilder.fromEventMatcher({
			matches: () => {
				calls.push("event");
				return true;
			},
		}).build();
		expect(macro.evaluate(noteOn(1, 1), state)).toBeNull();
		expect(calls).toEqual(["scope"]);
	});

	it("is idempotent for the same event and state", () => {
		const macro = MacroBuilder.fromEventMatcher(cc7).setActions(actions).build();
		const event = controlChange(1, 7, 10);
		expect(macro.evaluate(event, StateSnapshot.INITIAL)).toEqual(
			macro.evaluate(event, StateSnapshot.INITIAL),
		);
	});
});

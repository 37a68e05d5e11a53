/**
 * Evaluate benchmarks.
 *
 * Measures the per-event hot path: event matching, scope and precondition
 * gates, first-match-wins scanning and scaling with the number of macros.
 *
 * Run: cd midimacro && npm run bench
 */

import { bench, run, summary } from "mitata";

import {
	ContainsMatcher,
	type Macro,
	MacroBuilder,
	MidiEventMatcher,
	RangeMatcher,
	RuleEngine,
	Scope,
	StateSnapshot,
	ValueMatcher,
	keySequence,
	midiPrecondition,
} from "../src/index.ts";
import { controlChange, noteOn } from "../src/testing.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

function noteMacro(key: number): Macro {
	return MacroBuilder.fromEventMatcher(new MidiEventMatcher("note_on", { key: new ValueMatcher(key) }))
		.addAction(keySequence(`F${(key % 12) + 1}`))
		.build();
}

function makeMacros(n: number): RuleEngine {
	const macros: Macro[] = [];
	for (let i = 0; i < n; i++) macros.push(noteMacro(i));
	return new RuleEngine(macros);
}

const state = StateSnapshot.INITIAL.withFocus({
	windowClass: "firefox",
	windowName: "Inbox - Mozilla Firefox",
}).withEvent(noteOn(10, 36));

// ── Core scenarios ───────────────────────────────────────────────────────────

summary(() => {
	const engine = new RuleEngine([
		MacroBuilder.fromEventMatcher(
			new MidiEventMatcher("control_change", {
				control: new ValueMatcher(7),
				value: new RangeMatcher(0, 63),
			}),
		)
			.addAction(keySequence("ctrl+shift+t"))
			.build(),
	]);
	const hit = controlChange(1, 7, 40);
	const miss = controlChange(1, 7, 100);

	bench("cc_range_hit", () => engine.evaluate(hit, state));
	bench("cc_range_miss", () => engine.evaluate(miss, state));
});

summary(() => {
	const gated = new RuleEngine([
		MacroBuilder.fromEventMatcher(new MidiEventMatcher("note_on"))
			.setScope(new Scope(new ContainsMatcher("firefox", true)))
			.addPrecondition(
				midiPrecondition({ kind: "note_held", channel: new ValueMatcher(10), key: new ValueMatcher(36) }),
			)
			.build(),
	]);
	const event = noteOn(1, 60);

	bench("scope_and_precondition_hit", () => gated.evaluate(event, state));
	bench("scope_and_precondition_miss", () => gated.evaluate(event, StateSnapshot.INITIAL));
});

// ── Scaling ──────────────────────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 50, 100]) {
		const engine = makeMacros(n);
		const last = noteOn(1, n - 1);
		bench(`macro_count_${n}_last_match`, () => engine.evaluate(last, state));
	}
});

summary(() => {
	for (const n of [10, 100]) {
		const engine = makeMacros(n);
		const miss = noteOn(1, 127);
		bench(`macro_count_${n}_miss`, () => engine.evaluate(miss, state));
	}
});

// ── State recording ──────────────────────────────────────────────────────────

summary(() => {
	const cc = controlChange(1, 7, 40);
	bench("record_control_change", () => state.withEvent(cc));
});

await run();

import type { Action } from "./actions.ts";
import type { FocusTracker, KeyboardAdapter, ProcessSpawner } from "./adapters/types.ts";
import type { Config } from "./config/types.ts";
import type { Event, EventMatcher } from "./events.ts";
import { type Logger, getLogger } from "./logger.ts";
import type { Macro } from "./macro.ts";
import { formatMidiMessage } from "./midi/message.ts";
import { ActionRunner } from "./runner.ts";
import { type State, StateStore } from "./state.ts";
import { assertNever } from "./types.ts";

/** The macro that fired and the actions it owns. */
export interface MacroHit {
	readonly macro: Macro;
	readonly actions: readonly Action[];
}

/**
 * Ordered rule set with first-match-wins semantics: macros are evaluated in
 * declaration order and the first one that fires is the only one that does.
 */
export class RuleEngine {
	readonly macros: readonly Macro[];

	constructor(macros: readonly Macro[]) {
		this.macros = Object.freeze([...macros]);
		Object.freeze(this);
	}

	/** Evaluate in order, return first match. No match is not an error. */
	evaluate(event: Event, state: State): MacroHit | null {
		for (const macro of this.macros) {
			const actions = macro.evaluate(event, state);
			if (actions !== null) return { macro, actions };
		}
		return null;
	}
}

/** The outside world a MacroPad built from a Config acts on. */
export interface MacroPadAdapters {
	keyboard: KeyboardAdapter;
	spawner: ProcessSpawner;
	focusTracker: FocusTracker | null;
}

export interface MacroPadOptions {
	engine: RuleEngine;
	store: StateStore;
	runner: ActionRunner;
	stopEvent?: EventMatcher | null;
	logger?: Logger;
}

/**
 * The event loop: one event is evaluated and its actions run to completion
 * before the next is taken from the queue.
 */
export class MacroPad {
	private readonly engine: RuleEngine;
	private readonly store: StateStore;
	private readonly runner: ActionRunner;
	private readonly stopEvent: EventMatcher | null;
	private readonly log: Logger;

	constructor(options: MacroPadOptions) {
		this.engine = options.engine;
		this.store = options.store;
		this.runner = options.runner;
		this.stopEvent = options.stopEvent ?? null;
		this.log = options.logger ?? getLogger("engine");
	}

	/** Wire a resolved Config to its adapters. */
	static fromConfig(config: Config, adapters: MacroPadAdapters, logger?: Logger): MacroPad {
		return new MacroPad({
			engine: new RuleEngine(config.macros),
			store: new StateStore(adapters.focusTracker),
			runner: new ActionRunner({
				keyboard: adapters.keyboard,
				spawner: adapters.spawner,
				keyDelayUs: config.settings.keyDelayUs,
				logger,
			}),
			stopEvent: config.settings.stopEvent,
			logger,
		});
	}

	/**
	 * Evaluate one event against a single state snapshot, run the winning
	 * actions, then record the event into the state store.
	 */
	async dispatch(event: Event): Promise<MacroHit | null> {
		await this.store.refreshFocus();
		const state = this.store.current();
		const hit = this.engine.evaluate(event, state);

		if (hit === null) {
			this.log.debug({ event: describeEvent(event) }, "no macro matched");
		} else {
			this.log.info(
				{ event: describeEvent(event), actions: hit.actions.length },
				hit.macro.name === null
					? "executing macro (no name given)"
					: `executing macro "${hit.macro.name}"`,
			);
			await this.runner.runAll(hit.actions);
		}

		this.store.record(event);
		return hit;
	}

	/**
	 * Dispatch every event from `events` in arrival order. When the stop
	 * matcher fires, `stop` is called (it should end the event source); the
	 * events already queued are still dispatched.
	 */
	async run(events: AsyncIterable<Event>, stop: () => void): Promise<number> {
		let dispatched = 0;
		let stopping = false;
		for await (const event of events) {
			await this.dispatch(event);
			dispatched++;
			if (!stopping && this.stopEvent?.matches(event, this.store.current())) {
				this.log.info({ event: describeEvent(event) }, "stop event received");
				stopping = true;
				stop();
			}
		}
		return dispatched;
	}
}

function describeEvent(event: Event): string {
	switch (event.type) {
		case "midi":
			return formatMidiMessage(event.message);
		default:
			return assertNever(event.type);
	}
}

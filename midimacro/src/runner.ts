import type { Action } from "./actions.ts";
import type { KeyboardAdapter, ProcessSpawner } from "./adapters/types.ts";
import { type Logger, getLogger } from "./logger.ts";
import { assertNever } from "./types.ts";

/** Delay between synthesized keystrokes, in microseconds. */
export const DEFAULT_KEY_DELAY_US = 100;

export interface ActionRunnerOptions {
	keyboard: KeyboardAdapter;
	spawner: ProcessSpawner;
	keyDelayUs?: number;
	logger?: Logger;
}

/**
 * Executes actions against the keyboard and process adapters.
 *
 * Best effort: a failing action is logged and reported through the return
 * value, never thrown, so the rest of a combination and the engine go on.
 */
export class ActionRunner {
	private readonly keyboard: KeyboardAdapter;
	private readonly spawner: ProcessSpawner;
	private readonly keyDelayUs: number;
	private readonly log: Logger;

	constructor(options: ActionRunnerOptions) {
		this.keyboard = options.keyboard;
		this.spawner = options.spawner;
		this.keyDelayUs = options.keyDelayUs ?? DEFAULT_KEY_DELAY_US;
		this.log = options.logger ?? getLogger("runner");
	}

	/** Run actions in order. Resolves true when every one succeeded. */
	async runAll(actions: readonly Action[]): Promise<boolean> {
		let ok = true;
		for (const action of actions) {
			if (!(await this.run(action))) ok = false;
		}
		return ok;
	}

	/** Run one action. Resolves false if it (or any child) failed. */
	async run(action: Action): Promise<boolean> {
		switch (action.type) {
			case "key_sequence":
				return this.attempt(action.type, async () => {
					for (let i = 0; i < action.count; i++) {
						await this.keyboard.sendKeySequence(action.sequence, this.keyDelayUs);
					}
				});
			case "enter_text":
				return this.attempt(action.type, async () => {
					for (let i = 0; i < action.count; i++) {
						await this.keyboard.sendText(action.text, this.keyDelayUs);
					}
				});
			case "shell":
				return this.attempt(action.type, async () => {
					const env = Object.fromEntries(action.envVars ?? []);
					const code = await this.spawner.run(action.command, action.args ?? [], env);
					if (code !== 0) {
						throw new Error(`${action.command} exited with status ${code ?? "signal"}`);
					}
				});
			case "combination":
				return this.runAll(action.actions);
			default:
				return assertNever(action);
		}
	}

	private async attempt(type: Action["type"], fn: () => Promise<void>): Promise<boolean> {
		try {
			await fn();
			return true;
		} catch (e) {
			this.log.warn({ action: type, err: e }, "action failed");
			return false;
		}
	}
}

/**
 * Actions run when a macro fires. Pure data: the ActionRunner decides how
 * each variant reaches the keyboard or the process table.
 */

/**
 * Press a key combination `count` times, in xdotool keysym notation:
 * "ctrl+shift+t" presses Ctrl, Shift and T together.
 */
export type KeySequenceAction = {
	readonly type: "key_sequence";
	readonly sequence: string;
	readonly count: number;
};

/** Type `text` literally, `count` times. */
export type EnterTextAction = {
	readonly type: "enter_text";
	readonly text: string;
	readonly count: number;
};

/** Run a program. `command` is the executable path, without arguments. */
export type ShellAction = {
	readonly type: "shell";
	readonly command: string;
	readonly args: readonly string[] | null;
	readonly envVars: readonly (readonly [string, string])[] | null;
};

/** Run each child in order. A failing child does not stop the rest. */
export type CombinationAction = {
	readonly type: "combination";
	readonly actions: readonly Action[];
};

export type Action = KeySequenceAction | EnterTextAction | ShellAction | CombinationAction;

export type ActionType = Action["type"];

function checkCount(count: number): number {
	if (!Number.isSafeInteger(count) || count < 0) {
		throw new RangeError(`count should be an integer of 0 or more, found ${count}`);
	}
	return count;
}

export function keySequence(sequence: string, count = 1): KeySequenceAction {
	return Object.freeze({ type: "key_sequence", sequence, count: checkCount(count) });
}

export function enterText(text: string, count = 1): EnterTextAction {
	return Object.freeze({ type: "enter_text", text, count: checkCount(count) });
}

export function shell(
	command: string,
	args: readonly string[] | null = null,
	envVars: readonly (readonly [string, string])[] | null = null,
): ShellAction {
	return Object.freeze({
		type: "shell",
		command,
		args: args === null ? null : Object.freeze([...args]),
		envVars:
			envVars === null
				? null
				: Object.freeze(envVars.map(([key, value]) => Object.freeze([key, value] as const))),
	});
}

export function combination(actions: readonly Action[]): CombinationAction {
	return Object.freeze({ type: "combination", actions: Object.freeze([...actions]) });
}

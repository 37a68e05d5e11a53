/**
 * X11 keyboard synthesis and focus lookup through the `xdotool` binary.
 *
 * Requirements:
 *   - xdotool on PATH
 *   - a running X server (DISPLAY set)
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { type Logger, getLogger } from "../logger.ts";
import { type FocusedWindow, NO_FOCUSED_WINDOW } from "../scope.ts";
import { AdapterError, type FocusTracker, type KeyboardAdapter } from "./types.ts";

const execFileAsync = promisify(execFile);

/** Runs a program with arguments and resolves with its stdout. */
export type Exec = (file: string, args: readonly string[]) => Promise<string>;

const XDOTOOL_TIMEOUT_MS = 10_000;

export const execXdotool: Exec = async (file, args) => {
	const { stdout } = await execFileAsync(file, [...args], { timeout: XDOTOOL_TIMEOUT_MS });
	return stdout;
};

/** xdotool takes its inter-key delay in whole milliseconds. */
export function delayMs(delayUs: number): string {
	return String(Math.round(delayUs / 1000));
}

/** Fail with AdapterError when `xdotool` cannot be run at all. */
async function probe(exec: Exec, adapter: string): Promise<void> {
	try {
		await exec("xdotool", ["version"]);
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new AdapterError(adapter, `xdotool is not available (${reason})`);
	}
}

export class XdotoolKeyboard implements KeyboardAdapter {
	constructor(private readonly exec: Exec = execXdotool) {}

	static async create(exec: Exec = execXdotool): Promise<XdotoolKeyboard> {
		await probe(exec, "keyboard");
		return new XdotoolKeyboard(exec);
	}

	/** `sequence` is xdotool key syntax: whitespace-separated combos such as "ctrl+s Return". */
	async sendKeySequence(sequence: string, delayUs: number): Promise<void> {
		const keys = sequence.split(/\s+/).filter((k) => k !== "");
		if (keys.length === 0) return;
		await this.exec("xdotool", ["key", "--delay", delayMs(delayUs), ...keys]);
	}

	async sendText(text: string, delayUs: number): Promise<void> {
		if (text === "") return;
		await this.exec("xdotool", ["type", "--delay", delayMs(delayUs), "--", text]);
	}
}

/**
 * Reads the class and title of the active window. When there is none (or
 * the lookup fails) it reports NO_FOCUSED_WINDOW, which only global macros
 * and empty-string matchers accept.
 */
export class XdotoolFocusTracker implements FocusTracker {
	private readonly log: Logger;

	constructor(
		private readonly exec: Exec = execXdotool,
		logger?: Logger,
	) {
		this.log = logger ?? getLogger("focus");
	}

	static async create(exec: Exec = execXdotool): Promise<XdotoolFocusTracker> {
		await probe(exec, "focus tracker");
		return new XdotoolFocusTracker(exec);
	}

	async focusedWindow(): Promise<FocusedWindow> {
		try {
			const windowClass = await this.exec("xdotool", ["getactivewindow", "getwindowclassname"]);
			const windowName = await this.exec("xdotool", ["getactivewindow", "getwindowname"]);
			return { windowClass: windowClass.trim(), windowName: windowName.trim() };
		} catch (err) {
			this.log.debug({ err }, "no focused window");
			return NO_FOCUSED_WINDOW;
		}
	}
}

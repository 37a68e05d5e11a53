/**
 * In-process stand-ins for the adapters, plus message shorthands, for tests
 * and examples. Nothing here touches a device, a display or the process table.
 */

import type { DeviceListener, FocusTracker, KeyboardAdapter, ProcessSpawner } from "./adapters/types.ts";
import { type Event, type MidiEvent, midiEvent } from "./events.ts";
import type { MidiMessage } from "./midi/message.ts";
import type { EventQueue } from "./queue.ts";
import { type FocusedWindow, NO_FOCUSED_WINDOW } from "./scope.ts";

export type KeyboardCall =
	| { readonly kind: "key"; readonly sequence: string; readonly delayUs: number }
	| { readonly kind: "text"; readonly text: string; readonly delayUs: number };

/** Records every call. Rejects calls whose sequence or text is listed in `failOn`. */
export class RecordingKeyboard implements KeyboardAdapter {
	readonly calls: KeyboardCall[] = [];

	constructor(private readonly failOn: readonly string[] = []) {}

	async sendKeySequence(sequence: string, delayUs: number): Promise<void> {
		this.calls.push({ kind: "key", sequence, delayUs });
		if (this.failOn.includes(sequence)) throw new Error(`key sequence "${sequence}" failed`);
	}

	async sendText(text: string, delayUs: number): Promise<void> {
		this.calls.push({ kind: "text", text, delayUs });
		if (this.failOn.includes(text)) throw new Error(`text "${text}" failed`);
	}

	/** Calls as short strings: "key:ctrl+c", "text:hello". */
	get log(): string[] {
		return this.calls.map((c) => (c.kind === "key" ? `key:${c.sequence}` : `text:${c.text}`));
	}
}

export interface SpawnCall {
	readonly command: string;
	readonly args: readonly string[];
	readonly env: Readonly<Record<string, string>>;
}

/**
 * Records spawns and answers with the exit code configured for the command
 * (0 when none is). An Error in place of a code rejects, as a failed spawn does.
 */
export class FakeSpawner implements ProcessSpawner {
	readonly calls: SpawnCall[] = [];

	constructor(private readonly outcomes: Readonly<Record<string, number | null | Error>> = {}) {}

	async run(
		command: string,
		args: readonly string[],
		env: Readonly<Record<string, string>>,
	): Promise<number | null> {
		this.calls.push({ command, args: [...args], env: { ...env } });
		const outcome = this.outcomes[command];
		if (outcome instanceof Error) throw outcome;
		return outcome === undefined ? 0 : outcome;
	}
}

/** Reports whatever window was last set. */
export class StaticFocusTracker implements FocusTracker {
	constructor(public window: FocusedWindow = NO_FOCUSED_WINDOW) {}

	focus(windowClass: string, windowName = ""): void {
		this.window = { windowClass, windowName };
	}

	async focusedWindow(): Promise<FocusedWindow> {
		return this.window;
	}
}

/**
 * Replays a fixed list of messages into the queue on start() and then
 * leaves it open, like a device that went quiet. stop() closes it.
 */
export class ScriptedListener implements DeviceListener {
	private queue: EventQueue<Event> | null = null;
	stopped = false;

	constructor(
		private readonly messages: readonly MidiMessage[],
		private readonly portName = "Scripted Port",
	) {}

	async listPorts(): Promise<string[]> {
		return [this.portName];
	}

	async start(_portPattern: string, queue: EventQueue<Event>): Promise<string> {
		this.queue = queue;
		for (const message of this.messages) queue.push(midiEvent(message));
		return this.portName;
	}

	stop(): void {
		this.stopped = true;
		this.queue?.close();
	}
}

// =====================================================================
// Message shorthands
// =====================================================================

export function noteOn(channel: number, key: number, velocity = 100): MidiEvent {
	return midiEvent({ type: "note_on", channel, key, velocity });
}

export function noteOff(channel: number, key: number, velocity = 0): MidiEvent {
	return midiEvent({ type: "note_off", channel, key, velocity });
}

export function controlChange(channel: number, control: number, value: number): MidiEvent {
	return midiEvent({ type: "control_change", channel, control, value });
}

export function programChange(channel: number, program: number): MidiEvent {
	return midiEvent({ type: "program_change", channel, program });
}

export function pitchBend(channel: number, value: number): MidiEvent {
	return midiEvent({ type: "pitch_bend", channel, value });
}

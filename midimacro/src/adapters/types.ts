/**
 * Contracts between the engine and the outside world. The core only calls
 * through these; the implementations live beside this file.
 */

import type { Event } from "../events.ts";
import type { EventQueue } from "../queue.ts";
import type { FocusedWindow } from "../scope.ts";

/** An adapter could not be initialized. Fatal before the event loop starts. */
export class AdapterError extends Error {
	constructor(
		readonly adapter: string,
		message: string,
	) {
		super(`${adapter}: ${message}`);
		this.name = "AdapterError";
	}
}

/** Produces device events onto the engine's queue. */
export interface DeviceListener {
	listPorts(): Promise<string[]>;
	/** Start listening on the first port whose name contains `portPattern`. Returns the port name. */
	start(portPattern: string, queue: EventQueue<Event>): Promise<string>;
	/** Stop listening and close the queue handed to start(). */
	stop(): void;
}

export interface FocusTracker {
	focusedWindow(): Promise<FocusedWindow>;
}

export interface KeyboardAdapter {
	sendKeySequence(sequence: string, delayUs: number): Promise<void>;
	sendText(text: string, delayUs: number): Promise<void>;
}

/** Runs a program to completion and reports its exit code (`null` if killed by a signal). */
export interface ProcessSpawner {
	run(
		command: string,
		args: readonly string[],
		env: Readonly<Record<string, string>>,
	): Promise<number | null>;
}

/**
 * MIDI input from ALSA rawmidi device files (/dev/snd/midiC<card>D<device>).
 *
 * Port names come from /proc/asound/card<card>/midi<device>, whose first
 * line is the device name the driver reports.
 */

import { createReadStream, type ReadStream } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { type Event, midiEvent } from "../events.ts";
import { type Logger, getLogger } from "../logger.ts";
import { MidiStreamParser } from "../midi/parser.ts";
import type { EventQueue } from "../queue.ts";
import { AdapterError, type DeviceListener } from "./types.ts";

const DEVICE_FILE = /^midiC(\d+)D(\d+)$/;

export interface RawMidiListenerOptions {
	devDir?: string;
	procDir?: string;
	logger?: Logger;
}

interface RawMidiPort {
	readonly name: string;
	readonly path: string;
}

export class RawMidiListener implements DeviceListener {
	private readonly devDir: string;
	private readonly procDir: string;
	private readonly log: Logger;
	private stream: ReadStream | null = null;
	private queue: EventQueue<Event> | null = null;

	constructor(options: RawMidiListenerOptions = {}) {
		this.devDir = options.devDir ?? "/dev/snd";
		this.procDir = options.procDir ?? "/proc/asound";
		this.log = options.logger ?? getLogger("rawmidi");
	}

	async listPorts(): Promise<string[]> {
		return (await this.ports()).map((p) => p.name);
	}

	async start(portPattern: string, queue: EventQueue<Event>): Promise<string> {
		if (this.stream !== null) throw new AdapterError("rawmidi", "listener is already started");

		const ports = await this.ports();
		const port = ports.find((p) => p.name.includes(portPattern));
		if (port === undefined) {
			const available = ports.length === 0 ? "none" : ports.map((p) => p.name).join(", ");
			throw new AdapterError(
				"rawmidi",
				`no MIDI port matches "${portPattern}" (available: ${available})`,
			);
		}

		const parser = new MidiStreamParser((message) => queue.push(midiEvent(message)));
		const stream = createReadStream(port.path);
		await new Promise<void>((resolve, reject) => {
			stream.once("open", () => resolve());
			stream.once("error", (err) =>
				reject(new AdapterError("rawmidi", `cannot open ${port.path}: ${err.message}`)),
			);
		});

		stream.on("data", (chunk) => {
			if (typeof chunk !== "string") parser.feed(chunk);
		});
		stream.on("error", (err) => {
			this.log.error({ err, port: port.name }, "MIDI input failed");
			queue.close();
		});
		stream.on("close", () => queue.close());

		this.stream = stream;
		this.queue = queue;
		this.log.info({ port: port.name, path: port.path }, "listening");
		return port.name;
	}

	stop(): void {
		this.stream?.destroy();
		this.queue?.close();
		this.stream = null;
		this.queue = null;
	}

	private async ports(): Promise<RawMidiPort[]> {
		let entries: string[];
		try {
			entries = await readdir(this.devDir);
		} catch (err) {
			this.log.debug({ err, dir: this.devDir }, "no rawmidi devices");
			return [];
		}

		const ports: RawMidiPort[] = [];
		for (const entry of entries.sort()) {
			const match = DEVICE_FILE.exec(entry);
			if (match === null) continue;
			const [, card, device] = match;
			const name = await this.deviceName(card ?? "", device ?? "");
			ports.push({
				name: name === null ? entry : `${name} (${entry})`,
				path: join(this.devDir, entry),
			});
		}
		return ports;
	}

	private async deviceName(card: string, device: string): Promise<string | null> {
		try {
			const info = await readFile(join(this.procDir, `card${card}`, `midi${device}`), "utf8");
			const first = info.split("\n")[0]?.trim() ?? "";
			return first === "" ? null : first;
		} catch {
			return null;
		}
	}
}

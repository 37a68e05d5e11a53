/**
 * MIDI byte stream parser.
 *
 * Turns raw bytes read from a rawmidi device into channel voice messages.
 * Handles running status, ignores system real-time bytes wherever they
 * appear, and skips system exclusive / system common messages.
 *
 * A note-on with velocity 0 is reported as a note-off, which is what it
 * means on the wire.
 */

import type { MidiMessage } from "./message.ts";

type MessageListener = (message: MidiMessage) => void;

const SYSEX_START = 0xf0;
const SYSEX_END = 0xf7;
const REALTIME_MIN = 0xf8;

export class MidiStreamParser {
	private runningStatus = 0;
	private data: number[] = [];
	private inSysex = false;

	constructor(private readonly onMessage: MessageListener) {}

	/** Feed bytes in chunks of any size; partial messages carry over between calls. */
	feed(bytes: Uint8Array): void {
		for (const byte of bytes) {
			this.processByte(byte);
		}
	}

	reset(): void {
		this.runningStatus = 0;
		this.data = [];
		this.inSysex = false;
	}

	private processByte(byte: number): void {
		if (byte >= REALTIME_MIN) return;

		if (byte >= SYSEX_START) {
			// System common and sysex cancel running status
			this.inSysex = byte === SYSEX_START;
			this.runningStatus = 0;
			this.data = [];
			return;
		}

		if (byte & 0x80) {
			this.inSysex = false;
			this.runningStatus = byte;
			this.data = [];
			return;
		}

		if (this.inSysex || this.runningStatus === 0) return;

		this.data.push(byte);
		if (this.data.length === dataLength(this.runningStatus)) {
			const message = decode(this.runningStatus, this.data);
			this.data = [];
			this.onMessage(message);
		}
	}
}

function dataLength(status: number): number {
	const kind = status & 0xf0;
	return kind === 0xc0 || kind === 0xd0 ? 1 : 2;
}

function decode(status: number, data: readonly number[]): MidiMessage {
	const channel = (status & 0x0f) + 1;
	const [first = 0, second = 0] = data;

	switch (status & 0xf0) {
		case 0x80:
			return { type: "note_off", channel, key: first, velocity: second };
		case 0x90:
			if (second === 0) return { type: "note_off", channel, key: first, velocity: 0 };
			return { type: "note_on", channel, key: first, velocity: second };
		case 0xa0:
			return { type: "poly_aftertouch", channel, key: first, value: second };
		case 0xb0:
			return { type: "control_change", channel, control: first, value: second };
		case 0xc0:
			return { type: "program_change", channel, program: first };
		case 0xd0:
			return { type: "channel_aftertouch", channel, value: first };
		default:
			return { type: "pitch_bend", channel, value: first | (second << 7) };
	}
}

/** Parse one complete message; `null` if the bytes do not form exactly one. */
export function parseMidiMessage(bytes: Uint8Array): MidiMessage | null {
	const messages: MidiMessage[] = [];
	const parser = new MidiStreamParser((m) => messages.push(m));
	parser.feed(bytes);
	const [message] = messages;
	return messages.length === 1 && message !== undefined ? message : null;
}

#!/usr/bin/env tsx
/**
 * midimacro - run MIDI-triggered keyboard, text and shell macros.
 *
 *   midimacro list-ports
 *   midimacro check [--config midimacro.yml]
 *   midimacro listen [--config midimacro.yml] [--port nanoKONTROL]
 */

import { Command, InvalidArgumentError } from "commander";
import { ChildProcessSpawner } from "./adapters/process.ts";
import { RawMidiListener } from "./adapters/rawmidi.ts";
import { AdapterError } from "./adapters/types.ts";
import { XdotoolFocusTracker, XdotoolKeyboard } from "./adapters/xdotool.ts";
import { ConfigError, loadConfig } from "./config/index.ts";
import { MacroPad } from "./engine.ts";
import type { Event } from "./events.ts";
import { type LogLevel, type Logger, initLogger, isLogLevel } from "./logger.ts";
import { EventQueue } from "./queue.ts";

const DEFAULT_CONFIG_PATH = "midimacro.yml";

interface CommonOptions {
	logLevel?: LogLevel;
}

interface ConfigOptions extends CommonOptions {
	config: string;
}

interface ListenOptions extends ConfigOptions {
	port?: string;
}

function parseLogLevel(value: string): LogLevel {
	if (!isLogLevel(value)) throw new InvalidArgumentError(`unknown log level "${value}"`);
	return value;
}

function withCommonOptions(command: Command): Command {
	return command.option(
		"-l, --log-level <level>",
		"trace, debug, info, warn, error, fatal or silent (default: $LOG_LEVEL or info)",
		parseLogLevel,
	);
}

function withConfigOption(command: Command): Command {
	return withCommonOptions(command).option(
		"-c, --config <path>",
		"configuration file (YAML or JSON)",
		process.env.MIDIMACRO_CONFIG ?? DEFAULT_CONFIG_PATH,
	);
}

/** Report expected failures and set the exit status; anything else propagates. */
async function report(log: Logger, task: () => Promise<void>): Promise<void> {
	try {
		await task();
	} catch (err) {
		if (err instanceof ConfigError || err instanceof AdapterError) {
			log.error(err.message);
			process.exitCode = 1;
			return;
		}
		throw err;
	}
}

const listPortsCommand = withCommonOptions(new Command("list-ports"))
	.description("List the MIDI input ports that can be listened on")
	.action(async (options: CommonOptions) => {
		const log = initLogger({ level: options.logLevel });
		await report(log, async () => {
			const ports = await new RawMidiListener({ logger: log }).listPorts();
			if (ports.length === 0) {
				log.warn("no MIDI input ports found");
				return;
			}
			for (const port of ports) process.stdout.write(`${port}\n`);
		});
	});

const checkCommand = withConfigOption(new Command("check"))
	.description("Validate a configuration file without listening")
	.action(async (options: ConfigOptions) => {
		const log = initLogger({ level: options.logLevel });
		await report(log, async () => {
			const config = await loadConfig(options.config);
			log.info(
				{ macros: config.macros.length, midiPort: config.settings.midiPort },
				`${options.config} is valid`,
			);
			config.macros.forEach((macro, i) => {
				log.debug(
					{ scope: macro.scope?.describe() ?? "global", actions: macro.actions.length },
					macro.name === null ? `macro ${i}` : `macro "${macro.name}"`,
				);
			});
		});
	});

const listenCommand = withConfigOption(new Command("listen"))
	.description("Listen on a MIDI port and run matching macros")
	.option("-p, --port <pattern>", "substring of the MIDI port name (overrides global.midi_port)")
	.action(async (options: ListenOptions) => {
		const log = initLogger({ level: options.logLevel });
		await report(log, async () => {
			const config = await loadConfig(options.config);
			log.info({ macros: config.macros.length }, `loaded ${options.config}`);

			const pad = MacroPad.fromConfig(config, {
				keyboard: await XdotoolKeyboard.create(),
				spawner: new ChildProcessSpawner(),
				focusTracker: await XdotoolFocusTracker.create(),
			});

			const listener = new RawMidiListener({ logger: log });
			const queue = new EventQueue<Event>();
			const port = await listener.start(options.port ?? config.settings.midiPort ?? "", queue);
			log.info({ port }, "waiting for MIDI events (Ctrl+C to stop)");

			const stop = () => listener.stop();
			process.once("SIGINT", stop);
			process.once("SIGTERM", stop);
			try {
				const dispatched = await pad.run(queue, stop);
				log.info({ dispatched }, "stopped");
			} finally {
				process.off("SIGINT", stop);
				process.off("SIGTERM", stop);
			}
		});
	});

const program = new Command("midimacro")
	.description("Map MIDI controller events to keyboard, text and shell macros")
	.version("0.1.0")
	.addCommand(listPortsCommand)
	.addCommand(checkCommand)
	.addCommand(listenCommand);

await program.parseAsync(process.argv);

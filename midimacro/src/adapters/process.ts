import { spawn } from "node:child_process";
import type { ProcessSpawner } from "./types.ts";

/**
 * Spawns commands directly (no shell), with `env` layered over the current
 * environment. Output is discarded.
 */
export class ChildProcessSpawner implements ProcessSpawner {
	run(
		command: string,
		args: readonly string[],
		env: Readonly<Record<string, string>>,
	): Promise<number | null> {
		return new Promise((resolve, reject) => {
			const child = spawn(command, [...args], {
				env: { ...process.env, ...env },
				stdio: "ignore",
			});
			child.once("error", reject);
			child.once("close", (code) => resolve(code));
		});
	}
}

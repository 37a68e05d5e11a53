/**
 * Config-path benchmarks: YAML text → RawValue → Config.
 *
 * Run: cd midimacro && npm run bench
 */

import { bench, run, summary } from "mitata";

import { parseConfigText, resolveConfig } from "../src/index.ts";

function macroYaml(i: number): string {
	return `  - name: pad ${i}
    matching_events:
      - type: midi
        data: { message_type: note_on, channel: 10, key: ${i % 128} }
    scope:
      window_class: { regex: "^(firefox|code)$" }
    actions:
      - type: key_sequence
        data: { sequence: ctrl+${i % 10}, count: 1 }
`;
}

function configYaml(macros: number): string {
	const lines = ["version: 1", "macros:"];
	for (let i = 0; i < macros; i++) lines.push(macroYaml(i));
	return lines.join("\n");
}

summary(() => {
	for (const n of [1, 20, 100]) {
		const text = configYaml(n);
		const { document, version } = parseConfigText(text, "bench.yml");

		bench(`parse_${n}_macros`, () => parseConfigText(text, "bench.yml"));
		bench(`resolve_${n}_macros`, () => resolveConfig(document, version));
	}
});

await run();

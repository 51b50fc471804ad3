import { buildCommand } from "@stricli/core";

export const DEFAULT_INTERVAL_MINUTES = 15;

function parsePositiveInt(input: string): number {
	const value = Number(input);
	if (!Number.isInteger(value) || value <= 0) {
		throw new SyntaxError(`Expected a positive integer, got '${input}'`);
	}
	return value;
}

export const runCommand = buildCommand({
	loader: async () => {
		const { run } = await import("./impl.js");
		return run;
	},
	parameters: {
		flags: {
			config: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Path to the YAML configuration file (default: ./config.yaml)",
			},
			watch: {
				kind: "boolean",
				optional: true,
				brief: "Keep running, starting a new pass every interval",
			},
			intervalMinutes: {
				kind: "parsed",
				parse: parsePositiveInt,
				optional: true,
				brief: `Minutes between passes in watch mode (default: ${DEFAULT_INTERVAL_MINUTES})`,
			},
		},
	},
	docs: {
		brief: "Process new videos in the input playlist",
		fullDescription:
			"Lists the input playlist, skips videos that already have a Notion record, then fetches a transcript, summarizes, records and archives each new video in playlist order. Use --watch to repeat every --interval-minutes.",
	},
});

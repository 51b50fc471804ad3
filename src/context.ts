import type { CommandContext } from "@stricli/core";

// Stricli only needs a process-like object; commands also set exit codes on it.
export interface LocalContext extends CommandContext {
	readonly process: NodeJS.Process;
}

export function buildContext(process: NodeJS.Process): LocalContext {
	return { process };
}

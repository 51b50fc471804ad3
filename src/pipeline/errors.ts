export type FatalStage = "list-members" | "list-records";

/** Raised when the run cannot determine its work; nothing has been touched yet. */
export class FatalRunError extends Error {
	readonly stage: FatalStage;

	constructor(stage: FatalStage, cause: unknown) {
		super(`${describeStage(stage)}: ${errorMessage(cause)}`, { cause });
		this.name = "FatalRunError";
		this.stage = stage;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function describeStage(stage: FatalStage): string {
	switch (stage) {
		case "list-members":
			return "Failed to list input playlist";
		case "list-records":
			return "Failed to list processed videos";
	}
}

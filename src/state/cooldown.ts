import { z } from "zod";
import { BaseState } from "./base-state.js";

const MAX_ERROR_LENGTH = 500;

const cooldownStateSchema = z.object({
	consecutiveFailures: z.number().int().nonnegative().default(0),
	lastFailureAt: z.string().datetime().optional(),
	lastError: z.string().optional(),
	nextRetryAfter: z.string().datetime().optional(),
	backoffMinutes: z.number().int().nonnegative().optional(),
});

type CooldownStateData = z.infer<typeof cooldownStateSchema>;

export type CooldownCheck =
	| { skip: false; consecutiveFailures: number }
	| { skip: true; consecutiveFailures: number; nextRetryAfter: Date };

export type FailureRecord = {
	consecutiveFailures: number;
	backoffMinutes: number;
	nextRetryAfter: Date;
};

/** Wait before the next run after `failures` failed runs in a row. */
export function getBackoffMinutes(
	failures: number,
	schedule: readonly number[],
): number {
	if (failures <= 0 || schedule.length === 0) return 0;
	const index = Math.min(failures - 1, schedule.length - 1);
	return schedule[index] ?? 0;
}

/** Consecutive failed runs and when the next attempt is allowed. */
export class CooldownState extends BaseState<CooldownStateData> {
	protected schema = cooldownStateSchema;

	constructor(
		filePath: string,
		private readonly schedule: readonly number[],
	) {
		super(filePath);
	}

	check(now: Date = new Date()): CooldownCheck {
		const { consecutiveFailures, nextRetryAfter } = this.current;
		if (consecutiveFailures === 0 || !nextRetryAfter) {
			return { skip: false, consecutiveFailures };
		}

		const retryAt = new Date(nextRetryAfter);
		if (now < retryAt) {
			return { skip: true, consecutiveFailures, nextRetryAfter: retryAt };
		}
		return { skip: false, consecutiveFailures };
	}

	async recordFailure(
		message: string,
		now: Date = new Date(),
	): Promise<FailureRecord> {
		const consecutiveFailures = this.current.consecutiveFailures + 1;
		const backoffMinutes = getBackoffMinutes(
			consecutiveFailures,
			this.schedule,
		);
		const nextRetryAfter = new Date(now.getTime() + backoffMinutes * 60_000);

		this.state = {
			consecutiveFailures,
			lastFailureAt: now.toISOString(),
			lastError: message.slice(0, MAX_ERROR_LENGTH),
			nextRetryAfter: nextRetryAfter.toISOString(),
			backoffMinutes,
		};
		await this.save();

		return { consecutiveFailures, backoffMinutes, nextRetryAfter };
	}

	/** Clears the ledger and returns how many failures were pending. */
	async recordSuccess(): Promise<number> {
		const previous = this.current.consecutiveFailures;
		this.state = this.getDefaultState();
		await this.save();
		return previous;
	}

	protected getDefaultState(): CooldownStateData {
		return { consecutiveFailures: 0 };
	}
}

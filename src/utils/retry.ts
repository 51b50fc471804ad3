import { setTimeout as sleep } from "node:timers/promises";

export type RetryOptions = {
	/** Extra attempts after the first one */
	retries: number;
	backoffMs: number;
	isTransient: (error: unknown) => boolean;
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

/**
 * Runs `fn`, retrying transient failures with exponential backoff.
 * Non-transient errors and the last transient one are rethrown as is.
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	let attempt = 0;
	while (true) {
		try {
			return await fn();
		} catch (error) {
			if (attempt >= options.retries || !options.isTransient(error)) {
				throw error;
			}
			const delayMs = options.backoffMs * 2 ** attempt;
			attempt++;
			options.onRetry?.(error, attempt, delayMs);
			if (delayMs > 0) {
				await sleep(delayMs);
			}
		}
	}
}

/** Status codes worth another attempt: throttling and server-side failures. */
export function isTransientStatus(status: number): boolean {
	return status === 408 || status === 429 || status >= 500;
}

/** Timeouts and connection failures raised by `fetch`. */
export function isNetworkError(error: unknown): boolean {
	if (!(error instanceof Error)) return false;
	return (
		error.name === "AbortError" ||
		error.name === "TimeoutError" ||
		(error instanceof TypeError && error.message === "fetch failed")
	);
}

export class HttpStatusError extends Error {
	readonly status: number;

	constructor(status: number, message: string) {
		super(message);
		this.name = "HttpStatusError";
		this.status = status;
	}
}

export function isTransientHttpError(error: unknown): boolean {
	if (error instanceof HttpStatusError) {
		return isTransientStatus(error.status);
	}
	return isNetworkError(error);
}

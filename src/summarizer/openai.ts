import OpenAI, { APIConnectionError, APIError } from "openai";
import { z } from "zod";
import type { RequestsConfig, SummarizerConfig } from "../config.js";
import { errorMessage } from "../pipeline/errors.js";
import type {
	SummarizationEngine,
	Summary,
	SummaryRequest,
	SummaryResult,
} from "../pipeline/types.js";
import { log } from "../ui/logger.js";
import { isTransientStatus, withRetry } from "../utils/retry.js";
import {
	getSummaryPrompt,
	SUMMARY_SYSTEM_PROMPT,
	truncateTranscript,
} from "./prompt.js";

export type JsonCompletionRequest = {
	model: string;
	system: string;
	user: string;
};

/** Returns the raw message content of a JSON-mode completion. */
export type CompleteJson = (
	request: JsonCompletionRequest,
) => Promise<string | null>;

const MIN_KEY_POINTS = 3;
const MAX_KEY_POINTS = 5;

const summaryResponseSchema = z.object({
	summary: z.string().trim().min(1),
	key_points: z
		.array(z.string().trim().min(1))
		.min(MIN_KEY_POINTS)
		.transform((points) => points.slice(0, MAX_KEY_POINTS)),
	target_audience: z.string().trim().optional().default(""),
});

export function createOpenAiCompleter(
	config: SummarizerConfig,
	requests: RequestsConfig,
): CompleteJson {
	// Retries are ours, see withRetry below.
	const client = new OpenAI({
		apiKey: config.apiKey,
		timeout: requests.timeoutMs,
		maxRetries: 0,
	});

	return async ({ model, system, user }) => {
		const response = await client.chat.completions.create({
			model,
			response_format: { type: "json_object" },
			messages: [
				{ role: "system", content: system },
				{ role: "user", content: user },
			],
		});
		return response.choices[0]?.message?.content ?? null;
	};
}

export function isTransientOpenAiError(error: unknown): boolean {
	if (error instanceof APIConnectionError) return true;
	if (error instanceof APIError && typeof error.status === "number") {
		return isTransientStatus(error.status);
	}
	return false;
}

export function parseSummaryResponse(content: string): SummaryResult {
	let json: unknown;
	try {
		json = JSON.parse(stripCodeFence(content));
	} catch {
		return { ok: false, reason: "response is not valid JSON" };
	}

	const parsed = summaryResponseSchema.safeParse(json);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue?.path.join(".") || "response";
		return {
			ok: false,
			reason: `malformed summary (${where}: ${issue?.message ?? "invalid"})`,
		};
	}

	const summary: Summary = {
		synopsis: parsed.data.summary,
		keyPoints: parsed.data.key_points,
		audience: parsed.data.target_audience,
	};
	return { ok: true, summary };
}

export class OpenAiSummarizer implements SummarizationEngine {
	constructor(
		private readonly complete: CompleteJson,
		private readonly config: SummarizerConfig,
		private readonly requests: RequestsConfig,
	) {}

	async summarize(request: SummaryRequest): Promise<SummaryResult> {
		const prompt = getSummaryPrompt({
			...request,
			transcript: truncateTranscript(
				request.transcript,
				this.config.maxTranscriptChars,
			),
		});

		let content: string | null;
		try {
			content = await withRetry(
				() =>
					this.complete({
						model: this.config.model,
						system: SUMMARY_SYSTEM_PROMPT,
						user: prompt,
					}),
				{
					retries: this.requests.retries,
					backoffMs: this.requests.backoffMs,
					isTransient: isTransientOpenAiError,
					onRetry: (error, attempt, delayMs) =>
						log.warn(
							`Summary request failed, retrying (${errorMessage(error)})`,
							{ stage: "summarize" },
							{ attempt, delay_ms: delayMs },
						),
				},
			);
		} catch (error) {
			return { ok: false, reason: `OpenAI API error: ${errorMessage(error)}` };
		}

		if (!content) {
			return { ok: false, reason: "empty response from model" };
		}

		return parseSummaryResponse(content);
	}
}

function stripCodeFence(content: string): string {
	const trimmed = content.trim();
	const match = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/.exec(trimmed);
	return match?.[1] ?? trimmed;
}

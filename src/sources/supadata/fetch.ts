import { z } from "zod";
import type { RequestsConfig, TranscriptsConfig } from "../../config.js";
import { errorMessage } from "../../pipeline/errors.js";
import type {
	TranscriptResult,
	TranscriptSource,
} from "../../pipeline/types.js";
import { buildVideoUrl } from "../../pipeline/types.js";
import { log } from "../../ui/logger.js";
import {
	HttpStatusError,
	isTransientHttpError,
	withRetry,
} from "../../utils/retry.js";

const segmentSchema = z.union([
	z.string(),
	z.object({ text: z.string().optional().default("") }),
]);

const transcriptResponseSchema = z.object({
	content: z.union([z.string(), z.array(segmentSchema)]).optional(),
	segments: z.array(segmentSchema).optional(),
});

type Segment = z.infer<typeof segmentSchema>;

const errorBodySchema = z
	.object({
		error: z.string().optional(),
		message: z.string().optional(),
	})
	.passthrough();

export class SupadataTranscriptSource implements TranscriptSource {
	constructor(
		private readonly config: TranscriptsConfig,
		private readonly requests: RequestsConfig,
	) {}

	async fetchTranscript(videoId: string): Promise<TranscriptResult> {
		try {
			return await withRetry(() => this.request(videoId), {
				retries: this.requests.retries,
				backoffMs: this.requests.backoffMs,
				isTransient: isTransientHttpError,
				onRetry: (error, attempt, delayMs) =>
					log.warn(
						`Transcript request failed, retrying (${errorMessage(error)})`,
						{ videoId, stage: "transcript" },
						{ attempt, delay_ms: delayMs },
					),
			});
		} catch (error) {
			return { kind: "unavailable", reason: errorMessage(error) };
		}
	}

	private async request(videoId: string): Promise<TranscriptResult> {
		const params = new URLSearchParams({
			url: buildVideoUrl(videoId),
			// Existing captions only; generated transcripts are billed heavily.
			mode: "native",
		});
		const response = await fetch(
			`${this.config.baseUrl}/youtube/transcript?${params}`,
			{
				headers: { "x-api-key": this.config.apiKey },
				signal: AbortSignal.timeout(this.requests.timeoutMs),
			},
		);

		if (response.status === 404) {
			return { kind: "unavailable", reason: "no captions" };
		}

		if (!response.ok) {
			const detail = await readErrorDetail(response);
			if (
				response.status === 400 ||
				response.status === 401 ||
				response.status === 403
			) {
				return { kind: "unavailable", reason: detail };
			}
			throw new HttpStatusError(response.status, detail);
		}

		const body = transcriptResponseSchema.safeParse(await response.json());
		if (!body.success) {
			return { kind: "unavailable", reason: "unexpected transcript payload" };
		}

		const text =
			extractText(body.data.content) || extractText(body.data.segments);
		if (!text) {
			return { kind: "unavailable", reason: "empty transcript" };
		}
		return { kind: "available", text };
	}
}

function extractText(content: string | Segment[] | undefined): string {
	if (content === undefined) return "";
	if (typeof content === "string") return content.trim();
	return content
		.map((segment) => (typeof segment === "string" ? segment : segment.text))
		.filter((part) => part.trim().length > 0)
		.join(" ")
		.trim();
}

async function readErrorDetail(response: Response): Promise<string> {
	const prefix = `Supadata API error ${response.status}`;
	const text = await response.text();
	if (!text) return prefix;
	try {
		const body = errorBodySchema.safeParse(JSON.parse(text));
		const message = body.success
			? (body.data.message ?? body.data.error)
			: undefined;
		return message ? `${prefix}: ${message}` : `${prefix}: ${text}`;
	} catch {
		return `${prefix}: ${text}`;
	}
}

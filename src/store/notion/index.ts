import type { RequestsConfig } from "../../config.js";
import { errorMessage } from "../../pipeline/errors.js";
import type { ProcessedRecord, RecordStore } from "../../pipeline/types.js";
import { log } from "../../ui/logger.js";
import { withRetry } from "../../utils/retry.js";
import {
	isTransientNotionError,
	type NotionApi,
	type NotionPageProperties,
} from "./client.js";

/** Notion caps each rich text block at 2000 characters. */
export const RICH_TEXT_LIMIT = 2000;

export const PROPERTIES = {
	title: "Title",
	videoId: "Video ID",
	url: "URL",
	channel: "Channel",
	summary: "Summary",
	keyPoints: "Key Points",
	audience: "Target Audience",
	duration: "Duration",
	added: "Added",
	status: "Status",
} as const;

export function truncateText(
	text: string,
	maxLength = RICH_TEXT_LIMIT,
): string {
	if (text.length <= maxLength) return text;
	return `${text.slice(0, maxLength - 3)}...`;
}

function richText(content: string) {
	return { rich_text: [{ text: { content: truncateText(content) } }] };
}

export function buildPageProperties(
	record: ProcessedRecord,
): NotionPageProperties {
	const summary =
		record.status === "Error"
			? `Error: ${record.error ?? "unknown error"}`
			: (record.synopsis ?? "");
	const keyPoints = (record.keyPoints ?? [])
		.map((point) => `• ${point}`)
		.join("\n");

	return {
		[PROPERTIES.title]: {
			title: [{ text: { content: truncateText(record.title || "Untitled") } }],
		},
		[PROPERTIES.videoId]: richText(record.videoId),
		[PROPERTIES.url]: { url: record.url },
		[PROPERTIES.channel]: richText(record.channel),
		[PROPERTIES.summary]: richText(summary),
		[PROPERTIES.keyPoints]: richText(keyPoints),
		[PROPERTIES.audience]: richText(record.audience ?? ""),
		[PROPERTIES.duration]: richText(record.durationLabel),
		[PROPERTIES.added]: {
			date: { start: record.processedAt.toISOString().slice(0, 10) },
		},
		[PROPERTIES.status]: { select: { name: record.status } },
	};
}

export class NotionRecordStore implements RecordStore {
	constructor(
		private readonly api: NotionApi,
		private readonly databaseId: string,
		private readonly requests: RequestsConfig,
	) {}

	async listProcessedIds(): Promise<Set<string>> {
		const ids = new Set<string>();
		let cursor: string | undefined;

		do {
			const page = await this.call("query database", () =>
				this.api.queryVideoIds(this.databaseId, PROPERTIES.videoId, cursor),
			);
			for (const id of page.videoIds) ids.add(id);
			cursor = page.nextCursor ?? undefined;
		} while (cursor);

		log.debug("Loaded processed video ids", undefined, { count: ids.size });
		return ids;
	}

	async writeRecord(record: ProcessedRecord): Promise<void> {
		const pageId = await this.call("create page", () =>
			this.api.createPage(this.databaseId, buildPageProperties(record)),
		);
		log.debug("Created Notion page", { videoId: record.videoId }, {
			page: pageId,
			status: record.status,
		});
	}

	private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		return withRetry(fn, {
			retries: this.requests.retries,
			backoffMs: this.requests.backoffMs,
			isTransient: isTransientNotionError,
			onRetry: (error, attempt, delayMs) =>
				log.warn(
					`Notion ${operation} failed, retrying (${errorMessage(error)})`,
					{ stage: "notion" },
					{ attempt, delay_ms: delayMs },
				),
		});
	}
}

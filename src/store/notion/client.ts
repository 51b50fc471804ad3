import {
	APIErrorCode,
	Client,
	ClientErrorCode,
	isFullPage,
	isNotionClientError,
} from "@notionhq/client";
import type { NotionConfig, RequestsConfig } from "../../config.js";
import { isNetworkError } from "../../utils/retry.js";

export type NotionPageProperties = Parameters<
	Client["pages"]["create"]
>[0]["properties"];

export type VideoIdPage = {
	videoIds: string[];
	nextCursor: string | null;
};

/** The two database calls the record store makes. */
export interface NotionApi {
	queryVideoIds(
		databaseId: string,
		propertyName: string,
		cursor?: string,
	): Promise<VideoIdPage>;
	createPage(
		databaseId: string,
		properties: NotionPageProperties,
	): Promise<string>;
}

const QUERY_PAGE_SIZE = 100;

const TRANSIENT_CODES = new Set<string>([
	APIErrorCode.RateLimited,
	APIErrorCode.InternalServerError,
	APIErrorCode.ServiceUnavailable,
	APIErrorCode.ConflictError,
	ClientErrorCode.RequestTimeout,
]);

export function createNotionApi(
	config: NotionConfig,
	requests: RequestsConfig,
): NotionApi {
	const client = new Client({
		auth: config.apiKey,
		timeoutMs: requests.timeoutMs,
	});

	return {
		async queryVideoIds(databaseId, propertyName, cursor) {
			const response = await client.databases.query({
				database_id: databaseId,
				start_cursor: cursor,
				page_size: QUERY_PAGE_SIZE,
			});

			const videoIds: string[] = [];
			for (const page of response.results) {
				if (!isFullPage(page)) continue;
				const property = page.properties[propertyName];
				if (property?.type !== "rich_text") continue;
				const videoId = property.rich_text
					.map((part) => part.plain_text)
					.join("")
					.trim();
				if (videoId) videoIds.push(videoId);
			}

			return {
				videoIds,
				nextCursor: response.has_more ? response.next_cursor : null,
			};
		},

		async createPage(databaseId, properties) {
			const response = await client.pages.create({
				parent: { database_id: databaseId },
				properties,
			});
			return response.id;
		},
	};
}

export function isTransientNotionError(error: unknown): boolean {
	if (isNotionClientError(error)) {
		return TRANSIENT_CODES.has(error.code);
	}
	return isNetworkError(error);
}

import { google } from "googleapis";
import type { RequestsConfig, YouTubeConfig } from "../../config.js";
import { isTransientStatus } from "../../utils/retry.js";
import type { PlaylistEntry, PlaylistPage, YouTubeApi } from "./types.js";

const PAGE_SIZE = 50;

const TRANSIENT_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ETIMEDOUT",
	"EAI_AGAIN",
	"ECONNABORTED",
]);

export function createYouTubeApi(
	config: YouTubeConfig,
	requests: RequestsConfig,
): YouTubeApi {
	// The refresh token is exchanged for an access token on the first call.
	const auth = new google.auth.OAuth2(config.clientId, config.clientSecret);
	auth.setCredentials({ refresh_token: config.refreshToken });

	const youtube = google.youtube({
		version: "v3",
		auth,
		timeout: requests.timeoutMs,
	});

	return {
		async listPlaylistItems(playlistId, pageToken) {
			const response = await youtube.playlistItems.list({
				part: ["snippet", "contentDetails"],
				playlistId,
				maxResults: PAGE_SIZE,
				pageToken,
			});

			const entries: PlaylistEntry[] = [];
			for (const item of response.data.items ?? []) {
				const videoId = item.contentDetails?.videoId;
				if (!item.id || !videoId) continue;
				entries.push({
					itemId: item.id,
					videoId,
					title: item.snippet?.title ?? "",
					channel: item.snippet?.videoOwnerChannelTitle ?? "",
				});
			}

			return {
				entries,
				nextPageToken: response.data.nextPageToken ?? null,
			} satisfies PlaylistPage;
		},

		async listVideoDurations(videoIds) {
			const durations = new Map<string, string>();
			for (let i = 0; i < videoIds.length; i += PAGE_SIZE) {
				const response = await youtube.videos.list({
					part: ["contentDetails"],
					id: videoIds.slice(i, i + PAGE_SIZE),
					maxResults: PAGE_SIZE,
				});
				for (const video of response.data.items ?? []) {
					const duration = video.contentDetails?.duration;
					if (video.id && duration) {
						durations.set(video.id, duration);
					}
				}
			}
			return durations;
		},

		async insertPlaylistItem(playlistId, videoId) {
			const response = await youtube.playlistItems.insert({
				part: ["snippet"],
				requestBody: {
					snippet: {
						playlistId,
						resourceId: { kind: "youtube#video", videoId },
					},
				},
			});
			return response.data.id ?? "";
		},

		async deletePlaylistItem(itemId) {
			await youtube.playlistItems.delete({ id: itemId });
		},
	};
}

/** HTTP status of a googleapis (gaxios) error, if it carries one. */
export function readErrorStatus(error: unknown): number | undefined {
	if (typeof error !== "object" || error === null) return undefined;
	if ("status" in error && typeof error.status === "number") {
		return error.status;
	}
	if (
		"response" in error &&
		typeof error.response === "object" &&
		error.response !== null &&
		"status" in error.response &&
		typeof error.response.status === "number"
	) {
		return error.response.status;
	}
	return undefined;
}

export function isTransientYouTubeError(error: unknown): boolean {
	const status = readErrorStatus(error);
	if (status !== undefined) return isTransientStatus(status);
	if (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		typeof error.code === "string"
	) {
		return TRANSIENT_CODES.has(error.code);
	}
	return false;
}

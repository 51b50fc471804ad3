import type { RequestsConfig } from "../../config.js";
import { errorMessage } from "../../pipeline/errors.js";
import type { PlaylistAdapter, VideoRef } from "../../pipeline/types.js";
import { log } from "../../ui/logger.js";
import { withRetry } from "../../utils/retry.js";
import { formatDuration } from "./duration.js";
import { isTransientYouTubeError, readErrorStatus } from "./fetch.js";
import type { PlaylistEntry, YouTubeApi } from "./types.js";

export type PlaylistIds = {
	inputPlaylistId: string;
	outputPlaylistId: string;
};

export class YouTubePlaylist implements PlaylistAdapter {
	constructor(
		private readonly api: YouTubeApi,
		private readonly playlists: PlaylistIds,
		private readonly requests: RequestsConfig,
	) {}

	async listMembers(): Promise<VideoRef[]> {
		const entries = await this.listEntries(this.playlists.inputPlaylistId);

		const videoIds = [...new Set(entries.map((entry) => entry.videoId))];
		let durations = new Map<string, string>();
		if (videoIds.length > 0) {
			try {
				durations = await this.call("list durations", () =>
					this.api.listVideoDurations(videoIds),
				);
			} catch (error) {
				log.warn(`Could not fetch video durations: ${errorMessage(error)}`);
			}
		}

		return entries.map((entry) => ({
			id: entry.videoId,
			title: entry.title,
			channel: entry.channel,
			durationLabel: formatDuration(durations.get(entry.videoId)),
			playlistItemId: entry.itemId,
		}));
	}

	/**
	 * Adds the video to the output playlist, then removes it from the input one.
	 * A failure between the two leaves the video in both playlists.
	 */
	async move(video: VideoRef): Promise<void> {
		const itemId = video.playlistItemId ?? (await this.findItemId(video.id));
		const { outputPlaylistId } = this.playlists;

		// An insert that timed out may still have been applied.
		let attempted = false;
		await this.call("add to output playlist", async () => {
			if (attempted && (await this.contains(outputPlaylistId, video.id))) {
				log.debug("Already in output playlist", { videoId: video.id });
				return;
			}
			attempted = true;
			await this.api.insertPlaylistItem(outputPlaylistId, video.id);
		});

		try {
			await this.call("remove from input playlist", () =>
				this.api.deletePlaylistItem(itemId),
			);
		} catch (error) {
			if (readErrorStatus(error) === 404) {
				log.debug("Playlist item already removed", { videoId: video.id });
				return;
			}
			throw error;
		}
	}

	private async listEntries(playlistId: string): Promise<PlaylistEntry[]> {
		const entries: PlaylistEntry[] = [];
		let pageToken: string | undefined;

		do {
			const page = await this.call("list playlist items", () =>
				this.api.listPlaylistItems(playlistId, pageToken),
			);
			entries.push(...page.entries);
			pageToken = page.nextPageToken ?? undefined;
		} while (pageToken);

		return entries;
	}

	private async contains(
		playlistId: string,
		videoId: string,
	): Promise<boolean> {
		let pageToken: string | undefined;
		do {
			const page = await this.api.listPlaylistItems(playlistId, pageToken);
			if (page.entries.some((entry) => entry.videoId === videoId)) {
				return true;
			}
			pageToken = page.nextPageToken ?? undefined;
		} while (pageToken);
		return false;
	}

	private async findItemId(videoId: string): Promise<string> {
		const entries = await this.listEntries(this.playlists.inputPlaylistId);
		const entry = entries.find((candidate) => candidate.videoId === videoId);
		if (!entry) {
			throw new Error(
				`Video ${videoId} not found in playlist ${this.playlists.inputPlaylistId}`,
			);
		}
		return entry.itemId;
	}

	private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		return withRetry(fn, {
			retries: this.requests.retries,
			backoffMs: this.requests.backoffMs,
			isTransient: isTransientYouTubeError,
			onRetry: (error, attempt, delayMs) =>
				log.warn(
					`YouTube ${operation} failed, retrying (${errorMessage(error)})`,
					{ stage: "youtube" },
					{ attempt, delay_ms: delayMs },
				),
		});
	}
}

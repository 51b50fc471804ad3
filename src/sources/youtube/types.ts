export type PlaylistEntry = {
	itemId: string;
	videoId: string;
	title: string;
	channel: string;
};

export type PlaylistPage = {
	entries: PlaylistEntry[];
	nextPageToken: string | null;
};

/** The slice of the YouTube Data API the playlist adapter relies on. */
export interface YouTubeApi {
	listPlaylistItems(
		playlistId: string,
		pageToken?: string,
	): Promise<PlaylistPage>;
	/** ISO 8601 durations keyed by video id; unknown ids are absent */
	listVideoDurations(videoIds: string[]): Promise<Map<string, string>>;
	insertPlaylistItem(playlistId: string, videoId: string): Promise<string>;
	deletePlaylistItem(itemId: string): Promise<void>;
}

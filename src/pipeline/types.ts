export type VideoRef = {
	id: string;
	title: string;
	channel: string;
	durationLabel: string;
	/** Membership handle in the input playlist, used to remove the item */
	playlistItemId?: string;
};

export type TranscriptResult =
	| { kind: "available"; text: string }
	| { kind: "unavailable"; reason: string };

export type Summary = {
	synopsis: string;
	keyPoints: string[];
	audience: string;
};

export type SummaryResult =
	| { ok: true; summary: Summary }
	| { ok: false; reason: string };

export type RecordStatus = "Summarized" | "Error";

export type ProcessedRecord = {
	videoId: string;
	title: string;
	url: string;
	channel: string;
	synopsis: string | null;
	keyPoints: string[] | null;
	audience: string | null;
	durationLabel: string;
	processedAt: Date;
	status: RecordStatus;
	error: string | null;
};

export type VideoErrorKind =
	| "TranscriptUnavailable"
	| "SummarizationFailed"
	| "RecordWriteFailed"
	| "RelocationFailed";

export type VideoOutcome = {
	videoId: string;
	title: string;
	url: string;
	/** Status of the record written for this video, `null` when none was written */
	recordStatus: RecordStatus | null;
	relocated: boolean;
} & (
	| { outcome: "done"; summary: Summary }
	| { outcome: "error"; kind: VideoErrorKind; reason: string }
);

export type FailedOutcome = Extract<VideoOutcome, { outcome: "error" }>;

export type BatchOutcome = {
	startedAt: Date;
	finishedAt: Date;
	totalMembers: number;
	alreadyProcessed: number;
	outcomes: VideoOutcome[];
};

export interface TranscriptSource {
	fetchTranscript(videoId: string): Promise<TranscriptResult>;
}

export type SummaryRequest = {
	title: string;
	channel: string;
	transcript: string;
};

export interface SummarizationEngine {
	summarize(request: SummaryRequest): Promise<SummaryResult>;
}

export interface RecordStore {
	/** Every video id that already has a record, across all pages */
	listProcessedIds(): Promise<Set<string>>;
	/** Throws when the store rejects the record */
	writeRecord(record: ProcessedRecord): Promise<void>;
}

export interface PlaylistAdapter {
	listMembers(): Promise<VideoRef[]>;
	/** Moves a video from the input playlist to the output playlist */
	move(video: VideoRef): Promise<void>;
}

export interface Notifier {
	notifyBatch(batch: BatchOutcome): Promise<void>;
	notifyFatal(
		message: string,
		attempt: number,
		nextRetryMinutes: number,
	): Promise<void>;
	notifyRecovery(previousFailures: number): Promise<void>;
}

export type PipelineDeps = {
	playlist: PlaylistAdapter;
	store: RecordStore;
	transcripts: TranscriptSource;
	summarizer: SummarizationEngine;
	notifier?: Notifier;
	now?: () => Date;
};

export function buildVideoUrl(videoId: string): string {
	return `https://www.youtube.com/watch?v=${videoId}`;
}

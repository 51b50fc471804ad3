import { log } from "../ui/logger.js";
import { errorMessage } from "./errors.js";
import type {
	PipelineDeps,
	ProcessedRecord,
	Summary,
	VideoErrorKind,
	VideoOutcome,
	VideoRef,
} from "./types.js";
import { buildVideoUrl } from "./types.js";

type Draft =
	| { status: "Summarized"; summary: Summary }
	| { status: "Error"; kind: VideoErrorKind; reason: string };

/**
 * Drives one video through transcript, summary, record and relocation.
 * Never throws: every failure ends in a typed outcome for this video.
 */
export async function processVideo(
	video: VideoRef,
	deps: PipelineDeps,
): Promise<VideoOutcome> {
	const url = buildVideoUrl(video.id);
	const base = { videoId: video.id, title: video.title, url };
	const ctx = { videoId: video.id };

	const draft = await summarizeVideo(video, deps);

	const now = deps.now ?? (() => new Date());
	const record: ProcessedRecord = {
		videoId: video.id,
		title: video.title,
		url,
		channel: video.channel,
		synopsis: draft.status === "Summarized" ? draft.summary.synopsis : null,
		keyPoints: draft.status === "Summarized" ? draft.summary.keyPoints : null,
		audience: draft.status === "Summarized" ? draft.summary.audience : null,
		durationLabel: video.durationLabel,
		processedAt: now(),
		status: draft.status,
		error: draft.status === "Error" ? draft.reason : null,
	};

	try {
		log.debug("Writing record", { ...ctx, stage: "record" }, {
			status: record.status,
		});
		await deps.store.writeRecord(record);
	} catch (error) {
		return {
			...base,
			outcome: "error",
			kind: "RecordWriteFailed",
			reason: errorMessage(error),
			recordStatus: null,
			relocated: false,
		};
	}

	// Record before move: the record is what marks the video processed.
	try {
		log.debug("Moving to output playlist", { ...ctx, stage: "relocate" });
		await deps.playlist.move(video);
	} catch (error) {
		return {
			...base,
			outcome: "error",
			kind: "RelocationFailed",
			reason: errorMessage(error),
			recordStatus: record.status,
			relocated: false,
		};
	}

	if (draft.status === "Error") {
		return {
			...base,
			outcome: "error",
			kind: draft.kind,
			reason: draft.reason,
			recordStatus: record.status,
			relocated: true,
		};
	}

	return {
		...base,
		outcome: "done",
		summary: draft.summary,
		recordStatus: record.status,
		relocated: true,
	};
}

async function summarizeVideo(
	video: VideoRef,
	deps: PipelineDeps,
): Promise<Draft> {
	const ctx = { videoId: video.id };

	let transcript: string;
	try {
		log.debug("Fetching transcript", { ...ctx, stage: "transcript" });
		const result = await deps.transcripts.fetchTranscript(video.id);
		if (result.kind === "unavailable") {
			log.warn(`No transcript (${result.reason})`, ctx);
			return {
				status: "Error",
				kind: "TranscriptUnavailable",
				reason: `No transcript available: ${result.reason}`,
			};
		}
		transcript = result.text;
	} catch (error) {
		return {
			status: "Error",
			kind: "TranscriptUnavailable",
			reason: `Transcript fetch failed: ${errorMessage(error)}`,
		};
	}

	try {
		log.debug("Summarizing", { ...ctx, stage: "summarize" }, {
			chars: transcript.length,
		});
		const result = await deps.summarizer.summarize({
			title: video.title,
			channel: video.channel,
			transcript,
		});
		if (!result.ok) {
			return {
				status: "Error",
				kind: "SummarizationFailed",
				reason: `Summarization failed: ${result.reason}`,
			};
		}
		return { status: "Summarized", summary: result.summary };
	} catch (error) {
		return {
			status: "Error",
			kind: "SummarizationFailed",
			reason: `Summarization failed: ${errorMessage(error)}`,
		};
	}
}

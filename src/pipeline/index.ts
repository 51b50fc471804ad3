import {
	log,
	logBatchCompleted,
	logMembersFound,
	logVideoResult,
} from "../ui/logger.js";
import { errorMessage, FatalRunError } from "./errors.js";
import { processVideo } from "./process.js";
import type {
	BatchOutcome,
	PipelineDeps,
	VideoOutcome,
	VideoRef,
} from "./types.js";

export interface Pipeline {
	runOnce(): Promise<BatchOutcome>;
}

/**
 * Members of the input playlist without a record, in playlist order.
 * A video listed twice is kept once.
 */
export function selectNewVideos(
	members: VideoRef[],
	processedIds: ReadonlySet<string>,
): VideoRef[] {
	const seen = new Set<string>();
	const fresh: VideoRef[] = [];
	for (const video of members) {
		if (processedIds.has(video.id) || seen.has(video.id)) continue;
		seen.add(video.id);
		fresh.push(video);
	}
	return fresh;
}

export function createPipeline(deps: PipelineDeps): Pipeline {
	const now = deps.now ?? (() => new Date());

	return {
		async runOnce(): Promise<BatchOutcome> {
			const startedAt = now();

			let members: VideoRef[];
			try {
				members = await deps.playlist.listMembers();
			} catch (error) {
				throw new FatalRunError("list-members", error);
			}

			let processedIds: Set<string>;
			try {
				processedIds = await deps.store.listProcessedIds();
			} catch (error) {
				throw new FatalRunError("list-records", error);
			}

			const newVideos = selectNewVideos(members, processedIds);
			const alreadyProcessed = members.filter((v) =>
				processedIds.has(v.id),
			).length;
			logMembersFound(members.length, alreadyProcessed, newVideos.length);

			const outcomes: VideoOutcome[] = [];
			for (const video of newVideos) {
				const result = await processVideo(video, deps);
				logVideoResult(result);
				outcomes.push(result);
			}

			const batch: BatchOutcome = {
				startedAt,
				finishedAt: now(),
				totalMembers: members.length,
				alreadyProcessed,
				outcomes,
			};
			logBatchCompleted(batch);

			if (deps.notifier && outcomes.length > 0) {
				try {
					await deps.notifier.notifyBatch(batch);
				} catch (error) {
					log.warn(`Batch notification failed: ${errorMessage(error)}`);
				}
			}

			return batch;
		},
	};
}

import { setTimeout as sleep } from "node:timers/promises";
import { type Config, loadConfig } from "../../config.js";
import type { LocalContext } from "../../context.js";
import { SlackNotifier } from "../../notify/slack.js";
import { createPipeline, type Pipeline } from "../../pipeline/index.js";
import { errorMessage } from "../../pipeline/errors.js";
import type { Notifier, PipelineDeps } from "../../pipeline/types.js";
import { SupadataTranscriptSource } from "../../sources/supadata/fetch.js";
import { createYouTubeApi } from "../../sources/youtube/fetch.js";
import { YouTubePlaylist } from "../../sources/youtube/index.js";
import { CooldownState } from "../../state/cooldown.js";
import { createNotionApi } from "../../store/notion/client.js";
import { NotionRecordStore } from "../../store/notion/index.js";
import {
	createOpenAiCompleter,
	OpenAiSummarizer,
} from "../../summarizer/openai.js";
import { log } from "../../ui/logger.js";
import { DEFAULT_INTERVAL_MINUTES } from "./command.js";

interface RunCommandFlags {
	readonly config?: string;
	readonly watch?: boolean;
	readonly intervalMinutes?: number;
}

export type PassResult = "skipped" | "ok" | "partial" | "failed";

export function buildPipelineDeps(config: Config): PipelineDeps {
	const { requests } = config;

	const playlist = new YouTubePlaylist(
		createYouTubeApi(config.youtube, requests),
		{
			inputPlaylistId: config.youtube.inputPlaylistId,
			outputPlaylistId: config.youtube.outputPlaylistId,
		},
		requests,
	);
	const store = new NotionRecordStore(
		createNotionApi(config.notion, requests),
		config.notion.databaseId,
		requests,
	);
	const transcripts = new SupadataTranscriptSource(
		config.transcripts,
		requests,
	);
	const summarizer = new OpenAiSummarizer(
		createOpenAiCompleter(config.summarizer, requests),
		config.summarizer,
		requests,
	);

	const webhookUrl = config.notifier.slackWebhookUrl;
	if (!webhookUrl) {
		log.info("Slack webhook not configured, notifications disabled");
	}
	const notifier = webhookUrl
		? new SlackNotifier(webhookUrl, requests)
		: undefined;

	return { playlist, store, transcripts, summarizer, notifier };
}

/**
 * One pass with cooldown bookkeeping: skipped while a backoff is active,
 * a failure when the run is fatal or every video failed, a success otherwise.
 */
export async function runPass(args: {
	pipeline: Pipeline;
	cooldown: CooldownState;
	notifier?: Notifier;
	now?: () => Date;
}): Promise<PassResult> {
	const { pipeline, cooldown, notifier } = args;
	const now = args.now ?? (() => new Date());

	const check = cooldown.check(now());
	if (check.skip) {
		log.info("Skipping run, cooldown active", undefined, {
			failures: check.consecutiveFailures,
			next_retry: check.nextRetryAfter.toISOString(),
		});
		return "skipped";
	}

	const recordFailure = async (message: string): Promise<PassResult> => {
		const failure = await cooldown.recordFailure(message, now());
		log.error(message, undefined, {
			failures: failure.consecutiveFailures,
			backoff_min: failure.backoffMinutes,
		});
		await notifier?.notifyFatal(
			message,
			failure.consecutiveFailures,
			failure.backoffMinutes,
		);
		return "failed";
	};

	let failed: number;
	let total: number;
	try {
		const batch = await pipeline.runOnce();
		total = batch.outcomes.length;
		failed = batch.outcomes.filter((o) => o.outcome === "error").length;
	} catch (error) {
		return recordFailure(errorMessage(error));
	}

	if (total > 0 && failed === total) {
		return recordFailure(`All ${total} video(s) failed to process`);
	}

	const previousFailures = await cooldown.recordSuccess();
	if (previousFailures > 0) {
		log.info(`Recovered after ${previousFailures} failed run(s)`);
		await notifier?.notifyRecovery(previousFailures);
	}

	return failed > 0 ? "partial" : "ok";
}

/** A pass in watch mode: errors are logged so the loop keeps going. */
export async function runWatchedPass(
	args: Parameters<typeof runPass>[0],
): Promise<PassResult> {
	try {
		return await runPass(args);
	} catch (error) {
		log.error(`Pass failed: ${errorMessage(error)}`);
		return "failed";
	}
}

export async function run(
	this: LocalContext,
	flags: RunCommandFlags,
): Promise<void> {
	const config = await loadConfig(flags.config ?? "config.yaml");
	const deps = buildPipelineDeps(config);
	const pipeline = createPipeline(deps);

	const cooldown = new CooldownState(
		config.cooldown.statePath,
		config.cooldown.backoffMinutes,
	);
	await cooldown.load();

	if (!flags.watch) {
		const result = await runPass({
			pipeline,
			cooldown,
			notifier: deps.notifier,
		});
		if (result === "failed" || result === "partial") {
			this.process.exitCode = 1;
		}
		return;
	}

	const intervalMinutes = flags.intervalMinutes ?? DEFAULT_INTERVAL_MINUTES;
	log.info(`Watching, one pass every ${intervalMinutes} min`);
	// Each pass finishes before the next sleep, so passes never overlap.
	while (true) {
		await runWatchedPass({ pipeline, cooldown, notifier: deps.notifier });
		await sleep(intervalMinutes * 60_000);
	}
}

import pc from "picocolors";
import pino from "pino";
import pretty from "pino-pretty";
import type { BatchOutcome, VideoOutcome } from "../pipeline/types.js";

// ── Types ──────────────────────────────────────────────────────────────

export type LogContext = {
	videoId?: string;
	stage?: string;
};

export type LogParams = Record<string, string | number>;

type LogLevel = "debug" | "info" | "warn" | "error";

// ── Sink ───────────────────────────────────────────────────────────────

const stream = pretty({
	colorize: true,
	translateTime: "HH:MM:ss",
	ignore: "pid,hostname",
	messageFormat: "{msg}",
	singleLine: true,
});

export const logger = pino(
	{
		level: process.env.LOG_LEVEL ?? "info",
	},
	stream,
);

// ── Formatting helpers ─────────────────────────────────────────────────

const COL_VIDEO = 13;

function videoTag(videoId?: string): string {
	if (!videoId) return "".padEnd(COL_VIDEO);
	return pc.magenta(`[${videoId}]`.padEnd(COL_VIDEO));
}

function stageTag(stage?: string): string {
	return stage ? `${pc.cyan(stage)} ` : "";
}

function formatParams(params?: LogParams): string {
	if (!params || Object.keys(params).length === 0) return "";
	const pairs = Object.entries(params)
		.map(([k, v]) => `${pc.dim(`${k}:`)} ${pc.dim(pc.cyan(String(v)))}`)
		.join(" ");
	return ` ${pc.dim("[")}${pairs}${pc.dim("]")}`;
}

export function truncateTitle(title: string, max = 120): string {
	const cleaned = title.trim().replace(/\s+/g, " ");
	if (!cleaned) return "(untitled)";
	return cleaned.length > max ? `${cleaned.slice(0, max - 3)}...` : cleaned;
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	return `${(ms / 1000).toFixed(1)}s`;
}

// ── Core write ─────────────────────────────────────────────────────────

function write(
	level: LogLevel,
	message: string,
	context?: LogContext,
	params?: LogParams,
): void {
	const line = `${videoTag(context?.videoId)} ${stageTag(context?.stage)}${message}${formatParams(params)}`;
	logger[level](line);
}

// ── Public API ─────────────────────────────────────────────────────────

export const log = {
	debug(msg: string, ctx?: LogContext, params?: LogParams): void {
		write("debug", msg, ctx, params);
	},
	info(msg: string, ctx?: LogContext, params?: LogParams): void {
		write("info", msg, ctx, params);
	},
	warn(msg: string, ctx?: LogContext, params?: LogParams): void {
		write("warn", msg, ctx, params);
	},
	error(msg: string, ctx?: LogContext, params?: LogParams): void {
		write("error", msg, ctx, params);
	},
};

// ── Run reporting ──────────────────────────────────────────────────────

export function logMembersFound(
	total: number,
	alreadyProcessed: number,
	newCount: number,
): void {
	const newLabel = newCount > 0 ? pc.green(`${newCount} new`) : pc.dim("0 new");
	log.info(`Found ${newLabel} videos`, undefined, {
		total,
		processed: alreadyProcessed,
	});
}

export function logVideoResult(result: VideoOutcome): void {
	const ctx: LogContext = { videoId: result.videoId };
	const title = pc.cyan(`'${truncateTitle(result.title)}'`);

	if (result.outcome === "done") {
		log.info(`${pc.green("summarized")} ${title}`, ctx);
		return;
	}

	log.error(`${pc.red("failed")} ${title} (${result.reason})`, ctx, {
		kind: result.kind,
		record: result.recordStatus ?? "none",
		relocated: result.relocated ? "yes" : "no",
	});
}

export function logBatchCompleted(batch: BatchOutcome): void {
	const done = batch.outcomes.filter((o) => o.outcome === "done").length;
	const failed = batch.outcomes.length - done;
	const elapsed = batch.finishedAt.getTime() - batch.startedAt.getTime();

	log.info("Run complete", undefined, {
		done,
		failed,
		elapsed: formatDuration(elapsed),
	});
}

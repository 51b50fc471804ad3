import type { RequestsConfig } from "../config.js";
import { errorMessage } from "../pipeline/errors.js";
import type {
	BatchOutcome,
	FailedOutcome,
	Notifier,
	VideoOutcome,
} from "../pipeline/types.js";
import { log, truncateTitle } from "../ui/logger.js";

/** Slack rejects section text longer than this. */
const SECTION_LIMIT = 3000;

type TextObject = {
	type: "mrkdwn" | "plain_text";
	text: string;
	emoji?: boolean;
};

export type SlackBlock =
	| { type: "header"; text: TextObject }
	| { type: "section"; text: TextObject }
	| { type: "context"; elements: TextObject[] }
	| { type: "divider" };

export type SlackMessage = {
	text: string;
	blocks: SlackBlock[];
};

function section(text: string): SlackBlock {
	const clipped =
		text.length > SECTION_LIMIT
			? `${text.slice(0, SECTION_LIMIT - 3)}...`
			: text;
	return { type: "section", text: { type: "mrkdwn", text: clipped } };
}

function formatDone(outcome: VideoOutcome): string {
	return `• <${outcome.url}|${truncateTitle(outcome.title, 80)}>`;
}

function formatError(outcome: FailedOutcome): string {
	return `• <${outcome.url}|${truncateTitle(outcome.title, 80)}> \`${outcome.kind}\` ${outcome.reason}`;
}

export function buildBatchMessage(batch: BatchOutcome): SlackMessage {
	const done = batch.outcomes.filter((o) => o.outcome === "done");
	const failed = batch.outcomes.filter(
		(o): o is FailedOutcome => o.outcome === "error",
	);
	const headline = `Processed ${batch.outcomes.length} video(s): ${done.length} summarized, ${failed.length} failed`;

	const blocks: SlackBlock[] = [
		{
			type: "header",
			text: { type: "plain_text", text: "📺 Watch-later digest", emoji: true },
		},
		{ type: "context", elements: [{ type: "mrkdwn", text: headline }] },
	];

	if (done.length > 0) {
		blocks.push({ type: "divider" });
		blocks.push(section(`*Summarized*\n${done.map(formatDone).join("\n")}`));
	}

	if (failed.length > 0) {
		blocks.push({ type: "divider" });
		blocks.push(section(`*Errors*\n${failed.map(formatError).join("\n")}`));
	}

	return { text: headline, blocks };
}

export function buildFatalMessage(
	message: string,
	attempt: number,
	nextRetryMinutes: number,
): SlackMessage {
	const text = `Watch-later digest failed (attempt ${attempt})`;
	return {
		text,
		blocks: [
			{
				type: "header",
				text: { type: "plain_text", text: `🚨 ${text}`, emoji: true },
			},
			section(`\`\`\`${message}\`\`\``),
			{
				type: "context",
				elements: [
					{
						type: "mrkdwn",
						text: `Next retry in ${formatMinutes(nextRetryMinutes)}`,
					},
				],
			},
		],
	};
}

export function buildRecoveryMessage(previousFailures: number): SlackMessage {
	const text = `Watch-later digest recovered after ${previousFailures} failed run(s)`;
	return {
		text,
		blocks: [section(`✅ ${text}`)],
	};
}

function formatMinutes(minutes: number): string {
	if (minutes < 60) return `${minutes} min`;
	const hours = minutes / 60;
	return Number.isInteger(hours) ? `${hours} h` : `${hours.toFixed(1)} h`;
}

export class SlackNotifier implements Notifier {
	constructor(
		private readonly webhookUrl: string,
		private readonly requests: RequestsConfig,
	) {}

	async notifyBatch(batch: BatchOutcome): Promise<void> {
		await this.post(buildBatchMessage(batch));
	}

	async notifyFatal(
		message: string,
		attempt: number,
		nextRetryMinutes: number,
	): Promise<void> {
		await this.post(buildFatalMessage(message, attempt, nextRetryMinutes));
	}

	async notifyRecovery(previousFailures: number): Promise<void> {
		await this.post(buildRecoveryMessage(previousFailures));
	}

	/** Best effort: failures are logged, never thrown. */
	private async post(message: SlackMessage): Promise<void> {
		try {
			const response = await fetch(this.webhookUrl, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify(message),
				signal: AbortSignal.timeout(this.requests.timeoutMs),
			});
			if (!response.ok) {
				log.warn(
					`Slack webhook error ${response.status}: ${await response.text()}`,
				);
				return;
			}
			log.debug("Sent Slack notification", undefined, { text: message.text });
		} catch (error) {
			log.warn(`Slack notification failed: ${errorMessage(error)}`);
		}
	}
}

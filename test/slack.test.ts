import { afterEach, describe, expect, it, vi } from "vitest";
import {
	buildBatchMessage,
	buildFatalMessage,
	buildRecoveryMessage,
	SlackNotifier,
} from "../src/notify/slack.js";
import type { BatchOutcome } from "../src/pipeline/types.js";

const requests = { timeoutMs: 1000, retries: 0, backoffMs: 0 };

const batch: BatchOutcome = {
	startedAt: new Date("2026-01-15T10:00:00.000Z"),
	finishedAt: new Date("2026-01-15T10:02:00.000Z"),
	totalMembers: 4,
	alreadyProcessed: 2,
	outcomes: [
		{
			videoId: "v1",
			title: "Intro to Rust",
			url: "https://www.youtube.com/watch?v=v1",
			recordStatus: "Summarized",
			relocated: true,
			outcome: "done",
			summary: { synopsis: "s", keyPoints: ["k"], audience: "a" },
		},
		{
			videoId: "v2",
			title: "Live stream",
			url: "https://www.youtube.com/watch?v=v2",
			recordStatus: "Error",
			relocated: true,
			outcome: "error",
			kind: "TranscriptUnavailable",
			reason: "No transcript available: no captions",
		},
	],
};

afterEach(() => {
	vi.unstubAllGlobals();
});

describe("buildBatchMessage", () => {
	it("lists summarized videos and errors separately", () => {
		const message = buildBatchMessage(batch);

		expect(message.text).toBe("Processed 2 video(s): 1 summarized, 1 failed");
		expect(message.blocks).toEqual([
			{
				type: "header",
				text: { type: "plain_text", text: "📺 Watch-later digest", emoji: true },
			},
			{
				type: "context",
				elements: [
					{
						type: "mrkdwn",
						text: "Processed 2 video(s): 1 summarized, 1 failed",
					},
				],
			},
			{ type: "divider" },
			{
				type: "section",
				text: {
					type: "mrkdwn",
					text: "*Summarized*\n• <https://www.youtube.com/watch?v=v1|Intro to Rust>",
				},
			},
			{ type: "divider" },
			{
				type: "section",
				text: {
					type: "mrkdwn",
					text: "*Errors*\n• <https://www.youtube.com/watch?v=v2|Live stream> `TranscriptUnavailable` No transcript available: no captions",
				},
			},
		]);
	});

	it("omits the error section when nothing failed", () => {
		const [first] = batch.outcomes;
		const message = buildBatchMessage({
			...batch,
			outcomes: first ? [first] : [],
		});

		expect(message.blocks.map((b) => b.type)).toEqual([
			"header",
			"context",
			"divider",
			"section",
		]);
	});

	it("clips oversized sections", () => {
		const outcomes = Array.from({ length: 100 }, (_, i) => ({
			videoId: `v${i}`,
			title: "A fairly long video title that repeats many times over",
			url: `https://www.youtube.com/watch?v=v${i}`,
			recordStatus: "Summarized" as const,
			relocated: true,
			outcome: "done" as const,
			summary: { synopsis: "s", keyPoints: ["k"], audience: "a" },
		}));

		const section = buildBatchMessage({ ...batch, outcomes }).blocks[3];

		expect(section?.type).toBe("section");
		if (section?.type === "section") {
			expect(section.text.text).toHaveLength(3000);
			expect(section.text.text.endsWith("...")).toBe(true);
		}
	});
});

describe("buildFatalMessage", () => {
	it("shows the error and the next retry", () => {
		const message = buildFatalMessage(
			"Failed to list input playlist: x",
			3,
			120,
		);

		expect(message.text).toBe("Watch-later digest failed (attempt 3)");
		expect(message.blocks).toEqual([
			{
				type: "header",
				text: {
					type: "plain_text",
					text: "🚨 Watch-later digest failed (attempt 3)",
					emoji: true,
				},
			},
			{
				type: "section",
				text: { type: "mrkdwn", text: "```Failed to list input playlist: x```" },
			},
			{
				type: "context",
				elements: [{ type: "mrkdwn", text: "Next retry in 2 h" }],
			},
		]);
	});

	it("formats short and fractional waits", () => {
		const retryText = (minutes: number) => {
			const block = buildFatalMessage("x", 1, minutes).blocks[2];
			return block?.type === "context" ? block.elements[0]?.text : undefined;
		};

		expect(retryText(15)).toBe("Next retry in 15 min");
		expect(retryText(90)).toBe("Next retry in 1.5 h");
	});
});

describe("buildRecoveryMessage", () => {
	it("reports how many runs failed", () => {
		expect(buildRecoveryMessage(2)).toEqual({
			text: "Watch-later digest recovered after 2 failed run(s)",
			blocks: [
				{
					type: "section",
					text: {
						type: "mrkdwn",
						text: "✅ Watch-later digest recovered after 2 failed run(s)",
					},
				},
			],
		});
	});
});

describe("SlackNotifier", () => {
	it("posts the message as json", async () => {
		const fetchMock = vi
			.fn<typeof fetch>()
			.mockResolvedValue(new Response("ok", { status: 200 }));
		vi.stubGlobal("fetch", fetchMock);

		const notifier = new SlackNotifier("https://hooks.test/T000", requests);
		await notifier.notifyRecovery(1);

		const [url, init] = fetchMock.mock.calls[0] ?? [];
		expect(url).toBe("https://hooks.test/T000");
		expect(init?.method).toBe("POST");
		expect(init?.body).toBe(JSON.stringify(buildRecoveryMessage(1)));
	});

	it("does not throw when the webhook fails", async () => {
		vi.stubGlobal(
			"fetch",
			vi
				.fn<typeof fetch>()
				.mockResolvedValueOnce(new Response("no_team", { status: 404 }))
				.mockRejectedValueOnce(new TypeError("fetch failed")),
		);
		const notifier = new SlackNotifier("https://hooks.test/T000", requests);

		await expect(notifier.notifyBatch(batch)).resolves.toBeUndefined();
		await expect(notifier.notifyFatal("x", 1, 15)).resolves.toBeUndefined();
	});
});

import { afterEach, describe, expect, it, vi } from "vitest";
import { SupadataTranscriptSource } from "../src/sources/supadata/fetch.js";

const requests = { timeoutMs: 1000, retries: 1, backoffMs: 0 };

function source() {
	return new SupadataTranscriptSource(
		{ apiKey: "test-key", baseUrl: "https://transcripts.test/v1" },
		requests,
	);
}

function json(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

function stubFetch(...responses: Array<Response | Error>) {
	const fetchMock = vi.fn<typeof fetch>();
	for (const response of responses) {
		if (response instanceof Error) {
			fetchMock.mockRejectedValueOnce(response);
		} else {
			fetchMock.mockResolvedValueOnce(response);
		}
	}
	vi.stubGlobal("fetch", fetchMock);
	return fetchMock;
}

afterEach(() => {
	vi.unstubAllGlobals();
});

describe("SupadataTranscriptSource", () => {
	it("requests native captions for the video url", async () => {
		const fetchMock = stubFetch(json({ content: "hello world" }));

		await source().fetchTranscript("abc123");

		const [url, init] = fetchMock.mock.calls[0] ?? [];
		expect(url).toBe(
			"https://transcripts.test/v1/youtube/transcript?url=https%3A%2F%2Fwww.youtube.com%2Fwatch%3Fv%3Dabc123&mode=native",
		);
		expect(init?.headers).toEqual({ "x-api-key": "test-key" });
	});

	it("returns plain string content", async () => {
		stubFetch(json({ content: "  hello world \n" }));

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "available",
			text: "hello world",
		});
	});

	it("joins segment lists", async () => {
		stubFetch(
			json({
				content: [{ text: "first part" }, { text: " " }, "second part"],
			}),
		);

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "available",
			text: "first part second part",
		});
	});

	it("falls back to the segments field", async () => {
		stubFetch(json({ segments: [{ text: "from" }, { text: "segments" }] }));

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "available",
			text: "from segments",
		});
	});

	it("reports videos without captions", async () => {
		stubFetch(new Response("", { status: 404 }));

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "unavailable",
			reason: "no captions",
		});
	});

	it("reports an empty transcript", async () => {
		stubFetch(json({ content: "   " }));

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "unavailable",
			reason: "empty transcript",
		});
	});

	it("reports an unexpected payload", async () => {
		stubFetch(json({ content: 42 }));

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "unavailable",
			reason: "unexpected transcript payload",
		});
	});

	it("does not retry a rejected api key", async () => {
		const fetchMock = stubFetch(json({ message: "Invalid API key" }, 401));

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "unavailable",
			reason: "Supadata API error 401: Invalid API key",
		});
		expect(fetchMock).toHaveBeenCalledTimes(1);
	});

	it("retries a server error once", async () => {
		const fetchMock = stubFetch(
			new Response("upstream timeout", { status: 502 }),
			json({ content: "second try" }),
		);

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "available",
			text: "second try",
		});
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("gives up after repeated throttling", async () => {
		const fetchMock = stubFetch(
			json({ error: "rate limited" }, 429),
			json({ error: "rate limited" }, 429),
		);

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "unavailable",
			reason: "Supadata API error 429: rate limited",
		});
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("retries a network failure", async () => {
		stubFetch(new TypeError("fetch failed"), json({ content: "recovered" }));

		await expect(source().fetchTranscript("abc123")).resolves.toEqual({
			kind: "available",
			text: "recovered",
		});
	});
});

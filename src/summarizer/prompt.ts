import type { SummaryRequest } from "../pipeline/types.js";

export const TRUNCATION_MARKER = "\n\n[Transcript truncated due to length...]";

export const SUMMARY_SYSTEM_PROMPT =
	"You summarize YouTube video transcripts concisely. Always answer with a single JSON object.";

/**
 * Cuts the transcript to `maxChars`, backing up to the last sentence end when
 * one falls within the final fifth of the kept text.
 */
export function truncateTranscript(
	transcript: string,
	maxChars: number,
): string {
	if (transcript.length <= maxChars) {
		return transcript;
	}

	let truncated = transcript.slice(0, maxChars);
	const lastPeriod = truncated.lastIndexOf(". ");
	if (lastPeriod > maxChars * 0.8) {
		truncated = truncated.slice(0, lastPeriod + 1);
	}

	return `${truncated}${TRUNCATION_MARKER}`;
}

export function getSummaryPrompt(request: SummaryRequest): string {
	return `Summarize this video transcript.

Title: ${request.title}
Channel: ${request.channel}

## Output

Respond with a JSON object of this exact shape:

{
  "summary": "2-3 sentence summary of the video",
  "key_points": ["3 to 5 key takeaways, one per entry"],
  "target_audience": "who would find this video useful"
}

## Transcript

${request.transcript}`;
}

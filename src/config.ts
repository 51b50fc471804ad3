import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";

export const STATE_DIR_NAME = ".watchlater-digest";

const youtubeConfigSchema = z.object({
	inputPlaylistId: z.string().min(1),
	outputPlaylistId: z.string().min(1),
	clientId: z.string().min(1),
	clientSecret: z.string().min(1),
	refreshToken: z.string().min(1),
});

export type YouTubeConfig = z.infer<typeof youtubeConfigSchema>;

const transcriptsConfigSchema = z.object({
	apiKey: z.string().min(1),
	baseUrl: z.string().url().optional().default("https://api.supadata.ai/v1"),
});

export type TranscriptsConfig = z.infer<typeof transcriptsConfigSchema>;

const summarizerConfigSchema = z.object({
	apiKey: z.string().min(1),
	model: z.string().optional().default("gpt-4o-mini"),
	/** Transcripts longer than this are cut before being sent to the model */
	maxTranscriptChars: z.coerce
		.number()
		.int()
		.positive()
		.optional()
		.default(100_000),
});

export type SummarizerConfig = z.infer<typeof summarizerConfigSchema>;

const notionConfigSchema = z.object({
	apiKey: z.string().min(1),
	databaseId: z.string().min(1),
});

export type NotionConfig = z.infer<typeof notionConfigSchema>;

const notifierConfigSchema = z.object({
	slackWebhookUrl: z.string().url().optional(),
});

export type NotifierConfig = z.infer<typeof notifierConfigSchema>;

const requestsConfigSchema = z.object({
	timeoutMs: z.coerce.number().int().positive().optional().default(30_000),
	/** Extra attempts for transient (rate-limit, network, timeout) failures */
	retries: z.coerce.number().int().nonnegative().optional().default(1),
	backoffMs: z.coerce.number().int().nonnegative().optional().default(1000),
});

export type RequestsConfig = z.infer<typeof requestsConfigSchema>;

const cooldownConfigSchema = z.object({
	statePath: z
		.string()
		.optional()
		.default(`${STATE_DIR_NAME}/cooldown.yaml`),
	backoffMinutes: z
		.array(z.coerce.number().int().positive())
		.min(1)
		.optional()
		.default([15, 30, 120, 480, 1440]),
});

export type CooldownConfig = z.infer<typeof cooldownConfigSchema>;

const configSchema = z.object({
	youtube: youtubeConfigSchema,
	transcripts: transcriptsConfigSchema,
	summarizer: summarizerConfigSchema,
	notion: notionConfigSchema,
	notifier: notifierConfigSchema.optional().default({}),
	requests: requestsConfigSchema.optional().default({}),
	cooldown: cooldownConfigSchema.optional().default({}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Replaces `env.NAME` string values with `process.env.NAME`, recursively.
 * Unset variables resolve to `undefined` so optional settings drop out and
 * required ones fail validation.
 */
export function resolveEnvVars(
	value: unknown,
	env: NodeJS.ProcessEnv = process.env,
): unknown {
	if (typeof value === "string" && value.startsWith("env.")) {
		const resolved = env[value.slice(4)];
		return resolved === "" ? undefined : resolved;
	}
	if (Array.isArray(value)) {
		return value.map((item) => resolveEnvVars(item, env));
	}
	if (typeof value === "object" && value !== null) {
		const resolved: Record<string, unknown> = {};
		for (const [key, entry] of Object.entries(value)) {
			resolved[key] = resolveEnvVars(entry, env);
		}
		return resolved;
	}
	return value;
}

export function parseConfig(
	rawText: string,
	env: NodeJS.ProcessEnv = process.env,
): Config {
	const clean = rawText.replace(/^\uFEFF/, "");
	const parsed: unknown = parse(clean);

	const result = configSchema.safeParse(resolveEnvVars(parsed, env));
	if (!result.success) {
		throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
	}
	return result.data;
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");
}

export async function loadConfig(configPath: string): Promise<Config> {
	const rawText = await readFile(configPath, "utf8");
	return parseConfig(rawText);
}

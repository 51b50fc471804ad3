import { existsSync } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import type { z } from "zod";
import { errorMessage } from "../pipeline/errors.js";
import { log } from "../ui/logger.js";

/** A YAML file validated by a zod schema, replaced atomically on save. */
export abstract class BaseState<T> {
	readonly filePath: string;
	protected abstract schema: z.ZodType<T, z.ZodTypeDef, unknown>;
	protected state: T | null = null;

	constructor(filePath: string) {
		this.filePath = path.resolve(filePath);
	}

	async load(): Promise<void> {
		if (!existsSync(this.filePath)) {
			this.state = this.getDefaultState();
			return;
		}

		try {
			const raw = await readFile(this.filePath, "utf8");
			const parsed: unknown = YAML.parse(raw);
			this.state = this.schema.parse(parsed ?? {});
		} catch (error) {
			log.warn(
				`Failed to load state from ${this.filePath}, using defaults: ${errorMessage(error)}`,
			);
			this.state = this.getDefaultState();
		}
	}

	async save(): Promise<void> {
		const dir = path.dirname(this.filePath);
		await mkdir(dir, { recursive: true });

		const tempPath = `${this.filePath}.tmp`;
		const yaml = YAML.stringify(this.schema.parse(this.current));

		await writeFile(tempPath, yaml, "utf8");
		await rename(tempPath, this.filePath);
	}

	protected get current(): T {
		if (this.state === null) {
			throw new Error(`State ${this.filePath} used before load()`);
		}
		return this.state;
	}

	protected abstract getDefaultState(): T;
}

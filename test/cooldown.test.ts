import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CooldownState, getBackoffMinutes } from "../src/state/cooldown.js";

const T0 = new Date("2026-01-15T10:00:00.000Z");
const minutesAfter = (minutes: number) =>
	new Date(T0.getTime() + minutes * 60_000);

let dir: string;
let statePath: string;

beforeEach(async () => {
	dir = await mkdtemp(path.join(tmpdir(), "cooldown-"));
	statePath = path.join(dir, "state", "cooldown.yaml");
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
});

async function loaded(schedule: number[] = [15, 30]) {
	const state = new CooldownState(statePath, schedule);
	await state.load();
	return state;
}

describe("getBackoffMinutes", () => {
	it("walks the schedule and stays on its last step", () => {
		const schedule = [15, 30, 120];
		expect(getBackoffMinutes(0, schedule)).toBe(0);
		expect(getBackoffMinutes(1, schedule)).toBe(15);
		expect(getBackoffMinutes(3, schedule)).toBe(120);
		expect(getBackoffMinutes(9, schedule)).toBe(120);
		expect(getBackoffMinutes(2, [])).toBe(0);
	});
});

describe("CooldownState", () => {
	it("allows a run when there is no state file", async () => {
		const state = await loaded();
		expect(state.check(T0)).toEqual({ skip: false, consecutiveFailures: 0 });
	});

	it("skips runs until the backoff has passed", async () => {
		const state = await loaded();

		const failure = await state.recordFailure("notion down", T0);

		expect(failure).toEqual({
			consecutiveFailures: 1,
			backoffMinutes: 15,
			nextRetryAfter: minutesAfter(15),
		});
		expect(state.check(minutesAfter(10))).toEqual({
			skip: true,
			consecutiveFailures: 1,
			nextRetryAfter: minutesAfter(15),
		});
		expect(state.check(minutesAfter(15))).toEqual({
			skip: false,
			consecutiveFailures: 1,
		});
	});

	it("lengthens the backoff with each consecutive failure", async () => {
		const state = await loaded();

		await state.recordFailure("one", T0);
		const second = await state.recordFailure("two", minutesAfter(15));
		const third = await state.recordFailure("three", minutesAfter(45));

		expect(second.backoffMinutes).toBe(30);
		expect(third).toEqual({
			consecutiveFailures: 3,
			backoffMinutes: 30,
			nextRetryAfter: minutesAfter(75),
		});
	});

	it("persists failures across restarts", async () => {
		const first = await loaded();
		await first.recordFailure("x".repeat(600), T0);

		const reloaded = await loaded();

		expect(reloaded.check(minutesAfter(1)).skip).toBe(true);
		const saved = await readFile(statePath, "utf8");
		expect(saved).toContain("consecutiveFailures: 1");
		expect(saved).toContain(`lastError: ${"x".repeat(500)}\n`);
	});

	it("clears the ledger on success", async () => {
		const state = await loaded();
		await state.recordFailure("one", T0);
		await state.recordFailure("two", T0);

		await expect(state.recordSuccess()).resolves.toBe(2);
		expect(state.check(T0)).toEqual({ skip: false, consecutiveFailures: 0 });
		expect((await loaded()).check(T0).consecutiveFailures).toBe(0);
	});

	it("falls back to defaults when the file is corrupt", async () => {
		const state = await loaded();
		await state.recordSuccess();
		await writeFile(statePath, "consecutiveFailures: lots\n", "utf8");

		const reloaded = await loaded();

		expect(reloaded.check(T0)).toEqual({
			skip: false,
			consecutiveFailures: 0,
		});
	});

	it("must be loaded before use", () => {
		const state = new CooldownState(statePath, [15]);
		expect(() => state.check(T0)).toThrow("used before load()");
	});
});

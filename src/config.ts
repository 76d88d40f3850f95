import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import * as dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_RECONNECT_DELAY_MS, DEFAULT_GATEWAY_URL } from "./gateway/client.js";
import { DEFAULT_POLL_INTERVAL_MS } from "./poller/poller.js";
import { DEFAULT_API_BASE } from "./rest/fetcher.js";

const SOUND_FILE = "boom.mp3";
const PID_FILE = "channel-watch.pid";

export interface MonitorConfig {
	token: string;
	channelId: string;
	soundPath: string;
	apiBase: string;
	gatewayUrl: string;
	pollIntervalMs: number;
	reconnectDelayMs: number;
	pidFile: string;
}

export class ConfigError extends Error {
	readonly missing: string[];

	constructor(message: string, missing: string[] = []) {
		super(message);
		this.name = "ConfigError";
		this.missing = missing;
	}
}

const REQUIRED_VARS = ["DISCORD_TOKEN", "CHANNEL_ID"] as const;

const optionalString = z
	.string()
	.trim()
	.optional()
	.transform((v) => (v ? v : undefined));

const positiveInt = (fallback: number) =>
	optionalString.pipe(z.coerce.number().int().positive().optional()).transform((v) => v ?? fallback);

const EnvSchema = z.object({
	DISCORD_TOKEN: optionalString,
	CHANNEL_ID: optionalString,
	DISCORD_API_BASE: optionalString.pipe(z.string().url().optional()),
	DISCORD_GATEWAY_URL: optionalString.pipe(z.string().url().optional()),
	POLL_INTERVAL_MS: positiveInt(DEFAULT_POLL_INTERVAL_MS),
	RECONNECT_DELAY_MS: positiveInt(DEFAULT_RECONNECT_DELAY_MS),
});

/** Package root: one level above this module in both src/ and dist/. */
function packageRoot(): string {
	return resolve(dirname(fileURLToPath(import.meta.url)), "..");
}

/** `boom.mp3` beside the package if present, else in the working directory. */
export function defaultSoundPath(cwd: string = process.cwd()): string {
	const bundled = join(packageRoot(), SOUND_FILE);
	if (existsSync(bundled)) return bundled;
	return join(cwd, SOUND_FILE);
}

export function defaultPidFile(cwd: string = process.cwd()): string {
	return join(cwd, PID_FILE);
}

/** PID file location; does not require the monitor credentials. */
export function resolvePidFile(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): string {
	return env.CHANNEL_WATCH_PID_FILE?.trim() || defaultPidFile(cwd);
}

export function resolveSoundPath(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): string {
	return env.SOUND_PATH?.trim() || defaultSoundPath(cwd);
}

/** Load `.env` from the working directory into `process.env` (existing values win). */
export function loadDotEnv(cwd: string = process.cwd()): void {
	dotenv.config({ path: join(cwd, ".env") });
}

/**
 * Validate monitor settings from an environment map.
 * Throws ConfigError naming every missing required variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): MonitorConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const detail = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid configuration: ${detail}`);
	}
	const vars = parsed.data;

	const missing = REQUIRED_VARS.filter((key) => !vars[key]);
	if (!vars.DISCORD_TOKEN || !vars.CHANNEL_ID) {
		throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`, missing);
	}

	return {
		token: vars.DISCORD_TOKEN,
		channelId: vars.CHANNEL_ID,
		soundPath: resolveSoundPath(env, cwd),
		apiBase: vars.DISCORD_API_BASE ?? DEFAULT_API_BASE,
		gatewayUrl: vars.DISCORD_GATEWAY_URL ?? DEFAULT_GATEWAY_URL,
		pollIntervalMs: vars.POLL_INTERVAL_MS,
		reconnectDelayMs: vars.RECONNECT_DELAY_MS,
		pidFile: resolvePidFile(env, cwd),
	};
}

export function loadConfig(cwd: string = process.cwd()): MonitorConfig {
	loadDotEnv(cwd);
	return parseConfig(process.env, cwd);
}

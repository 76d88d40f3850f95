import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, loadConfig, parseConfig, resolvePidFile } from "../config.js";

describe("parseConfig", () => {
	const cwd = "/tmp/channel-watch-test";

	it("applies defaults for optional settings", () => {
		const config = parseConfig({ DISCORD_TOKEN: "test-token", CHANNEL_ID: "123" }, cwd);
		expect(config).toMatchObject({
			token: "test-token",
			channelId: "123",
			apiBase: "https://discord.com/api/v9",
			gatewayUrl: "wss://gateway.discord.gg/?v=9&encoding=json",
			pollIntervalMs: 1500,
			reconnectDelayMs: 5000,
			pidFile: "/tmp/channel-watch-test/channel-watch.pid",
		});
		expect(config.soundPath.endsWith("boom.mp3")).toBe(true);
	});

	it("reads overrides", () => {
		const config = parseConfig(
			{
				DISCORD_TOKEN: " test-token ",
				CHANNEL_ID: "123",
				SOUND_PATH: "/sounds/alarm.mp3",
				DISCORD_API_BASE: "http://127.0.0.1:8080/api",
				DISCORD_GATEWAY_URL: "ws://127.0.0.1:8081",
				POLL_INTERVAL_MS: "250",
				RECONNECT_DELAY_MS: "1000",
				CHANNEL_WATCH_PID_FILE: "/run/cw.pid",
			},
			cwd,
		);
		expect(config).toEqual({
			token: "test-token",
			channelId: "123",
			soundPath: "/sounds/alarm.mp3",
			apiBase: "http://127.0.0.1:8080/api",
			gatewayUrl: "ws://127.0.0.1:8081",
			pollIntervalMs: 250,
			reconnectDelayMs: 1000,
			pidFile: "/run/cw.pid",
		});
	});

	it("names every missing required variable", () => {
		try {
			parseConfig({ CHANNEL_ID: "" }, cwd);
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(ConfigError);
			expect(err).toMatchObject({
				missing: ["DISCORD_TOKEN", "CHANNEL_ID"],
				message: "Missing required environment variables: DISCORD_TOKEN, CHANNEL_ID",
			});
		}
	});

	it("rejects a non-numeric poll interval", () => {
		expect(() =>
			parseConfig({ DISCORD_TOKEN: "t", CHANNEL_ID: "1", POLL_INTERVAL_MS: "soon" }, cwd),
		).toThrow(/^Invalid configuration: POLL_INTERVAL_MS: /);
	});

	it("resolves the PID file without credentials", () => {
		expect(resolvePidFile({}, cwd)).toBe("/tmp/channel-watch-test/channel-watch.pid");
		expect(resolvePidFile({ CHANNEL_WATCH_PID_FILE: "/run/cw.pid" }, cwd)).toBe("/run/cw.pid");
	});
});

describe("loadConfig", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "channel-watch-"));
		vi.stubEnv("DISCORD_TOKEN", "");
		vi.stubEnv("CHANNEL_ID", "");
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		rmSync(dir, { recursive: true, force: true });
	});

	it("reads missing values from .env in the working directory", () => {
		// stubbed above so the originals are restored afterwards
		delete process.env.DISCORD_TOKEN;
		delete process.env.CHANNEL_ID;
		writeFileSync(join(dir, ".env"), "DISCORD_TOKEN=env-token\nCHANNEL_ID=555\n");

		const config = loadConfig(dir);
		expect(config.token).toBe("env-token");
		expect(config.channelId).toBe("555");
		expect(config.pidFile).toBe(join(dir, "channel-watch.pid"));
	});
});

#!/usr/bin/env node
import { spawn } from "node:child_process";
import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { AlertController } from "./alert/alert-controller.js";
import {
	type AlertSink,
	NOTIFICATION_TITLE,
	createDesktopSink,
	notificationBody,
} from "./alert/desktop-sink.js";
import { ConfigError, loadDotEnv, parseConfig, resolvePidFile, resolveSoundPath } from "./config.js";
import {
	formatUptime,
	isProcessAlive,
	readPidFile,
	removePidFile,
	uptimeSeconds,
	writePidFile,
} from "./daemon/pid-file.js";
import { Logger, describeError } from "./logger.js";
import { runMonitor } from "./monitor.js";

const USAGE = `Usage: channel-watch <command>

Commands:
  run [--daemon]  Start monitoring (foreground, or detached with --daemon)
  stop            Stop the daemon
  status          Show running/stopped, PID and uptime
  ack             Silence the current alert without stopping monitoring
  test            Send one test notification and play the sound once`;

export interface CliContext {
	env: NodeJS.ProcessEnv;
	cwd: string;
	sink: AlertSink;
	out: (line: string) => void;
	err: (line: string) => void;
}

function defaultContext(): CliContext {
	return {
		env: process.env,
		cwd: process.cwd(),
		sink: createDesktopSink(),
		out: (line) => process.stdout.write(`${line}\n`),
		err: (line) => process.stderr.write(`${line}\n`),
	};
}

class CommandFailure extends Error {
	constructor(message: string) {
		super(message);
		this.name = "CommandFailure";
	}
}

/** Recorded PID of a live monitor process, or `null`. */
function liveMonitorPid(pidFile: string): number | null {
	const record = readPidFile(pidFile);
	if (!record || !isProcessAlive(record.pid)) return null;
	return record.pid;
}

async function runForeground(ctx: CliContext): Promise<void> {
	const config = parseConfig(ctx.env, ctx.cwd);
	const existing = liveMonitorPid(config.pidFile);
	if (existing !== null && existing !== process.pid) {
		throw new CommandFailure(`Monitor already running with PID ${existing}`);
	}

	ctx.out("Starting channel-watch in foreground mode...");
	ctx.out(`Sound path: ${config.soundPath}`);
	ctx.out(`Channel ID: ${config.channelId}`);
	ctx.out("Press Ctrl+C to stop.");

	writePidFile(config.pidFile, process.pid);
	const controller = new AbortController();
	const alert = new AlertController({ soundPath: config.soundPath, sink: ctx.sink });

	const shutdown = (signal: NodeJS.Signals) => {
		Logger.info("MONITOR", `Received ${signal}, shutting down`);
		controller.abort();
	};
	const acknowledge = () => alert.stop();

	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);
	process.on("SIGUSR1", acknowledge);
	try {
		await runMonitor(config, { alert, signal: controller.signal });
	} finally {
		process.off("SIGINT", shutdown);
		process.off("SIGTERM", shutdown);
		process.off("SIGUSR1", acknowledge);
		if (readPidFile(config.pidFile)?.pid === process.pid) {
			removePidFile(config.pidFile);
		}
	}
}

function runDaemon(ctx: CliContext): void {
	// Fail fast in the parent rather than in a detached child nobody watches
	const config = parseConfig(ctx.env, ctx.cwd);
	const existing = liveMonitorPid(config.pidFile);
	if (existing !== null) {
		throw new CommandFailure(`Daemon already running with PID ${existing}`);
	}

	const script = fileURLToPath(import.meta.url);
	const child = spawn(process.execPath, [...process.execArgv, script, "run"], {
		cwd: ctx.cwd,
		env: ctx.env,
		detached: true,
		stdio: "ignore",
	});
	if (child.pid === undefined) {
		throw new CommandFailure("Failed to spawn daemon");
	}
	child.unref();

	writePidFile(config.pidFile, child.pid);
	ctx.out(`Daemon started with PID ${child.pid}`);
	ctx.out(`PID file: ${config.pidFile}`);
}

function signalDaemon(ctx: CliContext, signal: NodeJS.Signals): number {
	const pidFile = resolvePidFile(ctx.env, ctx.cwd);
	const record = readPidFile(pidFile);
	if (!record) {
		throw new CommandFailure("No PID file found. Is the daemon running?");
	}
	if (!isProcessAlive(record.pid)) {
		removePidFile(pidFile);
		throw new CommandFailure(`Process ${record.pid} is not running. Cleaned up stale PID file.`);
	}
	try {
		process.kill(record.pid, signal);
	} catch (err) {
		throw new CommandFailure(`Failed to send ${signal} to ${record.pid}: ${describeError(err)}`);
	}
	return record.pid;
}

function stopDaemon(ctx: CliContext): void {
	const pid = signalDaemon(ctx, "SIGTERM");
	removePidFile(resolvePidFile(ctx.env, ctx.cwd));
	ctx.out(`Stopped daemon (PID ${pid})`);
}

function acknowledgeAlert(ctx: CliContext): void {
	const pid = signalDaemon(ctx, "SIGUSR1");
	ctx.out(`Alert acknowledged (PID ${pid})`);
}

export function showStatus(ctx: CliContext, now: Date = new Date()): void {
	const pidFile = resolvePidFile(ctx.env, ctx.cwd);
	const record = readPidFile(pidFile);

	ctx.out("=== channel-watch status ===");
	if (!record) {
		ctx.out("STATUS: stopped");
		ctx.out("PID:    -");
		return;
	}
	if (!isProcessAlive(record.pid)) {
		ctx.out("STATUS: stopped (stale PID file)");
		ctx.out(`PID:    ${record.pid} (not running)`);
		ctx.out("Run 'channel-watch stop' to clean up the stale PID file.");
		return;
	}

	ctx.out("STATUS: running");
	ctx.out(`PID:    ${record.pid}`);
	const uptime = uptimeSeconds(record, now);
	if (uptime !== null) {
		ctx.out(`UPTIME: ${formatUptime(uptime)}`);
	}
	ctx.out(`PID file: ${pidFile}`);
}

/** One notification and one playback; reports each result. Returns whether both worked. */
export async function testNotification(ctx: CliContext): Promise<boolean> {
	const soundPath = resolveSoundPath(ctx.env, ctx.cwd);
	if (!existsSync(soundPath)) {
		ctx.err(`Warning: Sound file not found at ${soundPath}`);
	}

	let ok = true;
	ctx.out("Sending test notification...");
	try {
		await ctx.sink.notify(NOTIFICATION_TITLE, notificationBody("TEST-CHANNEL"));
		ctx.out("  Notification sent successfully");
	} catch (err) {
		ok = false;
		ctx.err(`  Failed to send notification: ${describeError(err)}`);
	}

	ctx.out(`Playing test sound: ${soundPath}`);
	try {
		await ctx.sink.play(soundPath);
		ctx.out("  Sound played successfully");
	} catch (err) {
		ok = false;
		ctx.err(`  Failed to play sound: ${describeError(err)}`);
	}
	ctx.out("Test complete.");
	return ok;
}

/** Run one CLI command; resolves to the process exit code. */
export async function main(argv: string[], ctx: CliContext = defaultContext()): Promise<number> {
	const [command, ...rest] = argv;

	try {
		switch (command) {
			case "run":
				if (rest.includes("--daemon")) {
					runDaemon(ctx);
				} else {
					await runForeground(ctx);
				}
				return 0;
			case "stop":
				stopDaemon(ctx);
				return 0;
			case "status":
				showStatus(ctx);
				return 0;
			case "ack":
				acknowledgeAlert(ctx);
				return 0;
			case "test":
				return (await testNotification(ctx)) ? 0 : 1;
			case "help":
			case "--help":
			case "-h":
				ctx.out(USAGE);
				return 0;
			default:
				ctx.err(command ? `Unknown command: ${command}` : "No command given");
				ctx.err(USAGE);
				return 1;
		}
	} catch (err) {
		if (err instanceof ConfigError) {
			ctx.err(`Configuration error: ${err.message}`);
			ctx.err("Please set the following environment variables:");
			ctx.err("  DISCORD_TOKEN - Your Discord user token");
			ctx.err("  CHANNEL_ID    - The channel ID to monitor");
			ctx.err("  SOUND_PATH    - (optional) Path to alarm sound file");
			return 1;
		}
		ctx.err(`Error: ${describeError(err)}`);
		return 1;
	}
}

function isEntryPoint(): boolean {
	const entry = process.argv[1];
	if (!entry) return false;
	try {
		return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
	} catch {
		return false;
	}
}

if (isEntryPoint()) {
	loadDotEnv();
	main(process.argv.slice(2)).then(
		(code) => {
			process.exitCode = code;
		},
		(err: unknown) => {
			process.stderr.write(`Fatal: ${describeError(err)}\n`);
			process.exitCode = 1;
		},
	);
}

import { spawn } from "node:child_process";

export const NOTIFICATION_TITLE = "CHANNEL OPEN";

/** External side effects of an alert. */
export interface AlertSink {
	/** Show a critical desktop notification. */
	notify(title: string, body: string): Promise<void>;
	/** Play a sound file once, resolving when playback ends. */
	play(soundPath: string): Promise<void>;
}

export class CommandError extends Error {
	readonly command: string;
	readonly exitCode: number | null;

	constructor(
		command: string,
		message: string,
		options?: { exitCode?: number | null; cause?: unknown },
	) {
		super(message, { cause: options?.cause });
		this.name = "CommandError";
		this.command = command;
		this.exitCode = options?.exitCode ?? null;
	}
}

export function notificationBody(channelName: string): string {
	return `Channel is now: ${channelName}`;
}

export function buildNotificationArgs(title: string, body: string): string[] {
	return ["-u", "critical", title, body];
}

export function buildSoundArgs(soundPath: string): string[] {
	return ["--no-video", "--really-quiet", soundPath];
}

/** Run a command to completion, rejecting on spawn failure or a non-zero exit. */
export function runCommand(command: string, args: string[]): Promise<void> {
	return new Promise((resolve, reject) => {
		const child = spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });
		let stderr = "";

		child.stderr?.on("data", (chunk: Buffer) => {
			stderr += chunk.toString();
		});

		child.on("error", (err) => {
			reject(new CommandError(command, `Failed to run ${command}: ${err.message}`, { cause: err }));
		});

		child.on("close", (code, signal) => {
			if (code === 0) {
				resolve();
				return;
			}
			const detail = stderr.trim() || (signal ? `killed by ${signal}` : `exit code ${code}`);
			reject(new CommandError(command, `${command} failed: ${detail}`, { exitCode: code }));
		});
	});
}

/** Desktop sink backed by notify-send and mpv. */
export function createDesktopSink(): AlertSink {
	return {
		notify(title, body) {
			return runCommand("notify-send", buildNotificationArgs(title, body));
		},
		play(soundPath) {
			return runCommand("mpv", buildSoundArgs(soundPath));
		},
	};
}

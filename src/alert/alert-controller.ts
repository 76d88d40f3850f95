import { Logger, describeError } from "../logger.js";
import type { NameAlerter } from "../state/reconcile.js";
import { type Sleep, delay } from "../utils/delay.js";
import { type AlertSink, NOTIFICATION_TITLE, createDesktopSink, notificationBody } from "./desktop-sink.js";

export const DEFAULT_CYCLE_MS = 3_000;
export const DEFAULT_CHECK_INTERVAL_MS = 100;

export interface AlertControllerOptions {
	soundPath: string;
	sink?: AlertSink;
	/** Time between the start of one playback wait and the next playback. */
	cycleMs?: number;
	/** Granularity at which `stop()` is noticed during the wait. */
	checkIntervalMs?: number;
	sleep?: Sleep;
}

/**
 * Owns the alert lifecycle: one notification per trigger, then the sound
 * on repeat until `stop()`.
 *
 * At most one playback loop exists. Triggering while a loop is running
 * sends the notification for the new name and leaves the loop as is.
 */
export class AlertController implements NameAlerter {
	private readonly soundPath: string;
	private readonly sink: AlertSink;
	private readonly cycleMs: number;
	private readonly checkIntervalMs: number;
	private readonly sleep: Sleep;
	private running = false;
	private loop: Promise<void> | null = null;
	private notifications: Promise<void> = Promise.resolve();
	private _lastAlertName: string | null = null;

	constructor(options: AlertControllerOptions) {
		this.soundPath = options.soundPath;
		this.sink = options.sink ?? createDesktopSink();
		this.cycleMs = options.cycleMs ?? DEFAULT_CYCLE_MS;
		this.checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
		this.sleep = options.sleep ?? delay;
	}

	isRunning(): boolean {
		return this.running;
	}

	/** True while a playback loop is alive, including its final wait after `stop()`. */
	isLooping(): boolean {
		return this.loop !== null;
	}

	get lastAlertName(): string | null {
		return this._lastAlertName;
	}

	trigger(name: string): void {
		this.running = true;
		this._lastAlertName = name;
		this.notifications = this.notifications.then(() => this.sendNotification(name));

		if (this.loop) {
			Logger.debug("ALERT", "Alert loop already running");
			return;
		}
		this.loop = this.runLoop().finally(() => {
			this.loop = null;
		});
	}

	/** Stop after the current playback; an in-flight playback is not killed. */
	stop(): void {
		if (!this.running) return;
		this.running = false;
		Logger.info("ALERT", "Alert acknowledged");
	}

	/** Resolves once pending notifications are sent and no loop is alive. */
	async whenIdle(): Promise<void> {
		await this.notifications;
		while (this.loop) {
			await this.loop;
		}
	}

	private async sendNotification(name: string): Promise<void> {
		try {
			await this.sink.notify(NOTIFICATION_TITLE, notificationBody(name));
		} catch (err) {
			Logger.warn("ALERT", `Failed to send notification: ${describeError(err)}`);
		}
	}

	private async runLoop(): Promise<void> {
		await this.notifications;

		while (this.running) {
			try {
				await this.sink.play(this.soundPath);
			} catch (err) {
				Logger.warn("ALERT", `Failed to play sound: ${describeError(err)}`);
			}

			for (let waited = 0; waited < this.cycleMs && this.running; waited += this.checkIntervalMs) {
				await this.sleep(this.checkIntervalMs);
			}
		}
	}
}

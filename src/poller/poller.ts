import { Logger, describeError } from "../logger.js";
import {
	type ChannelNameFetcher,
	DEFAULT_API_BASE,
	fetchChannelName,
} from "../rest/fetcher.js";
import type { LastNameStore } from "../state/last-name.js";
import { type NameAlerter, reconcileName } from "../state/reconcile.js";
import { type Sleep, delay } from "../utils/delay.js";

export const DEFAULT_POLL_INTERVAL_MS = 1_500;

export interface PollerOptions {
	token: string;
	channelId: string;
	state: LastNameStore;
	alert: NameAlerter;
	apiBase?: string;
	intervalMs?: number;
	fetcher?: ChannelNameFetcher;
	sleep?: Sleep;
}

/**
 * Fixed-interval REST detector. A failed fetch is logged and the next
 * attempt happens one interval later; there is no backoff.
 */
export class Poller {
	private readonly options: PollerOptions;
	private readonly intervalMs: number;
	private readonly fetcher: ChannelNameFetcher;
	private readonly sleep: Sleep;
	private _polls = 0;
	private _failures = 0;

	constructor(options: PollerOptions) {
		this.options = options;
		this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.fetcher = options.fetcher ?? fetchChannelName;
		this.sleep = options.sleep ?? delay;
	}

	/** Completed fetch attempts, successful or not. */
	get polls(): number {
		return this._polls;
	}

	get failures(): number {
		return this._failures;
	}

	/** Poll until `signal` aborts; without a signal this never resolves. */
	async run(signal?: AbortSignal): Promise<void> {
		const { token, channelId, state, alert, apiBase = DEFAULT_API_BASE } = this.options;

		while (!signal?.aborted) {
			await this.sleep(this.intervalMs, signal);
			if (signal?.aborted) break;

			try {
				const name = await this.fetcher({ token, channelId, apiBase, signal });
				reconcileName(name, { state, alert, source: "POLL" });
			} catch (err) {
				if (signal?.aborted) break;
				this._failures++;
				Logger.warn("POLL", `Failed to fetch channel: ${describeError(err)}`);
			} finally {
				this._polls++;
			}
		}
	}
}

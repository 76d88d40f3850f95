import { AlertController } from "./alert/alert-controller.js";
import type { AlertSink } from "./alert/desktop-sink.js";
import type { MonitorConfig } from "./config.js";
import { GatewayClient } from "./gateway/client.js";
import { Logger, describeError } from "./logger.js";
import { Poller } from "./poller/poller.js";
import { type ChannelNameFetcher, fetchChannelName } from "./rest/fetcher.js";
import { LastNameStore } from "./state/last-name.js";
import type { Sleep } from "./utils/delay.js";

export type MonitorSettings = Omit<MonitorConfig, "pidFile">;

export interface MonitorDeps {
	alert?: AlertController;
	sink?: AlertSink;
	fetcher?: ChannelNameFetcher;
	sleep?: Sleep;
	signal?: AbortSignal;
	/** Receives the running parts once they exist, before the loops start. */
	onStart?: (parts: MonitorParts) => void;
}

export interface MonitorParts {
	state: LastNameStore;
	alert: AlertController;
	poller: Poller;
	gateway: GatewayClient;
}

/**
 * Bootstrap the last known name, then run the REST poller and the gateway
 * client side by side. Resolves only when `deps.signal` aborts.
 */
export async function runMonitor(settings: MonitorSettings, deps: MonitorDeps = {}): Promise<void> {
	const { token, channelId, apiBase } = settings;
	const fetcher = deps.fetcher ?? fetchChannelName;
	const state = new LastNameStore();
	const alert =
		deps.alert ?? new AlertController({ soundPath: settings.soundPath, sink: deps.sink, sleep: deps.sleep });

	Logger.info("MONITOR", "Fetching initial channel state...");
	try {
		const initial = await fetcher({ token, channelId, apiBase, signal: deps.signal });
		state.set(initial);
		Logger.info("MONITOR", `Initial channel name: ${initial ?? "(none)"}`);
	} catch (err) {
		Logger.error("MONITOR", `Failed to fetch initial channel state: ${describeError(err)}`);
	}

	const poller = new Poller({
		token,
		channelId,
		apiBase,
		state,
		alert,
		intervalMs: settings.pollIntervalMs,
		fetcher,
		sleep: deps.sleep,
	});
	const gateway = new GatewayClient({
		token,
		channelId,
		state,
		alert,
		url: settings.gatewayUrl,
		reconnectDelayMs: settings.reconnectDelayMs,
		sleep: deps.sleep,
	});
	deps.onStart?.({ state, alert, poller, gateway });

	Logger.info("MONITOR", "Starting dual-mode monitoring (REST polling + WebSocket)...");
	await Promise.all([poller.run(deps.signal), gateway.run(deps.signal)]);
	alert.stop();
	await alert.whenIdle();
}

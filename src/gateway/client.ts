import WebSocket from "ws";
import { Logger, describeError } from "../logger.js";
import type { LastNameStore } from "../state/last-name.js";
import { type NameAlerter, reconcileName } from "../state/reconcile.js";
import { type Sleep, delay } from "../utils/delay.js";
import {
	CHANNEL_UPDATE,
	DEFAULT_IDENTIFY_PROPERTIES,
	GatewayProtocolError,
	decodeChannel,
	decodeFrame,
	encodeHeartbeat,
	encodeIdentify,
	frameOpcode,
} from "./protocol.js";
import type { DispatchFrame, GatewayState, IdentifyProperties } from "./types.js";

export const DEFAULT_GATEWAY_URL = "wss://gateway.discord.gg/?v=9&encoding=json";
export const DEFAULT_RECONNECT_DELAY_MS = 5_000;
const HELLO_TIMEOUT_MS = 10_000;

type StateListener = (state: GatewayState) => void;

export class GatewayTransportError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "GatewayTransportError";
	}
}

export interface GatewayClientOptions {
	token: string;
	channelId: string;
	state: LastNameStore;
	alert: NameAlerter;
	url?: string;
	reconnectDelayMs?: number;
	helloTimeoutMs?: number;
	properties?: IdentifyProperties;
	sleep?: Sleep;
	/** Opens the socket for one connection attempt. */
	createSocket?: (url: string) => WebSocket;
}

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

/**
 * Streaming change detector.
 *
 * Flow per connection:
 * 1. Open WebSocket
 * 2. Receive Hello (op 10) carrying heartbeat_interval
 * 3. Send Identify (op 2)
 * 4. Heartbeat (op 1) every interval while reading dispatches
 * 5. On close/error, wait the reconnect delay and start over
 */
export class GatewayClient {
	private readonly options: GatewayClientOptions;
	private readonly url: string;
	private readonly reconnectDelayMs: number;
	private readonly helloTimeoutMs: number;
	private readonly sleep: Sleep;
	private readonly createSocket: (url: string) => WebSocket;
	private _state: GatewayState = "disconnected";
	private _connectAttempts = 0;
	private _heartbeatsSent = 0;
	private _lastSequence: number | null = null;
	private stateListeners: StateListener[] = [];

	constructor(options: GatewayClientOptions) {
		this.options = options;
		this.url = options.url ?? DEFAULT_GATEWAY_URL;
		this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
		this.helloTimeoutMs = options.helloTimeoutMs ?? HELLO_TIMEOUT_MS;
		this.sleep = options.sleep ?? delay;
		this.createSocket = options.createSocket ?? ((url) => new WebSocket(url));
	}

	get state(): GatewayState {
		return this._state;
	}

	get connectAttempts(): number {
		return this._connectAttempts;
	}

	get heartbeatsSent(): number {
		return this._heartbeatsSent;
	}

	/** Sequence number of the last dispatch received, if any. */
	get lastSequence(): number | null {
		return this._lastSequence;
	}

	onStateChange(listener: StateListener): void {
		this.stateListeners.push(listener);
	}

	/** Connect and reconnect until `signal` aborts; without a signal this never resolves. */
	async run(signal?: AbortSignal): Promise<void> {
		while (!signal?.aborted) {
			try {
				await this.runSession(signal);
				if (!signal?.aborted) Logger.info("WS", "Connection closed");
			} catch (err) {
				Logger.warn("WS", describeError(err));
			}
			this.setState("disconnected");
			if (signal?.aborted) break;

			Logger.info("WS", `Reconnecting in ${this.reconnectDelayMs / 1000} seconds...`);
			await this.sleep(this.reconnectDelayMs, signal);
		}
	}

	/**
	 * One connection lifetime. Resolves when an active session ends with a
	 * close, rejects when the handshake or a send fails.
	 */
	private runSession(signal?: AbortSignal): Promise<void> {
		return new Promise((resolve, reject) => {
			this._connectAttempts++;
			Logger.info("WS", "Connecting to gateway...");

			const ws = this.createSocket(this.url);
			let phase: GatewayState = "disconnected";
			let heartbeatTimer: ReturnType<typeof setInterval> | null = null;
			let settled = false;

			const helloTimer = setTimeout(() => {
				settle(new GatewayProtocolError("Timed out waiting for Hello"));
			}, this.helloTimeoutMs);

			const enter = (next: GatewayState) => {
				phase = next;
				this.setState(next);
			};

			const onAbort = () => settle();

			const settle = (err?: Error) => {
				if (settled) return;
				settled = true;
				clearTimeout(helloTimer);
				if (heartbeatTimer) {
					clearInterval(heartbeatTimer);
					heartbeatTimer = null;
				}
				signal?.removeEventListener("abort", onAbort);
				if (ws.readyState !== WebSocket.CLOSED) {
					ws.terminate();
				}
				if (err) {
					reject(err);
				} else {
					resolve();
				}
			};

			const send = (payload: string, what: string) => {
				try {
					ws.send(payload, (err) => {
						if (err) {
							settle(new GatewayTransportError(`Failed to send ${what}`, { cause: err }));
						}
					});
				} catch (err) {
					settle(new GatewayTransportError(`Failed to send ${what}`, { cause: err }));
				}
			};

			if (signal?.aborted) {
				settle();
				return;
			}
			signal?.addEventListener("abort", onAbort, { once: true });

			ws.on("open", () => {
				Logger.info("WS", "Connected to gateway");
				enter("awaiting-hello");
			});

			ws.on("error", (err) => {
				const what = phase === "disconnected" ? "Failed to connect" : "WebSocket error";
				settle(new GatewayTransportError(what, { cause: toError(err) }));
			});

			ws.on("close", () => {
				if (phase === "active") {
					settle();
				} else {
					settle(new GatewayTransportError("Connection closed before Hello"));
				}
			});

			ws.on("message", (data, isBinary) => {
				if (settled) return;

				if (phase === "awaiting-hello") {
					if (isBinary) {
						settle(new GatewayProtocolError("Expected text message for Hello"));
						return;
					}
					let heartbeatInterval: number;
					try {
						const frame = decodeFrame(data.toString());
						if (frame.kind !== "hello") {
							throw new GatewayProtocolError(`Expected op 10, got op ${frameOpcode(frame)}`);
						}
						heartbeatInterval = frame.heartbeatInterval;
					} catch (err) {
						settle(toError(err));
						return;
					}
					clearTimeout(helloTimer);
					Logger.info("WS", `Received Hello, heartbeat_interval: ${heartbeatInterval}ms`);

					enter("identifying");
					send(
						encodeIdentify(this.options.token, this.options.properties ?? DEFAULT_IDENTIFY_PROPERTIES),
						"Identify",
					);
					if (settled) return;
					Logger.info("WS", "Sent Identify payload");

					heartbeatTimer = setInterval(() => {
						this._heartbeatsSent++;
						send(encodeHeartbeat(), "heartbeat");
					}, heartbeatInterval);
					enter("active");
					return;
				}

				if (phase !== "active" || isBinary) return;

				try {
					const frame = decodeFrame(data.toString());
					if (frame.kind === "dispatch") {
						this.handleDispatch(frame);
					}
					// heartbeat-ack: acknowledged, timeliness is not tracked
				} catch (err) {
					Logger.debug("WS", `Ignoring malformed frame: ${describeError(err)}`);
				}
			});
		});
	}

	private handleDispatch(frame: DispatchFrame): void {
		if (frame.sequence !== null) {
			this._lastSequence = frame.sequence;
		}
		if (frame.eventType !== CHANNEL_UPDATE) return;

		const channel = decodeChannel(frame.payload);
		if (!channel || channel.id !== this.options.channelId) return;

		reconcileName(channel.name ?? null, {
			state: this.options.state,
			alert: this.options.alert,
			source: "WS",
		});
	}

	private setState(next: GatewayState): void {
		if (this._state === next) return;
		this._state = next;
		for (const listener of this.stateListeners) {
			listener(next);
		}
	}
}

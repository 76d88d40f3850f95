import { z } from "zod";
import { type Channel, ChannelSchema } from "../rest/fetcher.js";
import {
	GatewayOpcode,
	type GatewayMessage,
	type IdentifyPayload,
	type IdentifyProperties,
	type InboundFrame,
} from "./types.js";

export const CHANNEL_UPDATE = "CHANNEL_UPDATE";

export const DEFAULT_IDENTIFY_PROPERTIES: IdentifyProperties = {
	os: "linux",
	browser: "Chrome",
	device: "Chrome",
};

export class GatewayProtocolError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "GatewayProtocolError";
	}
}

const EnvelopeSchema = z.object({
	op: z.number().int(),
	s: z.number().int().nullish(),
	t: z.string().nullish(),
	d: z.unknown().optional(),
});

const HelloPayloadSchema = z.object({
	heartbeat_interval: z.number().int().positive(),
});

function parseEnvelope(raw: string): GatewayMessage {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (err) {
		throw new GatewayProtocolError("Frame is not valid JSON", { cause: err });
	}
	const parsed = EnvelopeSchema.safeParse(json);
	if (!parsed.success) {
		throw new GatewayProtocolError("Frame is missing an integer op", {
			cause: parsed.error,
		});
	}
	return parsed.data;
}

/**
 * Decode one text frame. The envelope is validated first, then the
 * payload according to its op.
 */
export function decodeFrame(raw: string): InboundFrame {
	const msg = parseEnvelope(raw);

	switch (msg.op) {
		case GatewayOpcode.Hello: {
			if (msg.d === undefined || msg.d === null) {
				throw new GatewayProtocolError("Hello message missing 'd' field");
			}
			const hello = HelloPayloadSchema.safeParse(msg.d);
			if (!hello.success) {
				throw new GatewayProtocolError("Failed to parse Hello payload", {
					cause: hello.error,
				});
			}
			return { kind: "hello", heartbeatInterval: hello.data.heartbeat_interval };
		}

		case GatewayOpcode.Dispatch:
			if (!msg.t) {
				throw new GatewayProtocolError("Dispatch frame missing event type");
			}
			return {
				kind: "dispatch",
				eventType: msg.t,
				sequence: msg.s ?? null,
				payload: msg.d ?? null,
			};

		case GatewayOpcode.HeartbeatAck:
			return { kind: "heartbeat-ack" };

		default:
			return { kind: "unknown", op: msg.op };
	}
}

export function frameOpcode(frame: InboundFrame): number {
	switch (frame.kind) {
		case "hello":
			return GatewayOpcode.Hello;
		case "dispatch":
			return GatewayOpcode.Dispatch;
		case "heartbeat-ack":
			return GatewayOpcode.HeartbeatAck;
		case "unknown":
			return frame.op;
	}
}

/** Decode a CHANNEL_UPDATE payload; `null` when it is not a channel. */
export function decodeChannel(payload: unknown): Channel | null {
	const parsed = ChannelSchema.safeParse(payload);
	return parsed.success ? parsed.data : null;
}

export function encodeIdentify(
	token: string,
	properties: IdentifyProperties = DEFAULT_IDENTIFY_PROPERTIES,
): string {
	const d: IdentifyPayload = { token, properties: { ...properties } };
	const frame: GatewayMessage = { op: GatewayOpcode.Identify, d };
	return JSON.stringify(frame);
}

export function encodeHeartbeat(): string {
	const frame: GatewayMessage = { op: GatewayOpcode.Heartbeat };
	return JSON.stringify(frame);
}

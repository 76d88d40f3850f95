/** Gateway v9 frame types (JSON text encoding) */

export const GatewayOpcode = {
	Dispatch: 0,
	Heartbeat: 1,
	Identify: 2,
	Hello: 10,
	HeartbeatAck: 11,
} as const;

export type GatewayOpcode = (typeof GatewayOpcode)[keyof typeof GatewayOpcode];

/** Raw envelope; every inbound and outbound frame is one of these. */
export interface GatewayMessage {
	op: number;
	s?: number | null;
	t?: string | null;
	d?: unknown;
}

export interface IdentifyProperties {
	os: string;
	browser: string;
	device: string;
}

export interface IdentifyPayload {
	token: string;
	properties: IdentifyProperties;
}

export interface HelloFrame {
	kind: "hello";
	heartbeatInterval: number;
}

export interface DispatchFrame {
	kind: "dispatch";
	eventType: string;
	sequence: number | null;
	payload: unknown;
}

export interface HeartbeatAckFrame {
	kind: "heartbeat-ack";
}

/** Well-formed frame with an op this client does not act on. */
export interface UnknownFrame {
	kind: "unknown";
	op: number;
}

export type InboundFrame = HelloFrame | DispatchFrame | HeartbeatAckFrame | UnknownFrame;

export type GatewayState = "disconnected" | "awaiting-hello" | "identifying" | "active";

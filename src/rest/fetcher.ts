import { z } from "zod";
import type { WatchedName } from "../state/last-name.js";

export const DEFAULT_API_BASE = "https://discord.com/api/v9";
export const USER_AGENT =
	"Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** REST and gateway shape of the watched channel. */
export const ChannelSchema = z.object({
	id: z.string(),
	name: z.string().nullish(),
});

export type Channel = z.infer<typeof ChannelSchema>;

export type FetchErrorKind = "network" | "status" | "decode";

export class FetchError extends Error {
	readonly kind: FetchErrorKind;
	readonly status?: number;

	constructor(
		kind: FetchErrorKind,
		message: string,
		options?: { status?: number; cause?: unknown },
	) {
		super(message, { cause: options?.cause });
		this.name = "FetchError";
		this.kind = kind;
		this.status = options?.status;
	}
}

export interface FetchChannelOptions {
	token: string;
	channelId: string;
	apiBase?: string;
	signal?: AbortSignal;
}

export type ChannelNameFetcher = (options: FetchChannelOptions) => Promise<WatchedName>;

export function channelUrl(apiBase: string, channelId: string): string {
	return `${apiBase.replace(/\/+$/, "")}/channels/${encodeURIComponent(channelId)}`;
}

/**
 * Fetch the current name of a channel.
 * Resolves `null` when the channel exists but has no name (e.g. a DM).
 */
export const fetchChannelName: ChannelNameFetcher = async ({
	token,
	channelId,
	apiBase = DEFAULT_API_BASE,
	signal,
}) => {
	let res: Response;
	try {
		res = await fetch(channelUrl(apiBase, channelId), {
			method: "GET",
			headers: {
				Authorization: token,
				"User-Agent": USER_AGENT,
			},
			signal,
		});
	} catch (err) {
		throw new FetchError("network", "Request failed", { cause: err });
	}

	if (!res.ok) {
		throw new FetchError("status", `HTTP ${res.status}`, { status: res.status });
	}

	let body: unknown;
	try {
		body = await res.json();
	} catch (err) {
		throw new FetchError("decode", "Response body is not valid JSON", {
			status: res.status,
			cause: err,
		});
	}

	const parsed = ChannelSchema.safeParse(body);
	if (!parsed.success) {
		throw new FetchError("decode", "Unexpected channel payload", {
			status: res.status,
			cause: parsed.error,
		});
	}
	return parsed.data.name ?? null;
};

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FetchError, type FetchChannelOptions } from "../../rest/fetcher.js";
import { LastNameStore, type WatchedName } from "../../state/last-name.js";
import { Poller } from "../poller.js";

type Step = WatchedName | Error;

/** Fetcher that replays `steps` and aborts the poller after the last one. */
function scriptedFetcher(steps: Step[], controller: AbortController) {
	let i = 0;
	return vi.fn(async (_options: FetchChannelOptions): Promise<WatchedName> => {
		const step = steps[i++];
		if (i >= steps.length) controller.abort();
		if (step instanceof Error) throw step;
		return step ?? null;
	});
}

describe("Poller", () => {
	beforeEach(() => {
		vi.spyOn(console, "info").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("alerts once per distinct change", async () => {
		const controller = new AbortController();
		const state = new LastNameStore("closed");
		const alert = { trigger: vi.fn<(name: string) => void>() };
		const fetcher = scriptedFetcher(["closed", "open", "open", "closed", "open"], controller);

		const poller = new Poller({
			token: "test-token",
			channelId: "123",
			state,
			alert,
			fetcher,
			sleep: async () => {},
		});
		await poller.run(controller.signal);

		expect(fetcher).toHaveBeenCalledTimes(5);
		expect(alert.trigger.mock.calls.map((c) => c[0])).toEqual(["open", "closed", "open"]);
		expect(state.read()).toBe("open");
	});

	it("passes token, channel and api base to the fetcher", async () => {
		const controller = new AbortController();
		const fetcher = scriptedFetcher(["x"], controller);

		await new Poller({
			token: "test-token",
			channelId: "987",
			apiBase: "http://127.0.0.1:1/api",
			state: new LastNameStore("x"),
			alert: { trigger: vi.fn() },
			fetcher,
			sleep: async () => {},
		}).run(controller.signal);

		expect(fetcher.mock.calls[0][0]).toMatchObject({
			token: "test-token",
			channelId: "987",
			apiBase: "http://127.0.0.1:1/api",
		});
	});

	it("survives a malformed response and keeps polling on schedule", async () => {
		const controller = new AbortController();
		const state = new LastNameStore("closed");
		const alert = { trigger: vi.fn<(name: string) => void>() };
		const fetcher = scriptedFetcher(
			[new FetchError("decode", "Response body is not valid JSON"), "open"],
			controller,
		);
		const sleeps: number[] = [];

		const poller = new Poller({
			token: "t",
			channelId: "123",
			state,
			alert,
			fetcher,
			intervalMs: 1_500,
			sleep: async (ms) => {
				sleeps.push(ms);
			},
		});
		await poller.run(controller.signal);

		expect(poller.polls).toBe(2);
		expect(poller.failures).toBe(1);
		expect(sleeps).toEqual([1_500, 1_500]);
		expect(alert.trigger).toHaveBeenCalledWith("open");
		expect(console.warn).toHaveBeenCalledWith(
			expect.stringContaining("[WARN] [POLL] Failed to fetch channel: Response body is not valid JSON"),
		);
	});

	it("does not fetch once aborted during the sleep", async () => {
		const controller = new AbortController();
		const fetcher = vi.fn(async () => "x");

		await new Poller({
			token: "t",
			channelId: "123",
			state: new LastNameStore(),
			alert: { trigger: vi.fn() },
			fetcher,
			sleep: async () => {
				controller.abort();
			},
		}).run(controller.signal);

		expect(fetcher).not.toHaveBeenCalled();
	});
});

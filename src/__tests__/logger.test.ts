import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger, describeError } from "../logger.js";

afterEach(() => {
	vi.unstubAllEnvs();
	vi.restoreAllMocks();
});

describe("Logger", () => {
	it("formats debug messages with component name when LOG_LEVEL=debug", () => {
		vi.stubEnv("LOG_LEVEL", "debug");
		const spy = vi.spyOn(globalThis.console, "debug").mockImplementation(() => {});
		Logger.debug("WS", "test message");
		expect(spy).toHaveBeenCalledOnce();
		const msg = spy.mock.calls[0][0];
		expect(msg).toContain("[DEBUG]");
		expect(msg).toContain("[WS]");
		expect(msg).toContain("test message");
	});

	it("suppresses debug messages by default", () => {
		vi.stubEnv("LOG_LEVEL", "");
		const spy = vi.spyOn(globalThis.console, "debug").mockImplementation(() => {});
		Logger.debug("WS", "hidden");
		expect(spy).not.toHaveBeenCalled();
	});

	it("formats info messages with component name", () => {
		const spy = vi.spyOn(globalThis.console, "info").mockImplementation(() => {});
		Logger.info("POLL", "Channel name changed to: general");
		expect(spy).toHaveBeenCalledOnce();
		const msg = spy.mock.calls[0][0];
		expect(msg).toMatch(/ \[INFO\] \[POLL\] Channel name changed to: general$/);
	});

	it("routes warn and error to their console methods", () => {
		const warn = vi.spyOn(globalThis.console, "warn").mockImplementation(() => {});
		const error = vi.spyOn(globalThis.console, "error").mockImplementation(() => {});
		Logger.warn("ALERT", "fallback used");
		Logger.error("MONITOR", "bootstrap failed");
		expect(warn.mock.calls[0][0]).toContain("[WARN] [ALERT] fallback used");
		expect(error.mock.calls[0][0]).toContain("[ERROR] [MONITOR] bootstrap failed");
	});

	it("drops info when LOG_LEVEL=warn", () => {
		vi.stubEnv("LOG_LEVEL", "warn");
		const spy = vi.spyOn(globalThis.console, "info").mockImplementation(() => {});
		Logger.info("POLL", "quiet");
		expect(spy).not.toHaveBeenCalled();
	});

	it("includes data as JSON when provided", () => {
		const spy = vi.spyOn(globalThis.console, "info").mockImplementation(() => {});
		Logger.info("Test", "with data", { key: "value" });
		const msg = spy.mock.calls[0][0];
		expect(msg).toContain('with data {"key":"value"}');
	});

	it("includes ISO timestamp", () => {
		const spy = vi.spyOn(globalThis.console, "info").mockImplementation(() => {});
		Logger.info("Test", "timestamp check");
		const msg = spy.mock.calls[0][0];
		expect(msg).toMatch(/^\[\d{4}-\d{2}-\d{2}T/);
	});
});

describe("describeError", () => {
	it("appends the cause message", () => {
		const err = new Error("Request failed", { cause: new Error("ECONNREFUSED") });
		expect(describeError(err)).toBe("Request failed: ECONNREFUSED");
	});

	it("stringifies non-errors", () => {
		expect(describeError("boom")).toBe("boom");
	});
});

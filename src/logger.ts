type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

function resolveThreshold(): LogLevel {
	const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
	if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
		return raw;
	}
	return "info";
}

function format(
	level: LogLevel,
	component: string,
	message: string,
	data?: unknown,
): string {
	const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${component}] ${message}`;
	if (data === undefined) return line;
	return `${line} ${JSON.stringify(data)}`;
}

function shouldLog(level: LogLevel): boolean {
	return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveThreshold()];
}

/** Component-tagged console logger. */
export const Logger = {
	debug(component: string, message: string, data?: unknown): void {
		if (!shouldLog("debug")) return;
		console.debug(format("debug", component, message, data));
	},

	info(component: string, message: string, data?: unknown): void {
		if (!shouldLog("info")) return;
		console.info(format("info", component, message, data));
	},

	warn(component: string, message: string, data?: unknown): void {
		if (!shouldLog("warn")) return;
		console.warn(format("warn", component, message, data));
	},

	error(component: string, message: string, data?: unknown): void {
		if (!shouldLog("error")) return;
		console.error(format("error", component, message, data));
	},
};

/** Render an unknown thrown value as a log-friendly string. */
export function describeError(err: unknown): string {
	if (err instanceof Error) {
		if (err.cause instanceof Error) {
			return `${err.message}: ${err.cause.message}`;
		}
		return err.message;
	}
	return String(err);
}

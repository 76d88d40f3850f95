import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";

const PidRecordSchema = z.object({
	pid: z.number().int().positive(),
	startedAt: z.string(),
});

export type PidRecord = z.infer<typeof PidRecordSchema>;

/** Read the PID record; `null` when the file is missing or unreadable. */
export function readPidFile(filePath: string): PidRecord | null {
	if (!existsSync(filePath)) return null;
	let raw: string;
	try {
		raw = readFileSync(filePath, "utf-8").trim();
	} catch {
		return null;
	}

	// Bare PID, as written by older versions or by hand
	if (/^\d+$/.test(raw)) {
		return { pid: Number(raw), startedAt: "" };
	}
	try {
		const parsed = PidRecordSchema.safeParse(JSON.parse(raw));
		return parsed.success ? parsed.data : null;
	} catch {
		return null;
	}
}

export function writePidFile(filePath: string, pid: number, startedAt: Date = new Date()): PidRecord {
	const record: PidRecord = { pid, startedAt: startedAt.toISOString() };
	mkdirSync(dirname(filePath), { recursive: true });
	writeFileSync(filePath, `${JSON.stringify(record)}\n`);
	return record;
}

export function removePidFile(filePath: string): void {
	rmSync(filePath, { force: true });
}

/** Signal 0 probes for existence without delivering anything. */
export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM: exists but owned by someone else
		return err instanceof Error && "code" in err && err.code === "EPERM";
	}
}

/** `<h>h <m>m <s>s` */
export function formatUptime(totalSeconds: number): string {
	const secs = Math.max(0, Math.floor(totalSeconds));
	const hours = Math.floor(secs / 3600);
	const minutes = Math.floor((secs % 3600) / 60);
	const seconds = secs % 60;
	return `${hours}h ${minutes}m ${seconds}s`;
}

/** Seconds since `startedAt`, or `null` when unknown. */
export function uptimeSeconds(record: PidRecord, now: Date = new Date()): number | null {
	if (!record.startedAt) return null;
	const started = Date.parse(record.startedAt);
	if (Number.isNaN(started)) return null;
	return (now.getTime() - started) / 1000;
}

import { Logger } from "../logger.js";
import type { LastNameStore, WatchedName } from "./last-name.js";

/** Anything that can raise an alert for a newly observed name. */
export interface NameAlerter {
	trigger(name: string): void;
}

export type DetectionSource = "POLL" | "WS";

export interface ReconcileContext {
	state: LastNameStore;
	alert: NameAlerter;
	source: DetectionSource;
}

/**
 * Compare an observed name against the shared state and alert on a real
 * change into a non-empty name. Returns whether the stored name changed.
 */
export function reconcileName(next: WatchedName, ctx: ReconcileContext): boolean {
	if (!ctx.state.compareAndSwap(next)) return false;

	if (next) {
		Logger.info(ctx.source, `Channel name changed to: ${next}`);
		ctx.alert.trigger(next);
	} else {
		Logger.info(ctx.source, "Channel name cleared");
	}
	return true;
}

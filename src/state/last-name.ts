/** Name of the watched channel; `null` when absent or not yet observed. */
export type WatchedName = string | null;

/**
 * Last observed channel name, shared by the poller and the gateway client.
 *
 * Every read-compare-write happens synchronously, so no other task can
 * interleave between the comparison and the store.
 */
export class LastNameStore {
	private value: WatchedName;

	constructor(initial: WatchedName = null) {
		this.value = initial;
	}

	read(): WatchedName {
		return this.value;
	}

	set(next: WatchedName): void {
		this.value = next;
	}

	/** Store `next` if it differs from the current value. Returns whether it changed. */
	compareAndSwap(next: WatchedName): boolean {
		if (this.value === next) return false;
		this.value = next;
		return true;
	}
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait `ms` milliseconds. Resolves early (never rejects) when `signal`
 * aborts, so loops can check `signal.aborted` right after.
 */
export const delay: Sleep = (ms, signal) =>
	new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});

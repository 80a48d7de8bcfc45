import type { Artifact, ArtifactStore } from "./artifact-store";

export interface WaitOptions {
	timeoutMs: number;
	pollIntervalMs: number;
	now?: () => number;
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Polls the store until its version passes `baseline`.
 * Resolves to the newer artifact, or null once the timeout has elapsed.
 */
export async function waitForArtifact(store: ArtifactStore, baseline: number, opts: WaitOptions): Promise<Artifact | null> {
	const now = opts.now ?? Date.now;
	const deadline = now() + opts.timeoutMs;

	for (;;) {
		if (store.version() > baseline) {
			return store.current();
		}
		const remaining = deadline - now();
		if (remaining <= 0) return null;
		await sleep(Math.min(opts.pollIntervalMs, remaining));
	}
}

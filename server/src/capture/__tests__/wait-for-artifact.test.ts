import { describe, expect, it } from "vitest";
import { ArtifactStore } from "../artifact-store";
import { waitForArtifact } from "../wait-for-artifact";

describe("waitForArtifact", () => {
	it("returns at once when the store is already past the baseline", async () => {
		const store = new ArtifactStore();
		store.write(Buffer.from("x"));

		const artifact = await waitForArtifact(store, 0, { timeoutMs: 1_000, pollIntervalMs: 500 });
		expect(artifact?.version).toBe(1);
	});

	it("picks up a write that happens while waiting", async () => {
		const store = new ArtifactStore();
		setTimeout(() => store.write(Buffer.from("late")), 15);

		const artifact = await waitForArtifact(store, 0, { timeoutMs: 1_000, pollIntervalMs: 5 });
		expect(artifact?.data.toString()).toBe("late");
	});

	it("gives up after the timeout", async () => {
		const store = new ArtifactStore();
		store.write(Buffer.from("old"));

		const started = Date.now();
		const artifact = await waitForArtifact(store, 1, { timeoutMs: 30, pollIntervalMs: 5 });

		expect(artifact).toBeNull();
		expect(Date.now() - started).toBeGreaterThanOrEqual(25);
	});

	it("uses the injected clock for the deadline", async () => {
		const store = new ArtifactStore();
		let t = 0;
		const now = () => {
			t += 100;
			return t;
		};

		const artifact = await waitForArtifact(store, 0, { timeoutMs: 250, pollIntervalMs: 1, now });
		expect(artifact).toBeNull();
	});
});

import { createServer } from "node:http";
import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";

import { createHarness } from "../../__tests__/harness";
import type { Harness, HarnessOptions } from "../../__tests__/harness";
import { createApp } from "../app";

let server: Server | null = null;

async function start(opts: HarnessOptions = {}): Promise<{ h: Harness; base: string }> {
	const h = createHarness({ capture: { timeoutMs: 40, pollIntervalMs: 5 }, ...opts });
	const app = createApp({ orchestrator: h.orchestrator, store: h.store, activity: h.activity, bus: h.bus, logger: h.logger });

	const s = createServer(app);
	server = s;
	await new Promise<void>(resolve => s.listen(0, "127.0.0.1", resolve));
	const addr = s.address();
	if (!addr || typeof addr === "string") throw new Error("server is not listening on a TCP port");
	return { h, base: `http://127.0.0.1:${addr.port}` };
}

afterEach(async () => {
	const s = server;
	server = null;
	if (!s) return;
	await new Promise<void>(resolve => {
		s.close(() => resolve());
		s.closeAllConnections();
	});
});

describe("HTTP API", () => {
	it("reports status", async () => {
		const { base } = await start();

		const res = await fetch(`${base}/api/status`);

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			broker: "fake-broker:1883",
			device_id: null,
			latest_image_url: null,
			state: "idle",
			activity: []
		});
	});

	it("reports the current device and session state after a wake signal", async () => {
		const { h, base } = await start();
		h.wake("esp32-001");

		const body = await (await fetch(`${base}/api/status`)).json();

		expect(body).toMatchObject({
			device_id: "esp32-001",
			state: "polling",
			latest_image_url: null,
			activity: [{ source: "server", message: "Wake signal from esp32-001: waiting for image" }]
		});
	});

	it("captures an image and serves it", async () => {
		const { h, base } = await start();
		h.bus.onPublished = () => {
			h.bus.deliver(h.topics.image, Buffer.from([0xff, 0xd8, 0x01, 0x02]));
		};

		const res = await fetch(`${base}/api/capture`, { method: "POST" });
		expect(await res.json()).toEqual({ ok: true, latest_image_url: "/images/current_image.jpg" });

		const img = await fetch(`${base}/images/current_image.jpg`);
		expect(img.status).toBe(200);
		expect(img.headers.get("cache-control")).toBe("no-store");
		expect(img.headers.get("content-type")).toBe("image/jpeg");
		expect(Buffer.from(await img.arrayBuffer())).toEqual(Buffer.from([0xff, 0xd8, 0x01, 0x02]));
	});

	it("answers a capture timeout with a negative body", async () => {
		const { h, base } = await start();

		const res = await fetch(`${base}/api/capture`, { method: "POST" });

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ ok: false, latest_image_url: null, reason: "timeout" });
		expect(h.orchestrator.status().state).toBe("idle");
		expect(h.bus.subscriptionCount(h.topics.imageStream)).toBe(0);
	});

	it("rejects a capture while a session is running", async () => {
		const { h, base } = await start();
		h.wake();

		const res = await fetch(`${base}/api/capture`, { method: "POST" });

		expect(await res.json()).toEqual({ ok: false, latest_image_url: null, reason: "busy" });
		expect(h.bus.published).toEqual([]);
	});

	it("runs a manual detection", async () => {
		const { h, base } = await start({ detections: [[{ label: "cup", confidence: 0.75 }]] });
		h.bus.onPublished = () => {
			h.bus.deliver(h.topics.image, Buffer.from("frame"));
		};

		const res = await fetch(`${base}/api/detect`, { method: "POST" });

		expect(await res.json()).toEqual({ detected: ["cup"], latest_image_url: "/images/current_image.jpg" });
		expect(h.speaker.spoken).toEqual(["I detected cup."]);
	});

	it("reports a failed publish on detect", async () => {
		const { h, base } = await start();
		h.bus.publishResult = false;

		const res = await fetch(`${base}/api/detect`, { method: "POST" });

		expect(await res.json()).toEqual({ detected: [], latest_image_url: null, reason: "publish-failed" });
	});

	it("answers malformed JSON bodies with 400", async () => {
		const { base } = await start();

		const res = await fetch(`${base}/api/capture`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: "{broken"
		});

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: { code: "BAD_REQUEST", message: "Request body is not valid JSON" } });
	});

	it("returns 404 for unknown images and before the first capture", async () => {
		const { h, base } = await start();

		const missing = await fetch(`${base}/images/current_image.jpg`);
		expect(missing.status).toBe(404);
		expect(await missing.json()).toEqual({ error: { code: "NOT_FOUND", message: "No image named current_image.jpg" } });

		h.store.write(Buffer.from("x"));
		const other = await fetch(`${base}/images/other.jpg`);
		expect(other.status).toBe(404);
	});

	it("returns 400 for image names with path components", async () => {
		const { base } = await start();

		const res = await fetch(`${base}/images/..%2Fsecret.jpg`);

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: { code: "BAD_REQUEST", message: "Invalid image name: ../secret.jpg" } });
	});

	it("lists the devices seen so far", async () => {
		const { h, base } = await start();
		h.wake("esp32-001");

		const body = await (await fetch(`${base}/api/devices`)).json();

		expect(body).toEqual({ devices: [{ device_id: "esp32-001", last_seen: expect.any(String) }] });
	});

	it("reports health", async () => {
		const { base } = await start();

		const res = await fetch(`${base}/health`);

		expect(await res.json()).toEqual({ status: "ok", broker: "fake-broker:1883", connected: true });
	});

	it("answers unknown routes with a JSON 404", async () => {
		const { base } = await start();

		const res = await fetch(`${base}/nope`);

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "No route for GET /nope" } });
	});
});

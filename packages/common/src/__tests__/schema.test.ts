import { describe, expect, it } from "vitest";
import { captureCommand } from "../messages";
import { CaptureCommandSchema, FrameStartSchema, WakeSignalSchema } from "../schema";

describe("WakeSignalSchema", () => {
	it("keeps extra fields", () => {
		const res = WakeSignalSchema.safeParse({ device_id: "esp32-001", timestamp: 1000, rssi: -61 });

		expect(res.success).toBe(true);
		if (res.success) {
			expect(res.data).toEqual({ device_id: "esp32-001", timestamp: 1000, rssi: -61 });
		}
	});

	it("accepts a payload without device_id or timestamp", () => {
		expect(WakeSignalSchema.safeParse({}).success).toBe(true);
	});

	it("rejects a non-numeric timestamp", () => {
		expect(WakeSignalSchema.safeParse({ device_id: "esp32-001", timestamp: "soon" }).success).toBe(false);
	});
});

describe("captureCommand", () => {
	it("stamps unix seconds", () => {
		const cmd = captureCommand(new Date(1_700_000_000_999));

		expect(cmd).toEqual({ action: "capture_once", ts: 1_700_000_000 });
		expect(CaptureCommandSchema.safeParse(cmd).success).toBe(true);
	});
});

describe("FrameStartSchema", () => {
	it("requires a positive chunk count", () => {
		expect(FrameStartSchema.safeParse({ image_id: 1, size: 10, total: 0 }).success).toBe(false);
		expect(FrameStartSchema.safeParse({ image_id: 1, size: 10, total: 1 }).success).toBe(true);
	});
});

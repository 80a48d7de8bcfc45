import { describe, expect, it } from "vitest";
import { ACTIVITY_LOG_CAPACITY, ActivityLog, formatTimestamp } from "../activity-log";

describe("formatTimestamp", () => {
	it("formats local time with zero padding", () => {
		expect(formatTimestamp(new Date(2024, 0, 5, 7, 8, 9))).toBe("2024-01-05 07:08:09");
		expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe("2023-12-31 23:59:58");
	});
});

describe("ActivityLog", () => {
	it("defaults to a capacity of 200", () => {
		const log = new ActivityLog();
		for (let i = 0; i < 250; i++) {
			log.push("server", `m${i}`);
		}

		const entries = log.snapshot();
		expect(ACTIVITY_LOG_CAPACITY).toBe(200);
		expect(log.size).toBe(200);
		expect(entries[0].message).toBe("m50");
		expect(entries[199].message).toBe("m249");
	});

	it("evicts the oldest entries first", () => {
		const log = new ActivityLog(3);
		for (const m of ["a", "b", "c", "d", "e"]) {
			log.push("server", m);
		}

		expect(log.snapshot().map(e => e.message)).toEqual(["c", "d", "e"]);
	});

	it("stamps entries with the clock", () => {
		const log = new ActivityLog(10, undefined, () => new Date(2024, 4, 17, 12, 0, 1));
		log.push("sightline/logs/esp32cam", "esp32cam: connected");

		expect(log.snapshot()).toEqual([
			{ time: "2024-05-17 12:00:01", source: "sightline/logs/esp32cam", message: "esp32cam: connected" }
		]);
	});

	it("returns a copy of frozen entries", () => {
		const log = new ActivityLog(10);
		log.append({ time: "2024-01-01 00:00:00", source: "server", message: "hello" });

		const snap = log.snapshot();
		snap.pop();

		expect(log.size).toBe(1);
		expect(Object.isFrozen(log.snapshot()[0])).toBe(true);
	});

	it("rejects a capacity that is not a positive integer", () => {
		expect(() => new ActivityLog(0)).toThrow(RangeError);
	});
});

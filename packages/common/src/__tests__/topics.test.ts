import { describe, expect, it } from "vitest";
import { buildTopics, frameTopic, parseFrameTopic } from "../topics";

describe("buildTopics", () => {
	it("lays out topics under the namespace", () => {
		const topics = buildTopics({ namespace: "sightline", deviceId: "esp32-001" });

		expect(topics).toEqual({
			namespace: "sightline",
			signal: "sightline/device/esp32-001/signal",
			image: "sightline/cam_image",
			imageStream: "sightline/cam_image/#",
			logs: "sightline/logs/#",
			logsPrefix: "sightline/logs/",
			command: "sightline/camera/command"
		});
	});

	it("honours an image topic override", () => {
		const topics = buildTopics({ namespace: "lab", deviceId: "d1", imageTopic: "cams/front" });

		expect(topics.image).toBe("cams/front");
		expect(topics.imageStream).toBe("cams/front/#");
		expect(topics.command).toBe("lab/camera/command");
	});
});

describe("parseFrameTopic", () => {
	const image = "sightline/cam_image";

	it("parses start, chunk and end topics", () => {
		expect(parseFrameTopic(image, "sightline/cam_image/7/start")).toEqual({ imageId: 7, part: "start" });
		expect(parseFrameTopic(image, "sightline/cam_image/7/chunk/12")).toEqual({ imageId: 7, part: "chunk", index: 12 });
		expect(parseFrameTopic(image, "sightline/cam_image/7/end")).toEqual({ imageId: 7, part: "end" });
	});

	it("is the inverse of frameTopic", () => {
		const part = { imageId: 3, part: "chunk", index: 0 } as const;
		expect(parseFrameTopic(image, frameTopic(image, part))).toEqual(part);
	});

	it("rejects the raw topic and unrelated shapes", () => {
		expect(parseFrameTopic(image, "sightline/cam_image")).toBeNull();
		expect(parseFrameTopic(image, "sightline/cam_image/abc/start")).toBeNull();
		expect(parseFrameTopic(image, "sightline/cam_image/1/chunk")).toBeNull();
		expect(parseFrameTopic(image, "sightline/cam_image/1/chunk/x")).toBeNull();
		expect(parseFrameTopic(image, "sightline/cam_image/1/middle")).toBeNull();
		expect(parseFrameTopic(image, "sightline/logs/esp32cam")).toBeNull();
	});
});

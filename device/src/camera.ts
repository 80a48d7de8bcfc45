import type winston from "winston";
import { CaptureCommandSchema } from "@sightline/common";
import type { TopicLayout } from "@sightline/common";

import { CHUNK_SIZE, buildFrameMessages } from "./frames";
import type { OutboundMessage } from "./frames";

export interface CameraOptions {
	topics: TopicLayout;
	frame: Buffer;
	/** Name used in the logs topic and log lines. */
	name: string;
	chunked: boolean;
	chunkSize?: number;
	firstImageId?: number;
}

export function logsTopic(namespace: string, source: string): string {
	return `${namespace}/logs/${source}`;
}

/**
 * Plays the camera: answers capture commands and wake signals with a frame,
 * and reports what it does on the logs topic.
 */
export class CameraEmulator {
	private nextImageId: number;

	constructor(
		private readonly opts: CameraOptions,
		private readonly logger: winston.Logger
	) {
		this.nextImageId = opts.firstImageId ?? 1;
	}

	get subscriptions(): string[] {
		return [this.opts.topics.command, this.opts.topics.signal];
	}

	respond(topic: string, payload: Buffer): OutboundMessage[] {
		const { topics } = this.opts;

		if (topic === topics.signal) {
			return this.capture("wakeword signal -> capture");
		}

		if (topic === topics.command) {
			let json: unknown;
			try {
				json = JSON.parse(payload.toString("utf8"));
			} catch {
				this.logger.warn("Ignoring non-JSON command");
				return [];
			}
			const res = CaptureCommandSchema.safeParse(json);
			if (!res.success) {
				this.logger.warn("Ignoring unknown command: %s", payload.toString("utf8"));
				return [];
			}
			return this.capture(`command ${res.data.action}`);
		}

		return [];
	}

	private capture(reason: string): OutboundMessage[] {
		const { topics, frame, name, chunked } = this.opts;
		const log = (message: string): OutboundMessage => ({
			topic: logsTopic(topics.namespace, name),
			payload: `${name}: ${message}`
		});

		this.logger.info("Capture (%s): %d bytes", reason, frame.length);

		if (!chunked) {
			return [log(reason), { topic: topics.image, payload: frame }, log("image published")];
		}

		const imageId = this.nextImageId++;
		return [
			log(reason),
			...buildFrameMessages(topics.image, imageId, frame, this.opts.chunkSize ?? CHUNK_SIZE),
			log("image published (chunked)")
		];
	}
}

import type winston from "winston";
import { WakeSignalSchema, parseFrameTopic } from "@sightline/common";
import type { TopicLayout } from "@sightline/common";

import type { ActivityLog } from "../activity/activity-log";
import type { Artifact, ArtifactStore } from "../capture/artifact-store";
import { errorMessage } from "../lib/errors";
import { FrameAssembler } from "./frame-assembler";

export interface WakeSignal {
	deviceId: string;
	timestamp: number;
	payload: Record<string, unknown>;
	receivedAt: Date;
}

/** Receiver of the events the router extracts from the bus. */
export interface SignalSink {
	wakeSignal(signal: WakeSignal): void;
	imageArrived(artifact: Artifact): void;
}

export type DeviceEventHandler = (deviceId: string, payload: unknown) => void;

export type RouteOutcome = "wake" | "image" | "frame" | "log" | "event" | "dropped";

export interface SignalRouterDeps {
	topics: TopicLayout;
	store: ArtifactStore;
	sink: SignalSink;
	activity: ActivityLog;
	logger: winston.Logger;
	frames?: FrameAssembler;
	clock?: () => Date;
}

/** Device id segment of "ns/device/{id}/signal". */
function deviceFromTopic(topic: string): string | undefined {
	const parts = topic.split("/");
	return parts.length === 4 && parts[1] === "device" ? parts[2] : undefined;
}

export class SignalRouter {
	private readonly handlers = new Map<string, DeviceEventHandler>();
	private readonly frames: FrameAssembler;
	private readonly clock: () => Date;

	constructor(private readonly deps: SignalRouterDeps) {
		this.frames = deps.frames ?? new FrameAssembler(deps.logger);
		this.clock = deps.clock ?? (() => new Date());
	}

	/** Routes JSON messages on "ns/device/{id}/{eventType}" to `handler`. */
	register(eventType: string, handler: DeviceEventHandler): void {
		this.handlers.set(eventType, handler);
	}

	dispatch(topic: string, payload: Buffer): RouteOutcome {
		const { topics, logger } = this.deps;
		try {
			if (topic === topics.signal) {
				return this.wake(topic, payload);
			}

			if (topic === topics.image) {
				this.storeFrame(payload);
				return "image";
			}

			const part = parseFrameTopic(topics.image, topic);
			if (part) {
				const res = this.frames.accept(part, payload);
				if (res.kind === "complete") {
					this.storeFrame(res.frame);
				}
				return res.kind === "dropped" ? "dropped" : "frame";
			}

			if (topic.startsWith(topics.logsPrefix)) {
				this.deps.activity.push(topic, payload.toString("utf8"));
				return "log";
			}

			return this.event(topic, payload);
		} catch (err) {
			logger.error("Error processing message on %s: %s", topic, errorMessage(err));
			return "dropped";
		}
	}

	private wake(topic: string, payload: Buffer): RouteOutcome {
		const json = this.parseJson(topic, payload);
		if (json === undefined) return "dropped";

		const res = WakeSignalSchema.safeParse(json);
		if (!res.success) {
			this.deps.logger.warn("Invalid wake signal on %s: %s", topic, res.error.issues.map(i => i.message).join("; "));
			return "dropped";
		}

		const deviceId = res.data.device_id ?? deviceFromTopic(topic) ?? "unknown";
		const timestamp = res.data.timestamp ?? 0;
		this.deps.logger.info("Wake signal from device %s at timestamp %d", deviceId, timestamp);

		this.deps.sink.wakeSignal({ deviceId, timestamp, payload: res.data, receivedAt: this.clock() });
		return "wake";
	}

	private event(topic: string, payload: Buffer): RouteOutcome {
		const { logger } = this.deps;
		const json = this.parseJson(topic, payload);
		if (json === undefined) return "dropped";

		const parts = topic.split("/");
		if (parts.length !== 4) {
			logger.warn("Unroutable topic %s", topic);
			return "dropped";
		}

		const [, , deviceId, eventType] = parts;
		const handler = this.handlers.get(eventType);
		if (!handler) {
			logger.warn("No handler registered for event type %s (device %s)", eventType, deviceId);
			return "dropped";
		}

		logger.info("Processing %s from device %s", eventType, deviceId);
		handler(deviceId, json);
		return "event";
	}

	private storeFrame(data: Buffer): void {
		const artifact = this.deps.store.write(data);
		this.deps.logger.info("Image received: %d bytes, version %d", data.length, artifact.version);
		this.deps.sink.imageArrived(artifact);
	}

	private parseJson(topic: string, payload: Buffer): unknown {
		try {
			return JSON.parse(payload.toString("utf8"));
		} catch {
			this.deps.logger.warn("Received non-JSON message on %s (%d bytes)", topic, payload.length);
			return undefined;
		}
	}
}

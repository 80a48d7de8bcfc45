import type winston from "winston";
import { captureCommand } from "@sightline/common";
import type { ManualFailureReason, SessionState, TopicLayout } from "@sightline/common";

import type { ActivityLog } from "../activity/activity-log";
import type { Bus } from "../bus/types";
import type { SignalSink, WakeSignal } from "../bus/signal-router";
import type { Gateway } from "../gateway/types";
import type { CaptureConfig } from "../lib/config";
import { errorMessage } from "../lib/errors";
import type { Artifact, ArtifactStore } from "./artifact-store";
import { Session } from "./session";
import type { SessionLease, SessionOwner } from "./session";
import { waitForArtifact } from "./wait-for-artifact";

/** Devices remembered for `knownDevices()`; the one seen longest ago is forgotten first. */
export const MAX_KNOWN_DEVICES = 64;

export type ManualCaptureResult = { status: "captured"; artifact: Artifact } | { status: ManualFailureReason };

export type ManualDetectResult =
	| { status: "detected"; artifact: Artifact; labels: string[] }
	| { status: ManualFailureReason };

export interface DeviceRecord {
	deviceId: string;
	lastSeen: Date;
}

export interface OrchestratorStatus {
	state: SessionState;
	owner: SessionOwner | null;
	deviceId: string | null;
	targetVersion: number | null;
	imageStreamOpen: boolean;
}

export interface OrchestratorOptions {
	bus: Pick<Bus, "subscribe" | "unsubscribe" | "publish">;
	topics: TopicLayout;
	store: ArtifactStore;
	gateway: Gateway;
	activity: ActivityLog;
	logger: winston.Logger;
	capture: CaptureConfig;
	session?: Session;
	clock?: () => Date;
	maxDevices?: number;
}

/**
 * The image-stream subscription. Opened and closed only by the session lease holder,
 * so the broker never sees it more than once.
 */
class ImageStream {
	private opened = false;

	constructor(
		private readonly bus: Pick<Bus, "subscribe" | "unsubscribe">,
		private readonly topic: string,
		private readonly logger: winston.Logger
	) {}

	get isOpen(): boolean {
		return this.opened;
	}

	async open(): Promise<boolean> {
		if (this.opened) return true;
		this.opened = true;
		const ok = await this.bus.subscribe(this.topic);
		if (!ok) {
			// Stays open: the reconnect handler subscribes it again
			this.logger.warn("Image stream %s not subscribed yet", this.topic);
		}
		return ok;
	}

	async close(): Promise<void> {
		if (!this.opened) return;
		this.opened = false;
		await this.bus.unsubscribe(this.topic);
	}

	/** After a reconnect the broker has forgotten the subscription. */
	async restore(): Promise<boolean> {
		if (!this.opened) return true;
		this.logger.info("Restoring image stream %s", this.topic);
		return this.bus.subscribe(this.topic);
	}
}

/**
 * Drives the capture session.
 *
 * Autonomous: wake signal -> polling -> (image) -> detecting -> announce -> idle,
 * or back to polling when nothing was recognized.
 * Manual capture/detect take the same session and fail fast when it is busy.
 */
export class CaptureOrchestrator implements SignalSink {
	private readonly session: Session;
	private readonly stream: ImageStream;
	private readonly clock: () => Date;
	private readonly devices = new Map<string, Date>();
	private readonly inFlight = new Set<Promise<void>>();

	private signalLease: SessionLease | null = null;
	private currentDevice: string | null = null;
	private stopping = false;

	constructor(private readonly opts: OrchestratorOptions) {
		this.session = opts.session ?? new Session();
		this.stream = new ImageStream(opts.bus, opts.topics.imageStream, opts.logger);
		this.clock = opts.clock ?? (() => new Date());
	}

	/* ---------- autonomous flow ---------- */

	wakeSignal(signal: WakeSignal): void {
		const { logger, store, activity } = this.opts;
		this.seen(signal.deviceId, signal.receivedAt);

		if (this.stopping) return;

		if (!this.session.isIdle()) {
			logger.info("Wake signal from %s ignored: session is %s", signal.deviceId, this.session.current);
			return;
		}

		store.clear();
		const lease = this.session.tryBegin({ kind: "signal", deviceId: signal.deviceId }, store.version() + 1);
		if (!lease) return;

		this.signalLease = lease;
		this.currentDevice = signal.deviceId;
		activity.push("server", `Wake signal from ${signal.deviceId}: waiting for image`);

		this.track(this.stream.open(), "Opening image stream");
	}

	imageArrived(artifact: Artifact): void {
		const lease = this.signalLease;
		if (!lease || !this.session.holds(lease) || this.session.current !== "polling") return;

		const target = this.session.target();
		if (target === null || artifact.version < target) return;

		this.session.toDetecting(lease);
		this.track(this.runDetection(lease, artifact), "Detection");
	}

	handleReconnect(): void {
		if (!this.stream.isOpen) return;
		this.track(this.stream.restore(), "Restoring image stream");
	}

	private async runDetection(lease: SessionLease, artifact: Artifact): Promise<void> {
		const { logger, store, gateway, activity } = this.opts;
		logger.info("Image received, stopping fetch and starting detection (version %d)", artifact.version);

		try {
			await this.stream.close();
			const result = await gateway.detect(artifact);
			if (!this.session.holds(lease)) return;

			activity.push("server", `Detection result: ${JSON.stringify(result.labels)}`);

			if (result.labels.length > 0) {
				await gateway.announce(result.labels);
				this.finish(lease);
				return;
			}

			logger.info("No objects detected, continuing to fetch images");
			this.session.toPolling(lease, store.version() + 1);
			await this.stream.open();
		} catch (err) {
			logger.error("Detection session failed: %s", errorMessage(err));
			await this.stream.close();
			this.finish(lease);
		}
	}

	private finish(lease: SessionLease): void {
		this.session.end(lease);
		if (this.signalLease === lease) {
			this.signalLease = null;
		}
	}

	/* ---------- manual flows ---------- */

	async manualCapture(): Promise<ManualCaptureResult> {
		const { logger, activity, store } = this.opts;
		const baseline = store.version();
		const lease = this.begin("capture", baseline);
		if (!lease) {
			logger.warn("Manual capture rejected: session is %s", this.session.current);
			return { status: "busy" };
		}

		try {
			const ok = await this.requestFrame();
			activity.push("server", `Capture command sent: ${ok}`);
			if (!ok) return { status: "publish-failed" };

			const artifact = await waitForArtifact(store, baseline, this.opts.capture);
			if (!artifact) {
				logger.warn("Manual capture: no fresh image within %d ms", this.opts.capture.timeoutMs);
				return { status: "timeout" };
			}
			return { status: "captured", artifact };
		} finally {
			await this.stream.close();
			this.session.end(lease);
		}
	}

	async manualDetect(): Promise<ManualDetectResult> {
		const { logger, activity, store, gateway } = this.opts;
		const baseline = store.version();
		const lease = this.begin("detect", baseline);
		if (!lease) {
			logger.warn("Manual detect rejected: session is %s", this.session.current);
			return { status: "busy" };
		}

		try {
			const ok = await this.requestFrame();
			activity.push("server", ok ? "Detect command: capture_once sent" : "Detect command: capture_once failed");
			if (!ok) return { status: "publish-failed" };

			const artifact = await waitForArtifact(store, baseline, this.opts.capture);
			if (!artifact) {
				logger.info("Manual detect: no fresh image within %d ms", this.opts.capture.timeoutMs);
				activity.push("server", "Detection result: []");
				return { status: "timeout" };
			}

			this.session.toDetecting(lease);
			await this.stream.close();

			const { labels } = await gateway.detect(artifact);
			if (labels.length > 0) {
				await gateway.announce(labels);
			}
			activity.push("server", `Detection result: ${JSON.stringify(labels)}`);
			return { status: "detected", artifact, labels };
		} finally {
			await this.stream.close();
			this.session.end(lease);
		}
	}

	private begin(action: "capture" | "detect", baseline: number): SessionLease | null {
		if (this.stopping) return null;
		const deadline = this.clock().getTime() + this.opts.capture.timeoutMs;
		return this.session.tryBegin({ kind: "manual", action }, baseline + 1, deadline);
	}

	private async requestFrame(): Promise<boolean> {
		await this.stream.open();
		const command = captureCommand(this.clock());
		return this.opts.bus.publish(this.opts.topics.command, JSON.stringify(command));
	}

	/* ---------- inspection and lifecycle ---------- */

	status(): OrchestratorStatus {
		const snap = this.session.snapshot();
		return {
			state: snap.state,
			owner: snap.owner,
			deviceId: this.currentDevice,
			targetVersion: snap.targetVersion,
			imageStreamOpen: this.stream.isOpen
		};
	}

	private seen(deviceId: string, at: Date): void {
		this.devices.delete(deviceId);
		this.devices.set(deviceId, at);
		const max = this.opts.maxDevices ?? MAX_KNOWN_DEVICES;
		for (const oldest of this.devices.keys()) {
			if (this.devices.size <= max) break;
			this.devices.delete(oldest);
		}
	}

	knownDevices(): DeviceRecord[] {
		return [...this.devices].map(([deviceId, lastSeen]) => ({ deviceId, lastSeen }));
	}

	/** Resolves once no autonomous work is running. */
	async settled(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}

	async shutdown(): Promise<void> {
		this.stopping = true;
		const lease = this.signalLease;
		if (lease) {
			this.finish(lease);
		}
		await this.stream.close();
		await this.settled();
	}

	private track(work: Promise<unknown>, what: string): void {
		const p: Promise<void> = work
			.then(
				() => undefined,
				err => {
					this.opts.logger.error("%s failed: %s", what, errorMessage(err));
				}
			)
			.finally(() => {
				this.inFlight.delete(p);
			});
		this.inFlight.add(p);
	}
}

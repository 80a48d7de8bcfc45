import type winston from "winston";

import type { Artifact } from "../capture/artifact-store";
import { AppError, announcementFailed, detectionFailed, errorMessage } from "../lib/errors";
import type { Detection, DetectionResult, Detector, Gateway, Speaker } from "./types";

export const CONFIDENCE_THRESHOLD = 0.5;

/** Labels above the threshold, duplicates collapsed to their first occurrence. */
export function collectLabels(detections: readonly Detection[], threshold = CONFIDENCE_THRESHOLD): string[] {
	const seen = new Set<string>();
	for (const d of detections) {
		if (d.confidence > threshold) {
			seen.add(d.label);
		}
	}
	return [...seen];
}

export function announcementText(labels: readonly string[]): string {
	return `I detected ${labels.join(", and ")}.`;
}

export interface GatewayOptions {
	detector: Detector;
	speaker: Speaker;
	logger: winston.Logger;
	announceTimeoutMs: number;
}

/**
 * Front for the detector and the speaker. Neither method rejects:
 * detection failures count as "nothing seen", announcement failures are logged.
 */
export class DetectionGateway implements Gateway {
	constructor(private readonly opts: GatewayOptions) {}

	async detect(artifact: Artifact): Promise<DetectionResult> {
		const { logger } = this.opts;
		try {
			const detections = await this.opts.detector.detect(artifact);
			const labels = collectLabels(detections);
			logger.info("Detection on version %d: [%s]", artifact.version, labels.join(", "));
			return { labels, version: artifact.version };
		} catch (err) {
			const e = err instanceof AppError ? err : detectionFailed(errorMessage(err), err);
			logger.error("Detection failed on version %d [%s]: %s", artifact.version, e.code, e.message);
			return { labels: [], version: artifact.version };
		}
	}

	async announce(labels: readonly string[]): Promise<void> {
		if (labels.length === 0) return;

		const { logger, speaker, announceTimeoutMs } = this.opts;
		const text = announcementText(labels);
		const controller = new AbortController();
		let timer: NodeJS.Timeout | undefined;

		const timeout = new Promise<"timeout">(resolve => {
			timer = setTimeout(() => resolve("timeout"), announceTimeoutMs);
		});

		logger.info("Announcing: '%s'", text);
		try {
			const outcome = await Promise.race([speaker.speak(text, controller.signal).then(() => "done" as const), timeout]);
			if (outcome === "timeout") {
				controller.abort();
				logger.warn("Announcement aborted after %d ms", announceTimeoutMs);
			} else {
				logger.info("Announcement completed");
			}
		} catch (err) {
			const e = err instanceof AppError ? err : announcementFailed(errorMessage(err), err);
			logger.error("Announcement failed [%s]: %s", e.code, e.message);
		} finally {
			clearTimeout(timer);
		}
	}
}

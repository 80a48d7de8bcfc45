import type winston from "winston";
import { z } from "zod";

import type { Artifact } from "../capture/artifact-store";
import type { DetectorConfig } from "../lib/config";
import { detectionFailed } from "../lib/errors";
import type { Detection, Detector } from "./types";

export const DetectionsSchema = z.object({
	detections: z.array(
		z.object({
			label: z.string().min(1),
			confidence: z.number().min(0).max(1)
		})
	)
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** Sends the frame to an HTTP inference service and returns its raw detections. */
export class HttpDetector implements Detector {
	constructor(
		private readonly config: DetectorConfig,
		private readonly logger: winston.Logger,
		private readonly fetchImpl: FetchLike = fetch
	) {}

	async detect(artifact: Artifact, signal?: AbortSignal): Promise<Detection[]> {
		const timeout = AbortSignal.timeout(this.config.timeoutMs);
		const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

		this.logger.debug("Posting %d bytes (version %d) to %s", artifact.data.length, artifact.version, this.config.url);

		let res: Response;
		try {
			res = await this.fetchImpl(this.config.url, {
				method: "POST",
				headers: { "content-type": "image/jpeg" },
				body: artifact.data,
				signal: combined
			});
		} catch (err) {
			throw detectionFailed(`Detector request to ${this.config.url} failed`, err);
		}

		if (!res.ok) {
			throw detectionFailed(`Detector responded with HTTP ${res.status}`);
		}

		let body: unknown;
		try {
			body = await res.json();
		} catch (err) {
			throw detectionFailed("Detector response is not JSON", err);
		}

		const parsed = DetectionsSchema.safeParse(body);
		if (!parsed.success) {
			throw detectionFailed("Detector response has an unexpected shape", parsed.error.issues);
		}
		return parsed.data.detections;
	}
}

import type { Artifact } from "../capture/artifact-store";

export interface Detection {
	label: string;
	confidence: number;
}

export interface DetectionResult {
	/** Unique, in first-seen order. */
	labels: string[];
	version: number;
}

/**
 * Detector is the contract with the external object detector.
 * It may reject; the gateway turns failures into an empty result.
 */
export interface Detector {
	detect(artifact: Artifact, signal?: AbortSignal): Promise<Detection[]>;
}

/** Speaks a sentence and resolves once playback is done. Must stop when `signal` aborts. */
export interface Speaker {
	speak(text: string, signal: AbortSignal): Promise<void>;
}

export interface Gateway {
	detect(artifact: Artifact): Promise<DetectionResult>;
	announce(labels: readonly string[]): Promise<void>;
}

import type winston from "winston";
import { FrameEndSchema, FrameStartSchema } from "@sightline/common";
import type { FramePart } from "@sightline/common";

export const MAX_PENDING_FRAMES = 4;

export type AssemblyResult =
	| { kind: "pending" }
	| { kind: "complete"; imageId: number; frame: Buffer }
	| { kind: "dropped"; imageId: number; reason: string };

interface PendingFrame {
	size: number;
	total: number;
	chunks: Map<number, Buffer>;
}

function parseJson(payload: Buffer): unknown {
	try {
		return JSON.parse(payload.toString("utf8"));
	} catch {
		return undefined;
	}
}

/**
 * Reassembles frames the camera publishes in pieces:
 * `{image}/{id}/start` announces size and chunk count, `{image}/{id}/chunk/{idx}` carries the bytes,
 * `{image}/{id}/end` closes the frame.
 */
export class FrameAssembler {
	private readonly pending = new Map<number, PendingFrame>();

	constructor(
		private readonly logger: winston.Logger,
		private readonly maxPending: number = MAX_PENDING_FRAMES
	) {}

	get pendingCount(): number {
		return this.pending.size;
	}

	accept(part: FramePart, payload: Buffer): AssemblyResult {
		switch (part.part) {
			case "start":
				return this.start(part.imageId, payload);
			case "chunk":
				return this.chunk(part.imageId, part.index, payload);
			case "end":
				return this.end(part.imageId, payload);
		}
	}

	private start(imageId: number, payload: Buffer): AssemblyResult {
		const res = FrameStartSchema.safeParse(parseJson(payload));
		if (!res.success || res.data.image_id !== imageId) {
			return this.drop(imageId, "invalid start message");
		}

		// A repeated start restarts the frame
		this.pending.delete(imageId);
		while (this.pending.size >= this.maxPending) {
			const oldest = this.pending.keys().next();
			if (oldest.done) break;
			this.pending.delete(oldest.value);
			this.logger.warn("Frame %d evicted: too many pending frames", oldest.value);
		}

		this.pending.set(imageId, { size: res.data.size, total: res.data.total, chunks: new Map() });
		this.logger.debug("Frame %d started: %d bytes in %d chunks", imageId, res.data.size, res.data.total);
		return { kind: "pending" };
	}

	private chunk(imageId: number, index: number, payload: Buffer): AssemblyResult {
		const frame = this.pending.get(imageId);
		if (!frame) {
			return this.drop(imageId, `chunk ${index} without start`);
		}
		if (index >= frame.total) {
			return this.drop(imageId, `chunk ${index} out of range (total ${frame.total})`);
		}
		frame.chunks.set(index, Buffer.from(payload));
		return { kind: "pending" };
	}

	private end(imageId: number, payload: Buffer): AssemblyResult {
		const frame = this.pending.get(imageId);
		if (!frame) {
			return this.drop(imageId, "end without start");
		}
		this.pending.delete(imageId);

		const res = FrameEndSchema.safeParse(parseJson(payload));
		if (!res.success || res.data.image_id !== imageId) {
			return this.drop(imageId, "invalid end message");
		}

		if (frame.chunks.size !== frame.total) {
			return this.drop(imageId, `missing chunks (${frame.chunks.size}/${frame.total})`);
		}

		const parts: Buffer[] = [];
		for (let i = 0; i < frame.total; i++) {
			const c = frame.chunks.get(i);
			if (!c) return this.drop(imageId, `missing chunk ${i}`);
			parts.push(c);
		}

		const data = Buffer.concat(parts);
		if (data.length !== frame.size) {
			return this.drop(imageId, `size mismatch (${data.length} != ${frame.size})`);
		}

		this.logger.debug("Frame %d complete: %d bytes", imageId, data.length);
		return { kind: "complete", imageId, frame: data };
	}

	private drop(imageId: number, reason: string): AssemblyResult {
		this.pending.delete(imageId);
		this.logger.warn("Frame %d dropped: %s", imageId, reason);
		return { kind: "dropped", imageId, reason };
	}
}

import { frameTopic } from "@sightline/common";
import type { FrameEnd, FrameStart } from "@sightline/common";

// Same chunk size as the camera firmware
export const CHUNK_SIZE = 2048;

export interface OutboundMessage {
	topic: string;
	payload: string | Buffer;
}

export function splitFrame(data: Buffer, chunkSize: number = CHUNK_SIZE): Buffer[] {
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
	}
	const chunks: Buffer[] = [];
	for (let offset = 0; offset < data.length; offset += chunkSize) {
		chunks.push(data.subarray(offset, offset + chunkSize));
	}
	return chunks;
}

/** start, one message per chunk, end. */
export function buildFrameMessages(imageTopic: string, imageId: number, data: Buffer, chunkSize: number = CHUNK_SIZE): OutboundMessage[] {
	if (data.length === 0) {
		throw new RangeError("Cannot send an empty frame");
	}

	const chunks = splitFrame(data, chunkSize);
	const start: FrameStart = { image_id: imageId, size: data.length, total: chunks.length };
	const end: FrameEnd = { image_id: imageId };

	return [
		{ topic: frameTopic(imageTopic, { imageId, part: "start" }), payload: JSON.stringify(start) },
		...chunks.map((chunk, index) => ({ topic: frameTopic(imageTopic, { imageId, part: "chunk", index }), payload: chunk })),
		{ topic: frameTopic(imageTopic, { imageId, part: "end" }), payload: JSON.stringify(end) }
	];
}

import { z } from "zod";

// device_id and timestamp are optional on the wire; the router fills them from the topic
export const WakeSignalSchema = z
	.object({
		device_id: z.string().min(1).optional(),
		timestamp: z.number().finite().optional()
	})
	.passthrough();

export const CaptureCommandSchema = z.object({
	action: z.literal("capture_once"),
	ts: z.number().int().nonnegative()
});

export const FrameStartSchema = z.object({
	image_id: z.number().int().nonnegative(),
	size: z.number().int().positive(),
	total: z.number().int().positive()
});

export const FrameEndSchema = z.object({
	image_id: z.number().int().nonnegative()
});

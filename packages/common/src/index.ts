// Message and HTTP response shapes (used by server + device)
export { captureCommand } from "./messages";
export type {
	ActivityEntry,
	CaptureCommand,
	CaptureResponse,
	DetectResponse,
	FrameEnd,
	FrameStart,
	ManualFailureReason,
	SessionState,
	StatusResponse,
	WakeSignalPayload
} from "./messages";

// Validation schemas for inbound bus payloads
export { CaptureCommandSchema, FrameEndSchema, FrameStartSchema, WakeSignalSchema } from "./schema";

// Topic layout
export { buildTopics, frameTopic, parseFrameTopic } from "./topics";
export type { FramePart, TopicLayout, TopicOptions } from "./topics";

// Wire shapes shared by the server and the device simulator.

export interface WakeSignalPayload {
	device_id: string;
	timestamp: number; // device uptime in ms or unix time, whatever the firmware sends
	[key: string]: unknown;
}

export interface CaptureCommand {
	action: "capture_once";
	ts: number; // unix seconds
}

export interface FrameStart {
	image_id: number;
	size: number;
	total: number;
}

export interface FrameEnd {
	image_id: number;
}

export interface ActivityEntry {
	time: string; // YYYY-MM-DD HH:MM:SS, server local time
	source: string;
	message: string;
}

export type SessionState = "idle" | "polling" | "detecting";

export type ManualFailureReason = "busy" | "publish-failed" | "timeout";

export interface CaptureResponse {
	ok: boolean;
	latest_image_url: string | null;
	reason?: ManualFailureReason;
}

export interface DetectResponse {
	detected: string[];
	latest_image_url: string | null;
	reason?: ManualFailureReason;
}

export interface StatusResponse {
	broker: string;
	device_id: string | null;
	latest_image_url: string | null;
	state: SessionState;
	activity: ActivityEntry[];
}

export function captureCommand(now: Date = new Date()): CaptureCommand {
	return { action: "capture_once", ts: Math.floor(now.getTime() / 1000) };
}

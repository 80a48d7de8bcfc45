import express from "express";
import type { Express } from "express";
import type winston from "winston";
import type { CaptureResponse, DetectResponse, StatusResponse } from "@sightline/common";

import type { ActivityLog } from "../activity/activity-log";
import type { Bus } from "../bus/types";
import type { ArtifactStore } from "../capture/artifact-store";
import type { CaptureOrchestrator } from "../capture/orchestrator";
import { badRequest, notFound } from "../lib/errors";
import { errorHandler, httpEndpoint } from "./endpoint";

export const IMAGE_FILENAME = "current_image.jpg";
export const IMAGE_URL = `/images/${IMAGE_FILENAME}`;

export interface AppDeps {
	orchestrator: Pick<CaptureOrchestrator, "manualCapture" | "manualDetect" | "status" | "knownDevices">;
	store: ArtifactStore;
	activity: ActivityLog;
	bus: Pick<Bus, "describe" | "isConnected">;
	logger: winston.Logger;
}

export function createApp(deps: AppDeps): Express {
	const { orchestrator, store, activity, bus, logger } = deps;
	const app = express();

	app.disable("x-powered-by");
	app.use(express.json());

	const latestImageUrl = (): string | null => (store.current() ? IMAGE_URL : null);

	app.post(
		"/api/capture",
		httpEndpoint(logger, "capture", async (): Promise<CaptureResponse> => {
			const result = await orchestrator.manualCapture();
			if (result.status === "captured") {
				return { ok: true, latest_image_url: IMAGE_URL };
			}
			return { ok: false, latest_image_url: null, reason: result.status };
		})
	);

	app.post(
		"/api/detect",
		httpEndpoint(logger, "detect", async (): Promise<DetectResponse> => {
			const result = await orchestrator.manualDetect();
			if (result.status === "detected") {
				return { detected: result.labels, latest_image_url: IMAGE_URL };
			}
			return { detected: [], latest_image_url: null, reason: result.status };
		})
	);

	app.get(
		"/api/status",
		httpEndpoint(logger, "status", async (): Promise<StatusResponse> => {
			const status = orchestrator.status();
			return {
				broker: bus.describe(),
				device_id: status.deviceId,
				latest_image_url: latestImageUrl(),
				state: status.state,
				activity: activity.snapshot()
			};
		})
	);

	app.get(
		"/api/devices",
		httpEndpoint(logger, "devices", async () => ({
			devices: orchestrator.knownDevices().map(d => ({
				device_id: d.deviceId,
				last_seen: d.lastSeen.toISOString()
			}))
		}))
	);

	app.get(
		"/images/:filename",
		httpEndpoint(logger, "image", async ({ req, res }) => {
			const filename = req.params.filename;
			if (filename.includes("/") || filename.includes("\\") || filename.includes("..")) {
				throw badRequest(`Invalid image name: ${filename}`);
			}

			const artifact = store.current();
			if (filename !== IMAGE_FILENAME || !artifact) {
				throw notFound(`No image named ${filename}`);
			}

			res.set("Cache-Control", "no-store").type("image/jpeg").send(artifact.data);
			return undefined;
		})
	);

	app.get(
		"/health",
		httpEndpoint(logger, "health", async () => ({
			status: "ok",
			broker: bus.describe(),
			connected: bus.isConnected()
		}))
	);

	app.use(
		httpEndpoint(logger, "http", async ({ req }) => {
			throw notFound(`No route for ${req.method} ${req.path}`);
		})
	);

	app.use(errorHandler(logger));

	return app;
}

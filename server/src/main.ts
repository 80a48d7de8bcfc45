import { createServer } from "node:http";
import type { Server } from "node:http";
import process from "node:process";
import type winston from "winston";
import { buildTopics } from "@sightline/common";

import { ActivityLog } from "./activity/activity-log";
import { createMqttBus } from "./bus/mqtt-bus";
import { SignalRouter } from "./bus/signal-router";
import { ArtifactStore } from "./capture/artifact-store";
import { CaptureOrchestrator } from "./capture/orchestrator";
import { HttpDetector } from "./gateway/detector";
import { DetectionGateway } from "./gateway/gateway";
import { createSpeaker } from "./gateway/speaker";
import { createApp } from "./http/app";
import { loadConfig } from "./lib/config";
import { createLogger } from "./lib/log";

function listen(server: Server, host: string, port: number): Promise<void> {
	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(port, host, () => {
			server.off("error", reject);
			resolve();
		});
	});
}

function closeServer(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close(err => (err ? reject(err) : resolve()));
		server.closeAllConnections();
	});
}

function waitForStopSignal(logger: winston.Logger): Promise<string> {
	return new Promise(resolve => {
		const stop = (signal: string) => {
			logger.info("Stopping server (signal=%s)", signal);
			resolve(signal);
		};
		process.once("SIGINT", () => stop("SIGINT")); // Ctrl+C
		process.once("SIGTERM", () => stop("SIGTERM")); // systemd stop
	});
}

async function main(): Promise<void> {
	const config = loadConfig();

	const logger: winston.Logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "sightline-server",
		level: config.logLevel
	});

	const topics = buildTopics({
		namespace: config.topics.namespace,
		deviceId: config.topics.deviceId,
		imageTopic: config.topics.imageTopic
	});

	logger.info("Sightline server starting (device=%s, image topic=%s)", config.topics.deviceId, topics.image);

	const activity = new ActivityLog(undefined, logger);
	const store = new ArtifactStore();
	const bus = createMqttBus(logger, config.mqtt, [topics.signal, topics.logs, ...config.topics.events]);

	const gateway = new DetectionGateway({
		detector: new HttpDetector(config.detector, logger),
		speaker: createSpeaker(config.speech, logger),
		logger,
		announceTimeoutMs: config.speech.timeoutMs
	});

	const orchestrator = new CaptureOrchestrator({
		bus,
		topics,
		store,
		gateway,
		activity,
		logger,
		capture: config.capture
	});

	const router = new SignalRouter({ topics, store, sink: orchestrator, activity, logger });
	router.register("status", (deviceId, payload) => {
		activity.push(deviceId, `status ${JSON.stringify(payload)}`);
	});

	bus.onMessage((topic, payload) => {
		router.dispatch(topic, payload);
	});
	bus.onReconnect(() => orchestrator.handleReconnect());
	bus.connect();

	const app = createApp({ orchestrator, store, activity, bus, logger });
	const server = createServer(app);
	await listen(server, config.http.host, config.http.port);
	logger.info("HTTP listening on http://%s:%d", config.http.host, config.http.port);

	await waitForStopSignal(logger);

	try {
		await orchestrator.shutdown();
		await bus.close();
		await closeServer(server);
	} finally {
		logger.info("Sightline server exiting");
	}
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});

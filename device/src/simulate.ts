import "dotenv/config";
import fs from "node:fs";
import process from "node:process";
import { Command, InvalidArgumentError } from "commander";
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import type winston from "winston";
import { buildTopics } from "@sightline/common";
import type { TopicLayout, WakeSignalPayload } from "@sightline/common";

import { CameraEmulator, logsTopic } from "./camera";
import { CHUNK_SIZE, buildFrameMessages } from "./frames";
import type { OutboundMessage } from "./frames";
import { createLogger } from "./lib/log";

interface GlobalOptions {
	url: string;
	namespace: string;
	device: string;
	imageTopic?: string;
	logLevel: string;
}

function parsePositiveInt(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n) || n <= 0) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return n;
}

function readFrame(file: string): Buffer {
	const data = fs.readFileSync(file);
	if (data.length === 0) {
		throw new Error(`Image file ${file} is empty`);
	}
	return data;
}

function waitForStop(logger: winston.Logger): Promise<void> {
	return new Promise(resolve => {
		const stop = (signal: string) => {
			logger.info("Stopping (signal=%s)", signal);
			resolve();
		};
		process.once("SIGINT", () => stop("SIGINT"));
		process.once("SIGTERM", () => stop("SIGTERM"));
	});
}

async function publishAll(client: MqttClient, messages: OutboundMessage[], logger: winston.Logger): Promise<void> {
	for (const m of messages) {
		await client.publishAsync(m.topic, m.payload);
		logger.debug("Published %d bytes to %s", m.payload.length, m.topic);
	}
}

const program = new Command();

program
	.name("sightline-device")
	.description("Plays the wake-signal device and the camera against a Sightline server")
	.option("-u, --url <url>", "MQTT broker URL", process.env.MQTT_URL ?? "mqtt://broker.hivemq.com:1883")
	.option("-n, --namespace <ns>", "Topic namespace", "sightline")
	.option("-d, --device <id>", "Device id", "esp32-001")
	.option("--image-topic <topic>", "Image topic (default: <ns>/cam_image)")
	.option("--log-level <level>", "Log level", "info");

function setup(): { opts: GlobalOptions; topics: TopicLayout; logger: winston.Logger } {
	const opts = program.opts<GlobalOptions>();
	const topics = buildTopics({ namespace: opts.namespace, deviceId: opts.device, imageTopic: opts.imageTopic });
	const logger = createLogger("sightline-device", opts.logLevel);
	return { opts, topics, logger };
}

async function withClient(fn: (client: MqttClient, topics: TopicLayout, logger: winston.Logger) => Promise<void>): Promise<void> {
	const { opts, topics, logger } = setup();

	logger.info("Connecting to %s as device %s", opts.url, opts.device);
	const client = await mqtt.connectAsync(opts.url, {
		clientId: `sightline-device-${opts.device}-${process.pid}`,
		username: process.env.MQTT_USERNAME,
		password: process.env.MQTT_PASSWORD,
		reconnectPeriod: 0
	});

	try {
		await fn(client, topics, logger);
	} finally {
		await client.endAsync();
	}
}

program
	.command("signal")
	.description("Publish a wake signal")
	.option("-t, --timestamp <ms>", "Timestamp to send (default: now)", parsePositiveInt)
	.action(async (options: { timestamp?: number }) => {
		await withClient(async (client, topics, logger) => {
			const payload: WakeSignalPayload = {
				device_id: program.opts<GlobalOptions>().device,
				timestamp: options.timestamp ?? Date.now()
			};
			await client.publishAsync(topics.signal, JSON.stringify(payload));
			logger.info("Wake signal sent to %s", topics.signal);
		});
	});

program
	.command("image <file>")
	.description("Publish an image file as one frame")
	.option("--chunked", "Send as start/chunk/end messages like the camera firmware")
	.option("--chunk-size <bytes>", "Chunk size", parsePositiveInt, CHUNK_SIZE)
	.option("--image-id <id>", "Image id for chunked frames", parsePositiveInt, 1)
	.action(async (file: string, options: { chunked?: boolean; chunkSize: number; imageId: number }) => {
		const frame = readFrame(file);
		await withClient(async (client, topics, logger) => {
			const messages: OutboundMessage[] = options.chunked
				? buildFrameMessages(topics.image, options.imageId, frame, options.chunkSize)
				: [{ topic: topics.image, payload: frame }];
			await publishAll(client, messages, logger);
			logger.info("Frame of %d bytes sent in %d message(s)", frame.length, messages.length);
		});
	});

program
	.command("log <message...>")
	.description("Publish a line to the logs topic")
	.option("-s, --source <name>", "Source segment of the logs topic", "esp32")
	.action(async (words: string[], options: { source: string }) => {
		await withClient(async (client, topics, logger) => {
			const topic = logsTopic(topics.namespace, options.source);
			await client.publishAsync(topic, words.join(" "));
			logger.info("Log line sent to %s", topic);
		});
	});

program
	.command("camera <file>")
	.description("Answer capture commands and wake signals with the given image until stopped")
	.option("--raw", "Send frames on the raw image topic instead of chunked")
	.option("--name <name>", "Camera name in log lines", "esp32cam")
	.action(async (file: string, options: { raw?: boolean; name: string }) => {
		const frame = readFrame(file);
		await withClient(async (client, topics, logger) => {
			const camera = new CameraEmulator({ topics, frame, name: options.name, chunked: !options.raw }, logger);

			client.on("message", (topic, payload) => {
				const out = camera.respond(topic, payload);
				if (out.length === 0) return;
				publishAll(client, out, logger).catch(err => {
					logger.error("Publishing frame failed: %s", err instanceof Error ? err.message : String(err));
				});
			});

			await client.subscribeAsync(camera.subscriptions);
			await client.publishAsync(logsTopic(topics.namespace, options.name), `${options.name}: connected`);
			logger.info("Camera ready on %s", camera.subscriptions.join(", "));

			await waitForStop(logger);
		});
	});

program
	.parseAsync(process.argv)
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});

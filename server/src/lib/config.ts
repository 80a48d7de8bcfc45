import "dotenv/config";
import fs from "node:fs";
import process from "node:process";
import { Command } from "commander";
import { z } from "zod";

import { configError, errorMessage } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface MqttConfig {
	url: string;
	username?: string;
	password?: string;
	clientId: string;
	reconnectPeriodMs: number;
}

export interface TopicConfig {
	namespace: string;
	deviceId: string;
	imageTopic?: string;
	/** Extra durable subscriptions routed through the generic event table. */
	events: string[];
}

export interface CaptureConfig {
	timeoutMs: number;
	pollIntervalMs: number;
}

export interface DetectorConfig {
	url: string;
	timeoutMs: number;
}

export interface SpeechConfig {
	enabled: boolean;
	command: string;
	/** "{text}" is replaced by the sentence to speak. */
	args: string[];
	timeoutMs: number;
}

export interface AppConfig {
	mqtt: MqttConfig;
	topics: TopicConfig;
	http: {
		host: string;
		port: number;
	};
	capture: CaptureConfig;
	detector: DetectorConfig;
	speech: SpeechConfig;
	paths: {
		logDir: string;
	};
	logLevel: LogLevel;
}

/* ---------- defaults ---------- */

const DEFAULT_MQTT_URL = "mqtt://broker.hivemq.com:1883";
const DEFAULT_NAMESPACE = "sightline";
const DEFAULT_DEVICE_ID = "esp32-001";
const DEFAULT_HTTP_HOST = "127.0.0.1";
const DEFAULT_HTTP_PORT = 5000;
const DEFAULT_CAPTURE_TIMEOUT_MS = 6_000;
const DEFAULT_POLL_INTERVAL_MS = 150;
const DEFAULT_DETECTOR_URL = "http://127.0.0.1:8000/detect";
const DEFAULT_DETECTOR_TIMEOUT_MS = 15_000;
const DEFAULT_SPEECH_COMMAND = "espeak-ng";
const DEFAULT_SPEECH_TIMEOUT_MS = 20_000;
const DEFAULT_LOG_DIR = "./logs";
const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

/* ---------- config file ---------- */

const positiveInt = z.number().int().positive();

export const ConfigFileSchema = z
	.object({
		mqtt: z
			.object({
				url: z.string().optional(),
				username: z.string().optional(),
				password: z.string().optional(),
				clientId: z.string().optional(),
				reconnectPeriodMs: positiveInt.optional()
			})
			.optional(),
		topics: z
			.object({
				namespace: z.string().optional(),
				deviceId: z.string().optional(),
				imageTopic: z.string().optional(),
				events: z.array(z.string()).optional()
			})
			.optional(),
		http: z
			.object({
				host: z.string().optional(),
				port: z.number().int().nonnegative().optional()
			})
			.optional(),
		capture: z
			.object({
				timeoutMs: positiveInt.optional(),
				pollIntervalMs: positiveInt.optional()
			})
			.optional(),
		detector: z
			.object({
				url: z.string().optional(),
				timeoutMs: positiveInt.optional()
			})
			.optional(),
		speech: z
			.object({
				enabled: z.boolean().optional(),
				command: z.string().optional(),
				args: z.array(z.string()).optional(),
				timeoutMs: positiveInt.optional()
			})
			.optional(),
		paths: z
			.object({
				logDir: z.string().optional()
			})
			.optional(),
		logLevel: z.string().optional()
	})
	.strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

function parseCommandLine(argv: string[]): { configPath?: string } {
	const program = new Command();

	program
		.option("-c, --config <path>", "Path to configuration file")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse(argv);

	const opts = program.opts<{ config?: string }>();
	return { configPath: opts.config };
}

function readConfigFile(configPath: string): ConfigFile {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
	} catch (err) {
		throw configError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
	}

	const res = ConfigFileSchema.safeParse(parsed);
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid config file ${configPath}: ${issues}`);
	}
	return res.data;
}

/* ---------- environment ---------- */

type Env = Record<string, string | undefined>;

function optionalStringEnv(env: Env, name: string): string | undefined {
	const value = env[name];
	if (value === undefined || value.trim() === "") return undefined;
	return value.trim();
}

function optionalNumberEnv(env: Env, name: string): number | undefined {
	const raw = optionalStringEnv(env, name);
	if (raw === undefined) return undefined;
	const n = Number(raw);
	if (!Number.isInteger(n) || n < 0) {
		throw configError(`Environment variable ${name} must be a non-negative integer`);
	}
	return n;
}

function optionalBooleanEnv(env: Env, name: string): boolean | undefined {
	const raw = optionalStringEnv(env, name);
	if (raw === undefined) return undefined;
	const lower = raw.toLowerCase();
	if (lower === "true") return true;
	if (lower === "false") return false;
	throw configError(`Environment variable ${name} must be "true" or "false"`);
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(l => l === value);
}

/* ---------- validation ---------- */

export function validateConfig(cfg: AppConfig): void {
	let url: URL;
	try {
		url = new URL(cfg.mqtt.url);
	} catch {
		throw configError(`config.mqtt.url is not a valid URL: ${cfg.mqtt.url}`);
	}
	if (!["mqtt:", "mqtts:", "ws:", "wss:", "tcp:"].includes(url.protocol)) {
		throw configError(`config.mqtt.url has unsupported protocol ${url.protocol}`);
	}

	if (!cfg.topics.namespace.trim() || cfg.topics.namespace.includes("#") || cfg.topics.namespace.includes("+")) {
		throw configError("config.topics.namespace must be a non-empty topic without wildcards");
	}
	if (!cfg.topics.deviceId.trim() || cfg.topics.deviceId.includes("/")) {
		throw configError("config.topics.deviceId must be a non-empty single topic level");
	}

	if (cfg.http.port > 65_535) {
		throw configError("config.http.port must be at most 65535");
	}

	if (cfg.capture.pollIntervalMs > cfg.capture.timeoutMs) {
		throw configError("config.capture.pollIntervalMs must not exceed config.capture.timeoutMs");
	}

	try {
		new URL(cfg.detector.url);
	} catch {
		throw configError(`config.detector.url is not a valid URL: ${cfg.detector.url}`);
	}

	if (cfg.speech.enabled && !cfg.speech.command.trim()) {
		throw configError("config.speech.command is required when speech is enabled");
	}
}

/* ---------- public API ---------- */

export function buildConfig(file: ConfigFile, env: Env = process.env): AppConfig {
	const logLevel = (optionalStringEnv(env, "LOG_LEVEL") ?? file.logLevel ?? DEFAULT_LOG_LEVEL).toLowerCase();
	if (!isLogLevel(logLevel)) {
		throw configError(`logLevel must be one of: ${LOG_LEVELS.join(", ")}`);
	}

	const cfg: AppConfig = {
		mqtt: {
			url: optionalStringEnv(env, "MQTT_URL") ?? file.mqtt?.url ?? DEFAULT_MQTT_URL,
			username: optionalStringEnv(env, "MQTT_USERNAME") ?? file.mqtt?.username,
			password: optionalStringEnv(env, "MQTT_PASSWORD") ?? file.mqtt?.password,
			clientId: file.mqtt?.clientId ?? `sightline-server-${process.pid}`,
			reconnectPeriodMs: file.mqtt?.reconnectPeriodMs ?? 5_000
		},
		topics: {
			namespace: file.topics?.namespace ?? DEFAULT_NAMESPACE,
			deviceId: file.topics?.deviceId ?? DEFAULT_DEVICE_ID,
			imageTopic: file.topics?.imageTopic,
			events: file.topics?.events ?? []
		},
		http: {
			host: optionalStringEnv(env, "HTTP_HOST") ?? file.http?.host ?? DEFAULT_HTTP_HOST,
			port: optionalNumberEnv(env, "HTTP_PORT") ?? file.http?.port ?? DEFAULT_HTTP_PORT
		},
		capture: {
			timeoutMs: file.capture?.timeoutMs ?? DEFAULT_CAPTURE_TIMEOUT_MS,
			pollIntervalMs: file.capture?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
		},
		detector: {
			url: optionalStringEnv(env, "DETECTOR_URL") ?? file.detector?.url ?? DEFAULT_DETECTOR_URL,
			timeoutMs: file.detector?.timeoutMs ?? DEFAULT_DETECTOR_TIMEOUT_MS
		},
		speech: {
			enabled: optionalBooleanEnv(env, "SPEECH_ENABLED") ?? file.speech?.enabled ?? true,
			command: file.speech?.command ?? DEFAULT_SPEECH_COMMAND,
			args: file.speech?.args ?? ["{text}"],
			timeoutMs: file.speech?.timeoutMs ?? DEFAULT_SPEECH_TIMEOUT_MS
		},
		paths: {
			logDir: optionalStringEnv(env, "LOG_DIR") ?? file.paths?.logDir ?? DEFAULT_LOG_DIR
		},
		logLevel
	};

	validateConfig(cfg);
	return cfg;
}

export function loadConfig(argv: string[] = process.argv, env: Env = process.env): AppConfig {
	const { configPath } = parseCommandLine(argv);
	const file: ConfigFile = configPath ? readConfigFile(configPath) : {};
	return buildConfig(file, env);
}

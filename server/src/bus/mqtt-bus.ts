import type winston from "winston";
import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";

import type { MqttConfig } from "../lib/config";
import { errorMessage } from "../lib/errors";
import type { Bus, BusMessageHandler } from "./types";

const DEFAULT_PORTS: Record<string, string> = {
	"mqtt:": "1883",
	"tcp:": "1883",
	"mqtts:": "8883",
	"ws:": "80",
	"wss:": "443"
};

export function describeBroker(url: string): string {
	try {
		const u = new URL(url);
		return `${u.hostname}:${u.port || DEFAULT_PORTS[u.protocol] || "?"}`;
	} catch {
		return url;
	}
}

/**
 * MQTT transport for the server.
 *
 * Durable topics are subscribed on every (re)connect. Anything else subscribed through
 * `subscribe()` is transient: the client runs with `resubscribe: false` and a clean
 * session, so it is gone after a reconnect until its owner subscribes it again.
 */
export function createMqttBus(logger: winston.Logger, config: MqttConfig, durableTopics: readonly string[]): Bus {
	const broker = describeBroker(config.url);
	const handlers: BusMessageHandler[] = [];
	const reconnectListeners: Array<() => void> = [];

	let client: MqttClient | null = null;
	let connectedOnce = false;

	const subscribe = async (topic: string): Promise<boolean> => {
		if (!client?.connected) {
			logger.warn("Cannot subscribe to %s: not connected to %s", topic, broker);
			return false;
		}
		try {
			const granted = await client.subscribeAsync(topic, { qos: 0 });
			const refused = granted.some(g => g.qos === 128);
			if (refused) {
				logger.error("Broker refused subscription to %s", topic);
				return false;
			}
			logger.info("Subscribed to %s", topic);
			return true;
		} catch (err) {
			logger.error("Subscribe to %s failed: %s", topic, errorMessage(err));
			return false;
		}
	};

	const unsubscribe = async (topic: string): Promise<boolean> => {
		if (!client?.connected) {
			// Clean session: the broker drops our subscriptions together with the connection
			logger.debug("Skipping unsubscribe from %s: not connected", topic);
			return true;
		}
		try {
			await client.unsubscribeAsync(topic);
			logger.info("Unsubscribed from %s", topic);
			return true;
		} catch (err) {
			logger.error("Unsubscribe from %s failed: %s", topic, errorMessage(err));
			return false;
		}
	};

	const publish = async (topic: string, payload: string | Buffer): Promise<boolean> => {
		if (!client?.connected) {
			logger.warn("Cannot publish to %s: not connected to %s", topic, broker);
			return false;
		}
		try {
			await client.publishAsync(topic, payload, { qos: 0 });
			logger.info("Published to %s", topic);
			return true;
		} catch (err) {
			logger.error("Publish to %s failed: %s", topic, errorMessage(err));
			return false;
		}
	};

	const subscribeDurable = async (): Promise<void> => {
		for (const topic of durableTopics) {
			await subscribe(topic);
		}
	};

	const onConnect = (): void => {
		const reconnected = connectedOnce;
		connectedOnce = true;
		logger.info("%s to MQTT broker %s", reconnected ? "Reconnected" : "Connected", broker);

		subscribeDurable()
			.then(() => {
				if (!reconnected) return;
				for (const listener of reconnectListeners) {
					listener();
				}
			})
			.catch(err => {
				logger.error("Post-connect handling failed: %s", errorMessage(err));
			});
	};

	const onMessage = (topic: string, payload: Buffer): void => {
		logger.debug("Received %d bytes on %s", payload.length, topic);
		for (const handler of handlers) {
			try {
				handler(topic, payload);
			} catch (err) {
				logger.error("Message handler failed for %s: %s", topic, errorMessage(err));
			}
		}
	};

	return {
		connect(): void {
			if (client) return;

			const options: IClientOptions = {
				clientId: config.clientId,
				username: config.username,
				password: config.password,
				reconnectPeriod: config.reconnectPeriodMs,
				clean: true,
				resubscribe: false
			};

			logger.info("Connecting to MQTT broker %s (clientId=%s, auth=%s)", broker, config.clientId, config.username ? "yes" : "no");
			client = mqtt.connect(config.url, options);

			client.on("connect", onConnect);
			client.on("message", onMessage);
			client.on("reconnect", () => logger.info("Reconnecting to MQTT broker %s", broker));
			client.on("offline", () => logger.warn("MQTT client offline"));
			client.on("error", err => logger.error("MQTT error: %s", err.message));
		},

		subscribe,
		unsubscribe,
		publish,

		onMessage(handler: BusMessageHandler): void {
			handlers.push(handler);
		},

		onReconnect(listener: () => void): void {
			reconnectListeners.push(listener);
		},

		isConnected(): boolean {
			return client?.connected ?? false;
		},

		describe(): string {
			return broker;
		},

		async close(): Promise<void> {
			if (!client) return;
			logger.info("Closing MQTT connection");
			const c = client;
			client = null;
			await c.endAsync();
		}
	};
}

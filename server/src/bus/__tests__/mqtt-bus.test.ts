import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";

import { createSilentLogger } from "../../lib/log";
import { createMqttBus, describeBroker } from "../mqtt-bus";

const connect = vi.hoisted(() => vi.fn());
vi.mock("mqtt", () => ({ default: { connect } }));

/** Stands in for MqttClient: records subscriptions, goes up and down on request. */
class FakeClient extends EventEmitter {
	connected = false;
	readonly subscribed: string[] = [];
	readonly unsubscribed: string[] = [];

	async subscribeAsync(topic: string): Promise<Array<{ topic: string; qos: number }>> {
		this.subscribed.push(topic);
		return [{ topic, qos: 0 }];
	}

	async unsubscribeAsync(topic: string): Promise<void> {
		this.unsubscribed.push(topic);
	}

	async publishAsync(): Promise<void> {}

	async endAsync(): Promise<void> {
		this.connected = false;
	}

	up(): void {
		this.connected = true;
		this.emit("connect");
	}

	down(): void {
		this.connected = false;
		this.emit("offline");
	}
}

describe("describeBroker", () => {
	it("reports host and port", () => {
		expect(describeBroker("mqtt://broker.hivemq.com:1883")).toBe("broker.hivemq.com:1883");
		expect(describeBroker("mqtt://10.0.0.5:1884")).toBe("10.0.0.5:1884");
	});

	it("fills in the default port of the protocol", () => {
		expect(describeBroker("mqtt://localhost")).toBe("localhost:1883");
		expect(describeBroker("mqtts://broker.example")).toBe("broker.example:8883");
		expect(describeBroker("wss://broker.example/mqtt")).toBe("broker.example:443");
	});

	it("passes through what it cannot parse", () => {
		expect(describeBroker("broker without scheme")).toBe("broker without scheme");
	});
});

describe("createMqttBus before connect", () => {
	const bus = createMqttBus(
		createSilentLogger(),
		{ url: "mqtt://localhost:1883", clientId: "test-client", reconnectPeriodMs: 1_000 },
		["sightline/device/esp32-001/signal"]
	);

	it("is not connected", () => {
		expect(bus.isConnected()).toBe(false);
		expect(bus.describe()).toBe("localhost:1883");
	});

	it("resolves publish and subscribe to false instead of rejecting", async () => {
		await expect(bus.publish("sightline/camera/command", "{}")).resolves.toBe(false);
		await expect(bus.subscribe("sightline/cam_image/#")).resolves.toBe(false);
		await expect(bus.unsubscribe("sightline/cam_image/#")).resolves.toBe(true);
	});

	it("closes without a client", async () => {
		await expect(bus.close()).resolves.toBeUndefined();
	});
});

describe("createMqttBus connection handling", () => {
	const durable = ["a/signal", "a/logs/#"];

	function connected() {
		const client = new FakeClient();
		connect.mockReturnValue(client);
		const bus = createMqttBus(createSilentLogger(), { url: "mqtt://localhost:1883", clientId: "test-client", reconnectPeriodMs: 1_000 }, durable);
		const reconnected = vi.fn();
		bus.onReconnect(reconnected);
		bus.connect();
		return { client, bus, reconnected };
	}

	it("connects with a clean session and without client-side resubscription", () => {
		connected();

		expect(connect).toHaveBeenLastCalledWith(
			"mqtt://localhost:1883",
			expect.objectContaining({ clientId: "test-client", clean: true, resubscribe: false, reconnectPeriod: 1_000 })
		);
	});

	it("subscribes the durable topics on the first connect without calling reconnect listeners", async () => {
		const { client, bus, reconnected } = connected();

		client.up();
		await vi.waitFor(() => expect(client.subscribed).toEqual(durable));
		await bus.publish("a/camera/command", "{}");

		expect(bus.isConnected()).toBe(true);
		expect(reconnected).not.toHaveBeenCalled();
	});

	it("subscribes only the durable topics again after a reconnect, then notifies once", async () => {
		const { client, bus, reconnected } = connected();

		client.up();
		await vi.waitFor(() => expect(client.subscribed).toEqual(durable));
		await expect(bus.subscribe("a/cam_image/#")).resolves.toBe(true);

		client.down();
		expect(bus.isConnected()).toBe(false);
		client.up();
		await vi.waitFor(() => expect(reconnected).toHaveBeenCalledTimes(1));

		expect(client.subscribed).toEqual(["a/signal", "a/logs/#", "a/cam_image/#", "a/signal", "a/logs/#"]);
	});

	it("counts a refused subscription as a failure", async () => {
		const { client, bus } = connected();
		client.up();
		await vi.waitFor(() => expect(client.subscribed).toEqual(durable));
		vi.spyOn(client, "subscribeAsync").mockResolvedValueOnce([{ topic: "a/cam_image/#", qos: 128 }]);

		await expect(bus.subscribe("a/cam_image/#")).resolves.toBe(false);
	});

	it("ends the client on close", async () => {
		const { client, bus } = connected();
		client.up();
		const end = vi.spyOn(client, "endAsync");

		await bus.close();

		expect(end).toHaveBeenCalledTimes(1);
		expect(bus.isConnected()).toBe(false);
	});
});

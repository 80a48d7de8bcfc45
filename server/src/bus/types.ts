export type BusMessageHandler = (topic: string, payload: Buffer) => void;

/**
 * Bus is the contract between the server and its publish/subscribe transport.
 * - subscribe/unsubscribe/publish resolve to false instead of rejecting
 * - inbound messages are delivered to every registered message handler
 * - reconnect listeners fire after the transport re-established a dropped connection,
 *   once the durable topics are subscribed again
 */
export interface Bus {
	connect(): void;
	subscribe(topic: string): Promise<boolean>;
	unsubscribe(topic: string): Promise<boolean>;
	publish(topic: string, payload: string | Buffer): Promise<boolean>;
	onMessage(handler: BusMessageHandler): void;
	onReconnect(listener: () => void): void;
	isConnected(): boolean;
	/** Broker address for status output, e.g. "broker.hivemq.com:1883". */
	describe(): string;
	close(): Promise<void>;
}

import { randomUUID } from "node:crypto";
import type { Broker } from "./index.js";
import type { Headers, Payload } from "./types.js";

export type ProducerOptions = {
	/**
	 * The broker messages are published to. The producer registers itself with it.
	 */
	broker: Broker;
	/**
	 * The unique identifier for this producer.
	 * @default randomUUID()
	 */
	id?: string;
};

/**
 * Publishing handle bound to one broker.
 */
export class Producer {
	private readonly _id: string;
	private readonly _broker: Broker;

	/**
	 * Creates an instance of Producer and registers it with the broker.
	 * @param options The broker to publish to and an optional id.
	 */
	constructor(options: ProducerOptions) {
		this._id = options.id ?? randomUUID();
		this._broker = options.broker;
		this._broker.registerProducer(this);
	}

	public get id(): string {
		return this._id;
	}

	public get broker(): Broker {
		return this._broker;
	}

	/**
	 * Publishes a message through the broker.
	 * @returns The id of the new message, whether or not the topic accepted it.
	 */
	public async publish(
		topic: string,
		payload: Payload,
		headers?: Headers,
	): Promise<string> {
		return this._broker.publish(topic, payload, headers);
	}
}

import { Hookified } from "hookified";
import { defaultCapacity } from "./config.js";
import type { Consumer } from "./consumer.js";
import { assertCapacity, assertTopicName } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { DeliveryFailure, Message, TopicStats } from "./types.js";

/**
 * Events emitted by a topic.
 */
export enum TopicEvents {
	drop = "drop",
	prune = "prune",
	deliveryError = "delivery:error",
	error = "error",
}

/**
 * Configuration options for a topic.
 */
export type TopicOptions = {
	/**
	 * Name of the topic, unique within a broker.
	 */
	name: string;
	/**
	 * Maximum number of messages held in the buffer.
	 * @default 1000
	 */
	capacity?: number;
	/**
	 * Receives failures that escape every event listener.
	 * When absent a pino logger is created.
	 */
	logger?: Logger;
};

/**
 * Payload of the {@link TopicEvents.drop} event.
 */
export type DropEvent = {
	topic: string;
	message: Message;
	capacity: number;
};

/**
 * Payload of the {@link TopicEvents.prune} event.
 */
export type PruneEvent = {
	topic: string;
	consumerId: string;
};

/**
 * A named channel with a bounded FIFO buffer and a list of subscribers.
 * When the buffer is full new messages are dropped, never blocked and never
 * evicting older ones. Delivery does not drain the buffer; it only exists for
 * capacity accounting and statistics.
 */
export class Topic extends Hookified {
	private readonly _name: string;
	private readonly _capacity: number;
	private _buffer: Message[] = [];
	private _subscribers: Consumer[] = [];
	private readonly _inFlight = new Set<Promise<void>>();
	private _messageCount = 0;
	private _droppedCount = 0;
	private readonly _log: Logger;

	/**
	 * Creates an instance of Topic.
	 * @param options Name, capacity and logger of the topic.
	 */
	constructor(options: TopicOptions) {
		super();
		assertTopicName(options.name);
		const capacity = options.capacity ?? defaultCapacity;
		assertCapacity(capacity);
		this._name = options.name;
		this._capacity = capacity;
		this._log = options.logger ?? createLogger();
	}

	public get name(): string {
		return this._name;
	}

	public get capacity(): number {
		return this._capacity;
	}

	/**
	 * Number of messages ever accepted.
	 */
	public get messageCount(): number {
		return this._messageCount;
	}

	/**
	 * Number of messages rejected because the buffer was full.
	 */
	public get droppedCount(): number {
		return this._droppedCount;
	}

	public get bufferedCount(): number {
		return this._buffer.length;
	}

	/**
	 * Buffered messages, oldest first, as a copy.
	 */
	public get messages(): Message[] {
		return [...this._buffer];
	}

	/**
	 * Current subscribers in subscription order, as a copy.
	 */
	public get subscribers(): Consumer[] {
		return [...this._subscribers];
	}

	/**
	 * Number of deliveries that have been started and not yet settled.
	 */
	public get pendingDeliveries(): number {
		return this._inFlight.size;
	}

	/**
	 * Admits a message into the buffer.
	 * @param message The message to admit.
	 * @returns False when the buffer is full and the message was dropped.
	 */
	public enqueue(message: Message): boolean {
		if (this._buffer.length >= this._capacity) {
			this._droppedCount++;
			this.emit(TopicEvents.drop, {
				topic: this._name,
				message,
				capacity: this._capacity,
			} satisfies DropEvent);
			return false;
		}

		this._buffer.push(message);
		this._messageCount++;
		return true;
	}

	/**
	 * Fans a message out to a snapshot of the current subscribers.
	 * Inactive subscribers are pruned instead of receiving it. Each delivery runs
	 * on its own and this method returns before any handler is called.
	 * @param message The message to deliver.
	 */
	public deliver(message: Message): void {
		const snapshot = [...this._subscribers];
		for (const consumer of snapshot) {
			if (!consumer.active) {
				this.prune(consumer);
				continue;
			}

			this.dispatch(consumer, message);
		}
	}

	/**
	 * Adds a consumer. Subscribing twice is a no-op.
	 * @returns True when the consumer was added.
	 */
	public subscribe(consumer: Consumer): boolean {
		if (this._subscribers.includes(consumer)) {
			return false;
		}

		this._subscribers.push(consumer);
		consumer.addSubscription(this._name);
		return true;
	}

	/**
	 * Removes a consumer. Unsubscribing an unknown consumer is a no-op.
	 * @returns True when the consumer was removed.
	 */
	public unsubscribe(consumer: Consumer): boolean {
		const index = this._subscribers.indexOf(consumer);
		if (index === -1) {
			return false;
		}

		this._subscribers.splice(index, 1);
		consumer.removeSubscription(this._name);
		return true;
	}

	/**
	 * @param consumer The consumer to look for.
	 * @returns True when the consumer is currently subscribed.
	 */
	public hasSubscriber(consumer: Consumer): boolean {
		return this._subscribers.includes(consumer);
	}

	/**
	 * Empties the buffer so the topic can admit messages again.
	 * Counters are left untouched.
	 * @returns The number of messages released.
	 */
	public purge(): number {
		const released = this._buffer.length;
		this._buffer = [];
		return released;
	}

	/**
	 * Resolves once every started delivery has settled, including deliveries
	 * started while waiting.
	 */
	public async flush(): Promise<void> {
		while (this._inFlight.size > 0) {
			await Promise.all(this._inFlight);
		}
	}

	/**
	 * Detaches every subscriber, clearing the back-reference on each consumer.
	 */
	public detachAll(): void {
		for (const consumer of this._subscribers) {
			consumer.removeSubscription(this._name);
		}

		this._subscribers = [];
	}

	/**
	 * Snapshot of the topic's counters.
	 * @returns Name, counts, capacity and dropped messages.
	 */
	public getStats(): TopicStats {
		return {
			name: this._name,
			messageCount: this._messageCount,
			currentBufferedCount: this._buffer.length,
			subscriberCount: this._subscribers.length,
			capacity: this._capacity,
			droppedCount: this._droppedCount,
		};
	}

	private prune(consumer: Consumer): void {
		if (this.unsubscribe(consumer)) {
			this.emit(TopicEvents.prune, {
				topic: this._name,
				consumerId: consumer.id,
			} satisfies PruneEvent);
		}
	}

	private dispatch(consumer: Consumer, message: Message): void {
		const delivery = this.runDelivery(consumer, message).catch(
			(error: unknown) => {
				this._log.error(
					{
						err: error,
						topic: this._name,
						consumerId: consumer.id,
						messageId: message.id,
					},
					"error listener failed while reporting a delivery failure",
				);
			},
		);
		this._inFlight.add(delivery);
		void delivery.then(() => {
			this._inFlight.delete(delivery);
		});
	}

	private async runDelivery(
		consumer: Consumer,
		message: Message,
	): Promise<void> {
		// Handlers never run on the publisher's call stack
		await Promise.resolve();

		const result = await consumer.receive(message);
		if (result.status !== "failed") {
			return;
		}

		try {
			this.emit(TopicEvents.deliveryError, {
				topic: this._name,
				consumerId: consumer.id,
				message,
				error: result.error,
			} satisfies DeliveryFailure);
		} catch (error) {
			this.emit(TopicEvents.error, error);
		}
	}
}

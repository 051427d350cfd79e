import { Hookified, type HookifiedOptions } from "hookified";
import {
	defaultBrokerName,
	defaultCloseTimeout,
	type LogLevel,
	readDefaultCapacity,
	readLogLevel,
} from "./config.js";
import type { Consumer } from "./consumer.js";
import {
	assertCapacity,
	assertTopicName,
	BrokerClosedError,
	InvalidArgumentError,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { createMessage, defaultIdGenerator } from "./message.js";
import type { Producer } from "./producer.js";
import {
	type DropEvent,
	type PruneEvent,
	Topic,
	TopicEvents,
} from "./topic.js";
import type {
	BrokerStats,
	DeliveryFailure,
	Headers,
	IdGenerator,
	Message,
	Payload,
	TopicStats,
} from "./types.js";

/**
 * Standard events emitted by the Broker.
 */
export enum BrokerEvents {
	error = "error",
	publish = "publish",
	drop = "drop",
	subscribe = "subscribe",
	unsubscribe = "unsubscribe",
	prune = "prune",
	deliveryError = "delivery:error",
	topicCreated = "topic:create",
	topicDeleted = "topic:delete",
	close = "close",
}

/**
 * Hook event names for before/after lifecycle hooks.
 * Before hooks receive a mutable context object that can be modified.
 * After hooks receive the final context after the operation completes.
 */
export enum BrokerHooks {
	beforePublish = "before:publish",
	afterPublish = "after:publish",
	beforeSubscribe = "before:subscribe",
	afterSubscribe = "after:subscribe",
	beforeUnsubscribe = "before:unsubscribe",
	afterUnsubscribe = "after:unsubscribe",
	beforeClose = "before:close",
	afterClose = "after:close",
}

/**
 * Context handed to the {@link BrokerHooks.beforePublish} hook.
 */
export type PublishContext = {
	topic: string;
	payload: Payload;
	headers: Headers;
};

/**
 * Context handed to the {@link BrokerHooks.afterPublish} hook and the publish event.
 */
export type PublishResult = {
	message: Message;
	accepted: boolean;
};

export type SubscriptionContext = {
	consumer: Consumer;
	topic: string;
};

export type UnsubscriptionResult = SubscriptionContext & {
	removed: boolean;
};

export type CloseContext = {
	topicCount: number;
	consumerCount: number;
};

export type BrokerOptions = {
	/**
	 * Name used for the broker's logger.
	 * @default "skein"
	 */
	name?: string;
	/**
	 * Capacity for topics created without an explicit one.
	 * @default SKEIN_DEFAULT_CAPACITY or 1000
	 */
	defaultCapacity?: number;
	/**
	 * Source of message ids.
	 * @default randomUUID
	 */
	idGenerator?: IdGenerator;
	/**
	 * Clock used for message creation times.
	 * @default Date.now
	 */
	now?: () => number;
	/**
	 * Logger to use. When absent a pino logger is created.
	 */
	logger?: Logger;
	/**
	 * Level for the created logger. Ignored when `logger` is given.
	 * @default SKEIN_LOG_LEVEL or "info"
	 */
	logLevel?: LogLevel;
	/**
	 * Milliseconds `close()` waits for in-flight deliveries before abandoning them.
	 * @default 5000
	 */
	closeTimeout?: number;
} & Omit<HookifiedOptions, "logger">;

// The broker's pino logger is its own; hookified gets the remaining options.
function toHookifiedOptions(options: BrokerOptions = {}): HookifiedOptions {
	const { logger: _logger, ...hookified } = options;
	return hookified;
}

/**
 * In-memory topic broker. Owns the topic registry and the registry of every
 * consumer and producer that has used it.
 */
export class Broker extends Hookified {
	private readonly _topics = new Map<string, Topic>();
	private readonly _consumers = new Set<Consumer>();
	private readonly _producers = new Set<Producer>();
	private readonly _defaultCapacity: number;
	private readonly _idGenerator: IdGenerator;
	private readonly _now: () => number;
	private readonly _closeTimeout: number;
	private readonly _log: Logger;
	// Deleted topics whose deliveries have not settled yet
	private readonly _draining = new Set<Topic>();
	private _closed = false;
	private _closing?: Promise<void>;

	/**
	 * Creates an instance of Broker.
	 * @param options Optional configuration, layered over the environment.
	 */
	constructor(options?: BrokerOptions) {
		super(toHookifiedOptions(options));
		this._defaultCapacity = options?.defaultCapacity ?? readDefaultCapacity();
		assertCapacity(this._defaultCapacity, "defaultCapacity");
		this._closeTimeout = options?.closeTimeout ?? defaultCloseTimeout;
		if (!Number.isFinite(this._closeTimeout) || this._closeTimeout < 0) {
			throw new InvalidArgumentError(
				"closeTimeout",
				`closeTimeout must be a non-negative number, received ${String(this._closeTimeout)}`,
			);
		}

		this._idGenerator = options?.idGenerator ?? defaultIdGenerator;
		this._now = options?.now ?? Date.now;
		this._log =
			options?.logger ??
			createLogger({
				name: options?.name ?? defaultBrokerName,
				level: options?.logLevel ?? readLogLevel(),
			});
	}

	public get defaultCapacity(): number {
		return this._defaultCapacity;
	}

	public get closeTimeout(): number {
		return this._closeTimeout;
	}

	public get closed(): boolean {
		return this._closed;
	}

	/**
	 * Names of the registered topics.
	 */
	public get topicNames(): string[] {
		return [...this._topics.keys()];
	}

	/**
	 * Every consumer that has subscribed through this broker.
	 */
	public get consumers(): Consumer[] {
		return [...this._consumers];
	}

	/**
	 * Every producer bound to this broker.
	 */
	public get producers(): Producer[] {
		return [...this._producers];
	}

	/**
	 * Returns the topic with the given name, creating it when it does not exist.
	 * @param name The topic name.
	 * @param capacity Buffer capacity, only used when the topic is created.
	 */
	public createTopic(name: string, capacity?: number): Topic {
		this.assertOpen("create a topic");
		assertTopicName(name);
		if (capacity !== undefined) {
			assertCapacity(capacity);
		}

		const existing = this._topics.get(name);
		if (existing) {
			return existing;
		}

		const topic = new Topic({
			name,
			capacity: capacity ?? this._defaultCapacity,
			logger: this._log,
		});
		this.attach(topic);
		this._topics.set(name, topic);

		this._log.debug({ topic: name, capacity: topic.capacity }, "topic created");
		this.emit(BrokerEvents.topicCreated, {
			name,
			capacity: topic.capacity,
		});
		return topic;
	}

	/**
	 * Looks up a topic without creating it.
	 * @param name The topic name.
	 * @returns The topic, or undefined when none has that name.
	 */
	public getTopic(name: string): Topic | undefined {
		return this._topics.get(name);
	}

	/**
	 * @param name The topic name.
	 * @returns True when a topic with that name is registered.
	 */
	public hasTopic(name: string): boolean {
		return this._topics.has(name);
	}

	/**
	 * Removes a topic and detaches it from every consumer subscribed to it.
	 * @returns False when no topic has that name.
	 */
	public deleteTopic(name: string): boolean {
		const topic = this._topics.get(name);
		if (!topic) {
			return false;
		}

		this._topics.delete(name);
		for (const consumer of this._consumers) {
			topic.unsubscribe(consumer);
		}

		topic.detachAll();
		this.drain(topic);

		this._log.debug({ topic: name }, "topic deleted");
		this.emit(BrokerEvents.topicDeleted, { name });
		return true;
	}

	/**
	 * Empties a topic's buffer.
	 * @returns The number of messages released, or undefined for an unknown topic.
	 */
	public purgeTopic(name: string): number | undefined {
		return this._topics.get(name)?.purge();
	}

	/**
	 * Publishes a message, creating the topic when needed. The returned promise
	 * resolves once deliveries are started, not once they finish.
	 * @param topic The topic to publish to.
	 * @param payload The message payload.
	 * @param headers Optional message headers.
	 * @returns The message id, also when the topic was full and dropped it.
	 */
	public async publish(
		topic: string,
		payload: Payload,
		headers?: Headers,
	): Promise<string> {
		this.assertOpen("publish");
		assertTopicName(topic);

		// Before hook - context can be mutated by hook handlers
		const context: PublishContext = { topic, payload, headers: { ...headers } };
		await this.hook(BrokerHooks.beforePublish, context);

		const target = this.createTopic(context.topic);
		const message = createMessage(
			context.topic,
			context.payload,
			context.headers,
			{ idGenerator: this._idGenerator, now: this._now },
		);

		const accepted = target.enqueue(message);
		if (accepted) {
			target.deliver(message);
		}

		const result: PublishResult = { message, accepted };
		await this.hook(BrokerHooks.afterPublish, result);
		this.emit(BrokerEvents.publish, result);

		return message.id;
	}

	/**
	 * Subscribes a consumer to a topic, creating the topic when needed.
	 * Subscribing twice is a no-op.
	 */
	public async subscribe(consumer: Consumer, topic: string): Promise<void> {
		this.assertOpen("subscribe");
		assertTopicName(topic);

		const context: SubscriptionContext = { consumer, topic };
		await this.hook(BrokerHooks.beforeSubscribe, context);

		const target = this.createTopic(context.topic);
		this._consumers.add(context.consumer);
		const added = target.subscribe(context.consumer);

		await this.hook(BrokerHooks.afterSubscribe, {
			consumer: context.consumer,
			topic: context.topic,
		});

		if (added) {
			this._log.debug(
				{ topic: context.topic, consumerId: context.consumer.id },
				"consumer subscribed",
			);
			this.emit(BrokerEvents.subscribe, {
				consumer: context.consumer,
				topic: context.topic,
			});
		}
	}

	/**
	 * Unsubscribes a consumer from a topic.
	 * @returns False when the topic is unknown or the consumer was not subscribed.
	 */
	public async unsubscribe(consumer: Consumer, topic: string): Promise<boolean> {
		const context: SubscriptionContext = { consumer, topic };
		await this.hook(BrokerHooks.beforeUnsubscribe, context);

		const removed =
			this._topics.get(context.topic)?.unsubscribe(context.consumer) ?? false;

		const result: UnsubscriptionResult = {
			consumer: context.consumer,
			topic: context.topic,
			removed,
		};
		await this.hook(BrokerHooks.afterUnsubscribe, result);

		if (removed) {
			this._log.debug(
				{ topic: context.topic, consumerId: context.consumer.id },
				"consumer unsubscribed",
			);
			this.emit(BrokerEvents.unsubscribe, result);
		}

		return removed;
	}

	/** @internal Called by the Producer constructor. */
	public registerProducer(producer: Producer): void {
		this._producers.add(producer);
	}

	/**
	 * @param name The topic name.
	 * @returns The topic's counters, or undefined for an unknown topic.
	 */
	public getTopicStats(name: string): TopicStats | undefined {
		return this._topics.get(name)?.getStats();
	}

	/**
	 * @returns Counters of every registered topic, keyed by name in creation order.
	 */
	public getAllTopicStats(): Map<string, TopicStats> {
		const stats = new Map<string, TopicStats>();
		for (const [name, topic] of this._topics) {
			stats.set(name, topic.getStats());
		}

		return stats;
	}

	/**
	 * @returns Per-topic counters plus the number of topics, consumers and producers.
	 */
	public getStats(): BrokerStats {
		return {
			topics: this.getAllTopicStats(),
			totalTopics: this._topics.size,
			totalConsumers: this._consumers.size,
			totalProducers: this._producers.size,
		};
	}

	/**
	 * Resolves once every started delivery has settled, including those of
	 * topics deleted while their deliveries were running.
	 */
	public async flush(): Promise<void> {
		await Promise.all(
			[...this._topics.values(), ...this._draining].map(async (topic) =>
				topic.flush(),
			),
		);
	}

	/**
	 * Stops accepting work, waits up to `closeTimeout` for in-flight deliveries,
	 * stops every known consumer and deletes every topic. Later calls return the
	 * same promise.
	 */
	public async close(): Promise<void> {
		this._closing ??= this.shutdown();
		return this._closing;
	}

	private async shutdown(): Promise<void> {
		const context: CloseContext = {
			topicCount: this._topics.size,
			consumerCount: this._consumers.size,
		};
		await this.hook(BrokerHooks.beforeClose, context);

		this._closed = true;
		const settled = await this.flushWithin(this._closeTimeout);

		for (const consumer of this._consumers) {
			consumer.stop();
		}

		for (const name of this.topicNames) {
			this.deleteTopic(name);
		}

		if (!settled) {
			this._log.warn(
				{ timeout: this._closeTimeout, pending: this.pendingDeliveries() },
				"close timed out, abandoning in-flight deliveries",
			);
		}

		await this.hook(BrokerHooks.afterClose, context);

		this._log.info(context, "broker closed");
		this.emit(BrokerEvents.close, context);
	}

	private async flushWithin(timeout: number): Promise<boolean> {
		let timer: NodeJS.Timeout | undefined;
		const expired = new Promise<boolean>((resolve) => {
			timer = setTimeout(() => {
				resolve(false);
			}, timeout);
		});

		try {
			return await Promise.race([this.flush().then(() => true), expired]);
		} finally {
			clearTimeout(timer);
		}
	}

	private pendingDeliveries(): number {
		let pending = 0;
		for (const topic of [...this._topics.values(), ...this._draining]) {
			pending += topic.pendingDeliveries;
		}

		return pending;
	}

	private drain(topic: Topic): void {
		if (topic.pendingDeliveries === 0) {
			return;
		}

		this._draining.add(topic);
		void topic.flush().then(() => {
			this._draining.delete(topic);
		});
	}

	private attach(topic: Topic): void {
		topic.on(TopicEvents.drop, (event: DropEvent) => {
			this._log.warn(
				{
					topic: event.topic,
					messageId: event.message.id,
					capacity: event.capacity,
				},
				"topic buffer full, dropping message",
			);
			this.emit(BrokerEvents.drop, event);
		});

		topic.on(TopicEvents.prune, (event: PruneEvent) => {
			this._log.debug(event, "inactive consumer pruned");
			this.emit(BrokerEvents.prune, event);
		});

		topic.on(TopicEvents.deliveryError, (failure: DeliveryFailure) => {
			this._log.error(
				{
					err: failure.error,
					topic: failure.topic,
					consumerId: failure.consumerId,
					messageId: failure.message.id,
				},
				"consumer failed to process message",
			);
			this.emit(BrokerEvents.deliveryError, failure);
		});

		topic.on(TopicEvents.error, (error: unknown) => {
			this.emit(BrokerEvents.error, error);
		});
	}

	private assertOpen(operation: string): void {
		if (this._closed) {
			throw new BrokerClosedError(operation);
		}
	}
}

export {
	defaultBrokerName,
	defaultCapacity,
	defaultCloseTimeout,
	defaultLogLevel,
	loadConfig,
	readDefaultCapacity,
	readLogLevel,
	type BrokerConfig,
	type LogLevel,
} from "./config.js";
export { Consumer, type ConsumerOptions } from "./consumer.js";
export {
	BrokerClosedError,
	InvalidArgumentError,
	SkeinError,
} from "./errors.js";
export { createLogger, type Logger } from "./logger.js";
export { createMessage, describeMessage } from "./message.js";
export { Producer, type ProducerOptions } from "./producer.js";
export {
	type DropEvent,
	type PruneEvent,
	Topic,
	TopicEvents,
	type TopicOptions,
} from "./topic.js";
export type {
	BrokerStats,
	DeliveryFailure,
	DeliveryResult,
	Headers,
	IdGenerator,
	Message,
	MessageHandler,
	Payload,
	TopicStats,
} from "./types.js";

import { randomUUID } from "node:crypto";
import { InvalidArgumentError } from "./errors.js";
import type {
	DeliveryResult,
	Message,
	MessageHandler,
	MessageHandlerFunction,
} from "./types.js";

/**
 * Configuration options for a consumer.
 */
export type ConsumerOptions = {
	/**
	 * The unique identifier for this consumer.
	 * @default randomUUID()
	 */
	id?: string;
	/**
	 * Called once per accepted message on every subscribed topic.
	 */
	handler: MessageHandler;
	/**
	 * Deliver messages of the same topic one at a time, in publish order.
	 * @default false
	 */
	ordered?: boolean;
};

function toHandlerFunction(handler: MessageHandler): MessageHandlerFunction {
	if (typeof handler === "function") {
		return handler;
	}

	const target = handler;
	return async (message) => target.handle(message);
}

/**
 * A message sink that can be subscribed to any number of topics.
 * Handler errors are caught here and turned into a failed {@link DeliveryResult}.
 */
export class Consumer {
	private readonly _id: string;
	private readonly _handler: MessageHandlerFunction;
	private readonly _ordered: boolean;
	private readonly _subscribedTopics = new Set<string>();
	// Tail of the delivery chain per topic, only used when ordered
	private readonly _chains = new Map<string, Promise<DeliveryResult>>();
	private _active = true;

	/**
	 * Creates an instance of Consumer.
	 * @param options Identifier, handler and delivery mode.
	 */
	constructor(options: ConsumerOptions) {
		const id = options.id ?? randomUUID();
		if (id.length === 0) {
			throw new InvalidArgumentError(
				"id",
				"Consumer id must be a non-empty string",
			);
		}

		this._id = id;
		this._handler = toHandlerFunction(options.handler);
		this._ordered = options.ordered ?? false;
	}

	public get id(): string {
		return this._id;
	}

	/**
	 * False once {@link stop} has been called.
	 */
	public get active(): boolean {
		return this._active;
	}

	public get ordered(): boolean {
		return this._ordered;
	}

	/**
	 * Names of the topics this consumer is subscribed to, as a copy.
	 */
	public get subscribedTopics(): string[] {
		return [...this._subscribedTopics];
	}

	public isSubscribedTo(topic: string): boolean {
		return this._subscribedTopics.has(topic);
	}

	/**
	 * Permanently deactivates the consumer. Topics prune it on their next delivery.
	 * A delivery that already started may still complete.
	 */
	public stop(): void {
		this._active = false;
	}

	/**
	 * Hands a message to the handler. Never rejects.
	 * @param message The message to process.
	 * @returns The outcome of the delivery.
	 */
	public async receive(message: Message): Promise<DeliveryResult> {
		if (!this._ordered) {
			return this.invoke(message);
		}

		const previous = this._chains.get(message.topic);
		const next = previous
			? previous.then(async () => this.invoke(message))
			: this.invoke(message);
		this._chains.set(message.topic, next);

		const result = await next;
		if (this._chains.get(message.topic) === next) {
			this._chains.delete(message.topic);
		}

		return result;
	}

	/** @internal Called by Topic when the subscription is added. */
	public addSubscription(topic: string): void {
		this._subscribedTopics.add(topic);
	}

	/** @internal Called by Topic when the subscription is removed. */
	public removeSubscription(topic: string): void {
		this._subscribedTopics.delete(topic);
	}

	private async invoke(message: Message): Promise<DeliveryResult> {
		if (!this._active) {
			return { status: "skipped" };
		}

		try {
			await this._handler(message);
			return { status: "delivered" };
		} catch (error) {
			return { status: "failed", error };
		}
	}
}

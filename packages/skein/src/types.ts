/**
 * Header mapping attached to a message.
 */
export type Headers = Record<string, string>;

/**
 * Payload carried by a message. Text or raw bytes, stored opaquely.
 */
export type Payload = string | Uint8Array;

/**
 * Message routed through the broker. Frozen once created.
 */
export type Message = Readonly<{
	/**
	 * Unique identifier for the message
	 */
	id: string;
	/**
	 * The topic the message was published to
	 */
	topic: string;
	/**
	 * The payload of the message
	 */
	payload: Payload;
	/**
	 * Epoch milliseconds of when the message was created
	 */
	createdAt: number;
	/**
	 * Headers for additional metadata
	 */
	headers: Readonly<Headers>;
}>;

/**
 * Function form of a message handler. It may throw or reject; the broker catches it.
 */
export type MessageHandlerFunction = (message: Message) => void | Promise<void>;

/**
 * Object form of a message handler.
 */
export type MessageHandlerObject = {
	handle(message: Message): void | Promise<void>;
};

export type MessageHandler = MessageHandlerFunction | MessageHandlerObject;

/**
 * Produces identifiers that are unique within the process lifetime.
 */
export type IdGenerator = () => string;

/**
 * Outcome of handing one message to one consumer.
 */
export type DeliveryResult =
	| { status: "delivered" }
	| { status: "skipped" }
	| { status: "failed"; error: unknown };

/**
 * Reported when a consumer's handler fails on a message.
 */
export type DeliveryFailure = {
	topic: string;
	consumerId: string;
	message: Message;
	error: unknown;
};

/**
 * Point-in-time statistics for a topic.
 */
export type TopicStats = {
	name: string;
	/**
	 * Messages ever accepted by the topic
	 */
	messageCount: number;
	/**
	 * Messages currently held in the buffer
	 */
	currentBufferedCount: number;
	subscriberCount: number;
	capacity: number;
	/**
	 * Messages rejected because the buffer was full
	 */
	droppedCount: number;
};

/**
 * Aggregate statistics for a broker.
 */
export type BrokerStats = {
	topics: Map<string, TopicStats>;
	totalTopics: number;
	totalConsumers: number;
	totalProducers: number;
};

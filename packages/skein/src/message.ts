import { randomUUID } from "node:crypto";
import type { Headers, IdGenerator, Message, Payload } from "./types.js";

export type CreateMessageOptions = {
	/**
	 * Source of message ids.
	 * @default randomUUID
	 */
	idGenerator?: IdGenerator;
	/**
	 * Clock used for `createdAt`.
	 * @default Date.now
	 */
	now?: () => number;
};

export const defaultIdGenerator: IdGenerator = () => randomUUID();

/**
 * Builds an immutable message with a fresh id and creation time.
 * Headers are copied, so later changes to the caller's object do not leak in.
 * @param topic The topic the message is published to.
 * @param payload The message payload.
 * @param headers Optional headers, empty when absent.
 * @param options Id generator and clock overrides.
 */
export function createMessage(
	topic: string,
	payload: Payload,
	headers?: Headers,
	options?: CreateMessageOptions,
): Message {
	const idGenerator = options?.idGenerator ?? defaultIdGenerator;
	const now = options?.now ?? Date.now;

	return Object.freeze({
		id: idGenerator(),
		topic,
		payload,
		createdAt: now(),
		headers: Object.freeze({ ...headers }),
	});
}

/**
 * Short human-readable form used in log lines.
 */
export function describeMessage(message: Message): string {
	const payload =
		typeof message.payload === "string"
			? message.payload
			: `<${message.payload.byteLength} bytes>`;
	return `Message{id='${message.id.slice(0, 8)}', topic='${message.topic}', payload='${payload}'}`;
}

import { describe, expect, test } from "vitest";
import { createMessage, describeMessage } from "../src/message.js";

describe("createMessage", () => {
	test("should assign id, topic, payload, headers and creation time", () => {
		const message = createMessage("orders", "created", undefined, {
			idGenerator: () => "msg-1",
			now: () => 1_700_000_000_000,
		});

		expect(message).toEqual({
			id: "msg-1",
			topic: "orders",
			payload: "created",
			createdAt: 1_700_000_000_000,
			headers: {},
		});
	});

	test("should default to uuid ids and the current time", () => {
		const before = Date.now();
		const message = createMessage("orders", "created");
		const after = Date.now();

		expect(message.id).toMatch(
			/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
		);
		expect(message.createdAt).toBeGreaterThanOrEqual(before);
		expect(message.createdAt).toBeLessThanOrEqual(after);
	});

	test("should generate a different id for every message", () => {
		const first = createMessage("orders", "a");
		const second = createMessage("orders", "a");
		expect(first.id).not.toBe(second.id);
	});

	test("should copy headers", () => {
		const headers: Record<string, string> = { "x-trace": "abc" };
		const message = createMessage("orders", "created", headers);
		headers["x-trace"] = "changed";

		expect(message.headers).toEqual({ "x-trace": "abc" });
	});

	test("should freeze the message and its headers", () => {
		const message = createMessage("orders", "created", { "x-trace": "abc" });
		expect(Object.isFrozen(message)).toBe(true);
		expect(Object.isFrozen(message.headers)).toBe(true);
	});

	test("should keep binary payloads as they are", () => {
		const bytes = new Uint8Array([1, 2, 3]);
		const message = createMessage("blobs", bytes);
		expect(message.payload).toBe(bytes);
	});
});

describe("describeMessage", () => {
	test("should render a text payload", () => {
		const message = createMessage("orders", "Order #1001 created", undefined, {
			idGenerator: () => "0123456789abcdef",
		});

		expect(describeMessage(message)).toBe(
			"Message{id='01234567', topic='orders', payload='Order #1001 created'}",
		);
	});

	test("should render the size of a binary payload", () => {
		const message = createMessage("blobs", new Uint8Array(4), undefined, {
			idGenerator: () => "0123456789abcdef",
		});

		expect(describeMessage(message)).toBe(
			"Message{id='01234567', topic='blobs', payload='<4 bytes>'}",
		);
	});
});

import { type Logger, pino } from "pino";
import { Consumer } from "../src/consumer.js";
import type { Message } from "../src/types.js";

export const silent = pino({ level: "silent" });

export function sequentialIds(): () => string {
	let next = 0;
	return () => `msg-${++next}`;
}

export function captureLogger(): {
	logger: Logger;
	lines: Array<Record<string, unknown>>;
} {
	const lines: Array<Record<string, unknown>> = [];
	const logger = pino(
		{ level: "debug" },
		{
			write(line: string) {
				lines.push(JSON.parse(line));
			},
		},
	);
	return { logger, lines };
}

export function recordingConsumer(id: string): {
	consumer: Consumer;
	received: Message[];
} {
	const received: Message[] = [];
	const consumer = new Consumer({
		id,
		handler: (message) => {
			received.push(message);
		},
	});
	return { consumer, received };
}

/**
 * Base class for every error raised by skein.
 */
export class SkeinError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "SkeinError";
	}
}

/**
 * Raised synchronously when a caller passes an argument the broker cannot accept.
 */
export class InvalidArgumentError extends SkeinError {
	public readonly argument: string;

	constructor(argument: string, message: string) {
		super(message);
		this.name = "InvalidArgumentError";
		this.argument = argument;
	}
}

/**
 * Raised when a mutating call reaches a broker that has been closed.
 */
export class BrokerClosedError extends SkeinError {
	constructor(operation: string) {
		super(`Broker has been closed, cannot ${operation}`);
		this.name = "BrokerClosedError";
	}
}

export function assertTopicName(name: string): void {
	if (typeof name !== "string" || name.length === 0) {
		throw new InvalidArgumentError(
			"topic",
			"Topic name must be a non-empty string",
		);
	}
}

export function assertCapacity(capacity: number, argument = "capacity"): void {
	if (!Number.isInteger(capacity) || capacity <= 0) {
		throw new InvalidArgumentError(
			argument,
			`${argument} must be a positive integer, received ${String(capacity)}`,
		);
	}
}

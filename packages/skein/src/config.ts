import { assertCapacity, InvalidArgumentError } from "./errors.js";

export const logLevels = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const;

export type LogLevel = (typeof logLevels)[number];

export const defaultBrokerName = "skein";
export const defaultCapacity = 1000;
export const defaultLogLevel: LogLevel = "info";
/**
 * Milliseconds `Broker.close()` waits for in-flight deliveries.
 */
export const defaultCloseTimeout = 5000;

export type BrokerConfig = {
	defaultCapacity: number;
	logLevel: LogLevel;
};

type Env = NodeJS.ProcessEnv;

export function isLogLevel(value: string): value is LogLevel {
	return logLevels.some((level) => level === value);
}

/**
 * Reads `SKEIN_DEFAULT_CAPACITY`, the capacity for topics created without one.
 */
export function readDefaultCapacity(env: Env = process.env): number {
	const raw = env.SKEIN_DEFAULT_CAPACITY?.trim();
	if (!raw) {
		return defaultCapacity;
	}

	const capacity = Number(raw);
	assertCapacity(capacity, "SKEIN_DEFAULT_CAPACITY");
	return capacity;
}

/**
 * Reads `SKEIN_LOG_LEVEL`, the pino level for the broker's own logger.
 */
export function readLogLevel(env: Env = process.env): LogLevel {
	const raw = env.SKEIN_LOG_LEVEL?.trim().toLowerCase();
	if (!raw) {
		return defaultLogLevel;
	}

	if (!isLogLevel(raw)) {
		throw new InvalidArgumentError(
			"SKEIN_LOG_LEVEL",
			`SKEIN_LOG_LEVEL must be one of ${logLevels.join(", ")}, received ${raw}`,
		);
	}

	return raw;
}

/**
 * Reads broker configuration from environment variables, falling back to the defaults.
 */
export function loadConfig(env: Env = process.env): BrokerConfig {
	return {
		defaultCapacity: readDefaultCapacity(env),
		logLevel: readLogLevel(env),
	};
}

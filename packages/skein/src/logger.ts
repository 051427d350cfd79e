import { type Logger, pino } from "pino";
import { defaultBrokerName, defaultLogLevel, type LogLevel } from "./config.js";

export type { Logger } from "pino";

export type LoggerOptions = {
	name?: string;
	level?: LogLevel;
};

export function createLogger(options: LoggerOptions = {}): Logger {
	return pino({
		name: options.name ?? defaultBrokerName,
		level: options.level ?? defaultLogLevel,
	});
}

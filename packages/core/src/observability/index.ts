/**
 * Observability — Drishti logging for Pratidhvani.
 */

export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	resetLoggingConfig,
	parseLogLevel,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
	WritableSink,
} from "./logger.js";

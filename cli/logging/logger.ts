import pino, { type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Root logger for the CLI. Writes JSON lines to stderr so stdout stays
 * free for command output (entry-type listings, created paths).
 */
export function createLogger(level: LogLevel = "info"): Logger {
	return pino(
		{
			name: "notebook",
			level,
			base: undefined,
		},
		pino.destination(2),
	);
}

/** Logger that drops everything; handy for tests and library callers. */
export function createSilentLogger(): Logger {
	return pino({ level: "silent" });
}

import {
	configure,
	getConsoleSink,
	getLogger,
	type LogLevel,
} from "@logtape/logtape";

/**
 * Centralized logger configuration for gemwalk
 *
 * Creates a hierarchical logger structure:
 * - gemwalk (root)
 *   - transport (real/mock)
 *   - client
 *   - session
 *   - trust (real/mock)
 *   - file (real/mock)
 *   - config
 */

const LOG_LEVELS: readonly LogLevel[] = [
	"debug",
	"info",
	"warning",
	"error",
	"fatal",
];

let isConfigured = false;

/**
 * Narrow a user-supplied level name to a LogTape level
 *
 * Accepts "warn" as an alias of "warning".
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
	if (!value) {
		return null;
	}
	const normalized = value.trim().toLowerCase();
	if (normalized === "warn") {
		return "warning";
	}
	return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

/**
 * Configure LogTape with the specified log level
 * This function should be called only once, early in the application lifecycle
 */
export async function configureLogger(
	level: LogLevel = "warning",
): Promise<void> {
	if (isConfigured) {
		return;
	}

	await configure({
		sinks: {
			console: getConsoleSink(),
		},
		loggers: [
			{
				category: "gemwalk",
				lowestLevel: level,
				sinks: ["console"],
			},
			{
				category: ["logtape", "meta"],
				lowestLevel: "warning",
				sinks: ["console"],
			},
		],
	});

	isConfigured = true;
}

export const rootLogger = getLogger(["gemwalk"]);

// Implementation-specific loggers
export const transportLogger = getLogger(["gemwalk", "transport"]);
export const clientLogger = getLogger(["gemwalk", "client"]);
export const sessionLogger = getLogger(["gemwalk", "session"]);
export const trustLogger = getLogger(["gemwalk", "trust"]);
export const fileLogger = getLogger(["gemwalk", "file"]);
export const configLogger = getLogger(["gemwalk", "config"]);

// Test double loggers
export const mockTransportLogger = getLogger(["gemwalk", "transport", "mock"]);
export const mockTrustLogger = getLogger(["gemwalk", "trust", "mock"]);
export const mockFileLogger = getLogger(["gemwalk", "file", "mock"]);

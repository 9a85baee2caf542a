import { InvalidArgumentError } from "commander";
import type { Config } from "../interfaces/IConfigService.js";
import { describeError } from "../utils/describeError.js";

/**
 * Handle CLI command errors with user-friendly messages
 * Centralizes error handling across all CLI commands
 */
export function handleError(error: unknown, defaultMessage: string): never {
	console.error(`Error: ${defaultMessage}: ${describeError(error)}`);
	process.exit(1);
}

/**
 * Parse a URL argument, adding the gemini:// scheme when it is missing
 */
export function parseUrlArgument(value: string): URL {
	const text = value.includes("://") ? value : `gemini://${value}`;
	try {
		return new URL(text);
	} catch {
		throw new InvalidArgumentError(`"${value}" is not a valid URL.`);
	}
}

/**
 * Commander parser for non-negative integer options
 */
export function parseCount(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 0) {
		throw new InvalidArgumentError("Must be a non-negative integer.");
	}
	return parsed;
}

/**
 * Commander parser for positive millisecond options
 */
export function parseMilliseconds(value: string): number {
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Must be a positive number of milliseconds.");
	}
	return parsed;
}

/**
 * Options shared by commands that make requests
 */
export interface RequestCommandOptions {
	followRedirects?: boolean;
	maxRedirects?: number;
	timeout?: number;
	cert?: string;
	key?: string;
}

/**
 * Turn command-line options into configuration overrides
 */
export function toConfigOverrides(options: RequestCommandOptions): Config {
	if ((options.cert === undefined) !== (options.key === undefined)) {
		throw new InvalidArgumentError("--cert and --key must be given together.");
	}
	return {
		followRedirects: options.followRedirects,
		maxRedirects: options.maxRedirects,
		timeout: options.timeout,
		clientCertificate:
			options.cert !== undefined && options.key !== undefined
				? { certFile: options.cert, keyFile: options.key }
				: undefined,
	};
}

import { GeminiError } from "../types/Response.js";

/**
 * Host and port to connect to
 */
export interface Endpoint {
	readonly host: string;
	readonly port: number;
}

/**
 * Error thrown when the connection, the TLS handshake or an I/O operation fails
 */
export class TransportError extends GeminiError {
	/** The underlying cause of the transport failure */
	public readonly detail?: string;

	constructor(url: string, detail?: string) {
		super(`Transport error: ${detail || "Connection failed"}`, url);
		this.detail = detail;
	}
}

/**
 * Error thrown when the peer stops responding for longer than the timeout
 */
export class TransportTimeoutError extends TransportError {
	/** Timeout value in milliseconds that was exceeded */
	public readonly timeout: number;

	constructor(url: string, timeout: number) {
		super(url, `no activity for ${timeout}ms`);
		this.timeout = timeout;
	}
}

/**
 * Error thrown when a host presents a different key than the one pinned on
 * first use
 */
export class CertificateMismatchError extends TransportError {
	public readonly host: string;
	public readonly expected: string;
	public readonly actual: string;

	constructor(url: string, host: string, expected: string, actual: string) {
		super(
			url,
			`certificate for ${host} does not match the pinned key (expected ${expected}, got ${actual})`,
		);
		this.host = host;
		this.expected = expected;
		this.actual = actual;
	}
}

/**
 * Transport for Gemini requests
 *
 * One call opens one connection: it connects, completes the TLS handshake,
 * writes the request line and hands back the reply as a stream of chunks.
 * Connections are never reused.
 */
export default interface IGeminiTransport {
	/**
	 * Send a request line and return the reply stream
	 *
	 * @param endpoint - Host and port to connect to
	 * @param requestLine - The request including its CR LF terminator
	 * @param url - Requested URL, used for error reporting
	 * @returns The reply; stopping iteration early closes the connection
	 * @throws TransportError when the connection or handshake fails
	 * @throws CertificateMismatchError when the host's pinned key changed
	 */
	send(
		endpoint: Endpoint,
		requestLine: string,
		url: string,
	): Promise<AsyncIterable<Uint8Array>>;
}

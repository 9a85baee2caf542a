import { createHash } from "node:crypto";
import { isIP } from "node:net";
import { connect, type PeerCertificate, type TLSSocket } from "node:tls";
import type IGeminiTransport from "../interfaces/IGeminiTransport.js";
import {
	type Endpoint,
	TransportError,
	TransportTimeoutError,
} from "../interfaces/IGeminiTransport.js";
import type ITrustStore from "../interfaces/ITrustStore.js";
import { GeminiError } from "../types/Response.js";
import { transportLogger } from "../utils/logger.js";

/**
 * PEM-encoded client certificate and key presented during the handshake
 */
export interface ClientCertificate {
	readonly cert: string;
	readonly key: string;
}

export interface TlsTransportOptions {
	/** Milliseconds of socket inactivity before giving up (default: 30000) */
	readonly timeout?: number;
	/** Certificate to present when a capsule asks for one */
	readonly clientCertificate?: ClientCertificate;
}

/**
 * TLS transport using node:tls
 *
 * Certificate authorities play no part: the handshake accepts any
 * certificate, then the SHA-256 fingerprint of the server's public key is
 * checked against the trust store before the request is written. A host
 * whose key changed never receives the request.
 *
 * @example
 * ```typescript
 * const transport = new NodeTlsTransport(trustStore, { timeout: 10000 });
 * const reply = await transport.send(
 *   { host: "example.org", port: 1965 },
 *   "gemini://example.org/\r\n",
 *   "gemini://example.org/",
 * );
 * ```
 */
export default class NodeTlsTransport implements IGeminiTransport {
	static readonly DEFAULT_TIMEOUT = 30_000;

	private readonly timeout: number;

	constructor(
		private readonly trustStore: ITrustStore,
		private readonly options: TlsTransportOptions = {},
	) {
		const timeout = options.timeout ?? NodeTlsTransport.DEFAULT_TIMEOUT;
		if (timeout <= 0 || !Number.isFinite(timeout)) {
			throw new RangeError(
				`Invalid timeout value: ${timeout}. Must be a positive number.`,
			);
		}
		this.timeout = timeout;
	}

	async send(
		endpoint: Endpoint,
		requestLine: string,
		url: string,
	): Promise<AsyncIterable<Uint8Array>> {
		const socket = await this.connect(endpoint, url);

		try {
			const fingerprint = publicKeyFingerprint(
				socket.getPeerCertificate(),
				url,
			);
			const decision = await this.trustStore.verify(
				endpoint.host,
				endpoint.port,
				fingerprint,
				url,
			);
			transportLogger.debug("{host}:{port} key {decision}", {
				host: endpoint.host,
				port: endpoint.port,
				decision,
			});
			await writeLine(socket, requestLine);
		} catch (error) {
			socket.destroy();
			throw mapError(error, url);
		}

		return readChunks(socket, url);
	}

	private connect(endpoint: Endpoint, url: string): Promise<TLSSocket> {
		const { clientCertificate } = this.options;

		return new Promise((resolve, reject) => {
			const socket = connect({
				host: endpoint.host,
				port: endpoint.port,
				// SNI takes names only
				servername: isIP(endpoint.host) ? undefined : endpoint.host,
				rejectUnauthorized: false,
				minVersion: "TLSv1.2",
				cert: clientCertificate?.cert,
				key: clientCertificate?.key,
			});

			socket.setTimeout(this.timeout, () => {
				socket.destroy(new TransportTimeoutError(url, this.timeout));
			});
			// Errors after the handshake surface through the reply iterator
			socket.on("error", (error) => {
				transportLogger.debug("socket error for {url}: {error}", {
					url,
					error: error.message,
				});
			});

			const onHandshakeError = (error: Error) => {
				reject(mapError(error, url));
			};
			socket.once("error", onHandshakeError);
			socket.once("secureConnect", () => {
				socket.off("error", onHandshakeError);
				transportLogger.debug("connected to {host}:{port} ({protocol})", {
					host: endpoint.host,
					port: endpoint.port,
					protocol: socket.getProtocol() ?? "unknown",
				});
				resolve(socket);
			});
		});
	}
}

/**
 * SHA-256 of the certificate's public key as colon-separated upper-case hex
 *
 * Falls back to the certificate fingerprint when the key is not exposed.
 */
export function publicKeyFingerprint(
	certificate: Pick<PeerCertificate, "pubkey" | "fingerprint256">,
	url: string,
): string {
	if (certificate.pubkey && certificate.pubkey.length > 0) {
		return formatFingerprint(
			createHash("sha256").update(certificate.pubkey).digest("hex"),
		);
	}
	if (certificate.fingerprint256) {
		return certificate.fingerprint256;
	}
	throw new TransportError(url, "server presented no certificate");
}

export function formatFingerprint(hex: string): string {
	return (hex.toUpperCase().match(/../g) ?? []).join(":");
}

function writeLine(socket: TLSSocket, line: string): Promise<void> {
	return new Promise((resolve, reject) => {
		socket.write(line, "utf8", (error) => {
			if (error) {
				reject(error);
				return;
			}
			resolve();
		});
	});
}

async function* readChunks(
	socket: TLSSocket,
	url: string,
): AsyncGenerator<Uint8Array, void, undefined> {
	try {
		for await (const chunk of socket) {
			yield chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk));
		}
	} catch (error) {
		throw mapError(error, url);
	} finally {
		socket.destroy();
	}
}

function mapError(error: unknown, url: string): GeminiError {
	if (error instanceof GeminiError) {
		return error;
	}
	if (error instanceof Error) {
		const code =
			"code" in error && typeof error.code === "string" ? error.code : null;
		return new TransportError(
			url,
			code ? `${code}: ${error.message}` : error.message,
		);
	}
	return new TransportError(url, "Unknown network error occurred");
}

import type IGeminiClient from "../interfaces/IGeminiClient.js";
import type IGeminiTransport from "../interfaces/IGeminiTransport.js";
import { type Endpoint, TransportError } from "../interfaces/IGeminiTransport.js";
import {
	AddressError,
	GeminiError,
	type GeminiResponse,
	RedirectLoopError,
	type RequestOptions,
	SchemeError,
} from "../types/Response.js";
import { clientLogger } from "../utils/logger.js";
import { BoundedReader } from "./BoundedReader.js";
import {
	MAX_RESPONSE_BYTES,
	parseResponse,
	STATUS_TOKEN_LENGTH,
} from "./ResponseParser.js";

/**
 * Client-wide settings
 */
export interface GeminiClientOptions {
	/** Follow 3x responses automatically (default: true) */
	readonly followRedirects?: boolean;
	/** Most redirects followed for one request (default: 5) */
	readonly maxRedirects?: number;
}

/**
 * Gemini protocol client
 *
 * Each request opens its own connection through the transport, writes the
 * request line, reads the status token and at most 8 MiB after it, and
 * classifies the reply. Redirects are followed with a hop counter so a
 * redirect cycle ends in a RedirectLoopError.
 *
 * @example
 * ```typescript
 * const client = new GeminiClient(new NodeTlsTransport(trustStore));
 * const response = await client.request(new URL("gemini://example.org/"));
 * if (response.kind === "success") {
 *   console.log(response.mime);
 * }
 * ```
 */
export class GeminiClient implements IGeminiClient {
	static readonly DEFAULT_PORT = 1965;
	static readonly DEFAULT_MAX_REDIRECTS = 5;
	/** Longest request URL the protocol allows, in bytes */
	static readonly MAX_REQUEST_BYTES = 1024;
	static readonly SCHEME = "gemini:";

	private readonly followRedirects: boolean;
	private readonly maxRedirects: number;

	constructor(
		private readonly transport: IGeminiTransport,
		options: GeminiClientOptions = {},
	) {
		this.followRedirects = options.followRedirects ?? true;
		this.maxRedirects =
			options.maxRedirects ?? GeminiClient.DEFAULT_MAX_REDIRECTS;
	}

	async request(url: URL, options?: RequestOptions): Promise<GeminiResponse> {
		const followRedirects = options?.followRedirects ?? this.followRedirects;
		const maxRedirects = options?.maxRedirects ?? this.maxRedirects;
		const chain: string[] = [];

		let target = url;
		while (true) {
			const response = await this.requestOnce(target);
			chain.push(response.url.href);
			if (response.kind !== "redirect" || !followRedirects) {
				return response;
			}
			if (chain.length > maxRedirects) {
				throw new RedirectLoopError(
					[...chain, response.target.href],
					maxRedirects,
				);
			}
			clientLogger.debug("redirect {from} -> {to} ({code})", {
				from: response.url.href,
				to: response.target.href,
				code: response.code,
			});
			target = response.target;
		}
	}

	/**
	 * Check a URL and fill in the protocol defaults
	 *
	 * @returns A normalized copy of `url` and the endpoint to connect to
	 */
	static prepare(url: URL): { url: URL; endpoint: Endpoint } {
		const target = new URL(url.href);
		if (target.protocol !== GeminiClient.SCHEME) {
			throw new SchemeError(target.href, target.protocol);
		}
		if (target.hostname === "") {
			throw new AddressError(target.href, "missing host");
		}
		if (target.pathname === "") {
			target.pathname = "/";
		}
		if (
			Buffer.byteLength(target.href, "utf8") > GeminiClient.MAX_REQUEST_BYTES
		) {
			throw new AddressError(
				target.href,
				`request longer than ${GeminiClient.MAX_REQUEST_BYTES} bytes`,
			);
		}

		const port = target.port === "" ? GeminiClient.DEFAULT_PORT : Number(target.port);
		// IPv6 literals come back bracketed from the URL parser
		const host = target.hostname.replace(/^\[(.*)\]$/, "$1");
		return { url: target, endpoint: { host, port } };
	}

	private async requestOnce(requested: URL): Promise<GeminiResponse> {
		const { url, endpoint } = GeminiClient.prepare(requested);
		clientLogger.debug("request {url} via {host}:{port}", {
			url: url.href,
			host: endpoint.host,
			port: endpoint.port,
		});

		const stream = await this.transport.send(
			endpoint,
			`${url.href}\r\n`,
			url.href,
		);
		const reader = new BoundedReader(stream);
		let token: Uint8Array;
		let remainder: Uint8Array;
		try {
			token = await reader.readExact(STATUS_TOKEN_LENGTH);
			const rest = await reader.readToEnd(MAX_RESPONSE_BYTES);
			if (rest.truncated) {
				clientLogger.warn("response from {url} truncated at {bytes} bytes", {
					url: url.href,
					bytes: MAX_RESPONSE_BYTES,
				});
			}
			remainder = rest.bytes;
		} catch (error) {
			throw toTransportError(error, url.href);
		} finally {
			await reader.close();
		}

		const response = parseResponse(url, token, remainder);
		clientLogger.info("{code} {url}", { code: response.code, url: url.href });
		return response;
	}
}

function toTransportError(error: unknown, url: string): GeminiError {
	if (error instanceof GeminiError) {
		return error;
	}
	return new TransportError(
		url,
		error instanceof Error ? error.message : "Unknown I/O error",
	);
}

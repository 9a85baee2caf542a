import type { GeminiResponse, RequestOptions } from "../types/Response.js";

/**
 * Client for Gemini requests
 *
 * Stateless between requests apart from its immutable configuration.
 */
export default interface IGeminiClient {
	/**
	 * Request a URL and classify the reply
	 *
	 * @param url - Absolute gemini:// URL
	 * @param options - Per-request overrides of the client's redirect settings
	 * @returns The classified response (after following redirects, if enabled)
	 * @throws SchemeError when the URL is not gemini://
	 * @throws AddressError when the URL has no host or is too long
	 * @throws TransportError when the connection fails
	 * @throws ProtocolError when the reply is malformed
	 * @throws EncodingError when text in the reply is not UTF-8
	 * @throws RedirectLoopError when too many redirects were followed
	 */
	request(url: URL, options?: RequestOptions): Promise<GeminiResponse>;
}

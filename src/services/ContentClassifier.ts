import { type Content, TEXT_MIME_PREFIX } from "../types/Content.js";
import { EncodingError } from "../types/Response.js";

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decode bytes as strict UTF-8
 *
 * @returns The decoded text, or null when the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
	try {
		return utf8.decode(bytes);
	} catch (error) {
		if (error instanceof TypeError) {
			return null;
		}
		throw error;
	}
}

/**
 * Wrap a MIME type and payload into typed content
 *
 * @param mime - MIME type from the response header
 * @param bytes - Response payload
 * @param url - URL the payload came from, for error reporting
 * @throws EncodingError when a text MIME type carries invalid UTF-8
 */
export function classifyContent(
	mime: string,
	bytes: Uint8Array,
	url = "",
): Content {
	if (!mime.startsWith(TEXT_MIME_PREFIX)) {
		return { mime, body: { kind: "binary", bytes } };
	}

	const text = decodeUtf8(bytes);
	if (text === null) {
		throw new EncodingError(url, "body");
	}
	return { mime, body: { kind: "text", text } };
}

/**
 * Content shown for a server prompt while waiting for the user's answer
 */
export function promptContent(prompt: string): Content {
	return { mime: "text/plain", body: { kind: "text", text: prompt } };
}

import {
	AddressResolutionError,
	EncodingError,
	type GeminiResponse,
	ProtocolError,
	STATUS_CATEGORIES,
	STATUS_TABLE,
} from "../types/Response.js";
import { decodeUtf8 } from "./ContentClassifier.js";

/** Two status digits and the space after them */
export const STATUS_TOKEN_LENGTH = 3;

/** Most bytes read after the status token */
export const MAX_RESPONSE_BYTES = 8 * 1024 * 1024;

/** MIME type assumed when a success header is empty */
export const DEFAULT_MIME = "text/gemini; charset=utf-8";

const SPACE = 0x20;
const NEWLINE = 0x0a;

/**
 * Classify a reply from its status token and the bytes that follow it
 *
 * @param url - URL the reply belongs to
 * @param token - The first three bytes of the reply
 * @param remainder - Everything after the token (already capped)
 * @throws ProtocolError for an unknown status or a malformed status token
 * @throws EncodingError when a header, prompt or message is not UTF-8
 * @throws AddressResolutionError when a redirect target is not a URL
 */
export function parseResponse(
	url: URL,
	token: Uint8Array,
	remainder: Uint8Array,
): GeminiResponse {
	const code = parseStatusToken(url, token);
	const entry = STATUS_TABLE[code];
	if (!entry) {
		throw new ProtocolError(
			url.href,
			"unknown-status",
			`unknown status code ${code}`,
		);
	}

	switch (entry.kind) {
		case "input":
			return {
				kind: "input",
				code,
				url,
				status: entry.status,
				sensitive: entry.status === "sensitive",
				prompt: decodeText(url, remainder, "prompt").trim(),
			};
		case "success": {
			const newline = remainder.indexOf(NEWLINE);
			const header = newline === -1 ? remainder : remainder.subarray(0, newline);
			const body =
				newline === -1 ? new Uint8Array(0) : remainder.subarray(newline + 1);
			const mime = decodeText(url, header, "header").trim();
			return {
				kind: "success",
				code,
				url,
				mime: mime === "" ? DEFAULT_MIME : mime,
				body,
			};
		}
		case "redirect": {
			const targetText = decodeText(url, remainder, "redirect target").trim();
			return {
				kind: "redirect",
				code,
				url,
				status: entry.status,
				permanent: entry.status === "permanent",
				target: parseRedirectTarget(url, targetText),
			};
		}
		case "temporaryFailure":
			return {
				kind: "temporaryFailure",
				code,
				url,
				status: entry.status,
				...optionalMessage(url, remainder),
			};
		case "permanentFailure":
			return {
				kind: "permanentFailure",
				code,
				url,
				status: entry.status,
				...optionalMessage(url, remainder),
			};
		case "clientCertificateError":
			return {
				kind: "clientCertificateError",
				code,
				url,
				status: entry.status,
				...optionalMessage(url, remainder),
			};
	}
}

/**
 * Validate the status token and return its two digits
 */
export function parseStatusToken(url: URL, token: Uint8Array): string {
	const text = String.fromCharCode(...token.subarray(0, 2));
	if (!/^\d\d$/.test(text)) {
		throw new ProtocolError(
			url.href,
			token.length < 2 ? "malformed-header" : "invalid-status",
			`invalid response code ${JSON.stringify(text)}`,
		);
	}
	const category = text.charAt(0);
	if (!STATUS_CATEGORIES[category]) {
		throw new ProtocolError(
			url.href,
			"invalid-status",
			`invalid response code ${text}`,
		);
	}
	if (token.length < STATUS_TOKEN_LENGTH || token[2] !== SPACE) {
		throw new ProtocolError(
			url.href,
			"malformed-header",
			`status ${text} is not followed by a space`,
		);
	}
	return text;
}

function decodeText(url: URL, bytes: Uint8Array, part: string): string {
	const text = decodeUtf8(bytes);
	if (text === null) {
		throw new EncodingError(url.href, part);
	}
	return text;
}

function optionalMessage(
	url: URL,
	bytes: Uint8Array,
): { message?: string } {
	const message = decodeText(url, bytes, "message").trim();
	return message === "" ? {} : { message };
}

function parseRedirectTarget(url: URL, text: string): URL {
	try {
		return new URL(text, url);
	} catch (error) {
		throw new AddressResolutionError(
			text,
			url.href,
			error instanceof Error ? error.message : undefined,
		);
	}
}

/**
 * Status of an input request (1x)
 */
export type InputStatus = "normal" | "sensitive";

/**
 * Status of a redirect (3x)
 */
export type RedirectStatus = "temporary" | "permanent";

/**
 * Status of a temporary failure (4x)
 */
export type TemporaryFailureStatus =
	| "unspecified"
	| "serverUnavailable"
	| "cgiError"
	| "proxyError"
	| "slowDown";

/**
 * Status of a permanent failure (5x)
 */
export type PermanentFailureStatus =
	| "unspecified"
	| "notFound"
	| "gone"
	| "proxyRequestRefused"
	| "badRequest";

/**
 * Status of a client certificate error (6x)
 */
export type ClientCertificateStatus = "required" | "notAuthorized" | "notValid";

/**
 * Fields shared by every response variant
 */
interface ResponseBase {
	/** Two-digit status code as sent by the server (e.g. "20") */
	readonly code: string;
	/** URL that produced this response (the last hop when redirects were followed) */
	readonly url: URL;
}

export interface InputResponse extends ResponseBase {
	readonly kind: "input";
	readonly status: InputStatus;
	/** Whether the answer should be masked while typed */
	readonly sensitive: boolean;
	readonly prompt: string;
}

export interface SuccessResponse extends ResponseBase {
	readonly kind: "success";
	readonly mime: string;
	/** Raw payload; decoding is the content classifier's job */
	readonly body: Uint8Array;
}

export interface RedirectResponse extends ResponseBase {
	readonly kind: "redirect";
	readonly status: RedirectStatus;
	readonly permanent: boolean;
	readonly target: URL;
}

export interface TemporaryFailureResponse extends ResponseBase {
	readonly kind: "temporaryFailure";
	readonly status: TemporaryFailureStatus;
	readonly message?: string;
}

export interface PermanentFailureResponse extends ResponseBase {
	readonly kind: "permanentFailure";
	readonly status: PermanentFailureStatus;
	readonly message?: string;
}

export interface ClientCertificateErrorResponse extends ResponseBase {
	readonly kind: "clientCertificateError";
	readonly status: ClientCertificateStatus;
	readonly message?: string;
}

/**
 * A classified Gemini reply; exactly one variant per well-formed response
 */
export type GeminiResponse =
	| InputResponse
	| SuccessResponse
	| RedirectResponse
	| TemporaryFailureResponse
	| PermanentFailureResponse
	| ClientCertificateErrorResponse;

export type ResponseKind = GeminiResponse["kind"];

/**
 * One row of the status table
 */
export type StatusEntry =
	| { readonly kind: "input"; readonly status: InputStatus }
	| { readonly kind: "success" }
	| { readonly kind: "redirect"; readonly status: RedirectStatus }
	| { readonly kind: "temporaryFailure"; readonly status: TemporaryFailureStatus }
	| { readonly kind: "permanentFailure"; readonly status: PermanentFailureStatus }
	| {
			readonly kind: "clientCertificateError";
			readonly status: ClientCertificateStatus;
	  };

/**
 * Status category for each leading digit
 */
export const STATUS_CATEGORIES: Readonly<Record<string, ResponseKind>> = {
	"1": "input",
	"2": "success",
	"3": "redirect",
	"4": "temporaryFailure",
	"5": "permanentFailure",
	"6": "clientCertificateError",
};

/**
 * Every status code the client understands. Anything not listed here is a
 * protocol violation.
 */
export const STATUS_TABLE: Readonly<Record<string, StatusEntry>> = {
	"10": { kind: "input", status: "normal" },
	"11": { kind: "input", status: "sensitive" },
	"20": { kind: "success" },
	"30": { kind: "redirect", status: "temporary" },
	"31": { kind: "redirect", status: "permanent" },
	"40": { kind: "temporaryFailure", status: "unspecified" },
	"41": { kind: "temporaryFailure", status: "serverUnavailable" },
	"42": { kind: "temporaryFailure", status: "cgiError" },
	"43": { kind: "temporaryFailure", status: "proxyError" },
	"44": { kind: "temporaryFailure", status: "slowDown" },
	"50": { kind: "permanentFailure", status: "unspecified" },
	"51": { kind: "permanentFailure", status: "notFound" },
	"52": { kind: "permanentFailure", status: "gone" },
	"53": { kind: "permanentFailure", status: "proxyRequestRefused" },
	"59": { kind: "permanentFailure", status: "badRequest" },
	"60": { kind: "clientCertificateError", status: "required" },
	"61": { kind: "clientCertificateError", status: "notAuthorized" },
	"62": { kind: "clientCertificateError", status: "notValid" },
};

/**
 * Human-readable names for the status codes, used in failure pages
 */
export const STATUS_DESCRIPTIONS: Readonly<Record<string, string>> = {
	"10": "Input",
	"11": "Sensitive input",
	"20": "Success",
	"30": "Temporary redirect",
	"31": "Permanent redirect",
	"40": "Temporary failure",
	"41": "Server unavailable",
	"42": "CGI error",
	"43": "Proxy error",
	"44": "Slow down",
	"50": "Permanent failure",
	"51": "Not found",
	"52": "Gone",
	"53": "Proxy request refused",
	"59": "Bad request",
	"60": "Client certificate required",
	"61": "Certificate not authorized",
	"62": "Certificate not valid",
};

/**
 * Options for a single request
 */
export interface RequestOptions {
	/** Follow 3x responses automatically (default: client setting) */
	readonly followRedirects?: boolean;
	/** Maximum number of redirect hops before giving up (default: client setting) */
	readonly maxRedirects?: number;
}

/**
 * Base class for all errors raised while resolving, requesting or decoding a
 * Gemini resource
 */
export abstract class GeminiError extends Error {
	constructor(
		message: string,
		public readonly url: string,
	) {
		super(message);
		this.name = this.constructor.name;
	}
}

/**
 * Error thrown when a URL does not use the gemini scheme
 */
export class SchemeError extends GeminiError {
	public readonly scheme: string;

	constructor(url: string, scheme: string) {
		super(`Unsupported scheme "${scheme}" (expected "gemini:")`, url);
		this.scheme = scheme;
	}
}

/**
 * Error thrown when a URL cannot be requested (missing host, request too long)
 */
export class AddressError extends GeminiError {
	constructor(url: string, reason: string) {
		super(`Invalid address: ${reason}`, url);
	}
}

export type ProtocolErrorReason =
	| "invalid-status"
	| "unknown-status"
	| "malformed-header";

/**
 * Error thrown when the server's reply does not follow the protocol
 */
export class ProtocolError extends GeminiError {
	public readonly reason: ProtocolErrorReason;

	constructor(url: string, reason: ProtocolErrorReason, detail: string) {
		super(`Protocol error: ${detail}`, url);
		this.reason = reason;
	}
}

/**
 * Error thrown when bytes that must be text are not valid UTF-8
 */
export class EncodingError extends GeminiError {
	/** What was being decoded (e.g. "prompt", "body") */
	public readonly part: string;

	constructor(url: string, part: string) {
		super(`Invalid UTF-8 in ${part}`, url);
		this.part = part;
	}
}

/**
 * Error thrown when a link or typed address cannot be turned into a URL
 */
export class AddressResolutionError extends GeminiError {
	/** The text that failed to resolve */
	public readonly input: string;

	constructor(input: string, base: string, cause?: string) {
		super(
			`Cannot resolve "${input}"${cause ? `: ${cause}` : ""}`,
			base,
		);
		this.input = input;
	}
}

/**
 * Error thrown when redirects go on for longer than the configured limit
 */
export class RedirectLoopError extends GeminiError {
	/** Every URL visited, starting with the original request */
	public readonly chain: readonly string[];

	constructor(chain: readonly string[], maxRedirects: number) {
		super(
			`Too many redirects (more than ${maxRedirects})`,
			chain[0] ?? "",
		);
		this.chain = chain;
	}
}

/**
 * Error raised when a response category reaches a caller that has no handling
 * for it (a redirect that was not followed, a failure, a certificate error)
 */
export class UnhandledResponseError extends GeminiError {
	public readonly response: GeminiResponse;

	constructor(response: GeminiResponse) {
		super(describeResponse(response), response.url.href);
		this.response = response;
	}
}

/**
 * One-line summary of a response, e.g. "51 Not found: no such page"
 */
export function describeResponse(response: GeminiResponse): string {
	const title = `${response.code} ${STATUS_DESCRIPTIONS[response.code] ?? "Unknown status"}`;
	switch (response.kind) {
		case "input":
			return `${title}: ${response.prompt}`;
		case "success":
			return `${title} (${response.mime})`;
		case "redirect":
			return `${title} to ${response.target.href}`;
		case "temporaryFailure":
		case "permanentFailure":
		case "clientCertificateError":
			return response.message ? `${title}: ${response.message}` : title;
	}
}

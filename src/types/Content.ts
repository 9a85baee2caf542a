/**
 * Decoded body of a successful response
 */
export type Body =
	| { readonly kind: "text"; readonly text: string }
	| { readonly kind: "binary"; readonly bytes: Uint8Array };

/**
 * A MIME type together with its body
 *
 * `body` is text exactly when `mime` starts with "text/" and the payload is
 * valid UTF-8; otherwise it holds the payload byte for byte.
 */
export interface Content {
	readonly mime: string;
	readonly body: Body;
}

/** MIME prefix of every type decoded as text */
export const TEXT_MIME_PREFIX = "text/";

/** MIME type of gemtext documents */
export const GEMTEXT_MIME = "text/gemini";

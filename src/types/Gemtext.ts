import type { AddressResolutionError } from "./Response.js";

/**
 * One classified line of a gemtext document
 */
export type GemtextLine =
	| { readonly kind: "text"; readonly text: string }
	| { readonly kind: "link"; readonly target: URL; readonly label: string }
	| { readonly kind: "preformatted"; readonly text: string };

/**
 * Outcome of parsing a single line
 *
 * A failed line does not stop the document; callers decide whether to skip it.
 */
export type GemtextParseResult =
	| { readonly ok: true; readonly line: GemtextLine }
	| {
			readonly ok: false;
			readonly error: AddressResolutionError;
			/** The line as it appeared in the document */
			readonly raw: string;
	  };

/** Prefix of a link line */
export const LINK_MARKER = "=>";

/** Prefix of a preformatted line */
export const PREFORMATTED_MARKER = "```";

import {
	type GemtextLine,
	type GemtextParseResult,
	LINK_MARKER,
	PREFORMATTED_MARKER,
} from "../types/Gemtext.js";
import { AddressResolutionError } from "../types/Response.js";

const SCHEME_SEPARATOR = "://";

/**
 * Parse a gemtext document one line at a time
 *
 * Lines are produced lazily. A link whose target cannot be resolved yields a
 * failed result for that line only and parsing carries on with the next one.
 * Production stops once the remaining text is empty, so a single trailing
 * newline does not add an empty last line. Text lines are kept exactly as
 * written apart from a CR LF terminator; link labels are trimmed.
 *
 * Preformatted markers apply to their own line only: "```foo" yields a
 * preformatted "foo" and does not open a block.
 *
 * @example
 * ```typescript
 * const base = new URL("gemini://example.org/");
 * for (const result of parseGemtext("=> /about About\nHello", base)) {
 *   if (result.ok) console.log(result.line);
 * }
 * ```
 */
export function* parseGemtext(
	text: string,
	base: URL,
): Generator<GemtextParseResult, void, undefined> {
	let rest = text;
	while (rest !== "") {
		const newline = rest.indexOf("\n");
		let line: string;
		if (newline === -1) {
			line = rest;
			rest = "";
		} else {
			// CR LF is one terminator; any other CR belongs to the line
			const end = newline > 0 && rest[newline - 1] === "\r" ? newline - 1 : newline;
			line = rest.slice(0, end);
			rest = rest.slice(newline + 1);
		}
		yield parseLine(line, base);
	}
}

/**
 * Classify a single line (without its terminator)
 */
export function parseLine(line: string, base: URL): GemtextParseResult {
	if (line.startsWith(LINK_MARKER)) {
		return parseLink(line, base);
	}
	if (line.startsWith(PREFORMATTED_MARKER)) {
		return {
			ok: true,
			line: {
				kind: "preformatted",
				text: line.slice(PREFORMATTED_MARKER.length),
			},
		};
	}
	return { ok: true, line: { kind: "text", text: line } };
}

function parseLink(line: string, base: URL): GemtextParseResult {
	const body = line.slice(LINK_MARKER.length).trim();
	const split = body.search(/\s/);
	const targetText = split === -1 ? body : body.slice(0, split);
	const label = split === -1 ? "" : body.slice(split).trim();

	try {
		const target = targetText.includes(SCHEME_SEPARATOR)
			? new URL(targetText)
			: new URL(targetText, base);
		return { ok: true, line: { kind: "link", target, label } };
	} catch (error) {
		return {
			ok: false,
			error: new AddressResolutionError(
				targetText,
				base.href,
				error instanceof Error ? error.message : undefined,
			),
			raw: line,
		};
	}
}

/**
 * Keep only the lines that parsed, in document order
 */
export function parsedLines(text: string, base: URL): GemtextLine[] {
	const lines: GemtextLine[] = [];
	for (const result of parseGemtext(text, base)) {
		if (result.ok) {
			lines.push(result.line);
		}
	}
	return lines;
}

/**
 * Link targets of a document in document order, skipping lines that failed
 */
export function collectLinks(text: string, base: URL): URL[] {
	const links: URL[] = [];
	for (const line of parsedLines(text, base)) {
		if (line.kind === "link") {
			links.push(line.target);
		}
	}
	return links;
}

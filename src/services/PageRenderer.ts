import type { Content } from "../types/Content.js";
import type { GemtextLine } from "../types/Gemtext.js";
import type { SessionStatus, SessionStatusKind } from "../types/Session.js";
import { describeError } from "../utils/describeError.js";
import { GeminiClient } from "./GeminiClient.js";

/**
 * What the renderer needs to know about a session
 */
export interface PageView {
	readonly url: URL;
	readonly content: Content | null;
	/** Parsed lines when the content is gemtext, otherwise null */
	readonly lines: readonly GemtextLine[] | null;
	readonly status: SessionStatus;
	readonly scroll: number;
	readonly notice: string | null;
	readonly canGoBack: boolean;
	readonly canAdvance: boolean;
}

export interface Viewport {
	readonly width: number;
	readonly height: number;
}

const STATUS_LABELS: Readonly<Record<SessionStatusKind, string>> = {
	loading: "Loading",
	browsing: "Browsing",
	typing: "Typing",
	awaitingInput: "Input",
	failed: "Error",
};

const STATUS_WIDTH = 10;
const PREFORMATTED_INDENT = "  ";

/**
 * Formats a session as plain terminal lines
 *
 * Output is a title (the URL), a rule, the visible part of the page and a
 * status bar holding the typed buffer and the status name. Gemtext links are
 * numbered from 0 in document order, matching what a typed number selects.
 */
export class PageRenderer {
	/**
	 * @returns Exactly `viewport.height` lines (at least 4)
	 */
	render(view: PageView, viewport: Viewport): string[] {
		const width = Math.max(viewport.width, 20);
		const height = Math.max(viewport.height, 4);
		const bodyHeight = height - 3;

		const page = this.pageLines(view).flatMap((line) => wrap(line, width));
		const visible = page.slice(view.scroll, view.scroll + bodyHeight);
		while (visible.length < bodyHeight) {
			visible.push("");
		}

		return [
			truncate(view.url.href, width),
			"─".repeat(width),
			...visible,
			this.statusBar(view, width),
		];
	}

	/**
	 * Every line of the page body, before wrapping and scrolling
	 */
	pageLines(view: PageView): string[] {
		switch (view.status.kind) {
			case "loading":
				return ["Loading..."];
			case "failed":
				return [
					"This page could not be loaded.",
					"",
					describeError(view.status.error),
					"",
					failureCommands(view),
				];
			default:
				break;
		}

		const content = view.content;
		if (!content) {
			return ["No content"];
		}
		if (content.body.kind === "binary") {
			return [
				"Format not supported!",
				`${content.mime} (${content.body.bytes.length} bytes)`,
			];
		}
		if (view.lines) {
			return this.gemtextLines(view.lines);
		}
		return content.body.text.split(/\r?\n/);
	}

	statusBar(view: PageView, width: number): string {
		const label = STATUS_LABELS[view.status.kind];
		let left: string;
		switch (view.status.kind) {
			case "typing":
				left = `=> ${view.status.buffer}`;
				break;
			case "awaitingInput":
				left = `=> ${view.status.sensitive ? "*".repeat(view.status.buffer.length) : view.status.buffer}`;
				break;
			default:
				left = view.notice ? `! ${view.notice}` : "=> ";
				break;
		}
		const leftWidth = width - STATUS_WIDTH;
		return `${truncate(left, leftWidth).padEnd(leftWidth)}${label.padStart(STATUS_WIDTH)}`;
	}

	private gemtextLines(lines: readonly GemtextLine[]): string[] {
		const out: string[] = [];
		let linkNumber = 0;
		for (const line of lines) {
			switch (line.kind) {
				case "text":
					out.push(line.text);
					break;
				case "preformatted":
					out.push(`${PREFORMATTED_INDENT}${line.text}`);
					break;
				case "link": {
					const label = line.label || line.target.href;
					const foreign =
						line.target.protocol === GeminiClient.SCHEME
							? ""
							: ` (${line.target.protocol.replace(/:$/, "")})`;
					out.push(`[${linkNumber}] ${label}${foreign}`);
					linkNumber += 1;
					break;
				}
			}
		}
		return out;
	}
}

/**
 * Commands offered on an error page; back and forward only when they move
 */
function failureCommands(view: PageView): string {
	const commands = ["r retry", "i go to", "q quit"];
	if (view.canAdvance) {
		commands.unshift("> forward");
	}
	if (view.canGoBack) {
		commands.unshift("< back");
	}
	return commands.join("   ");
}

/**
 * Hard-wrap a line to `width` characters; an empty line stays one line
 */
export function wrap(line: string, width: number): string[] {
	const chars = Array.from(line);
	if (chars.length <= width) {
		return [line];
	}
	const out: string[] = [];
	for (let start = 0; start < chars.length; start += width) {
		out.push(chars.slice(start, start + width).join(""));
	}
	return out;
}

function truncate(text: string, width: number): string {
	const chars = Array.from(text);
	if (chars.length <= width) {
		return text;
	}
	return `${chars.slice(0, Math.max(width - 1, 0)).join("")}…`;
}

import type { SessionCommand, SessionStatus } from "../types/Session.js";

export interface CommandInputOptions {
	/** Lines moved by a page scroll */
	readonly pageSize: number;
}

/**
 * Single-key shortcuts accepted while browsing or on an error page
 */
export const SHORTCUTS: Readonly<Record<string, (pageSize: number) => SessionCommand>> = {
	q: () => ({ type: "quit" }),
	"<": () => ({ type: "back" }),
	">": () => ({ type: "forward" }),
	r: () => ({ type: "reload" }),
	i: () => ({ type: "startTyping" }),
	j: () => ({ type: "scroll", delta: 1 }),
	k: () => ({ type: "scroll", delta: -1 }),
	n: (pageSize) => ({ type: "scroll", delta: pageSize }),
	p: (pageSize) => ({ type: "scroll", delta: -pageSize }),
};

/**
 * Translate one line typed at the terminal into session commands
 *
 * - browsing / error page: a shortcut, an empty line (next page), or any
 *   other text, which is typed as an address and submitted
 * - typing: an empty line cancels; anything else drops the pending buffer
 *   and is read as if browsing, so each line stands on its own
 * - input prompt: the line is the answer, submitted as typed
 * - loading: nothing
 */
export function toCommands(
	status: SessionStatus,
	line: string,
	options: CommandInputOptions,
): SessionCommand[] {
	switch (status.kind) {
		case "loading":
			return [];
		case "browsing":
		case "failed": {
			const trimmed = line.trim();
			if (trimmed === "") {
				return [{ type: "scroll", delta: options.pageSize }];
			}
			const shortcut = SHORTCUTS[trimmed];
			if (shortcut) {
				return [shortcut(options.pageSize)];
			}
			return [{ type: "startTyping" }, ...typed(trimmed), { type: "submit" }];
		}
		case "typing": {
			const cancel: SessionCommand = { type: "cancel" };
			if (line.trim() === "") {
				return [cancel];
			}
			return [cancel, ...toCommands({ kind: "browsing" }, line, options)];
		}
		case "awaitingInput":
			return [...typed(line), { type: "submit" }];
	}
}

function typed(text: string): SessionCommand[] {
	return Array.from(text, (char): SessionCommand => ({ type: "character", char }));
}

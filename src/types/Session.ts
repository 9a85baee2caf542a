import type { NavigationHistory } from "../services/NavigationHistory.js";
import type { Content } from "./Content.js";

/**
 * Where the session is in its lifecycle; exactly one is active at a time
 */
export type SessionStatus =
	| { readonly kind: "loading" }
	| { readonly kind: "browsing" }
	| { readonly kind: "typing"; buffer: string }
	| { readonly kind: "awaitingInput"; buffer: string; readonly sensitive: boolean }
	| { readonly kind: "failed"; readonly error: Error };

export type SessionStatusKind = SessionStatus["kind"];

/**
 * Everything the display layer reads, owned by the session controller
 */
export interface Session {
	readonly history: NavigationHistory;
	content: Content | null;
	status: SessionStatus;
	/** Lines scrolled past the top of the page; never negative, no upper bound */
	scroll: number;
	/** Non-fatal message to show in the status bar until the next transition */
	notice: string | null;
}

/**
 * Discrete events from the input layer
 */
export type SessionCommand =
	| { readonly type: "character"; readonly char: string }
	| { readonly type: "backspace" }
	| { readonly type: "submit" }
	| { readonly type: "cancel" }
	| { readonly type: "startTyping" }
	| { readonly type: "back" }
	| { readonly type: "forward" }
	| { readonly type: "scroll"; readonly delta: number }
	| { readonly type: "reload" }
	| { readonly type: "quit" };

/**
 * What the driver should do after a command was applied
 */
export type DispatchOutcome = "continue" | "quit";

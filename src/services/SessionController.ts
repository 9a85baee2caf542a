import type IGeminiClient from "../interfaces/IGeminiClient.js";
import { GEMTEXT_MIME } from "../types/Content.js";
import type { GemtextLine } from "../types/Gemtext.js";
import {
	AddressResolutionError,
	type GeminiResponse,
	UnhandledResponseError,
} from "../types/Response.js";
import type {
	DispatchOutcome,
	Session,
	SessionCommand,
} from "../types/Session.js";
import { sessionLogger } from "../utils/logger.js";
import { classifyContent, promptContent } from "./ContentClassifier.js";
import { collectLinks, parsedLines } from "./GemtextParser.js";
import { NavigationHistory } from "./NavigationHistory.js";

/** Typed addresses starting with this are parsed as absolute URLs */
export const ABSOLUTE_ADDRESS_MARKER = "gemini://";

/**
 * Drives one browsing session
 *
 * Owns the session value (history, content, status, scroll) and is the only
 * place it changes. Commands are applied by the transition functions below;
 * when a transition leaves the session in `loading`, the driver calls
 * `load()`, which performs the request and applies the response.
 *
 * Errors never end the session: a failed load moves to `failed` with the
 * history intact, and an address that cannot be resolved leaves a notice.
 *
 * @example
 * ```typescript
 * const controller = new SessionController(client, new URL("gemini://example.org/"));
 * await controller.load();
 * await controller.dispatch({ type: "startTyping" });
 * await controller.dispatch({ type: "character", char: "0" });
 * await controller.dispatch({ type: "submit" });
 * ```
 */
export class SessionController {
	private readonly state: Session;

	constructor(
		private readonly client: IGeminiClient,
		home: URL,
	) {
		this.state = {
			history: new NavigationHistory(home),
			content: null,
			status: { kind: "loading" },
			scroll: 0,
			notice: null,
		};
	}

	get session(): Readonly<Session> {
		return this.state;
	}

	isLoading(): boolean {
		return this.state.status.kind === "loading";
	}

	/**
	 * Request the current URL and apply the outcome
	 *
	 * Does nothing unless the session is loading.
	 */
	async load(): Promise<void> {
		if (!this.isLoading()) {
			return;
		}
		const url = this.state.history.current();
		sessionLogger.debug("loading {url}", { url: url.href });

		try {
			const response = await this.client.request(url);
			applyResponse(this.state, response);
		} catch (error) {
			applyLoadFailure(this.state, error);
		}
	}

	/**
	 * Apply one command from the input layer
	 *
	 * Commands that arrive while a request is in flight are ignored.
	 */
	async dispatch(command: SessionCommand): Promise<DispatchOutcome> {
		const session = this.state;
		switch (session.status.kind) {
			case "loading":
				return "continue";
			case "browsing":
				return applyBrowsingCommand(session, command);
			case "typing":
				return applyTypingCommand(session, command);
			case "awaitingInput":
				return applyInputCommand(session, command);
			case "failed":
				return applyFailedCommand(session, command);
		}
	}

	/**
	 * Lines of the current page when it is a gemtext document
	 *
	 * Lines that fail to parse are skipped.
	 */
	documentLines(): GemtextLine[] | null {
		return documentLines(this.state);
	}
}

/**
 * Move into loading: clears content and scroll
 */
export function startLoading(session: Session): void {
	session.status = { kind: "loading" };
	session.content = null;
	session.scroll = 0;
	session.notice = null;
}

/**
 * Apply the response for the current URL
 */
export function applyResponse(session: Session, response: GeminiResponse): void {
	switch (response.kind) {
		case "success":
			session.content = classifyContent(
				response.mime,
				response.body,
				response.url.href,
			);
			session.status = { kind: "browsing" };
			return;
		case "input":
			session.content = promptContent(response.prompt);
			session.status = {
				kind: "awaitingInput",
				buffer: "",
				sensitive: response.sensitive,
			};
			return;
		default:
			applyLoadFailure(session, new UnhandledResponseError(response));
	}
}

/**
 * Record a failed load; history and the URL being loaded are kept
 */
export function applyLoadFailure(session: Session, error: unknown): void {
	const failure =
		error instanceof Error ? error : new Error(`Load failed: ${String(error)}`);
	sessionLogger.warn("load of {url} failed: {error}", {
		url: session.history.current().href,
		error: failure.message,
	});
	session.content = null;
	session.status = { kind: "failed", error: failure };
}

export function applyBrowsingCommand(
	session: Session,
	command: SessionCommand,
): DispatchOutcome {
	session.notice = null;
	switch (command.type) {
		case "startTyping":
			session.status = { kind: "typing", buffer: "" };
			break;
		case "back":
			session.history.back();
			startLoading(session);
			break;
		case "forward":
			session.history.advance();
			startLoading(session);
			break;
		case "reload":
			startLoading(session);
			break;
		case "scroll":
			session.scroll = Math.max(0, session.scroll + command.delta);
			break;
		case "quit":
			return "quit";
		default:
			break;
	}
	return "continue";
}

export function applyTypingCommand(
	session: Session,
	command: SessionCommand,
): DispatchOutcome {
	const { status } = session;
	if (status.kind !== "typing") {
		return "continue";
	}

	switch (command.type) {
		case "character":
			status.buffer += command.char;
			break;
		case "backspace":
			status.buffer = status.buffer.slice(0, -1);
			break;
		case "cancel":
			session.status = { kind: "browsing" };
			break;
		case "submit":
			submitAddress(session, status.buffer);
			break;
		case "quit":
			return "quit";
		default:
			break;
	}
	return "continue";
}

export function applyInputCommand(
	session: Session,
	command: SessionCommand,
): DispatchOutcome {
	const { status } = session;
	if (status.kind !== "awaitingInput") {
		return "continue";
	}

	switch (command.type) {
		case "character":
			status.buffer += command.char;
			break;
		case "backspace":
			status.buffer = status.buffer.slice(0, -1);
			break;
		case "cancel":
			status.buffer = "";
			break;
		case "submit": {
			const answered = session.history.current();
			// An empty answer is still sent, as a bare "?"
			answered.search = status.buffer === "" ? "?" : status.buffer;
			// The prompt page itself is not kept in history
			session.history.back();
			session.history.push(answered);
			startLoading(session);
			break;
		}
		case "quit":
			return "quit";
		default:
			break;
	}
	return "continue";
}

export function applyFailedCommand(
	session: Session,
	command: SessionCommand,
): DispatchOutcome {
	switch (command.type) {
		case "back":
			session.history.back();
			startLoading(session);
			break;
		case "forward":
			session.history.advance();
			startLoading(session);
			break;
		case "reload":
			startLoading(session);
			break;
		case "startTyping":
			session.status = { kind: "typing", buffer: "" };
			break;
		case "quit":
			return "quit";
		default:
			break;
	}
	return "continue";
}

/**
 * Resolve a typed address and navigate to it
 *
 * In order: a non-negative integer selects that link (0-based) of the current
 * page, text starting with "gemini://" is an absolute URL, anything else is
 * relative to the current URL. A link number with no matching link changes
 * nothing. An address that cannot be resolved returns to browsing with a
 * notice.
 */
export function submitAddress(session: Session, buffer: string): void {
	const current = session.history.current();

	if (/^\d+$/.test(buffer)) {
		const index = Number.parseInt(buffer, 10);
		const body = session.content?.body;
		if (body?.kind !== "text") {
			return;
		}
		const link = collectLinks(body.text, current)[index];
		if (!link) {
			return;
		}
		navigate(session, link);
		return;
	}

	let target: URL;
	try {
		target = buffer.startsWith(ABSOLUTE_ADDRESS_MARKER)
			? new URL(buffer)
			: new URL(buffer, current);
	} catch (error) {
		const failure = new AddressResolutionError(
			buffer,
			current.href,
			error instanceof Error ? error.message : undefined,
		);
		sessionLogger.info("{error}", { error: failure.message });
		session.status = { kind: "browsing" };
		session.notice = failure.message;
		return;
	}
	navigate(session, target);
}

function navigate(session: Session, target: URL): void {
	session.history.push(target);
	startLoading(session);
}

/**
 * Parsed lines of the session's content when it is gemtext
 */
export function documentLines(session: Session): GemtextLine[] | null {
	const content = session.content;
	if (!content || content.body.kind !== "text") {
		return null;
	}
	if (!content.mime.startsWith(GEMTEXT_MIME)) {
		return null;
	}
	return parsedLines(content.body.text, session.history.current());
}

import type { Interface as ReadlineInterface } from "node:readline";
import { createInterface } from "node:readline";
import { sessionLogger } from "../utils/logger.js";
import { toCommands } from "./CommandInput.js";
import type { PageRenderer, PageView } from "./PageRenderer.js";
import type { SessionController } from "./SessionController.js";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";

/**
 * Streams the browser talks to
 */
export interface TerminalIO {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream & {
		readonly isTTY?: boolean;
		readonly columns?: number;
		readonly rows?: number;
	};
}

/**
 * Line-oriented terminal front end for a session
 *
 * Loop: draw, load if the session is loading, otherwise wait for a line and
 * dispatch the commands it maps to. Only one request is ever in flight and
 * input is not read while it runs.
 */
export class TerminalBrowser {
	constructor(
		private readonly controller: SessionController,
		private readonly renderer: PageRenderer,
		private readonly io: TerminalIO,
	) {}

	/**
	 * Run until the user quits or input ends
	 */
	async run(): Promise<void> {
		const rl = this.createReadlineInterface();
		const lines = rl[Symbol.asyncIterator]();

		try {
			while (true) {
				this.draw();
				if (this.controller.isLoading()) {
					await this.controller.load();
					continue;
				}

				const next = await lines.next();
				if (next.done) {
					sessionLogger.debug("input closed");
					return;
				}

				const commands = toCommands(
					this.controller.session.status,
					next.value,
					{ pageSize: this.pageSize() },
				);
				for (const command of commands) {
					if ((await this.controller.dispatch(command)) === "quit") {
						return;
					}
				}
			}
		} finally {
			rl.close();
		}
	}

	/**
	 * Current session as the renderer sees it
	 */
	view(): PageView {
		const session = this.controller.session;
		return {
			url: session.history.current(),
			content: session.content,
			lines: this.controller.documentLines(),
			status: session.status,
			scroll: session.scroll,
			notice: session.notice,
			canGoBack: session.history.canGoBack(),
			canAdvance: session.history.canAdvance(),
		};
	}

	private draw(): void {
		const { output } = this.io;
		const lines = this.renderer.render(this.view(), {
			width: output.columns ?? 80,
			height: output.rows ?? 24,
		});
		output.write(`${output.isTTY ? CLEAR_SCREEN : ""}${lines.join("\n")}\n`);
	}

	private pageSize(): number {
		return Math.max((this.io.output.rows ?? 24) - 3, 1);
	}

	private createReadlineInterface(): ReadlineInterface {
		return createInterface({
			input: this.io.input,
			terminal: false,
		});
	}
}

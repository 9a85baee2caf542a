import { Command } from "commander";
import { getServices } from "../../services/serviceFactory.js";
import { SessionController } from "../../services/SessionController.js";
import { TerminalBrowser } from "../../services/TerminalBrowser.js";
import {
	handleError,
	parseCount,
	parseMilliseconds,
	parseUrlArgument,
	type RequestCommandOptions,
	toConfigOverrides,
} from "../cliUtils.js";

/**
 * Add the options shared by every command that makes requests
 */
export function withRequestOptions(command: Command): Command {
	return command
		.option("--follow-redirects", "Follow redirects automatically (default)")
		.option("--no-follow-redirects", "Stop at redirects instead of following them")
		.option(
			"--max-redirects <count>",
			"Most redirects followed for one request (default: 5)",
			parseCount,
		)
		.option(
			"--timeout <ms>",
			"Milliseconds of inactivity before a request fails (default: 30000)",
			parseMilliseconds,
		)
		.option("--cert <file>", "PEM client certificate to present")
		.option("--key <file>", "PEM key for --cert");
}

export const browseCommand = withRequestOptions(
	new Command("browse")
		.description(
			"Browse Gemini space interactively.\nType a link number, a URL or a relative path at the prompt; < and > move through history, q quits.",
		)
		.argument("[url]", "Page to open (default: homeUrl from the config file)"),
).action(async (url: string | undefined, options: RequestCommandOptions) => {
	try {
		const { client, config, pageRenderer } = await getServices(
			toConfigOverrides(options),
		);
		const start = parseUrlArgument(url ?? config.homeUrl);

		const controller = new SessionController(client, start);
		const browser = new TerminalBrowser(controller, pageRenderer, {
			input: process.stdin,
			output: process.stdout,
		});
		await browser.run();
	} catch (error) {
		handleError(error, "Browser stopped");
	}
});

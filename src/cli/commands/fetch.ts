import { Command } from "commander";
import { classifyContent } from "../../services/ContentClassifier.js";
import { getServices } from "../../services/serviceFactory.js";
import { describeResponse } from "../../types/Response.js";
import {
	handleError,
	parseUrlArgument,
	type RequestCommandOptions,
	toConfigOverrides,
} from "../cliUtils.js";
import { withRequestOptions } from "./browse.js";

interface FetchOptions extends RequestCommandOptions {
	raw?: boolean;
	header?: boolean;
	query?: string;
}

export const fetchCommand = withRequestOptions(
	new Command("fetch")
		.description(
			"Request a single URL and print the response body.\nAnything other than a success is printed to stderr and exits with status 1.",
		)
		.argument("<url>", "URL to request")
		.option("--raw", "Write the body bytes unchanged, even for text", false)
		.option("-i, --header", "Print the status line before the body", false)
		.option("-q, --query <text>", "Answer to send as the query string"),
).action(async (url: string, options: FetchOptions) => {
	try {
		const { client } = await getServices(toConfigOverrides(options));
		const target = parseUrlArgument(url);
		if (options.query !== undefined) {
			target.search = options.query;
		}

		const response = await client.request(target);
		if (options.header) {
			console.log(describeResponse(response));
		}

		if (response.kind !== "success") {
			if (!options.header) {
				console.error(describeResponse(response));
			}
			process.exitCode = 1;
			return;
		}

		if (options.raw) {
			process.stdout.write(response.body);
			return;
		}
		const content = classifyContent(
			response.mime,
			response.body,
			response.url.href,
		);
		if (content.body.kind === "binary") {
			process.stdout.write(content.body.bytes);
			return;
		}
		process.stdout.write(content.body.text);
	} catch (error) {
		handleError(error, `Failed to fetch ${url}`);
	}
});

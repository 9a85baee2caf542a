#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { configureLogger, parseLogLevel, rootLogger } from "./utils/logger.js";

// Configure LogTape before the command modules load
const hasVerboseFlag =
	process.argv.includes("-V") || process.argv.includes("--verbose");
const initialLogLevel =
	parseLogLevel(process.env.LOG_LEVEL) ?? (hasVerboseFlag ? "debug" : "warning");

await configureLogger(initialLogLevel);

// Now import commands after logger is configured
const { browseCommand } = await import("./cli/commands/browse.js");
const { fetchCommand } = await import("./cli/commands/fetch.js");
const { hostsCommand } = await import("./cli/commands/hosts.js");

let version = "0.0.0";
try {
	const packageJson: unknown = JSON.parse(
		await readFile(new URL("../package.json", import.meta.url), "utf8"),
	);
	if (
		typeof packageJson === "object" &&
		packageJson !== null &&
		"version" in packageJson &&
		typeof packageJson.version === "string"
	) {
		version = packageJson.version;
	}
} catch (error) {
	rootLogger.warn("could not read version from package.json: {error}", {
		error: error instanceof Error ? error.message : String(error),
	});
}

const program = new Command();

program
	.name("gemwalk")
	.description(
		"gemwalk is a terminal client for the Gemini protocol. It browses\ngemtext pages, answers server prompts and pins each capsule's key on first use.",
	)
	.version(version, "-v, --version", "Show version information")
	.option("-V, --verbose", "Enable debug logging for transport, trust and session events")
	.helpOption("-h, --help", "help for gemwalk")
	.hook("preAction", (thisCommand) => {
		if (thisCommand.opts().verbose) {
			rootLogger.debug("Verbose logging enabled.");
		}
	});

program.addCommand(browseCommand, { isDefault: true });
program.addCommand(fetchCommand);
program.addCommand(hostsCommand);

await program.parseAsync();

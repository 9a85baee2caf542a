import { Command } from "commander";
import { GeminiClient } from "../../services/GeminiClient.js";
import { getServices } from "../../services/serviceFactory.js";
import { handleError, parseCount } from "../cliUtils.js";

/**
 * Hosts list subcommand - shows every pinned key
 */
const hostsListCommand = new Command("list")
	.description("List hosts whose keys are pinned.")
	.action(async () => {
		try {
			const { trustStore } = await getServices();
			const hosts = await trustStore.list();
			if (hosts.length === 0) {
				console.log(`No pinned hosts in ${trustStore.getPath()}`);
				return;
			}
			for (const host of hosts) {
				console.log(`${host.id}  ${host.fingerprint}  (since ${host.firstSeen})`);
			}
		} catch (error) {
			handleError(error, "Failed to read known hosts");
		}
	});

/**
 * Hosts forget subcommand - drops a pin so the next key is trusted again
 */
const hostsForgetCommand = new Command("forget")
	.description(
		"Forget the pinned key of a host.\nUse this after a capsule legitimately changed its certificate.",
	)
	.argument("<host>", "Host name as it appears in URLs")
	.option(
		"-p, --port <port>",
		"Port the host is reached on",
		parseCount,
		GeminiClient.DEFAULT_PORT,
	)
	.action(async (host: string, options: { port: number }) => {
		try {
			const { trustStore } = await getServices();
			if (await trustStore.forget(host, options.port)) {
				console.log(`Forgot ${host}:${options.port}`);
			} else {
				console.log(`${host}:${options.port} was not pinned`);
			}
		} catch (error) {
			handleError(error, `Failed to forget ${host}`);
		}
	});

/**
 * Main hosts command with subcommands for managing pinned keys
 */
export const hostsCommand = new Command("hosts")
	.description("Manage pinned host keys (trust on first use)")
	.addCommand(hostsListCommand)
	.addCommand(hostsForgetCommand);

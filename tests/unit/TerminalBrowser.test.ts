import { Readable, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { PageRenderer } from "../../src/services/PageRenderer.js";
import { SessionController } from "../../src/services/SessionController.js";
import { TerminalBrowser } from "../../src/services/TerminalBrowser.js";
import ScriptedGeminiClient, { gemtextPage } from "../mocks/ScriptedGeminiClient.js";

const HOME = "gemini://example.org/";

function createOutput(): { stream: Writable; text: () => string } {
	const chunks: string[] = [];
	const stream = new Writable({
		write(chunk, _encoding, callback) {
			chunks.push(String(chunk));
			callback();
		},
	});
	return { stream, text: () => chunks.join("") };
}

function createBrowser(lines: string[]) {
	const client = new ScriptedGeminiClient()
		.on(HOME, gemtextPage(HOME, "Welcome\n=> /about About\n"))
		.on("gemini://example.org/about", gemtextPage("gemini://example.org/about", "About us\n"));
	const controller = new SessionController(client, new URL(HOME));
	const output = createOutput();
	const browser = new TerminalBrowser(controller, new PageRenderer(), {
		input: Readable.from(lines.map((line) => `${line}\n`)),
		output: output.stream,
	});
	return { client, controller, browser, output };
}

describe("TerminalBrowser", () => {
	it("loads the start page, follows a typed link number and quits", async () => {
		const { client, browser, output } = createBrowser(["0", "q"]);

		await browser.run();

		expect(client.requested).toEqual([HOME, "gemini://example.org/about"]);
		const screen = output.text().split("\n");
		expect(screen).toContain("[0] About");
		expect(screen).toContain("About us");
	});

	it("starts a fresh address after a link number with no link", async () => {
		const { client, controller, browser } = createBrowser(["7", "about", "q"]);

		await browser.run();

		expect(client.requested).toEqual([HOME, "gemini://example.org/about"]);
		expect(controller.session.history.current().href).toBe("gemini://example.org/about");
	});

	it("stops when input ends", async () => {
		const { client, controller, browser } = createBrowser([]);

		await browser.run();

		expect(client.requested).toEqual([HOME]);
		expect(controller.session.status).toEqual({ kind: "browsing" });
	});

	it("does not clear the screen when output is not a terminal", async () => {
		const { browser, output } = createBrowser(["q"]);
		await browser.run();
		expect(output.text().startsWith("gemini://example.org/\n")).toBe(true);
	});

	it("exposes the session as a page view", async () => {
		const { controller, browser } = createBrowser([]);
		await controller.load();

		const view = browser.view();
		expect(view.url.href).toBe(HOME);
		expect(view.status).toEqual({ kind: "browsing" });
		expect(view.canGoBack).toBe(false);
		expect(view.canAdvance).toBe(false);
		expect(view.lines).toEqual([
			{ kind: "text", text: "Welcome" },
			{ kind: "link", target: new URL("gemini://example.org/about"), label: "About" },
		]);
	});
});

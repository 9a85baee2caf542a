import { beforeEach, describe, expect, it } from "vitest";
import type IGeminiTransport from "../../src/interfaces/IGeminiTransport.js";
import { TransportError } from "../../src/interfaces/IGeminiTransport.js";
import { GeminiClient } from "../../src/services/GeminiClient.js";
import { MAX_RESPONSE_BYTES } from "../../src/services/ResponseParser.js";
import {
	AddressError,
	ProtocolError,
	RedirectLoopError,
	SchemeError,
} from "../../src/types/Response.js";
import InMemoryTransport from "../mocks/InMemoryTransport.js";

const MIB = 1024 * 1024;
const body = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe("GeminiClient", () => {
	let transport: InMemoryTransport;
	let client: GeminiClient;

	beforeEach(() => {
		transport = new InMemoryTransport();
		client = new GeminiClient(transport);
	});

	describe("request", () => {
		it("writes the absolute URL and CR LF on the default port", async () => {
			transport.setReply("gemini://example.org/", "20 text/gemini\r\n# Home\n");

			const response = await client.request(new URL("gemini://example.org"));

			expect(transport.getRequestHistory()).toEqual([
				{
					endpoint: { host: "example.org", port: 1965 },
					requestLine: "gemini://example.org/\r\n",
					url: "gemini://example.org/",
				},
			]);
			expect(response.kind).toBe("success");
			if (response.kind === "success") {
				expect(response.mime).toBe("text/gemini");
				expect(body(response.body)).toBe("# Home\n");
				expect(response.url.href).toBe("gemini://example.org/");
			}
		});

		it("uses an explicit port and unbrackets IPv6 hosts", async () => {
			transport.setReply("gemini://example.org:1966/x", "51 \r\n");
			transport.setReply("gemini://[::1]/", "51 \r\n");

			await client.request(new URL("gemini://example.org:1966/x"));
			await client.request(new URL("gemini://[::1]/"));

			expect(transport.getRequestHistory().map((r) => r.endpoint)).toEqual([
				{ host: "example.org", port: 1966 },
				{ host: "::1", port: 1965 },
			]);
		});

		it("does not modify the caller's URL", async () => {
			transport.setReply("gemini://example.org/", "20 text/plain\r\n");
			const url = new URL("gemini://example.org");
			await client.request(url);
			expect(url.pathname).toBe("");
		});

		it("rejects other schemes before connecting", async () => {
			await expect(
				client.request(new URL("https://example.org/")),
			).rejects.toBeInstanceOf(SchemeError);
			expect(transport.getRequestHistory()).toEqual([]);
		});

		it("rejects a URL without a host", async () => {
			await expect(client.request(new URL("gemini:///path"))).rejects.toThrow(
				new AddressError("gemini:///path", "missing host"),
			);
		});

		it("rejects a request longer than 1024 bytes", async () => {
			const url = new URL(`gemini://example.org/${"a".repeat(1100)}`);
			await expect(client.request(url)).rejects.toBeInstanceOf(AddressError);
			expect(transport.getRequestHistory()).toEqual([]);
		});

		it("passes transport errors through", async () => {
			transport.setReply(
				"gemini://example.org/",
				new TransportError("gemini://example.org/", "ECONNREFUSED"),
			);
			await expect(
				client.request(new URL("gemini://example.org/")),
			).rejects.toThrow("Transport error: ECONNREFUSED");
		});

		it("wraps stream failures in a TransportError", async () => {
			const failing: IGeminiTransport = {
				async send() {
					return (async function* () {
						yield new TextEncoder().encode("20 text/plain\r\npartial");
						throw new Error("socket hang up");
					})();
				},
			};
			await expect(
				new GeminiClient(failing).request(new URL("gemini://example.org/")),
			).rejects.toThrow(new TransportError("gemini://example.org/", "socket hang up"));
		});

		it("reports a reply shorter than the status token as a protocol error", async () => {
			transport.setReply("gemini://example.org/", "2");
			await expect(
				client.request(new URL("gemini://example.org/")),
			).rejects.toMatchObject({ reason: "malformed-header" });
		});

		it("reports an unknown status as a protocol error", async () => {
			transport.setReply("gemini://example.org/", "99 what\r\n");
			await expect(
				client.request(new URL("gemini://example.org/")),
			).rejects.toBeInstanceOf(ProtocolError);
		});
	});

	describe("response size cap", () => {
		it("reads at most 8 MiB after the status token and closes the stream", async () => {
			const header = new TextEncoder().encode("20 text/plain\r\n");
			const chunks = [header, ...Array.from({ length: 10 }, () => new Uint8Array(MIB).fill(0x61))];
			transport.setReply("gemini://example.org/big", chunks);

			const response = await client.request(new URL("gemini://example.org/big"));

			expect(response.kind).toBe("success");
			if (response.kind === "success") {
				// "text/plain\r\n" takes 12 of the capped bytes
				expect(response.body.length).toBe(MAX_RESPONSE_BYTES - 12);
			}
			expect(transport.chunksPulled).toBe(9);
			expect(transport.closedEarly).toBe(1);
		});

		it("reads small replies to their end", async () => {
			transport.setReply("gemini://example.org/", [
				new TextEncoder().encode("20 text/pl"),
				new TextEncoder().encode("ain\r\nhel"),
				new TextEncoder().encode("lo"),
			]);

			const response = await client.request(new URL("gemini://example.org/"));

			expect(response.kind === "success" && body(response.body)).toBe("hello");
			expect(transport.chunksPulled).toBe(3);
			expect(transport.closedEarly).toBe(0);
		});
	});

	describe("redirects", () => {
		it("follows a redirect and returns the final response", async () => {
			transport.setReply("gemini://example.org/old", "31 /new\r\n");
			transport.setReply("gemini://example.org/new", "20 text/gemini\r\nmoved\n");

			const response = await client.request(new URL("gemini://example.org/old"));

			expect(response.kind).toBe("success");
			expect(response.url.href).toBe("gemini://example.org/new");
			expect(transport.getRequestHistory().map((r) => r.url)).toEqual([
				"gemini://example.org/old",
				"gemini://example.org/new",
			]);
		});

		it("returns the redirect when following is disabled for the request", async () => {
			transport.setReply("gemini://example.org/old", "30 /new\r\n");

			const response = await client.request(new URL("gemini://example.org/old"), {
				followRedirects: false,
			});

			expect(response.kind).toBe("redirect");
			expect(response.kind === "redirect" && response.target.href).toBe(
				"gemini://example.org/new",
			);
			expect(transport.getRequestHistory()).toHaveLength(1);
		});

		it("returns the redirect when the client does not follow redirects", async () => {
			transport.setReply("gemini://example.org/old", "30 /new\r\n");
			const manual = new GeminiClient(transport, { followRedirects: false });

			const response = await manual.request(new URL("gemini://example.org/old"));
			expect(response.kind).toBe("redirect");
		});

		it("stops a redirect cycle after the hop limit", async () => {
			transport.setReply("gemini://example.org/a", "30 gemini://example.org/b\r\n");
			transport.setReply("gemini://example.org/b", "30 gemini://example.org/a\r\n");

			const attempt = client.request(new URL("gemini://example.org/a"));

			await expect(attempt).rejects.toBeInstanceOf(RedirectLoopError);
			await expect(attempt).rejects.toMatchObject({
				message: "Too many redirects (more than 5)",
				url: "gemini://example.org/a",
				chain: [
					"gemini://example.org/a",
					"gemini://example.org/b",
					"gemini://example.org/a",
					"gemini://example.org/b",
					"gemini://example.org/a",
					"gemini://example.org/b",
					"gemini://example.org/a",
				],
			});
			expect(transport.getRequestHistory()).toHaveLength(6);
		});

		it("fails on the first redirect when the limit is zero", async () => {
			transport.setReply("gemini://example.org/a", "30 /b\r\n");

			await expect(
				client.request(new URL("gemini://example.org/a"), { maxRedirects: 0 }),
			).rejects.toBeInstanceOf(RedirectLoopError);
			expect(transport.getRequestHistory()).toHaveLength(1);
		});

		it("rejects a redirect to another scheme", async () => {
			transport.setReply("gemini://example.org/a", "30 https://example.org/\r\n");
			await expect(
				client.request(new URL("gemini://example.org/a")),
			).rejects.toBeInstanceOf(SchemeError);
		});
	});

	describe("prepare", () => {
		it("fills in the root path and default port", () => {
			const { url, endpoint } = GeminiClient.prepare(new URL("gemini://example.org"));
			expect(url.href).toBe("gemini://example.org/");
			expect(endpoint).toEqual({ host: "example.org", port: 1965 });
		});
	});
});

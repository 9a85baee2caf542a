import { describe, expect, it } from "vitest";
import { CertificateMismatchError } from "../../src/interfaces/IGeminiTransport.js";
import type ITrustStore from "../../src/interfaces/ITrustStore.js";

const KEY_A = "AA:BB:CC";
const KEY_B = "DD:EE:FF";
const URL_TEXT = "gemini://example.org/";

/**
 * Behaviour every ITrustStore implementation must share
 */
export function createTrustStoreContractTests(
	name: string,
	createStore: () => ITrustStore,
): void {
	describe(`${name} (ITrustStore contract)`, () => {
		it("pins a key on first use", async () => {
			const store = createStore();
			expect(await store.verify("example.org", 1965, KEY_A, URL_TEXT)).toBe(
				"first-use",
			);
			expect(await store.verify("example.org", 1965, KEY_A, URL_TEXT)).toBe(
				"trusted",
			);
		});

		it("rejects a different key for a pinned host", async () => {
			const store = createStore();
			await store.verify("example.org", 1965, KEY_A, URL_TEXT);

			const attempt = store.verify("example.org", 1965, KEY_B, URL_TEXT);
			await expect(attempt).rejects.toBeInstanceOf(CertificateMismatchError);
			await expect(
				store.verify("example.org", 1965, KEY_B, URL_TEXT),
			).rejects.toMatchObject({
				host: "example.org:1965",
				expected: KEY_A,
				actual: KEY_B,
				url: URL_TEXT,
			});
		});

		it("keeps pins per port and ignores host case", async () => {
			const store = createStore();
			await store.verify("Example.ORG", 1965, KEY_A, URL_TEXT);

			expect(await store.verify("example.org", 1965, KEY_A, URL_TEXT)).toBe(
				"trusted",
			);
			expect(await store.verify("example.org", 1966, KEY_B, URL_TEXT)).toBe(
				"first-use",
			);
		});

		it("lists pinned hosts sorted by id", async () => {
			const store = createStore();
			await store.verify("zeta.example", 1965, KEY_A, URL_TEXT);
			await store.verify("alpha.example", 1965, KEY_B, URL_TEXT);

			const hosts = await store.list();
			expect(hosts.map((host) => host.id)).toEqual([
				"alpha.example:1965",
				"zeta.example:1965",
			]);
			expect(hosts[0]?.fingerprint).toBe(KEY_B);
		});

		it("forgets a host so a new key is accepted", async () => {
			const store = createStore();
			await store.verify("example.org", 1965, KEY_A, URL_TEXT);

			expect(await store.forget("example.org", 1965)).toBe(true);
			expect(await store.forget("example.org", 1965)).toBe(false);
			expect(await store.verify("example.org", 1965, KEY_B, URL_TEXT)).toBe(
				"first-use",
			);
		});

		it("matches an IPv6 host with or without brackets", async () => {
			const store = createStore();
			await store.verify("::1", 1965, KEY_A, "gemini://[::1]/");

			expect(await store.verify("[::1]", 1965, KEY_A, "gemini://[::1]/")).toBe(
				"trusted",
			);
			expect(await store.forget("[::1]", 1965)).toBe(true);
			expect(await store.list()).toEqual([]);
		});
	});
}

import { describe, expect, it } from "vitest";
import { BoundedReader } from "../../src/services/BoundedReader.js";

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

function source(parts: string[], log: string[] = []): AsyncIterable<Uint8Array> {
	return {
		async *[Symbol.asyncIterator]() {
			try {
				for (const part of parts) {
					log.push(`pull ${part}`);
					yield new TextEncoder().encode(part);
				}
				log.push("end");
			} finally {
				log.push("released");
			}
		},
	};
}

describe("BoundedReader", () => {
	it("reads exactly across chunk boundaries", async () => {
		const reader = new BoundedReader(source(["ab", "cde"]));
		expect(text(await reader.readExact(3))).toBe("abc");

		const rest = await reader.readToEnd(10);
		expect(text(rest.bytes)).toBe("de");
		expect(rest.truncated).toBe(false);
	});

	it("returns fewer bytes when the stream ends early", async () => {
		const reader = new BoundedReader(source(["ab"]));
		expect(text(await reader.readExact(3))).toBe("ab");
		expect((await reader.readExact(3)).length).toBe(0);
	});

	it("skips empty chunks", async () => {
		const reader = new BoundedReader(source(["", "a", "", "bc"]));
		expect(text(await reader.readExact(3))).toBe("abc");
	});

	it("stops pulling at the cap and releases the stream", async () => {
		const log: string[] = [];
		const reader = new BoundedReader(source(["abcd", "efgh", "ijkl"], log));

		const rest = await reader.readToEnd(6);
		expect(text(rest.bytes)).toBe("abcdef");
		expect(rest.truncated).toBe(true);
		expect(log).toEqual(["pull abcd", "pull efgh", "released"]);
	});

	it("only pulls what a read needs", async () => {
		const log: string[] = [];
		const reader = new BoundedReader(source(["abc", "def"], log));
		await reader.readExact(2);
		expect(log).toEqual(["pull abc"]);
	});

	it("close releases an unfinished stream once", async () => {
		const log: string[] = [];
		const reader = new BoundedReader(source(["abc", "def"], log));
		await reader.readExact(1);
		await reader.close();
		await reader.close();
		expect(log).toEqual(["pull abc", "released"]);
		expect((await reader.readExact(1)).length).toBe(0);
	});
});

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type IFileService from "../../src/interfaces/IFileService.js";
import { FileNotFoundError } from "../../src/interfaces/IFileService.js";

/**
 * Factory that creates an IFileService, the directory the tests may use and a
 * cleanup function
 */
type FileServiceFactory = () => Promise<{
	service: IFileService;
	root: string;
	cleanup: () => Promise<void>;
}>;

/**
 * Shared contract test suite for IFileService implementations
 *
 * Run against both the real file system and the in-memory double so the
 * double cannot drift from what the stores rely on.
 */
export function createFileServiceContractTests(factory: FileServiceFactory): void {
	describe("IFileService Contract", () => {
		let fileService: IFileService;
		let root: string;
		let cleanup: () => Promise<void>;

		beforeEach(async () => {
			({ service: fileService, root, cleanup } = await factory());
		});

		afterEach(async () => {
			await cleanup();
		});

		it("reads back what was written", async () => {
			await fileService.writeFile(`${root}/hosts.json`, '{"version":1}');
			expect(await fileService.readFile(`${root}/hosts.json`)).toBe('{"version":1}');
		});

		it("keeps empty and multi-line content", async () => {
			await fileService.writeFile(`${root}/empty.txt`, "");
			await fileService.writeFile(`${root}/lines.txt`, "one\ntwo\n");

			expect(await fileService.readFile(`${root}/empty.txt`)).toBe("");
			expect(await fileService.readFile(`${root}/lines.txt`)).toBe("one\ntwo\n");
		});

		it("replaces existing content", async () => {
			await fileService.writeFile(`${root}/config.json`, "first");
			await fileService.writeFile(`${root}/config.json`, "second");
			expect(await fileService.readFile(`${root}/config.json`)).toBe("second");
		});

		it("creates missing parent directories on write", async () => {
			await fileService.writeFile(`${root}/a/b/c.txt`, "deep");

			expect(await fileService.readFile(`${root}/a/b/c.txt`)).toBe("deep");
		});

		it("reports missing files", async () => {
			await expect(
				fileService.readFile(`${root}/missing.txt`),
			).rejects.toBeInstanceOf(FileNotFoundError);
		});

		it("creates nested directories idempotently", async () => {
			await fileService.mkdir(`${root}/x/y`);
			await fileService.mkdir(`${root}/x/y`);

			await fileService.writeFile(`${root}/x/y/z.txt`, "inside");
			expect(await fileService.readFile(`${root}/x/y/z.txt`)).toBe("inside");
		});
	});
}

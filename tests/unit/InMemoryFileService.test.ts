import { describe, expect, it } from "vitest";
import InMemoryFileService from "../mocks/InMemoryFileService.js";
import { createFileServiceContractTests } from "../shared/IFileService.contract.js";

describe("InMemoryFileService", () => {
	describe("Contract Tests", () => {
		createFileServiceContractTests(async () => ({
			service: new InMemoryFileService(),
			root: "/mem",
			cleanup: async () => {},
		}));
	});

	it("records operations for assertions", async () => {
		const service = new InMemoryFileService({ "/mem/a.txt": "a" });
		await service.readFile("/mem/a.txt");

		expect(service.getOperationHistory()).toEqual([
			{ operation: "readFile", path: "/mem/a.txt" },
		]);
	});
});

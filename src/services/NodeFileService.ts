import {
	mkdir as fsMkdir,
	readFile as fsReadFile,
	writeFile as fsWriteFile,
} from "node:fs/promises";
import { dirname } from "node:path";
import type IFileService from "../interfaces/IFileService.js";
import {
	FileIOError,
	FileNotFoundError,
	FilePermissionError,
} from "../interfaces/IFileService.js";
import { fileLogger } from "../utils/logger.js";

/**
 * Real file service implementation using node:fs/promises
 *
 * Provides production file system operations with proper error handling
 * and mapping to custom error types defined in IFileService.
 */
export default class NodeFileService implements IFileService {
	private mapSystemError(
		error: unknown,
		path: string,
		operation: "read" | "write" | "create",
	): never {
		if (!(error instanceof Error)) {
			throw new FileIOError(path, "Unknown error");
		}

		switch (errorCode(error)) {
			case "ENOENT":
				throw new FileNotFoundError(path);
			case "EACCES":
			case "EPERM":
				throw new FilePermissionError(path, operation);
			case "ENOSPC":
				throw new FileIOError(path, "No space left on device");
			default:
				throw new FileIOError(path, error.message);
		}
	}

	async readFile(path: string): Promise<string> {
		try {
			const content = await fsReadFile(path, "utf8");
			fileLogger.debug("read success: {path} ({bytes} bytes)", {
				path,
				bytes: content.length,
			});
			return content;
		} catch (error) {
			fileLogger.debug("read failed: {path} (error: {error})", {
				path,
				error: error instanceof Error ? error.message : String(error),
			});
			this.mapSystemError(error, path, "read");
		}
	}

	/**
	 * Write a file, creating its parent directory first
	 */
	async writeFile(path: string, content: string): Promise<void> {
		try {
			const dir = dirname(path);
			if (dir !== path) {
				await this.mkdir(dir);
			}

			await fsWriteFile(path, content, "utf8");
			fileLogger.debug("write success: {path}", { path });
		} catch (error) {
			fileLogger.error("write failed: {path} (error: {error})", {
				path,
				error: error instanceof Error ? error.message : String(error),
			});
			this.mapSystemError(error, path, "write");
		}
	}

	async mkdir(path: string): Promise<void> {
		try {
			await fsMkdir(path, { recursive: true });
			fileLogger.debug("mkdir success: {path}", { path });
		} catch (error) {
			if (errorCode(error) === "EEXIST") {
				return;
			}
			fileLogger.error("mkdir failed: {path} (error: {error})", {
				path,
				error: error instanceof Error ? error.message : String(error),
			});
			this.mapSystemError(error, path, "create");
		}
	}
}

function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error) {
		return typeof error.code === "string" ? error.code : undefined;
	}
	return undefined;
}

import { FileSystemError } from "../interfaces/IFileService.js";
import { GeminiError } from "../types/Response.js";

/**
 * One-line, user-facing description of an error
 */
export function describeError(error: unknown): string {
	if (error instanceof GeminiError || error instanceof FileSystemError) {
		return error.message;
	}
	if (error instanceof Error) {
		return `${error.name}: ${error.message}`;
	}
	return String(error);
}

import path from "node:path";
import type {
	Config,
	IConfigService,
	ResolvedConfig,
} from "../interfaces/IConfigService.js";
import type IFileService from "../interfaces/IFileService.js";
import { configLogger } from "../utils/logger.js";
import { GeminiClient } from "./GeminiClient.js";
import NodeTlsTransport from "./NodeTlsTransport.js";

/** Page opened when neither the command line nor the config name one */
export const DEFAULT_HOME_URL = "gemini://geminiprotocol.net/";

/**
 * Service for the configuration file
 *
 * Reads a JSON file through the file service. A missing, corrupt or invalid
 * file reads as null so the browser falls back to defaults.
 *
 * @example Basic usage
 * ```typescript
 * const configPath = path.join(os.homedir(), ".config", "gemwalk", "config.json");
 * const service = new ConfigService(configPath, fileService);
 * const config = await service.resolve({ followRedirects: false });
 * ```
 */
export class ConfigService implements IConfigService {
	private readonly configDir: string;

	constructor(
		private readonly configPath: string,
		private readonly fileService: IFileService,
	) {
		this.configDir = path.dirname(configPath);
	}

	/**
	 * @throws Never throws - returns null for any configuration errors
	 */
	async getConfig(): Promise<Config | null> {
		let content: string;
		try {
			content = await this.fileService.readFile(this.configPath);
		} catch (error) {
			configLogger.debug("no configuration at {path}: {error}", {
				path: this.configPath,
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}

		let config: unknown;
		try {
			config = JSON.parse(content);
		} catch {
			configLogger.warn("configuration at {path} is not valid JSON", {
				path: this.configPath,
			});
			return null;
		}

		if (!this.validateConfig(config)) {
			configLogger.warn("configuration at {path} is invalid, using defaults", {
				path: this.configPath,
			});
			return null;
		}
		return config;
	}

	async resolve(overrides: Config = {}): Promise<ResolvedConfig> {
		const stored = (await this.getConfig()) ?? {};
		const merged: Config = { ...stored, ...definedFields(overrides) };

		return {
			homeUrl: merged.homeUrl ?? DEFAULT_HOME_URL,
			followRedirects: merged.followRedirects ?? true,
			maxRedirects: merged.maxRedirects ?? GeminiClient.DEFAULT_MAX_REDIRECTS,
			timeout: merged.timeout ?? NodeTlsTransport.DEFAULT_TIMEOUT,
			clientCertificate: merged.clientCertificate ?? null,
			knownHostsPath:
				merged.knownHostsPath ?? path.join(this.configDir, "known_hosts.json"),
		};
	}

	/**
	 * Validate configuration structure and values
	 *
	 * Unknown fields are allowed for forward compatibility.
	 */
	private validateConfig(config: unknown): config is Config {
		if (typeof config !== "object" || config === null || Array.isArray(config)) {
			return false;
		}
		const fields: Record<string, unknown> = { ...config };

		if (fields.homeUrl !== undefined) {
			if (typeof fields.homeUrl !== "string" || !isGeminiUrl(fields.homeUrl)) {
				return false;
			}
		}

		if (
			fields.followRedirects !== undefined &&
			typeof fields.followRedirects !== "boolean"
		) {
			return false;
		}

		if (fields.maxRedirects !== undefined) {
			if (
				typeof fields.maxRedirects !== "number" ||
				!Number.isInteger(fields.maxRedirects) ||
				fields.maxRedirects < 0
			) {
				return false;
			}
		}

		if (fields.timeout !== undefined) {
			if (
				typeof fields.timeout !== "number" ||
				!Number.isFinite(fields.timeout) ||
				fields.timeout <= 0
			) {
				return false;
			}
		}

		if (fields.clientCertificate !== undefined) {
			const cert = fields.clientCertificate;
			if (typeof cert !== "object" || cert === null) {
				return false;
			}
			const certFields: Record<string, unknown> = { ...cert };
			if (
				typeof certFields.certFile !== "string" ||
				typeof certFields.keyFile !== "string"
			) {
				return false;
			}
		}

		if (
			fields.knownHostsPath !== undefined &&
			typeof fields.knownHostsPath !== "string"
		) {
			return false;
		}

		return true;
	}
}

function isGeminiUrl(value: string): boolean {
	try {
		return new URL(value).protocol === GeminiClient.SCHEME;
	} catch {
		return false;
	}
}

function definedFields(config: Config): Config {
	return Object.fromEntries(
		Object.entries(config).filter(([, value]) => value !== undefined),
	);
}

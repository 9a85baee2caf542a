import * as os from "node:os";
import * as path from "node:path";
import type { Config, ResolvedConfig } from "../interfaces/IConfigService.js";
import type IFileService from "../interfaces/IFileService.js";
import { ConfigService } from "./ConfigService.js";
import { FileTrustStore } from "./FileTrustStore.js";
import { GeminiClient } from "./GeminiClient.js";
import NodeFileService from "./NodeFileService.js";
import NodeTlsTransport, { type ClientCertificate } from "./NodeTlsTransport.js";
import { PageRenderer } from "./PageRenderer.js";

/**
 * Service factory that creates and manages the singleton service instances.
 * Centralizes dependency injection setup so CLI commands only deal with
 * configured services.
 */

export interface Services {
	config: ResolvedConfig;
	fileService: IFileService;
	configService: ConfigService;
	trustStore: FileTrustStore;
	transport: NodeTlsTransport;
	client: GeminiClient;
	pageRenderer: PageRenderer;
}

let services: Services | null = null;

/**
 * Location of the user configuration file
 */
export function defaultConfigPath(): string {
	return path.join(os.homedir(), ".config", "gemwalk", "config.json");
}

/**
 * Initialize and return the singleton service instances.
 * Services are created on first access and reused for subsequent calls;
 * `overrides` only apply to the first call.
 *
 * @param overrides - Values from command-line flags, applied over the config file
 */
export async function getServices(overrides: Config = {}): Promise<Services> {
	if (!services) {
		const fileService = new NodeFileService();
		const configService = new ConfigService(defaultConfigPath(), fileService);
		const config = await configService.resolve(overrides);

		const trustStore = new FileTrustStore(config.knownHostsPath, fileService);
		const transport = new NodeTlsTransport(trustStore, {
			timeout: config.timeout,
			clientCertificate: await loadClientCertificate(config, fileService),
		});
		const client = new GeminiClient(transport, {
			followRedirects: config.followRedirects,
			maxRedirects: config.maxRedirects,
		});

		services = {
			config,
			fileService,
			configService,
			trustStore,
			transport,
			client,
			pageRenderer: new PageRenderer(),
		};
	}

	return services;
}

/**
 * Read the configured client certificate and key, if any
 */
export async function loadClientCertificate(
	config: ResolvedConfig,
	fileService: IFileService,
): Promise<ClientCertificate | undefined> {
	if (!config.clientCertificate) {
		return undefined;
	}
	const [cert, key] = await Promise.all([
		fileService.readFile(config.clientCertificate.certFile),
		fileService.readFile(config.clientCertificate.keyFile),
	]);
	return { cert, key };
}

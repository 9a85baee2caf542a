/**
 * Paths to a PEM certificate and key presented to capsules that ask for one
 */
export interface ClientCertificateConfig {
	certFile: string;
	keyFile: string;
}

/**
 * Contents of the configuration file; every field is optional
 */
export interface Config {
	/** Page opened when no URL is given */
	homeUrl?: string;
	/** Follow redirects automatically */
	followRedirects?: boolean;
	/** Most redirects followed for one request */
	maxRedirects?: number;
	/** Milliseconds of socket inactivity before a request fails */
	timeout?: number;
	clientCertificate?: ClientCertificateConfig;
	/** Where pinned host keys are stored */
	knownHostsPath?: string;
}

/**
 * Configuration with every default filled in
 */
export interface ResolvedConfig {
	readonly homeUrl: string;
	readonly followRedirects: boolean;
	readonly maxRedirects: number;
	readonly timeout: number;
	readonly clientCertificate: ClientCertificateConfig | null;
	readonly knownHostsPath: string;
}

/**
 * Service interface for the configuration file
 */
export interface IConfigService {
	/**
	 * Get the stored configuration
	 *
	 * @returns Configuration object, or null if not found or invalid
	 */
	getConfig(): Promise<Config | null>;

	/**
	 * Stored configuration merged over the defaults, then `overrides` on top
	 */
	resolve(overrides?: Config): Promise<ResolvedConfig>;
}

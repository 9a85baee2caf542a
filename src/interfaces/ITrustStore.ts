/**
 * A key pinned for a host on first contact
 */
export interface KnownHost {
	/** "host:port" */
	readonly id: string;
	/** SHA-256 fingerprint of the host's public key, colon-separated hex */
	readonly fingerprint: string;
	/** ISO 8601 timestamp of the first successful handshake */
	readonly firstSeen: string;
}

/**
 * Outcome of checking a presented key
 */
export type TrustDecision = "trusted" | "first-use";

/**
 * Trust-on-first-use store
 *
 * The first key seen for a host is pinned; later handshakes must present the
 * same key.
 */
export default interface ITrustStore {
	/**
	 * Check a presented key against the pin, pinning it if the host is new
	 *
	 * @param host - Host name or address
	 * @param port - Port the host was reached on
	 * @param fingerprint - Fingerprint of the presented key
	 * @param url - URL being requested, for error reporting
	 * @returns "first-use" when the key was just pinned, "trusted" when it matched
	 * @throws CertificateMismatchError when a different key is pinned
	 */
	verify(
		host: string,
		port: number,
		fingerprint: string,
		url: string,
	): Promise<TrustDecision>;

	/**
	 * All pinned hosts
	 */
	list(): Promise<KnownHost[]>;

	/**
	 * Remove the pin for a host
	 *
	 * @returns true if a pin was removed
	 */
	forget(host: string, port: number): Promise<boolean>;
}

/**
 * Key under which a host is pinned
 *
 * IPv6 literals are stored without brackets, so "[::1]" and "::1" match.
 */
export function knownHostId(host: string, port: number): string {
	const bare = host.replace(/^\[(.*)\]$/, "$1");
	return `${bare.toLowerCase()}:${port}`;
}

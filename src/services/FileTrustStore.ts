import { z } from "zod";
import { FileIOError, FileNotFoundError } from "../interfaces/IFileService.js";
import type IFileService from "../interfaces/IFileService.js";
import { CertificateMismatchError } from "../interfaces/IGeminiTransport.js";
import type ITrustStore from "../interfaces/ITrustStore.js";
import {
	type KnownHost,
	knownHostId,
	type TrustDecision,
} from "../interfaces/ITrustStore.js";
import { trustLogger } from "../utils/logger.js";

const PinRecordSchema = z.object({
	fingerprint: z.string({ message: "fingerprint must be string" }),
	firstSeen: z.string({ message: "firstSeen must be string" }),
});

/**
 * Zod schema for the known hosts file
 */
const KnownHostsSchema = z.object({
	version: z.literal(1).optional(),
	hosts: z.record(z.string(), PinRecordSchema),
});

type PinRecord = z.infer<typeof PinRecordSchema>;
type KnownHostsFile = z.infer<typeof KnownHostsSchema>;

/**
 * Trust-on-first-use store persisted as JSON
 *
 * The file is read once and rewritten after every change. A file that exists
 * but does not match the schema is an error, never an empty store.
 *
 * @example
 * ```typescript
 * const store = new FileTrustStore("~/.config/gemwalk/known_hosts.json", fileService);
 * await store.verify("example.org", 1965, fingerprint, "gemini://example.org/");
 * ```
 */
export class FileTrustStore implements ITrustStore {
	private hosts: Map<string, PinRecord> | null = null;

	constructor(
		private readonly path: string,
		private readonly fileService: IFileService,
		private readonly now: () => Date = () => new Date(),
	) {}

	async verify(
		host: string,
		port: number,
		fingerprint: string,
		url: string,
	): Promise<TrustDecision> {
		const hosts = await this.load();
		const id = knownHostId(host, port);
		const pin = hosts.get(id);

		if (!pin) {
			hosts.set(id, { fingerprint, firstSeen: this.now().toISOString() });
			await this.save(hosts);
			trustLogger.info("pinned {id} ({fingerprint})", { id, fingerprint });
			return "first-use";
		}

		if (pin.fingerprint !== fingerprint) {
			trustLogger.error("key mismatch for {id}", { id });
			throw new CertificateMismatchError(url, id, pin.fingerprint, fingerprint);
		}
		return "trusted";
	}

	async list(): Promise<KnownHost[]> {
		const hosts = await this.load();
		return Array.from(hosts.entries())
			.map(([id, pin]) => ({ id, ...pin }))
			.sort((a, b) => a.id.localeCompare(b.id));
	}

	async forget(host: string, port: number): Promise<boolean> {
		const hosts = await this.load();
		const removed = hosts.delete(knownHostId(host, port));
		if (removed) {
			await this.save(hosts);
		}
		return removed;
	}

	getPath(): string {
		return this.path;
	}

	private async load(): Promise<Map<string, PinRecord>> {
		if (this.hosts) {
			return this.hosts;
		}

		let content: string;
		try {
			content = await this.fileService.readFile(this.path);
		} catch (error) {
			if (error instanceof FileNotFoundError) {
				this.hosts = new Map();
				return this.hosts;
			}
			throw error;
		}

		this.hosts = parseKnownHosts(this.path, content);
		return this.hosts;
	}

	private async save(hosts: Map<string, PinRecord>): Promise<void> {
		const file: KnownHostsFile = {
			version: 1,
			hosts: Object.fromEntries(hosts),
		};
		await this.fileService.writeFile(this.path, JSON.stringify(file, null, 2));
	}
}

function parseKnownHosts(path: string, content: string): Map<string, PinRecord> {
	let data: unknown;
	try {
		data = JSON.parse(content);
	} catch {
		throw new FileIOError(path, "known hosts file is not valid JSON");
	}

	const result = KnownHostsSchema.safeParse(data);
	if (!result.success) {
		const issue = result.error.issues[0];
		throw new FileIOError(
			path,
			issue ? describeIssue(issue) : "Unknown validation error",
		);
	}
	return new Map(Object.entries(result.data.hosts));
}

function describeIssue(issue: z.core.$ZodIssue): string {
	const [field, id] = issue.path;
	if (field === "hosts" && id !== undefined) {
		return `invalid entry for ${String(id)}`;
	}
	if (field === "hosts") {
		return "known hosts file has no hosts table";
	}
	return issue.message;
}

/**
 * Result of reading the rest of a stream up to a cap
 */
export interface CappedRead {
	readonly bytes: Uint8Array;
	/** True when the cap was reached before the end of the stream was seen */
	readonly truncated: boolean;
}

/**
 * Pull-based reader over a chunked byte stream
 *
 * Only pulls as many chunks as a read needs, so a cap on the amount read is a
 * cap on what is taken from the connection. Bytes of the last chunk that go
 * past a cap are dropped, never returned.
 */
export class BoundedReader {
	private readonly iterator: AsyncIterator<Uint8Array>;
	private readonly chunks: Uint8Array[] = [];
	private buffered = 0;
	private ended = false;

	constructor(source: AsyncIterable<Uint8Array>) {
		this.iterator = source[Symbol.asyncIterator]();
	}

	/**
	 * Read exactly `length` bytes, or fewer if the stream ends first
	 */
	async readExact(length: number): Promise<Uint8Array> {
		while (this.buffered < length && (await this.pull())) {
			// keep pulling
		}
		return this.take(Math.min(length, this.buffered));
	}

	/**
	 * Read until the end of the stream or until `cap` bytes were read
	 */
	async readToEnd(cap: number): Promise<CappedRead> {
		while (this.buffered < cap && (await this.pull())) {
			// keep pulling
		}
		const truncated = this.buffered >= cap && !this.ended;
		const bytes = this.take(Math.min(cap, this.buffered));
		if (truncated) {
			await this.close();
		}
		return { bytes, truncated };
	}

	/**
	 * Stop reading and release the underlying stream
	 */
	async close(): Promise<void> {
		this.chunks.length = 0;
		this.buffered = 0;
		if (this.ended) {
			return;
		}
		this.ended = true;
		await this.iterator.return?.();
	}

	private async pull(): Promise<boolean> {
		if (this.ended) {
			return false;
		}
		const next = await this.iterator.next();
		if (next.done) {
			this.ended = true;
			return false;
		}
		if (next.value.length > 0) {
			this.chunks.push(next.value);
			this.buffered += next.value.length;
		}
		return true;
	}

	private take(length: number): Uint8Array {
		const out = new Uint8Array(length);
		let offset = 0;
		while (offset < length) {
			const chunk = this.chunks[0];
			if (!chunk) {
				break;
			}
			const needed = length - offset;
			if (chunk.length <= needed) {
				out.set(chunk, offset);
				offset += chunk.length;
				this.chunks.shift();
			} else {
				out.set(chunk.subarray(0, needed), offset);
				offset += needed;
				this.chunks[0] = chunk.subarray(needed);
			}
		}
		this.buffered -= offset;
		return out;
	}
}

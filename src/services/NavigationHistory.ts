/**
 * Back/forward stack of visited URLs with a movable cursor
 *
 * The list is never empty and `position` (1-based) always points at an entry.
 * Pushing while the cursor is not on the last entry discards everything ahead
 * of it, the way a browser forgets its forward history.
 */
export class NavigationHistory {
	private readonly entries: URL[];
	private index = 0;

	constructor(start: URL) {
		this.entries = [start];
	}

	/** 1-based cursor */
	get position(): number {
		return this.index + 1;
	}

	get length(): number {
		return this.entries.length;
	}

	/**
	 * URL under the cursor
	 *
	 * Returns a copy so callers can modify it (e.g. set a query) without
	 * touching the stored entry.
	 */
	current(): URL {
		const entry = this.entries[this.index];
		if (!entry) {
			throw new RangeError(
				`History cursor ${this.position} outside 1..${this.length}`,
			);
		}
		return new URL(entry.href);
	}

	/**
	 * Drop the forward branch, append `url` and move onto it
	 */
	push(url: URL): void {
		this.entries.length = this.index + 1;
		this.entries.push(new URL(url.href));
		this.index = this.entries.length - 1;
	}

	/**
	 * Move one entry back; no-op on the first entry
	 */
	back(): void {
		if (this.index > 0) {
			this.index -= 1;
		}
	}

	/**
	 * Move one entry forward; no-op on the last entry
	 */
	advance(): void {
		this.index = Math.min(this.index + 1, this.entries.length - 1);
	}

	canGoBack(): boolean {
		return this.index > 0;
	}

	canAdvance(): boolean {
		return this.index < this.entries.length - 1;
	}
}

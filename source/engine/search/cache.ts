/**
 * Result cache owned by one orchestrator.
 *
 * Entries remember the index version they were computed against. A read
 * discards an entry that has expired or whose version no longer matches;
 * there is no background sweep. Insertion order doubles as age, so the
 * oldest entry is evicted first once the cache is full.
 */

import type {HybridSearchResponse} from './types.js';

export interface CacheEntry {
	fingerprint: string;
	response: HybridSearchResponse;
	createdAt: number;
	ttlMs: number;
	indexVersion: number;
}

export interface CacheStats {
	hits: number;
	misses: number;
	entries: number;
	/** hits / (hits + misses), 0 before the first lookup */
	hitRate: number;
}

export interface ResultCacheOptions {
	maxEntries?: number;
	/** Clock in milliseconds, injectable for tests */
	now?: () => number;
}

export const DEFAULT_CACHE_MAX_ENTRIES = 1000;

export class ResultCache {
	private readonly entries = new Map<string, CacheEntry>();
	private readonly now: () => number;
	private maxEntries: number;
	private hits = 0;
	private misses = 0;

	constructor(options: ResultCacheOptions = {}) {
		this.now = options.now ?? Date.now;
		this.maxEntries = Math.max(
			0,
			options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES,
		);
	}

	/**
	 * Cached response for a fingerprint, if fresh and computed against
	 * `indexVersion`. Counts a hit or a miss.
	 */
	get(
		fingerprint: string,
		indexVersion: number,
	): HybridSearchResponse | undefined {
		const entry = this.entries.get(fingerprint);
		if (entry && this.isFresh(entry, indexVersion)) {
			this.hits++;
			return entry.response;
		}
		if (entry) this.entries.delete(fingerprint);
		this.misses++;
		return undefined;
	}

	set(
		fingerprint: string,
		response: HybridSearchResponse,
		ttlMs: number,
		indexVersion: number,
	): void {
		if (this.maxEntries === 0 || ttlMs <= 0) return;

		// Re-inserting moves the key to the young end.
		this.entries.delete(fingerprint);
		this.entries.set(fingerprint, {
			fingerprint,
			response,
			createdAt: this.now(),
			ttlMs,
			indexVersion,
		});
		this.evict();
	}

	/**
	 * Drop every entry. Counters are kept.
	 */
	invalidate(): void {
		this.entries.clear();
	}

	resize(maxEntries: number): void {
		this.maxEntries = Math.max(0, maxEntries);
		this.evict();
	}

	get size(): number {
		return this.entries.size;
	}

	stats(): CacheStats {
		const lookups = this.hits + this.misses;
		return {
			hits: this.hits,
			misses: this.misses,
			entries: this.entries.size,
			hitRate: lookups === 0 ? 0 : this.hits / lookups,
		};
	}

	private isFresh(entry: CacheEntry, indexVersion: number): boolean {
		return (
			entry.indexVersion === indexVersion &&
			this.now() - entry.createdAt < entry.ttlMs
		);
	}

	private evict(): void {
		while (this.entries.size > this.maxEntries) {
			const oldest = this.entries.keys().next();
			if (oldest.done) return;
			this.entries.delete(oldest.value);
		}
	}
}

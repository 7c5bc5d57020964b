/**
 * Trigram similarity over symbol names.
 *
 * Names are padded with two spaces on each side before slicing, so that
 * leading and trailing characters get trigrams of their own. The score of
 * a candidate is the share of the query's trigrams it contains.
 */

import type {SearchBackend} from '../search/types.js';
import {throwIfAborted} from '../abort.js';

export const DEFAULT_TRIGRAM_THRESHOLD = 0.3;

export interface TrigramMatch {
	key: string;
	score: number;
}

/**
 * Distinct lower-cased trigrams of a padded name.
 */
export function extractTrigrams(name: string): Set<string> {
	const trimmed = name.trim();
	const trigrams = new Set<string>();
	if (trimmed.length === 0) return trigrams;

	const padded = `  ${trimmed.toLowerCase()}  `;
	for (let i = 0; i + 3 <= padded.length; i++) {
		trigrams.add(padded.slice(i, i + 3));
	}
	return trigrams;
}

/**
 * Trigram -> keys map, one name per key.
 */
export class TrigramIndex {
	private readonly byTrigram = new Map<string, Set<string>>();
	private readonly byKey = new Map<string, Set<string>>();

	get size(): number {
		return this.byKey.size;
	}

	set(key: string, name: string): void {
		this.delete(key);
		const trigrams = extractTrigrams(name);
		if (trigrams.size === 0) return;

		this.byKey.set(key, trigrams);
		for (const trigram of trigrams) {
			let keys = this.byTrigram.get(trigram);
			if (!keys) {
				keys = new Set();
				this.byTrigram.set(trigram, keys);
			}
			keys.add(key);
		}
	}

	delete(key: string): boolean {
		const trigrams = this.byKey.get(key);
		if (!trigrams) return false;

		for (const trigram of trigrams) {
			const keys = this.byTrigram.get(trigram);
			if (!keys) continue;
			keys.delete(key);
			if (keys.size === 0) this.byTrigram.delete(trigram);
		}
		this.byKey.delete(key);
		return true;
	}

	/**
	 * Keys scoring at least `threshold`, by score descending then key.
	 */
	search(
		query: string,
		limit: number,
		threshold: number = DEFAULT_TRIGRAM_THRESHOLD,
	): TrigramMatch[] {
		const wanted = extractTrigrams(query);
		if (wanted.size === 0 || limit <= 0) return [];

		const hits = new Map<string, number>();
		for (const trigram of wanted) {
			for (const key of this.byTrigram.get(trigram) ?? []) {
				hits.set(key, (hits.get(key) ?? 0) + 1);
			}
		}

		const matches: TrigramMatch[] = [];
		for (const [key, count] of hits) {
			const score = count / wanted.size;
			if (score >= threshold) matches.push({key, score});
		}

		return matches
			.sort((a, b) =>
				a.score !== b.score
					? b.score - a.score
					: a.key < b.key
						? -1
						: a.key > b.key
							? 1
							: 0,
			)
			.slice(0, limit);
	}
}

export interface TrigramBackendOptions {
	/** Minimum share of query trigrams a name must contain */
	threshold?: number;
}

/**
 * Built-in fuzzy source: ranks documents by how closely their symbol name
 * resembles the query.
 */
export class TrigramSymbolBackend implements SearchBackend {
	private readonly getIndex: () => TrigramIndex;
	private readonly threshold: number;

	constructor(getIndex: () => TrigramIndex, options: TrigramBackendOptions = {}) {
		this.getIndex = getIndex;
		this.threshold = options.threshold ?? DEFAULT_TRIGRAM_THRESHOLD;
	}

	async search(
		query: string,
		limit: number,
		signal?: AbortSignal,
	): Promise<readonly string[]> {
		throwIfAborted(signal, 'Fuzzy search cancelled');
		return this.getIndex()
			.search(query, limit, this.threshold)
			.map(match => match.key);
	}
}

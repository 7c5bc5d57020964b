import {describe, it, expect} from 'vitest';
import {ResultCache} from '../search/cache.js';
import type {HybridSearchResponse} from '../search/types.js';

function response(query: string): HybridSearchResponse {
	return {
		results: [{docId: 'a', fusedScore: 0.5, contributingSources: ['bm25']}],
		query,
		degraded: [],
		narrowed: [],
		perSource: [],
		cached: false,
		elapsedMs: 1,
	};
}

function fakeClock() {
	let time = 1000;
	return {
		now: () => time,
		advance: (ms: number) => {
			time += ms;
		},
	};
}

describe('ResultCache', () => {
	it('returns a stored response until its ttl runs out', () => {
		const clock = fakeClock();
		const cache = new ResultCache({now: clock.now});
		cache.set('fp', response('q'), 100, 1);

		clock.advance(99);
		expect(cache.get('fp', 1)?.query).toBe('q');

		clock.advance(1);
		expect(cache.get('fp', 1)).toBeUndefined();
		expect(cache.size).toBe(0);
	});

	it('misses when the index version moved on', () => {
		const cache = new ResultCache();
		cache.set('fp', response('q'), 60_000, 1);
		expect(cache.get('fp', 2)).toBeUndefined();
		expect(cache.get('fp', 1)).toBeUndefined();
	});

	it('counts hits and misses', () => {
		const cache = new ResultCache();
		expect(cache.stats().hitRate).toBe(0);

		cache.get('fp', 1);
		cache.set('fp', response('q'), 60_000, 1);
		cache.get('fp', 1);
		cache.get('fp', 1);
		cache.get('other', 1);

		expect(cache.stats()).toEqual({
			hits: 2,
			misses: 2,
			entries: 1,
			hitRate: 0.5,
		});
	});

	it('evicts the oldest entry when full', () => {
		const cache = new ResultCache({maxEntries: 2});
		cache.set('a', response('a'), 60_000, 1);
		cache.set('b', response('b'), 60_000, 1);
		cache.set('a', response('a2'), 60_000, 1);
		cache.set('c', response('c'), 60_000, 1);

		expect(cache.get('b', 1)).toBeUndefined();
		expect(cache.get('a', 1)?.query).toBe('a2');
		expect(cache.get('c', 1)?.query).toBe('c');
	});

	it('skips entries with no ttl or no room', () => {
		const cache = new ResultCache();
		cache.set('fp', response('q'), 0, 1);
		expect(cache.size).toBe(0);

		const disabled = new ResultCache({maxEntries: 0});
		disabled.set('fp', response('q'), 60_000, 1);
		expect(disabled.size).toBe(0);
	});

	it('shrinks on resize and clears on invalidate', () => {
		const cache = new ResultCache();
		cache.set('a', response('a'), 60_000, 1);
		cache.set('b', response('b'), 60_000, 1);
		cache.set('c', response('c'), 60_000, 1);

		cache.resize(1);
		expect(cache.size).toBe(1);
		expect(cache.get('c', 1)?.query).toBe('c');

		cache.invalidate();
		expect(cache.size).toBe(0);
		expect(cache.stats().hits).toBe(1);
	});
});

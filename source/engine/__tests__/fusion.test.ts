import {describe, it, expect} from 'vitest';
import {
	assignRanks,
	rankIds,
	reciprocalRankFusion,
} from '../search/fusion.js';
import type {RankedResult, SourceName} from '../search/types.js';

const EQUAL = {bm25: 1, semantic: 1, fuzzy: 1};

function lists(
	entries: Partial<Record<SourceName, string[]>>,
): Map<SourceName, RankedResult[]> {
	const map = new Map<SourceName, RankedResult[]>();
	for (const [source, ids] of Object.entries(entries)) {
		if (source === 'bm25' || source === 'semantic' || source === 'fuzzy') {
			map.set(source, rankIds(source, ids ?? []));
		}
	}
	return map;
}

describe('assignRanks', () => {
	it('numbers results from 1 and keeps the first of repeated ids', () => {
		const ranked = assignRanks('bm25', [
			{docId: 'a', score: 3},
			{docId: 'b', score: 2},
			{docId: 'a', score: 1},
			{docId: 'c', score: 1},
		]);
		expect(ranked).toEqual([
			{docId: 'a', score: 3, source: 'bm25', rank: 1},
			{docId: 'b', score: 2, source: 'bm25', rank: 2},
			{docId: 'c', score: 1, source: 'bm25', rank: 3},
		]);
	});
});

describe('rankIds', () => {
	it('scores ids by reciprocal rank and drops duplicates', () => {
		expect(rankIds('semantic', ['x', 'y', 'x', 'z'])).toEqual([
			{docId: 'x', score: 1, source: 'semantic', rank: 1},
			{docId: 'y', score: 0.5, source: 'semantic', rank: 2},
			{docId: 'z', score: 1 / 3, source: 'semantic', rank: 3},
		]);
	});
});

describe('reciprocalRankFusion', () => {
	it('sums weight / (k + rank) across sources', () => {
		const fused = reciprocalRankFusion(
			lists({bm25: ['a', 'b', 'c'], fuzzy: ['c', 'a']}),
			{weights: EQUAL},
		);

		expect(fused.map(r => r.docId)).toEqual(['a', 'c', 'b']);
		expect(fused[0]?.fusedScore).toBeCloseTo(1 / 61 + 1 / 62, 12);
		expect(fused[1]?.fusedScore).toBeCloseTo(1 / 63 + 1 / 61, 12);
		expect(fused[2]?.fusedScore).toBeCloseTo(1 / 62, 12);
		expect(fused[0]?.contributingSources).toEqual(['bm25', 'fuzzy']);
		expect(fused[2]?.contributingSources).toEqual(['bm25']);
	});

	it('honours rrfK and weights', () => {
		const fused = reciprocalRankFusion(
			lists({bm25: ['a'], semantic: ['b']}),
			{weights: {bm25: 0.25, semantic: 0.75, fuzzy: 0}, rrfK: 10},
		);
		expect(fused.map(r => r.docId)).toEqual(['b', 'a']);
		expect(fused[0]?.fusedScore).toBeCloseTo(0.75 / 11, 12);
		expect(fused[1]?.fusedScore).toBeCloseTo(0.25 / 11, 12);
	});

	it('breaks equal scores by docId', () => {
		const fused = reciprocalRankFusion(lists({bm25: ['b'], fuzzy: ['a']}), {
			weights: EQUAL,
		});
		expect(fused.map(r => r.docId)).toEqual(['a', 'b']);
		expect(fused[0]?.fusedScore).toBe(fused[1]?.fusedScore);
	});

	it('lists contributing sources in fixed order', () => {
		const fused = reciprocalRankFusion(
			lists({fuzzy: ['a'], semantic: ['a'], bm25: ['a']}),
			{weights: EQUAL},
		);
		expect(fused).toHaveLength(1);
		expect(fused[0]?.fusedScore).toBeCloseTo(3 / 61, 12);
		expect(fused[0]?.contributingSources).toEqual([
			'bm25',
			'semantic',
			'fuzzy',
		]);
	});

	it('returns nothing for no lists', () => {
		expect(reciprocalRankFusion(new Map(), {weights: EQUAL})).toEqual([]);
	});

	it('gives the same output for the same input', () => {
		const input = lists({bm25: ['d', 'e', 'f'], semantic: ['f', 'd'], fuzzy: ['e']});
		expect(reciprocalRankFusion(input, {weights: EQUAL})).toEqual(
			reciprocalRankFusion(input, {weights: EQUAL}),
		);
	});
});

/**
 * Weighted Reciprocal Rank Fusion.
 *
 *   fusedScore(d) = sum over sources s of weight[s] / (rrfK + rank_s(d))
 *
 * A document a source did not return contributes nothing for that source.
 * Fusion is a pure function of its inputs; ties are broken by docId.
 */

import {
	SOURCE_NAMES,
	type FusedResult,
	type RankedResult,
	type SourceName,
} from './types.js';

export const DEFAULT_RRF_K = 60;

export interface FusionOptions {
	weights: Readonly<Record<SourceName, number>>;
	rrfK?: number;
}

function compareIds(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order fused results by fusedScore descending, then docId ascending.
 */
export function compareFused(a: FusedResult, b: FusedResult): number {
	if (a.fusedScore !== b.fusedScore) return b.fusedScore - a.fusedScore;
	return compareIds(a.docId, b.docId);
}

/**
 * Turn a source's ordering into ranked results. Repeated ids keep their
 * first (best) position; ranks are 1-based and contiguous.
 */
export function assignRanks(
	source: SourceName,
	ordering: ReadonlyArray<{docId: string; score: number}>,
): RankedResult[] {
	const seen = new Set<string>();
	const ranked: RankedResult[] = [];
	for (const {docId, score} of ordering) {
		if (seen.has(docId)) continue;
		seen.add(docId);
		ranked.push({docId, score, source, rank: ranked.length + 1});
	}
	return ranked;
}

/**
 * Rank a backend's plain id list. Scores are 1 / rank.
 */
export function rankIds(
	source: SourceName,
	ids: readonly string[],
): RankedResult[] {
	const unique = [...new Set(ids)];
	return unique.map((docId, i) => ({
		docId,
		score: 1 / (i + 1),
		source,
		rank: i + 1,
	}));
}

/**
 * Fuse per-source rankings. Sources absent from `lists` take no part.
 */
export function reciprocalRankFusion(
	lists: ReadonlyMap<SourceName, readonly RankedResult[]>,
	options: FusionOptions,
): FusedResult[] {
	const rrfK = options.rrfK ?? DEFAULT_RRF_K;
	const fused = new Map<string, {score: number; sources: Set<SourceName>}>();

	// Fixed source order keeps floating-point sums identical run to run.
	for (const source of SOURCE_NAMES) {
		const results = lists.get(source);
		if (!results) continue;
		const weight = options.weights[source];

		for (const result of results) {
			let entry = fused.get(result.docId);
			if (!entry) {
				entry = {score: 0, sources: new Set()};
				fused.set(result.docId, entry);
			}
			entry.score += weight / (rrfK + result.rank);
			entry.sources.add(source);
		}
	}

	const results: FusedResult[] = [];
	for (const [docId, entry] of fused) {
		results.push({
			docId,
			fusedScore: entry.score,
			contributingSources: SOURCE_NAMES.filter(source =>
				entry.sources.has(source),
			),
		});
	}
	return results.sort(compareFused);
}

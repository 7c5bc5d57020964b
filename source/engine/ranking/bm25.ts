/**
 * BM25 ranking over the inverted index.
 *
 * Scores only documents that match: candidate sets come from postings, so
 * the cost is proportional to matching documents, never to the corpus.
 *
 *   idf(t)      = ln(1 + (N - df + 0.5) / (df + 0.5))
 *   score(t, d) = idf(t) * tf * (k1 + 1) / (tf + k1 * (1 - b + b * len / avgLen))
 */

import type {DocId, InvertedIndex, Posting} from '../index/index.js';
import type {QueryNode} from '../query/index.js';
import type {Term} from '../tokenizer/index.js';

export interface Bm25Options {
	k1?: number;
	b?: number;
	/** Upper bound on terms a single prefix expands to */
	maxPrefixExpansions?: number;
}

export interface ScoredDocument {
	docId: DocId;
	score: number;
}

type Scores = Map<DocId, number>;

export const DEFAULT_K1 = 1.2;
export const DEFAULT_B = 0.75;
export const DEFAULT_MAX_PREFIX_EXPANSIONS = 64;

/**
 * Order by score descending, then docId ascending.
 */
export function compareScored(
	a: {docId: string; score: number},
	b: {docId: string; score: number},
): number {
	if (a.score !== b.score) return b.score - a.score;
	return a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0;
}

export function inverseDocumentFrequency(
	totalDocuments: number,
	documentFrequency: number,
): number {
	return Math.log(
		1 +
			(totalDocuments - documentFrequency + 0.5) / (documentFrequency + 0.5),
	);
}

function lowerBound(values: readonly number[], target: number): number {
	let lo = 0;
	let hi = values.length;
	while (lo < hi) {
		const mid = (lo + hi) >> 1;
		if ((values[mid] ?? Number.POSITIVE_INFINITY) < target) lo = mid + 1;
		else hi = mid;
	}
	return lo;
}

function containsPosition(values: readonly number[], target: number): boolean {
	return values[lowerBound(values, target)] === target;
}

/**
 * True when the postings' positions contain the terms at consecutive
 * offsets, in order.
 */
export function hasConsecutivePositions(postings: readonly Posting[]): boolean {
	const [first, ...rest] = postings;
	if (!first) return false;
	return first.positions.some(start =>
		rest.every((posting, i) => containsPosition(posting.positions, start + i + 1)),
	);
}

/**
 * Smallest window (max - min position) holding at least one position of
 * every posting. Infinity when a posting is empty.
 */
export function minimumCoverSpan(postings: readonly Posting[]): number {
	const events: Array<{position: number; label: number}> = [];
	postings.forEach((posting, label) => {
		for (const position of posting.positions) events.push({position, label});
	});
	events.sort((a, b) => a.position - b.position || a.label - b.label);

	const need = postings.length;
	const counts = new Array<number>(need).fill(0);
	let covered = 0;
	let best = Number.POSITIVE_INFINITY;
	let left = 0;

	for (const event of events) {
		if ((counts[event.label] ?? 0) === 0) covered++;
		counts[event.label] = (counts[event.label] ?? 0) + 1;

		while (covered === need) {
			const head = events[left];
			if (!head) break;
			best = Math.min(best, event.position - head.position);
			counts[head.label] = (counts[head.label] ?? 0) - 1;
			if (counts[head.label] === 0) covered--;
			left++;
		}
	}

	return best;
}

export class Bm25Ranker {
	private readonly k1: number;
	private readonly b: number;
	private readonly maxPrefixExpansions: number;

	constructor(options: Bm25Options = {}) {
		this.k1 = options.k1 ?? DEFAULT_K1;
		this.b = options.b ?? DEFAULT_B;
		this.maxPrefixExpansions =
			options.maxPrefixExpansions ?? DEFAULT_MAX_PREFIX_EXPANSIONS;
	}

	/**
	 * Score and rank documents matching a query.
	 * Sorted by score descending, docId ascending.
	 */
	score(query: QueryNode, index: InvertedIndex): ScoredDocument[] {
		if (index.totalDocuments() === 0) return [];

		const scores = this.evaluate(query, index);
		const ranked: ScoredDocument[] = [];
		for (const [docId, score] of scores) ranked.push({docId, score});
		return ranked.sort(compareScored);
	}

	/**
	 * Indexed terms a query can match positively (NOT subtrees excluded,
	 * prefixes expanded). Used for highlighting.
	 */
	matchedTerms(query: QueryNode, index: InvertedIndex): Term[] {
		const terms = new Set<Term>();
		const visit = (node: QueryNode) => {
			switch (node.type) {
				case 'term':
					terms.add(node.term);
					break;
				case 'phrase':
				case 'near':
					for (const term of node.terms) terms.add(term);
					break;
				case 'prefix':
					for (const term of index.expandPrefix(
						node.stem,
						this.maxPrefixExpansions,
					)) {
						terms.add(term);
					}
					break;
				case 'and':
				case 'or':
					node.children.forEach(visit);
					break;
				case 'not':
					break;
			}
		};
		visit(query);
		return [...terms].filter(term => index.hasTerm(term));
	}

	private evaluate(node: QueryNode, index: InvertedIndex): Scores {
		switch (node.type) {
			case 'term':
				return this.scoreTerm(node.term, index);
			case 'prefix': {
				const expansions = index.expandPrefix(
					node.stem,
					this.maxPrefixExpansions,
				);
				return union(expansions.map(term => this.scoreTerm(term, index)));
			}
			case 'phrase':
				return this.scoreStructural(node.terms, index, hasConsecutivePositions);
			case 'near':
				return this.scoreStructural(
					node.terms,
					index,
					postings => minimumCoverSpan(postings) <= node.distance,
				);
			case 'and':
				return this.evaluateAnd(node.children, index);
			case 'or':
				return union(
					node.children
						.filter(child => child.type !== 'not')
						.map(child => this.evaluate(child, index)),
				);
			case 'not':
				// A bare negation would have to enumerate the corpus.
				return new Map();
		}
	}

	private evaluateAnd(
		children: readonly QueryNode[],
		index: InvertedIndex,
	): Scores {
		const positives: Scores[] = [];
		const negatives: QueryNode[] = [];
		for (const child of children) {
			if (child.type === 'not') negatives.push(child.child);
			else positives.push(this.evaluate(child, index));
		}
		if (positives.length === 0) return new Map();

		positives.sort((a, b) => a.size - b.size);
		const [smallest, ...others] = positives;
		const result: Scores = new Map();
		if (!smallest) return result;

		for (const [docId, score] of smallest) {
			let total = score;
			let matchesAll = true;
			for (const other of others) {
				const contribution = other.get(docId);
				if (contribution === undefined) {
					matchesAll = false;
					break;
				}
				total += contribution;
			}
			if (matchesAll) result.set(docId, total);
		}

		for (const negative of negatives) {
			if (result.size === 0) break;
			for (const docId of this.evaluate(negative, index).keys()) {
				result.delete(docId);
			}
		}

		return result;
	}

	private scoreTerm(term: Term, index: InvertedIndex): Scores {
		const scores: Scores = new Map();
		const postings = index.getPostings(term);
		if (postings.length === 0) return scores;

		const idf = inverseDocumentFrequency(
			index.totalDocuments(),
			postings.length,
		);
		const avgLength = index.averageDocumentLength();
		for (const posting of postings) {
			scores.set(posting.docId, this.contribution(idf, posting, index, avgLength));
		}
		return scores;
	}

	/**
	 * Phrase and NEAR: intersect candidates, then keep documents whose
	 * positions satisfy `accept`, scoring them by their terms' BM25 sum.
	 */
	private scoreStructural(
		terms: readonly Term[],
		index: InvertedIndex,
		accept: (postings: readonly Posting[]) => boolean,
	): Scores {
		const scores: Scores = new Map();
		const lists = terms.map(term => index.getPostings(term));
		if (lists.length === 0 || lists.some(list => list.length === 0)) {
			return scores;
		}

		const N = index.totalDocuments();
		const avgLength = index.averageDocumentLength();
		const idfs = lists.map(list => inverseDocumentFrequency(N, list.length));
		const driver = lists.reduce((a, b) => (b.length < a.length ? b : a));

		for (const candidate of driver) {
			const postings: Posting[] = [];
			for (const term of terms) {
				const posting = index.getPosting(term, candidate.docId);
				if (!posting) break;
				postings.push(posting);
			}
			if (postings.length !== terms.length || !accept(postings)) continue;

			let total = 0;
			postings.forEach((posting, i) => {
				total += this.contribution(idfs[i] ?? 0, posting, index, avgLength);
			});
			scores.set(candidate.docId, total);
		}

		return scores;
	}

	private contribution(
		idf: number,
		posting: Posting,
		index: InvertedIndex,
		avgLength: number,
	): number {
		const tf = posting.termFrequency;
		const length = index.documentLength(posting.docId);
		const norm =
			avgLength > 0 ? 1 - this.b + this.b * (length / avgLength) : 1;
		return (idf * (tf * (this.k1 + 1))) / (tf + this.k1 * norm);
	}
}

function union(parts: Scores[]): Scores {
	const result: Scores = new Map();
	for (const part of parts) {
		for (const [docId, score] of part) {
			result.set(docId, (result.get(docId) ?? 0) + score);
		}
	}
	return result;
}

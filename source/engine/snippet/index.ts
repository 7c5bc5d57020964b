/**
 * Snippet extraction with highlight offsets.
 *
 * Matches are character spans in the document. They are grouped into
 * clusters (neighbours at most `window` apart, a cluster spanning at most
 * 2 * window), the densest cluster is picked, and the excerpt extends
 * `window` characters either side of it.
 */

import type {Snippet} from '../search/types.js';
import {Tokenizer, type Term} from '../tokenizer/index.js';

export type Span = readonly [start: number, end: number];

export interface SnippetOptions {
	/** Characters of context on each side of the cluster */
	window?: number;
}

export const DEFAULT_SNIPPET_WINDOW = 80;

export const ELLIPSIS = '…';

interface Cluster {
	spans: Span[];
	start: number;
	end: number;
}

/**
 * Character spans of tokens in `text` whose term is one of `terms`.
 * Compound tokens are only reported when none of their parts matched.
 */
export function locateMatches(
	text: string,
	terms: Iterable<Term>,
	tokenizer: Tokenizer = new Tokenizer(),
): Span[] {
	const wanted = new Set(terms);
	if (wanted.size === 0) return [];

	const spans: Span[] = [];
	for (const token of tokenizer.tokenize(text)) {
		if (!wanted.has(token.term)) continue;
		if (token.compound) {
			const overlaps = spans.some(
				([start, end]) => start < token.end && end > token.start,
			);
			if (overlaps) continue;
		}
		spans.push([token.start, token.end]);
	}

	return mergeSpans(spans);
}

/**
 * Sort spans and merge the ones that overlap.
 */
export function mergeSpans(spans: readonly Span[]): Span[] {
	const sorted = [...spans].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
	const merged: Array<[number, number]> = [];
	for (const [start, end] of sorted) {
		const last = merged[merged.length - 1];
		if (last && start < last[1]) {
			last[1] = Math.max(last[1], end);
		} else {
			merged.push([start, end]);
		}
	}
	return merged;
}

function clusterSpans(spans: readonly Span[], window: number): Cluster[] {
	const clusters: Cluster[] = [];
	let current: Cluster | null = null;

	for (const span of spans) {
		const [start, end] = span;
		if (
			current &&
			start - current.end <= window &&
			end - current.start <= 2 * window
		) {
			current.spans.push(span);
			current.end = Math.max(current.end, end);
			continue;
		}
		current = {spans: [span], start, end};
		clusters.push(current);
	}

	return clusters;
}

function pickCluster(clusters: readonly Cluster[]): Cluster | null {
	let best: Cluster | null = null;
	for (const cluster of clusters) {
		if (!best) {
			best = cluster;
			continue;
		}
		const count = cluster.spans.length - best.spans.length;
		const span = cluster.end - cluster.start - (best.end - best.start);
		if (count > 0 || (count === 0 && span < 0)) best = cluster;
	}
	return best;
}

/**
 * Extract an excerpt around the best match cluster.
 * Highlights are relative to the returned snippet text.
 */
export function extractSnippet(
	text: string,
	matches: readonly Span[],
	options: SnippetOptions = {},
): Snippet {
	const window = Math.max(1, options.window ?? DEFAULT_SNIPPET_WINDOW);
	const spans = mergeSpans(
		matches.filter(
			([start, end]) => start >= 0 && end <= text.length && start < end,
		),
	);

	const cluster = pickCluster(clusterSpans(spans, window));
	if (!cluster) {
		const head = text.slice(0, 2 * window);
		return {
			text: head.length < text.length ? head + ELLIPSIS : head,
			highlights: [],
		};
	}

	const from = Math.max(0, cluster.start - window);
	const to = Math.min(text.length, cluster.end + window);
	const prefix = from > 0 ? ELLIPSIS : '';
	const suffix = to < text.length ? ELLIPSIS : '';
	const offset = prefix.length - from;

	return {
		text: prefix + text.slice(from, to) + suffix,
		highlights: cluster.spans.map(([start, end]): [number, number] => [
			start + offset,
			end + offset,
		]),
	};
}

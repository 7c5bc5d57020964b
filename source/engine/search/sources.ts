/**
 * Ranked sources taking part in fan-out, and the timeout runner.
 */

import {throwIfAborted} from '../abort.js';
import type {HybridConfig} from '../config/index.js';
import {SourceTimeoutError} from '../errors.js';
import type {InvertedIndex} from '../index/index.js';
import type {QueryNode} from '../query/index.js';
import {Bm25Ranker} from '../ranking/bm25.js';
import {assignRanks, rankIds} from './fusion.js';
import type {
	DegradedReason,
	RankedResult,
	SearchBackend,
	SourceName,
} from './types.js';

export interface SourceRequest {
	/** Raw query string, passed to external backends */
	query: string;
	/** Parsed query, used by local sources */
	parsed: QueryNode;
	/** Number of candidates wanted */
	limit: number;
	config: HybridConfig;
	/** Local sources drop rejected documents before truncating */
	accept: ((docId: string) => boolean) | null;
	signal: AbortSignal;
}

/**
 * A source of one ranked list. Results are best first, ranks 1-based.
 */
export interface RankedSource {
	readonly name: SourceName;
	search(request: SourceRequest): Promise<RankedResult[]>;
}

/**
 * BM25 over the current inverted index.
 */
export class Bm25Source implements RankedSource {
	readonly name = 'bm25' as const;
	private readonly getIndex: () => InvertedIndex;

	constructor(getIndex: () => InvertedIndex) {
		this.getIndex = getIndex;
	}

	async search(request: SourceRequest): Promise<RankedResult[]> {
		throwIfAborted(request.signal, 'BM25 search cancelled');
		const {k1, b} = request.config.bm25;
		const ranker = new Bm25Ranker({
			k1,
			b,
			maxPrefixExpansions: request.config.maxPrefixExpansions,
		});

		let scored = ranker.score(request.parsed, this.getIndex());
		const {accept} = request;
		if (accept) scored = scored.filter(doc => accept(doc.docId));
		return assignRanks(this.name, scored.slice(0, request.limit));
	}
}

/**
 * Adapts an external {@link SearchBackend} returning plain ids.
 */
export class BackendSource implements RankedSource {
	readonly name: SourceName;
	private readonly backend: SearchBackend;

	constructor(name: SourceName, backend: SearchBackend) {
		this.name = name;
		this.backend = backend;
	}

	async search(request: SourceRequest): Promise<RankedResult[]> {
		const ids = await this.backend.search(
			request.query,
			request.limit,
			request.signal,
		);
		return rankIds(this.name, ids).slice(0, request.limit);
	}
}

// ============================================================================
// Timeout runner
// ============================================================================

export type SourceOutcome =
	| {
			status: 'ok';
			source: SourceName;
			results: RankedResult[];
			latencyMs: number;
	  }
	| {
			status: 'degraded';
			source: SourceName;
			reason: DegradedReason;
			error: Error;
			latencyMs: number;
	  }
	| {status: 'aborted'; source: SourceName; latencyMs: number};

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run one source under its own deadline. Never rejects.
 *
 * The source gets a child signal that aborts when the caller's signal
 * aborts or the deadline passes. The timer is always cleared.
 */
export async function runSource(
	source: RankedSource,
	request: Omit<SourceRequest, 'signal'>,
	timeoutMs: number | null,
	parent?: AbortSignal,
): Promise<SourceOutcome> {
	const controller = new AbortController();
	const onAbort = () => controller.abort(parent?.reason);
	if (parent?.aborted) controller.abort(parent.reason);
	else parent?.addEventListener('abort', onAbort, {once: true});

	let timer: ReturnType<typeof setTimeout> | undefined;
	const started = performance.now();
	const elapsed = () => performance.now() - started;

	try {
		const work = source.search({...request, signal: controller.signal});
		const results =
			timeoutMs === null
				? await work
				: await Promise.race([
						work,
						new Promise<never>((_, reject) => {
							timer = setTimeout(() => {
								const error = new SourceTimeoutError(source.name, timeoutMs);
								controller.abort(error);
								reject(error);
							}, timeoutMs);
						}),
					]);
		return {status: 'ok', source: source.name, results, latencyMs: elapsed()};
	} catch (error) {
		if (parent?.aborted) {
			return {status: 'aborted', source: source.name, latencyMs: elapsed()};
		}
		return {
			status: 'degraded',
			source: source.name,
			reason: error instanceof SourceTimeoutError ? 'timeout' : 'error',
			error: toError(error),
			latencyMs: elapsed(),
		};
	} finally {
		clearTimeout(timer);
		parent?.removeEventListener('abort', onAbort);
	}
}

/**
 * Hybrid search orchestrator.
 *
 * One call:
 * 1. parse the query (a QuerySyntaxError fails the call) and check the cache
 * 2. fan out to every enabled, registered source, each under its own deadline
 * 3. fuse the ranked lists with weighted RRF
 * 4. filter, then truncate to the limit
 * 5. cache the response
 *
 * A source that errors or times out contributes nothing and is reported
 * as degraded. An enabled source with no registered implementation is
 * narrowed away for the call. Cancellation through the caller's signal
 * rejects with an AbortError; nothing is fused or cached.
 */

import crypto from 'node:crypto';
import {raceAbort, throwIfAborted} from '../abort.js';
import type {HybridConfig} from '../config/index.js';
import {SourceUnavailableError} from '../errors.js';
import type {InvertedIndex} from '../index/index.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import {QueryParser, type QueryNode} from '../query/index.js';
import {ResultCache} from './cache.js';
import {buildFilterPredicate} from './filters.js';
import {assignRanks, reciprocalRankFusion} from './fusion.js';
import {runSource, type RankedSource, type SourceOutcome} from './sources.js';
import {
	SOURCE_NAMES,
	type DegradedSource,
	type FusedResult,
	type HybridSearchResponse,
	type RankedResult,
	type SearchFilters,
	type SourceName,
	type SourceReport,
	type SourceSearchResponse,
} from './types.js';

export const DEFAULT_SEARCH_LIMIT = 10;

export interface SearchOptions {
	filters?: SearchFilters;
	limit?: number;
	signal?: AbortSignal;
}

export interface OrchestratorOptions {
	/** Provider of the index to search; re-read on every call */
	index: () => InvertedIndex;
	logger?: Logger;
	cacheMaxEntries?: number;
	/** Clock for cache expiry, injectable for tests */
	now?: () => number;
}

interface LatencyTotals {
	calls: number;
	totalMs: number;
}

export type AverageLatencies = Record<SourceName, number | null>;

function normalizeQuery(query: string): string {
	return query.trim().replace(/\s+/g, ' ');
}

function normalizeLimit(limit: number | undefined): number {
	if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_SEARCH_LIMIT;
	return Math.max(0, Math.floor(limit));
}

function normalizeFilters(filters: SearchFilters | undefined): SearchFilters {
	const normalized: SearchFilters = {};
	const language = filters?.language?.trim().toLowerCase();
	const pathGlob = filters?.pathGlob?.trim();
	if (language) normalized.language = language;
	if (pathGlob) normalized.pathGlob = pathGlob;
	return normalized;
}

/**
 * Cache key over everything that changes a fused response.
 */
export function fingerprint(
	query: string,
	filters: SearchFilters,
	limit: number,
	sources: readonly SourceName[],
	config: HybridConfig,
): string {
	const payload = JSON.stringify({
		query: normalizeQuery(query),
		filters: normalizeFilters(filters),
		limit,
		sources,
		weights: SOURCE_NAMES.map(name => config.weights[name]),
		rrfK: config.rrfK,
	});
	return crypto.createHash('sha256').update(payload).digest('hex');
}

/**
 * TTL for a response: per-source TTLs mixed by the weights of the sources
 * that produced results (of those that ran, when none did).
 */
export function mixedTtl(
	config: HybridConfig,
	productive: readonly SourceName[],
	ran: readonly SourceName[],
): number {
	const pool = productive.length > 0 ? productive : ran;
	const totalWeight = pool.reduce((sum, name) => sum + config.weights[name], 0);
	if (pool.length === 0) return config.cacheTtlMs.bm25;
	if (totalWeight <= 0) {
		return Math.min(...pool.map(name => config.cacheTtlMs[name]));
	}
	let ttl = 0;
	for (const name of pool) {
		ttl += (config.weights[name] / totalWeight) * config.cacheTtlMs[name];
	}
	return Math.round(ttl);
}

export class HybridOrchestrator {
	readonly cache: ResultCache;
	private readonly sources = new Map<SourceName, RankedSource>();
	private readonly latency = new Map<SourceName, LatencyTotals>();
	private readonly getIndex: () => InvertedIndex;
	private readonly logger: Logger;

	constructor(options: OrchestratorOptions) {
		this.getIndex = options.index;
		this.logger = options.logger ?? createNullLogger();
		this.cache = new ResultCache({
			maxEntries: options.cacheMaxEntries,
			now: options.now,
		});
	}

	register(source: RankedSource): void {
		this.sources.set(source.name, source);
		this.cache.invalidate();
	}

	unregister(name: SourceName): boolean {
		const removed = this.sources.delete(name);
		if (removed) this.cache.invalidate();
		return removed;
	}

	isAvailable(name: SourceName): boolean {
		return this.sources.has(name);
	}

	/**
	 * Split the enabled sources into those that can run and those that
	 * have no implementation.
	 */
	narrow(config: HybridConfig): {active: SourceName[]; narrowed: SourceName[]} {
		const active: SourceName[] = [];
		const narrowed: SourceName[] = [];
		for (const name of SOURCE_NAMES) {
			if (!config.enabled[name]) continue;
			if (this.sources.has(name)) {
				active.push(name);
			} else {
				narrowed.push(name);
				const reason = new SourceUnavailableError(name);
				this.logger.debug('Search', 'Narrowing source for this call', {
					source: name,
					reason: reason.message,
				});
			}
		}
		return {active, narrowed};
	}

	/**
	 * Parse with the tokenizer of the current index.
	 *
	 * @throws QuerySyntaxError
	 */
	parse(query: string): QueryNode {
		return new QueryParser(this.getIndex().tokenizer).parse(query);
	}

	/**
	 * Hybrid search: fan-out, fusion, filters, limit and cache.
	 */
	async search(
		query: string,
		options: SearchOptions,
		config: HybridConfig,
	): Promise<HybridSearchResponse> {
		const started = performance.now();
		const parsed = this.parse(query);
		const {signal} = options;
		throwIfAborted(signal, 'Search cancelled');

		const index = this.getIndex();
		const indexVersion = index.version;
		const limit = normalizeLimit(options.limit);
		const filters = normalizeFilters(options.filters);
		const {active, narrowed} = this.narrow(config);

		const key = fingerprint(query, filters, limit, active, config);
		const hit = this.cache.get(key, indexVersion);
		if (hit) {
			return {
				...hit,
				results: hit.results.map(result => ({...result})),
				cached: true,
				elapsedMs: performance.now() - started,
			};
		}

		const predicate = buildFilterPredicate(filters);
		const accept = predicate
			? (docId: string) => predicate(docId, index.getDocument(docId)?.fields)
			: null;
		const candidates = limit * Math.max(1, config.candidateMultiplier);

		const outcomes = await raceAbort(
			Promise.all(
				active.map(name =>
					this.runRegistered(
						name,
						{query, parsed, limit: candidates, config, accept},
						config,
						signal,
					),
				),
			),
			signal,
			'Search cancelled',
		);
		throwIfAborted(signal, 'Search cancelled');

		const lists = new Map<SourceName, readonly RankedResult[]>();
		const degraded: DegradedSource[] = [];
		const perSource: SourceReport[] = [];
		for (const outcome of outcomes) {
			this.recordLatency(outcome.source, outcome.latencyMs);
			if (outcome.status === 'ok') {
				lists.set(outcome.source, outcome.results);
				perSource.push({
					source: outcome.source,
					count: outcome.results.length,
					latencyMs: outcome.latencyMs,
				});
			} else if (outcome.status === 'degraded') {
				degraded.push({
					source: outcome.source,
					reason: outcome.reason,
					message: outcome.error.message,
				});
				perSource.push({
					source: outcome.source,
					count: 0,
					latencyMs: outcome.latencyMs,
				});
				this.logger.warn('Search', 'Source degraded', {
					source: outcome.source,
					reason: outcome.reason,
					message: outcome.error.message,
				});
			}
		}

		let fused: FusedResult[] = reciprocalRankFusion(lists, {
			weights: config.weights,
			rrfK: config.rrfK,
		});
		if (accept) fused = fused.filter(result => accept(result.docId));
		fused = fused.slice(0, limit);

		const response: HybridSearchResponse = {
			results: fused,
			query,
			degraded,
			narrowed,
			perSource,
			cached: false,
			elapsedMs: performance.now() - started,
		};

		const productive = [...lists]
			.filter(([, results]) => results.length > 0)
			.map(([name]) => name);
		let ttl = mixedTtl(config, productive, [...lists.keys()]);
		// Degraded responses expire early
		if (degraded.length > 0) ttl = Math.min(ttl, config.degradedCacheTtlMs);
		this.cache.set(
			key,
			{...response, results: fused.map(result => ({...result}))},
			ttl,
			indexVersion,
		);

		return response;
	}

	/**
	 * Search a single source, without fusion or caching.
	 *
	 * @throws SourceUnavailableError when no implementation is registered
	 */
	async searchSource(
		name: SourceName,
		query: string,
		options: SearchOptions,
		config: HybridConfig,
	): Promise<SourceSearchResponse> {
		const started = performance.now();
		const parsed = this.parse(query);
		if (!this.sources.has(name)) throw new SourceUnavailableError(name);
		const {signal} = options;
		throwIfAborted(signal, 'Search cancelled');

		const index = this.getIndex();
		const limit = normalizeLimit(options.limit);
		const predicate = buildFilterPredicate(normalizeFilters(options.filters));
		const accept = predicate
			? (docId: string) => predicate(docId, index.getDocument(docId)?.fields)
			: null;
		const candidates = accept
			? limit * Math.max(1, config.candidateMultiplier)
			: limit;

		const outcome = await raceAbort(
			this.runRegistered(
				name,
				{query, parsed, limit: candidates, config, accept},
				config,
				signal,
			),
			signal,
			'Search cancelled',
		);
		throwIfAborted(signal, 'Search cancelled');
		this.recordLatency(name, outcome.latencyMs);

		let results: RankedResult[] = [];
		let degraded: DegradedSource | null = null;
		if (outcome.status === 'ok') {
			const kept = accept
				? outcome.results.filter(result => accept(result.docId))
				: outcome.results;
			results = assignRanks(name, kept.slice(0, limit));
		} else if (outcome.status === 'degraded') {
			degraded = {
				source: name,
				reason: outcome.reason,
				message: outcome.error.message,
			};
			this.logger.warn('Search', 'Source degraded', {...degraded});
		}

		return {
			results,
			query,
			source: name,
			degraded,
			latencyMs: outcome.latencyMs,
			elapsedMs: performance.now() - started,
		};
	}

	/**
	 * Mean latency per source over every call so far; null if never run.
	 */
	averageLatencies(): AverageLatencies {
		const averages: AverageLatencies = {bm25: null, semantic: null, fuzzy: null};
		for (const [name, totals] of this.latency) {
			averages[name] = totals.calls > 0 ? totals.totalMs / totals.calls : null;
		}
		return averages;
	}

	private runRegistered(
		name: SourceName,
		request: Parameters<typeof runSource>[1],
		config: HybridConfig,
		signal: AbortSignal | undefined,
	): Promise<SourceOutcome> {
		const source = this.sources.get(name);
		if (!source) {
			const outcome: SourceOutcome = {
				status: 'degraded',
				source: name,
				reason: 'unavailable',
				error: new SourceUnavailableError(name),
				latencyMs: 0,
			};
			return Promise.resolve(outcome);
		}
		return runSource(source, request, config.sourceTimeoutMs[name], signal);
	}

	private recordLatency(name: SourceName, latencyMs: number): void {
		const totals = this.latency.get(name) ?? {calls: 0, totalMs: 0};
		totals.calls++;
		totals.totalMs += latencyMs;
		this.latency.set(name, totals);
	}
}

export {
	DEFAULT_CACHE_MAX_ENTRIES,
	ResultCache,
	type CacheEntry,
	type CacheStats,
	type ResultCacheOptions,
} from './cache.js';
export {
	buildFilterPredicate,
	documentLanguage,
	documentPath,
	hasFilters,
	type DocumentPredicate,
} from './filters.js';
export {
	DEFAULT_RRF_K,
	assignRanks,
	compareFused,
	rankIds,
	reciprocalRankFusion,
	type FusionOptions,
} from './fusion.js';
export {
	DEFAULT_SEARCH_LIMIT,
	HybridOrchestrator,
	fingerprint,
	mixedTtl,
	type AverageLatencies,
	type OrchestratorOptions,
	type SearchOptions,
} from './orchestrator.js';
export {
	BackendSource,
	Bm25Source,
	runSource,
	type RankedSource,
	type SourceOutcome,
	type SourceRequest,
} from './sources.js';
export * from './types.js';

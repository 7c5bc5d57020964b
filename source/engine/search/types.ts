/**
 * Search result types.
 */

/**
 * Ranked-search sources that take part in hybrid fusion.
 */
export const SOURCE_NAMES = ['bm25', 'semantic', 'fuzzy'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

/**
 * Search mode accepted by the service.
 */
export type SearchMode =
	| 'auto' // Exact symbol short-circuit, otherwise hybrid
	| 'symbol' // Exact symbol lookup only
	| 'fulltext' // BM25 only
	| 'hybrid' // Fan-out + RRF
	| 'bm25' // Alias of fulltext
	| 'semantic' // Semantic source only
	| 'fuzzy'; // Fuzzy source only

export const SEARCH_MODES: readonly SearchMode[] = [
	'auto',
	'symbol',
	'fulltext',
	'hybrid',
	'bm25',
	'semantic',
	'fuzzy',
];

/**
 * One entry of a single source's ordering.
 */
export interface RankedResult {
	docId: string;
	score: number;
	source: SourceName;
	/** 1-based position in the source's own ordering */
	rank: number;
	/** Excerpt around the matched terms (only when snippets are requested) */
	snippet?: Snippet;
}

/**
 * One entry of an RRF-merged ordering.
 */
export interface FusedResult {
	docId: string;
	fusedScore: number;
	/** Sources that ranked this document, in SOURCE_NAMES order */
	contributingSources: SourceName[];
	/** Excerpt around the matched terms (only when snippets are requested) */
	snippet?: Snippet;
}

export interface Snippet {
	text: string;
	/** [start, end) offsets relative to `text` */
	highlights: Array<[number, number]>;
}

/**
 * Post-hoc result filters.
 */
export interface SearchFilters {
	/** Language identifier (e.g. "typescript"), compared case-insensitively */
	language?: string;
	/** Glob matched against the document path (e.g. "src/**\/*.ts") */
	pathGlob?: string;
}

export type DegradedReason = 'timeout' | 'error' | 'unavailable';

export interface DegradedSource {
	source: SourceName;
	reason: DegradedReason;
	message: string;
}

export interface SourceReport {
	source: SourceName;
	count: number;
	latencyMs: number;
}

/**
 * Response of a hybrid search.
 */
export interface HybridSearchResponse {
	results: FusedResult[];
	query: string;
	/** Sources that errored or timed out during fan-out */
	degraded: DegradedSource[];
	/** Enabled sources skipped because no backend is configured */
	narrowed: SourceName[];
	/** Sources that ran, with result counts and latency */
	perSource: SourceReport[];
	cached: boolean;
	elapsedMs: number;
}

/**
 * An external ranked-search backend (semantic or fuzzy).
 * Returns document ids, best first.
 */
export interface SearchBackend {
	search(
		query: string,
		limit: number,
		signal?: AbortSignal,
	): Promise<readonly string[]>;
}

/**
 * Response of a single-source search.
 */
export interface SourceSearchResponse {
	results: RankedResult[];
	query: string;
	source: SourceName;
	/** Set when the source errored or timed out */
	degraded: DegradedSource | null;
	latencyMs: number;
	elapsedMs: number;
}

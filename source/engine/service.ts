/**
 * Code search service: the facade over ingestion, search and maintenance.
 *
 * The document store is the source of truth; the inverted index and the
 * symbol table are derived from it and rebuilt from it on demand. Writes
 * (ingestion, removal, rebuild, snapshot) go through a single queue, so a
 * rebuild blocks new writes but never reads: searches keep using the
 * previous index until the rebuilt one is swapped in.
 */

import pLimit from 'p-limit';
import {ZodError} from 'zod';
import {
	ConfigRef,
	DEFAULT_CONFIG,
	withMethods,
	withWeights,
	type EnabledSources,
	type HybridConfig,
	type SourceWeights,
} from './config/index.js';
import {getSnapshotPath} from './constants.js';
import {
	FallbackDispatcher,
	type DispatchResult,
} from './dispatcher/index.js';
import {
	InvertedIndex,
	readSnapshot,
	writeSnapshot,
	type IndexSize,
	type RestoreResult,
} from './index/index.js';
import {createNullLogger, type Logger} from './logger/index.js';
import {Bm25Ranker} from './ranking/bm25.js';
import {
	BackendSource,
	Bm25Source,
	HybridOrchestrator,
	type AverageLatencies,
	type CacheStats,
} from './search/index.js';
import type {
	FusedResult,
	RankedResult,
	SearchBackend,
	SearchFilters,
	SearchMode,
	Snippet,
} from './search/types.js';
import {extractSnippet, locateMatches} from './snippet/index.js';
import {
	SymbolTable,
	TrigramSymbolBackend,
	type SymbolDefinition,
} from './symbols/index.js';
import {Tokenizer} from './tokenizer/index.js';
import {
	parsedDocumentSchema,
	type DocumentStore,
	type ParsedDocument,
} from './storage/index.js';

export interface CodeSearchServiceOptions {
	store: DocumentStore;
	config?: HybridConfig;
	logger?: Logger;
	/** Semantic backend; semantic search is narrowed away without one */
	semantic?: SearchBackend | null;
	/** Fuzzy backend; defaults to trigram matching over symbol names, null disables */
	fuzzy?: SearchBackend | null;
	/** Where `persist()` writes the index snapshot; null keeps it in memory only */
	snapshotPath?: string | null;
	/** Clock for cache expiry, injectable for tests */
	now?: () => number;
}

export interface ServiceSearchOptions {
	mode?: SearchMode;
	filters?: SearchFilters;
	limit?: number;
	/** Attach an excerpt with highlights to each ranked result */
	snippets?: boolean;
	signal?: AbortSignal;
}

export interface ServiceStats {
	/** hits / lookups of the hybrid result cache */
	cacheHitRate: number;
	/** Mean latency per source in ms, null for sources never run */
	avgLatencyPerSource: AverageLatencies;
	indexSize: IndexSize;
	indexVersion: number;
	symbols: number;
	cache: CacheStats;
}

export interface RebuildResult {
	documents: number;
	/** Ids listed by the store that could not be read back */
	skipped: string[];
	elapsedMs: number;
}

export interface OpenResult {
	/** Where the index came from */
	source: 'snapshot' | 'store';
	documents: number;
	/** Documents dropped from the snapshot and re-read from the store */
	recovered: string[];
}

export class CodeSearchService {
	private readonly store: DocumentStore;
	private readonly logger: Logger;
	private readonly configRef: ConfigRef;
	private readonly tokenizer = new Tokenizer();
	private readonly orchestrator: HybridOrchestrator;
	private readonly dispatcher: FallbackDispatcher;
	private readonly snapshotPath: string | null;
	private readonly writeQueue = pLimit(1);
	private index: InvertedIndex;
	private symbols = new SymbolTable();

	constructor(options: CodeSearchServiceOptions) {
		this.store = options.store;
		this.logger = options.logger ?? createNullLogger();
		this.configRef = new ConfigRef(options.config ?? DEFAULT_CONFIG);
		this.snapshotPath = options.snapshotPath ?? null;
		this.index = new InvertedIndex({tokenizer: this.tokenizer});

		this.orchestrator = new HybridOrchestrator({
			index: () => this.index,
			logger: this.logger,
			cacheMaxEntries: this.configRef.current.cacheMaxEntries,
			now: options.now,
		});
		this.orchestrator.register(new Bm25Source(() => this.index));
		this.setBackend('semantic', options.semantic ?? null);
		this.setBackend(
			'fuzzy',
			options.fuzzy === undefined
				? new TrigramSymbolBackend(() => this.symbols.trigrams)
				: options.fuzzy,
		);

		this.dispatcher = new FallbackDispatcher({
			orchestrator: this.orchestrator,
			symbols: () => this.symbols,
			index: () => this.index,
			logger: this.logger,
		});
	}

	/**
	 * Create a service whose snapshot lives in the project's data directory.
	 */
	static forProject(
		projectRoot: string,
		options: Omit<CodeSearchServiceOptions, 'snapshotPath'>,
	): CodeSearchService {
		return new CodeSearchService({
			...options,
			snapshotPath: getSnapshotPath(projectRoot),
		});
	}

	/**
	 * Load the index: from the snapshot when there is one, otherwise by
	 * rebuilding from the store. Documents dropped from a corrupted snapshot
	 * are re-read from the store; a snapshot that cannot be parsed at all
	 * (truncated, or written by another snapshot version) is ignored.
	 */
	async open(): Promise<OpenResult> {
		const restored = await this.loadSnapshot();

		if (!restored) {
			const rebuilt = await this.rebuild();
			return {source: 'store', documents: rebuilt.documents, recovered: []};
		}

		return this.writeQueue(async () => {
			const symbols = new SymbolTable();
			for (const id of restored.index.documentIds()) {
				const document = restored.index.getDocument(id);
				if (document) symbols.set(id, document.fields);
			}

			const recovered: string[] = [];
			for (const error of restored.dropped) {
				const document = await this.readStored(error.docId);
				if (!document) continue;
				restored.index.addDocument(document.id, document.text, document.fields);
				symbols.set(document.id, document.fields);
				recovered.push(document.id);
			}

			this.swap(restored.index, symbols);
			this.logger.info('Service', 'Index loaded from snapshot', {
				documents: restored.index.totalDocuments(),
				dropped: restored.dropped.length,
				recovered: recovered.length,
			});
			return {
				source: 'snapshot' as const,
				documents: restored.index.totalDocuments(),
				recovered,
			};
		});
	}

	private async loadSnapshot(): Promise<RestoreResult | null> {
		if (!this.snapshotPath) return null;
		try {
			return await readSnapshot(this.snapshotPath, {
				tokenizer: this.tokenizer,
				logger: this.logger,
			});
		} catch (error) {
			if (error instanceof SyntaxError || error instanceof ZodError) {
				this.logger.error(
					'Service',
					'Unreadable index snapshot, rebuilding from store',
					error,
				);
				return null;
			}
			throw error;
		}
	}

	// ============================================================================
	// Ingestion
	// ============================================================================

	async addDocument(document: ParsedDocument): Promise<void> {
		await this.addDocuments([document]);
	}

	/**
	 * Store and index documents, replacing existing ones with the same id.
	 *
	 * @throws ZodError when a document is malformed; nothing is written then
	 */
	async addDocuments(documents: readonly ParsedDocument[]): Promise<void> {
		const valid = documents.map(document => parsedDocumentSchema.parse(document));
		if (valid.length === 0) return;

		await this.writeQueue(async () => {
			await this.store.put(valid);
			const index = this.index;
			for (const document of valid) {
				index.addDocument(document.id, document.text, document.fields);
				this.symbols.set(document.id, document.fields);
			}
		});
	}

	/**
	 * @returns whether the document was known
	 */
	async removeDocument(id: string): Promise<boolean> {
		return this.writeQueue(async () => {
			const stored = await this.store.delete(id);
			const indexed = this.index.removeDocument(id);
			this.symbols.delete(id);
			return stored || indexed;
		});
	}

	// ============================================================================
	// Search
	// ============================================================================

	/**
	 * Search in the given mode (default `auto`).
	 *
	 * @throws QuerySyntaxError for a malformed query
	 * @throws AbortError when `signal` aborts
	 */
	async search(
		query: string,
		options: ServiceSearchOptions = {},
	): Promise<DispatchResult> {
		const config = this.configRef.current;
		const result = await this.dispatcher.resolve(
			query,
			options.mode ?? 'auto',
			{filters: options.filters, limit: options.limit, signal: options.signal},
			config,
		);
		if (!options.snippets || result.handler === 'symbol_exact') return result;
		return this.attachSnippets(result, query, config);
	}

	lookupSymbol(name: string): SymbolDefinition[] {
		return this.symbols.lookup(name);
	}

	/**
	 * Excerpt of a stored document around the terms a query matches.
	 * Null for unknown documents.
	 *
	 * @throws QuerySyntaxError for a malformed query
	 */
	async snippet(docId: string, query: string): Promise<Snippet | null> {
		return this.snippetFor(docId, query, this.configRef.current);
	}

	// ============================================================================
	// Configuration
	// ============================================================================

	/**
	 * Replace the fusion weights. They are sum-normalized.
	 *
	 * @throws ConfigError for negative, non-finite or all-zero weights
	 */
	configureWeights(weights: Partial<SourceWeights>): HybridConfig {
		return this.configRef.update(config =>
			withWeights(config, {...config.weights, ...weights}),
		);
	}

	/**
	 * Enable or disable sources for hybrid search.
	 *
	 * @throws ConfigError when every source would be disabled
	 */
	configureMethods(methods: Partial<EnabledSources>): HybridConfig {
		return this.configRef.update(config =>
			withMethods(config, {...config.enabled, ...methods}),
		);
	}

	getConfig(): HybridConfig {
		return this.configRef.current;
	}

	/**
	 * Plug in or remove a semantic or fuzzy backend.
	 */
	setBackend(name: 'semantic' | 'fuzzy', backend: SearchBackend | null): void {
		if (backend) this.orchestrator.register(new BackendSource(name, backend));
		else this.orchestrator.unregister(name);
	}

	// ============================================================================
	// Maintenance
	// ============================================================================

	stats(): ServiceStats {
		const cache = this.orchestrator.cache.stats();
		return {
			cacheHitRate: cache.hitRate,
			avgLatencyPerSource: this.orchestrator.averageLatencies(),
			indexSize: this.index.size(),
			indexVersion: this.index.version,
			symbols: this.symbols.size,
			cache,
		};
	}

	/**
	 * Build a fresh index from the store and swap it in. Queued behind
	 * pending writes; writes issued meanwhile wait for it.
	 */
	async rebuild(): Promise<RebuildResult> {
		return this.writeQueue(async () => {
			const started = performance.now();
			const config = this.configRef.current;
			const ids = await this.store.listIds();

			const readLimit = pLimit(Math.max(1, config.rebuildConcurrency));
			const documents = await Promise.all(
				ids.map(id => readLimit(() => this.readStored(id))),
			);

			const index = new InvertedIndex({
				tokenizer: this.tokenizer,
				initialVersion: this.index.version + 1,
			});
			const symbols = new SymbolTable();
			const skipped: string[] = [];
			documents.forEach((document, i) => {
				if (!document) {
					skipped.push(ids[i] ?? '');
					return;
				}
				index.addDocument(document.id, document.text, document.fields);
				symbols.set(document.id, document.fields);
			});

			this.swap(index, symbols);
			const result: RebuildResult = {
				documents: index.totalDocuments(),
				skipped,
				elapsedMs: performance.now() - started,
			};
			this.logger.info('Service', 'Index rebuilt', {...result});
			return result;
		});
	}

	/**
	 * Write the index snapshot. No-op without a snapshot path.
	 */
	async persist(): Promise<void> {
		const snapshotPath = this.snapshotPath;
		if (!snapshotPath) return;
		await this.writeQueue(async () => {
			await writeSnapshot(snapshotPath, this.index);
			this.logger.info('Service', 'Snapshot saved', {
				path: snapshotPath,
				documents: this.index.totalDocuments(),
			});
		});
	}

	/**
	 * Wait for pending writes, save the snapshot and close the store.
	 */
	async close(): Promise<void> {
		await this.persist();
		await this.writeQueue(() => this.store.close());
	}

	// ============================================================================
	// Internals
	// ============================================================================

	private swap(index: InvertedIndex, symbols: SymbolTable): void {
		this.index = index;
		this.symbols = symbols;
		this.orchestrator.cache.invalidate();
	}

	/**
	 * A document that cannot be read back is logged and left out.
	 */
	private async readStored(id: string): Promise<ParsedDocument | undefined> {
		try {
			return await this.store.get(id);
		} catch (error) {
			this.logger.error(
				'Service',
				`Skipping unreadable document ${id}`,
				error instanceof Error ? error : new Error(String(error)),
			);
			return undefined;
		}
	}

	private async attachSnippets<
		R extends {response: {results: ReadonlyArray<FusedResult | RankedResult>}},
	>(result: R, query: string, config: HybridConfig): Promise<R> {
		const results = await this.withSnippets(result.response.results, query, config);
		return {...result, response: {...result.response, results}};
	}

	private async withSnippets<T extends FusedResult | RankedResult>(
		results: readonly T[],
		query: string,
		config: HybridConfig,
	): Promise<T[]> {
		return Promise.all(
			results.map(async result => {
				const snippet = await this.snippetFor(result.docId, query, config);
				return snippet ? {...result, snippet} : {...result};
			}),
		);
	}

	private async snippetFor(
		docId: string,
		query: string,
		config: HybridConfig,
	): Promise<Snippet | null> {
		const parsed = this.orchestrator.parse(query);
		const document = await this.store.get(docId);
		if (!document) return null;

		const ranker = new Bm25Ranker({
			k1: config.bm25.k1,
			b: config.bm25.b,
			maxPrefixExpansions: config.maxPrefixExpansions,
		});
		const terms = ranker.matchedTerms(parsed, this.index);
		return extractSnippet(
			document.text,
			locateMatches(document.text, terms, this.tokenizer),
			{window: config.snippetWindow},
		);
	}
}

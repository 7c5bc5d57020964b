/**
 * Fallback dispatcher: picks the handler for a search mode.
 *
 * - auto: an exact symbol name short-circuits to its definitions,
 *   anything else goes to the hybrid orchestrator
 * - symbol: symbol table only
 * - fulltext / bm25: BM25 only
 * - semantic / fuzzy: that source only (single_source)
 * - hybrid: the orchestrator
 *
 * Sources without a registered implementation are narrowed away for the
 * call. A single-source mode whose source is missing falls back to BM25.
 */

import type {HybridConfig} from '../config/index.js';
import type {InvertedIndex} from '../index/index.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import {buildFilterPredicate} from '../search/filters.js';
import type {HybridOrchestrator, SearchOptions} from '../search/orchestrator.js';
import type {
	HybridSearchResponse,
	SearchMode,
	SourceName,
	SourceSearchResponse,
} from '../search/types.js';
import type {SymbolDefinition, SymbolTable} from '../symbols/index.js';

/**
 * `single_source` serves the semantic and fuzzy modes; the others are the
 * three handlers of the fallback chain.
 */
export type DispatchHandler =
	| 'symbol_exact'
	| 'fulltext'
	| 'single_source'
	| 'hybrid';

export type DispatchResult =
	| {
			handler: 'symbol_exact';
			mode: SearchMode;
			query: string;
			symbols: SymbolDefinition[];
	  }
	| {
			handler: 'fulltext' | 'single_source';
			mode: SearchMode;
			/** Source that actually ran */
			source: SourceName;
			/** Requested sources that had no implementation */
			narrowed: SourceName[];
			response: SourceSearchResponse;
	  }
	| {
			handler: 'hybrid';
			mode: SearchMode;
			response: HybridSearchResponse;
	  };

export interface DispatcherOptions {
	orchestrator: HybridOrchestrator;
	symbols: () => SymbolTable;
	index: () => InvertedIndex;
	logger?: Logger;
}

function applyLimit<T>(items: T[], limit: number | undefined): T[] {
	return limit === undefined ? items : items.slice(0, Math.max(0, limit));
}

export class FallbackDispatcher {
	private readonly orchestrator: HybridOrchestrator;
	private readonly getSymbols: () => SymbolTable;
	private readonly getIndex: () => InvertedIndex;
	private readonly logger: Logger;

	constructor(options: DispatcherOptions) {
		this.orchestrator = options.orchestrator;
		this.getSymbols = options.symbols;
		this.getIndex = options.index;
		this.logger = options.logger ?? createNullLogger();
	}

	async resolve(
		query: string,
		mode: SearchMode,
		options: SearchOptions,
		config: HybridConfig,
	): Promise<DispatchResult> {
		switch (mode) {
			case 'auto': {
				// The short-circuit is decided before the limit applies
				const symbols = this.exactSymbols(query, options);
				if (symbols.length > 0) {
					return {
						handler: 'symbol_exact',
						mode,
						query,
						symbols: applyLimit(symbols, options.limit),
					};
				}
				return this.hybrid(query, mode, options, config);
			}
			case 'symbol':
				return {
					handler: 'symbol_exact',
					mode,
					query,
					symbols: applyLimit(this.exactSymbols(query, options), options.limit),
				};
			case 'fulltext':
			case 'bm25':
				return this.single('bm25', query, mode, options, config);
			case 'semantic':
			case 'fuzzy':
				return this.single(mode, query, mode, options, config);
			case 'hybrid':
				return this.hybrid(query, mode, options, config);
		}
	}

	/**
	 * Definitions whose name is exactly the query, filtered.
	 */
	private exactSymbols(
		query: string,
		options: SearchOptions,
	): SymbolDefinition[] {
		let symbols = this.getSymbols().lookup(query);
		const predicate = buildFilterPredicate(options.filters);
		if (predicate) {
			const index = this.getIndex();
			symbols = symbols.filter(symbol =>
				predicate(symbol.docId, index.getDocument(symbol.docId)?.fields),
			);
		}
		return symbols;
	}

	private async hybrid(
		query: string,
		mode: SearchMode,
		options: SearchOptions,
		config: HybridConfig,
	): Promise<DispatchResult> {
		const response = await this.orchestrator.search(query, options, config);
		return {handler: 'hybrid', mode, response};
	}

	private async single(
		source: SourceName,
		query: string,
		mode: SearchMode,
		options: SearchOptions,
		config: HybridConfig,
	): Promise<DispatchResult> {
		const narrowed: SourceName[] = [];
		let target = source;
		if (!this.orchestrator.isAvailable(source)) {
			this.logger.debug('Dispatcher', 'Source not configured, using bm25', {
				source,
			});
			narrowed.push(source);
			target = 'bm25';
		}
		const response = await this.orchestrator.searchSource(
			target,
			query,
			options,
			config,
		);
		return {
			handler: target === 'bm25' ? 'fulltext' : 'single_source',
			mode,
			source: target,
			narrowed,
			response,
		};
	}
}

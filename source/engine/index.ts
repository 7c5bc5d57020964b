/**
 * hybridex: local code indexing and hybrid search.
 */

export {
	CodeSearchService,
	type CodeSearchServiceOptions,
	type OpenResult,
	type RebuildResult,
	type ServiceSearchOptions,
	type ServiceStats,
} from './service.js';
export {
	ConfigRef,
	DEFAULT_CONFIG,
	loadConfig,
	normalizeWeights,
	resolveConfig,
	saveConfig,
	validateMethods,
	withMethods,
	withWeights,
	type EnabledSources,
	type HybridConfig,
	type HybridConfigInput,
	type SourceWeights,
} from './config/index.js';
export {
	getConfigPath,
	getDataDir,
	getHomeDir,
	getLanceDbPath,
	getLogsDir,
	getProjectId,
	getSnapshotPath,
	FIELD_KEYS,
	HYBRIDEX_HOME_ENV,
} from './constants.js';
export {
	ConfigError,
	HybridexError,
	IndexCorruptionError,
	QuerySyntaxError,
	SourceTimeoutError,
	SourceUnavailableError,
	type HybridexErrorCode,
} from './errors.js';
export {createAbortError, isAbortError, throwIfAborted} from './abort.js';
export {
	FallbackDispatcher,
	type DispatchHandler,
	type DispatchResult,
} from './dispatcher/index.js';
export * from './index/index.js';
export {createLogger, createNullLogger, type Logger, type LogLevel} from './logger/index.js';
export * from './query/index.js';
export {
	Bm25Ranker,
	compareScored,
	inverseDocumentFrequency,
	type Bm25Options,
	type ScoredDocument,
} from './ranking/bm25.js';
export * from './search/index.js';
export {
	DEFAULT_SNIPPET_WINDOW,
	extractSnippet,
	locateMatches,
	type Span,
} from './snippet/index.js';
export * from './storage/index.js';
export * from './symbols/index.js';
export {Tokenizer, type Term, type Token} from './tokenizer/index.js';

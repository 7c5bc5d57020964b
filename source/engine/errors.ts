/**
 * Error taxonomy for indexing and search.
 *
 * Only QuerySyntaxError (and cancellation) ever fails a search call.
 * Source errors are recovered inside the orchestrator and reported as
 * degraded sources; corrupted documents are dropped from the index.
 */

import type {SourceName} from './search/types.js';

export type HybridexErrorCode =
	| 'QUERY_SYNTAX'
	| 'SOURCE_TIMEOUT'
	| 'SOURCE_UNAVAILABLE'
	| 'INDEX_CORRUPTION'
	| 'CONFIG_INVALID';

export class HybridexError extends Error {
	readonly code: HybridexErrorCode;

	constructor(code: HybridexErrorCode, message: string) {
		super(message);
		this.name = 'HybridexError';
		this.code = code;
	}
}

/**
 * Malformed query string. Raised before fan-out begins.
 */
export class QuerySyntaxError extends HybridexError {
	/** Character offset in the query where parsing failed */
	readonly position: number;
	readonly query: string;

	constructor(message: string, query: string, position: number) {
		super('QUERY_SYNTAX', `${message} (at position ${position})`);
		this.name = 'QuerySyntaxError';
		this.query = query;
		this.position = position;
	}
}

export class SourceTimeoutError extends HybridexError {
	readonly source: SourceName;
	readonly timeoutMs: number;

	constructor(source: SourceName, timeoutMs: number) {
		super('SOURCE_TIMEOUT', `Source ${source} timed out after ${timeoutMs}ms`);
		this.name = 'SourceTimeoutError';
		this.source = source;
		this.timeoutMs = timeoutMs;
	}
}

export class SourceUnavailableError extends HybridexError {
	readonly source: SourceName;

	constructor(source: SourceName) {
		super('SOURCE_UNAVAILABLE', `Source ${source} is not configured`);
		this.name = 'SourceUnavailableError';
		this.source = source;
	}
}

export class IndexCorruptionError extends HybridexError {
	readonly docId: string;
	readonly reason: string;

	constructor(docId: string, reason: string) {
		super('INDEX_CORRUPTION', `Document ${docId} is corrupted: ${reason}`);
		this.name = 'IndexCorruptionError';
		this.docId = docId;
		this.reason = reason;
	}
}

export class ConfigError extends HybridexError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(
			'CONFIG_INVALID',
			issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
		);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

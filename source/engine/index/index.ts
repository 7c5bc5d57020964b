export {InvertedIndex, type InvertedIndexOptions} from './inverted-index.js';
export {
	serializeIndex,
	restoreIndex,
	readSnapshot,
	writeSnapshot,
	type IndexSnapshot,
	type RestoreResult,
} from './snapshot.js';
export type {
	DocId,
	DocumentRecord,
	IndexedDocument,
	IndexSize,
	Posting,
} from './types.js';

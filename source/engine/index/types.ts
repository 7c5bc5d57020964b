import type {Term} from '../tokenizer/index.js';

export type DocId = string;

/**
 * One (term, document) pair with frequency > 0.
 */
export interface Posting {
	readonly docId: DocId;
	readonly termFrequency: number;
	/** Ascending token positions */
	readonly positions: readonly number[];
}

/**
 * A document as the index sees it.
 */
export interface IndexedDocument {
	readonly id: DocId;
	/** Number of token positions in the document text */
	readonly length: number;
	/** Number of token positions in each field value */
	readonly fieldLengths: Readonly<Record<string, number>>;
	readonly fields: Readonly<Record<string, string>>;
}

/**
 * Fully tokenized document ready to be inserted.
 */
export interface DocumentRecord {
	document: IndexedDocument;
	/** term -> ascending positions */
	termPositions: ReadonlyMap<Term, readonly number[]>;
}

export interface IndexSize {
	documents: number;
	terms: number;
	postings: number;
	averageDocumentLength: number;
}

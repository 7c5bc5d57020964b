import {Tokenizer, type Term} from '../tokenizer/index.js';
import type {
	DocId,
	DocumentRecord,
	IndexedDocument,
	IndexSize,
	Posting,
} from './types.js';

export interface InvertedIndexOptions {
	tokenizer?: Tokenizer;
	/** Starting value of the mutation counter (carried across rebuilds) */
	initialVersion?: number;
}

type DocumentEntry = {
	document: IndexedDocument;
	terms: Term[];
};

const EMPTY_POSTINGS: readonly Posting[] = Object.freeze([]);

function compareIds(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * In-memory inverted index.
 *
 * Data structure:
 * - term -> (docId -> posting)
 * - docId -> document + the terms it contributed (for O(doc) removal)
 *
 * Mutations are synchronous, so a reader never observes a half-applied
 * document. `getPostings()` hands out a frozen array sorted by docId that
 * stays valid after later writes; it is cached until the term changes.
 */
export class InvertedIndex {
	readonly tokenizer: Tokenizer;
	private readonly postings = new Map<Term, Map<DocId, Posting>>();
	private readonly sortedPostings = new Map<Term, readonly Posting[]>();
	private readonly documents = new Map<DocId, DocumentEntry>();
	private vocabulary: Term[] | null = null;
	private totalLength = 0;
	private postingTotal = 0;
	private mutationCount: number;

	constructor(options: InvertedIndexOptions = {}) {
		this.tokenizer = options.tokenizer ?? new Tokenizer();
		this.mutationCount = options.initialVersion ?? 0;
	}

	/**
	 * Monotonic counter bumped by every successful add or remove.
	 */
	get version(): number {
		return this.mutationCount;
	}

	/**
	 * Tokenize and index a document, replacing any previous version.
	 */
	addDocument(
		id: DocId,
		text: string,
		fields: Readonly<Record<string, string>> = {},
	): void {
		this.insertDocument(this.buildRecord(id, text, fields));
	}

	/**
	 * Tokenize a document without touching the index.
	 */
	buildRecord(
		id: DocId,
		text: string,
		fields: Readonly<Record<string, string>> = {},
	): DocumentRecord {
		if (id.length === 0) {
			throw new Error('Document id must be non-empty');
		}

		const termPositions = new Map<Term, number[]>();
		let length = 0;
		for (const token of this.tokenizer.tokenize(text)) {
			if (!token.compound) length++;
			let positions = termPositions.get(token.term);
			if (!positions) {
				positions = [];
				termPositions.set(token.term, positions);
			}
			positions.push(token.position);
		}

		const fieldLengths: Record<string, number> = {};
		for (const [key, value] of Object.entries(fields)) {
			fieldLengths[key] = this.tokenizer.countPositions(value);
		}

		return {
			document: {id, length, fieldLengths, fields: {...fields}},
			termPositions,
		};
	}

	/**
	 * Insert an already tokenized document, replacing any previous version.
	 * Callers outside this class must have validated the record.
	 */
	insertDocument(record: DocumentRecord): void {
		const {document} = record;
		this.detach(document.id);

		const terms: Term[] = [];
		for (const [term, positions] of record.termPositions) {
			if (positions.length === 0) continue;
			let docMap = this.postings.get(term);
			if (!docMap) {
				docMap = new Map();
				this.postings.set(term, docMap);
				this.vocabulary = null;
			}
			docMap.set(document.id, {
				docId: document.id,
				termFrequency: positions.length,
				positions: Object.freeze([...positions]),
			});
			this.sortedPostings.delete(term);
			this.postingTotal++;
			terms.push(term);
		}

		this.documents.set(document.id, {document, terms});
		this.totalLength += document.length;
		this.mutationCount++;
	}

	/**
	 * Remove a document and all its postings.
	 * @returns true when the document existed
	 */
	removeDocument(id: DocId): boolean {
		const removed = this.detach(id);
		if (removed) this.mutationCount++;
		return removed;
	}

	private detach(id: DocId): boolean {
		const entry = this.documents.get(id);
		if (!entry) return false;

		for (const term of entry.terms) {
			const docMap = this.postings.get(term);
			if (!docMap?.delete(id)) continue;
			this.postingTotal--;
			this.sortedPostings.delete(term);
			if (docMap.size === 0) {
				this.postings.delete(term);
				this.vocabulary = null;
			}
		}

		this.documents.delete(id);
		this.totalLength -= entry.document.length;
		return true;
	}

	/**
	 * Postings for a term, sorted by docId.
	 */
	getPostings(term: Term): readonly Posting[] {
		const cached = this.sortedPostings.get(term);
		if (cached) return cached;

		const docMap = this.postings.get(term);
		if (!docMap) return EMPTY_POSTINGS;

		const sorted = Object.freeze(
			[...docMap.values()].sort((a, b) => compareIds(a.docId, b.docId)),
		);
		this.sortedPostings.set(term, sorted);
		return sorted;
	}

	getPosting(term: Term, id: DocId): Posting | undefined {
		return this.postings.get(term)?.get(id);
	}

	documentFrequency(term: Term): number {
		return this.postings.get(term)?.size ?? 0;
	}

	hasTerm(term: Term): boolean {
		return this.postings.has(term);
	}

	/**
	 * Token length of a document, 0 when unknown.
	 */
	documentLength(id: DocId): number {
		return this.documents.get(id)?.document.length ?? 0;
	}

	totalDocuments(): number {
		return this.documents.size;
	}

	averageDocumentLength(): number {
		const n = this.documents.size;
		return n === 0 ? 0 : this.totalLength / n;
	}

	hasDocument(id: DocId): boolean {
		return this.documents.has(id);
	}

	getDocument(id: DocId): IndexedDocument | undefined {
		return this.documents.get(id)?.document;
	}

	/**
	 * All document ids in ascending order.
	 */
	documentIds(): DocId[] {
		return [...this.documents.keys()].sort(compareIds);
	}

	/**
	 * Indexed terms starting with `stem`, in lexicographic order.
	 */
	expandPrefix(stem: string, limit: number = Number.POSITIVE_INFINITY): Term[] {
		const vocabulary = this.sortedVocabulary();

		let lo = 0;
		let hi = vocabulary.length;
		while (lo < hi) {
			const mid = (lo + hi) >> 1;
			if ((vocabulary[mid] ?? '') < stem) lo = mid + 1;
			else hi = mid;
		}

		const out: Term[] = [];
		for (let i = lo; i < vocabulary.length && out.length < limit; i++) {
			const term = vocabulary[i];
			if (term === undefined || !term.startsWith(stem)) break;
			out.push(term);
		}
		return out;
	}

	private sortedVocabulary(): Term[] {
		if (!this.vocabulary) {
			this.vocabulary = [...this.postings.keys()].sort(compareIds);
		}
		return this.vocabulary;
	}

	vocabularySize(): number {
		return this.postings.size;
	}

	postingsCount(): number {
		return this.postingTotal;
	}

	size(): IndexSize {
		return {
			documents: this.totalDocuments(),
			terms: this.vocabularySize(),
			postings: this.postingsCount(),
			averageDocumentLength: this.averageDocumentLength(),
		};
	}

	/**
	 * Iterate every (term, postings) pair. Used by snapshots.
	 */
	*entries(): IterableIterator<[Term, readonly Posting[]]> {
		for (const term of this.sortedVocabulary()) {
			yield [term, this.getPostings(term)];
		}
	}
}

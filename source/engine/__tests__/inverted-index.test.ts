import {describe, it, expect} from 'vitest';
import {InvertedIndex} from '../index/index.js';

describe('InvertedIndex', () => {
	it('re-indexing the same document is idempotent', () => {
		const once = new InvertedIndex();
		once.addDocument('doc1', 'alpha beta alpha gamma');

		const twice = new InvertedIndex();
		twice.addDocument('doc1', 'alpha beta alpha gamma');
		twice.addDocument('doc1', 'alpha beta alpha gamma');

		for (const term of ['alpha', 'beta', 'gamma']) {
			expect(twice.getPostings(term)).toEqual(once.getPostings(term));
		}
		expect(twice.getPostings('alpha')[0]?.termFrequency).toBe(2);
		expect(twice.totalDocuments()).toBe(1);
		expect(twice.postingsCount()).toBe(once.postingsCount());
		expect(twice.averageDocumentLength()).toBe(4);
	});

	it('replaces the old postings on re-index with new text', () => {
		const index = new InvertedIndex();
		index.addDocument('doc1', 'alpha beta');
		index.addDocument('doc1', 'gamma');

		expect(index.getPostings('alpha')).toEqual([]);
		expect(index.hasTerm('alpha')).toBe(false);
		expect(index.getPostings('gamma')).toEqual([
			{docId: 'doc1', termFrequency: 1, positions: [0]},
		]);
		expect(index.documentLength('doc1')).toBe(1);
	});

	it('maintains N and average length incrementally', () => {
		const index = new InvertedIndex();
		index.addDocument('a', 'x y');
		index.addDocument('b', 'x y z w');
		expect(index.totalDocuments()).toBe(2);
		expect(index.averageDocumentLength()).toBe(3);

		expect(index.removeDocument('b')).toBe(true);
		expect(index.totalDocuments()).toBe(1);
		expect(index.averageDocumentLength()).toBe(2);
		expect(index.documentFrequency('x')).toBe(1);
		expect(index.documentLength('b')).toBe(0);
	});

	it('bumps the version only on successful mutations', () => {
		const index = new InvertedIndex({initialVersion: 10});
		index.addDocument('a', 'x');
		expect(index.version).toBe(11);
		expect(index.removeDocument('missing')).toBe(false);
		expect(index.version).toBe(11);
		index.removeDocument('a');
		expect(index.version).toBe(12);
	});

	it('hands out postings snapshots that later writes do not change', () => {
		const index = new InvertedIndex();
		index.addDocument('b', 'shared');
		const before = index.getPostings('shared');
		index.addDocument('a', 'shared');

		expect(before.map(p => p.docId)).toEqual(['b']);
		expect(Object.isFrozen(before)).toBe(true);
		expect(index.getPostings('shared').map(p => p.docId)).toEqual(['a', 'b']);
	});

	it('expands prefixes in lexicographic order up to a limit', () => {
		const index = new InvertedIndex();
		index.addDocument('a', 'foo food fob bar');
		expect(index.expandPrefix('fo')).toEqual(['fob', 'foo', 'food']);
		expect(index.expandPrefix('fo', 2)).toEqual(['fob', 'foo']);
		expect(index.expandPrefix('zz')).toEqual([]);

		index.addDocument('b', 'fox');
		expect(index.expandPrefix('fo')).toEqual(['fob', 'foo', 'food', 'fox']);
	});

	it('records field lengths and keeps fields', () => {
		const index = new InvertedIndex();
		index.addDocument('a', 'body text', {path: 'src/main.ts', symbol: 'main'});
		expect(index.getDocument('a')).toEqual({
			id: 'a',
			length: 2,
			fieldLengths: {path: 3, symbol: 1},
			fields: {path: 'src/main.ts', symbol: 'main'},
		});
	});

	it('rejects an empty id', () => {
		const index = new InvertedIndex();
		expect(() => index.addDocument('', 'text')).toThrow('Document id must be non-empty');
	});
});

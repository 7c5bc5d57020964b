import {describe, it, expect} from 'vitest';
import {
	SymbolTable,
	TrigramIndex,
	TrigramSymbolBackend,
	extractTrigrams,
	symbolFromFields,
} from '../symbols/index.js';

describe('extractTrigrams', () => {
	it('pads names with two spaces on each side', () => {
		expect([...extractTrigrams('AB')]).toEqual(['  a', ' ab', 'ab ', 'b  ']);
	});

	it('returns nothing for a blank name', () => {
		expect(extractTrigrams('   ').size).toBe(0);
	});
});

describe('TrigramIndex', () => {
	const index = new TrigramIndex();
	index.set('d1', 'parseQuery');
	index.set('d2', 'parseConfig');
	index.set('d3', 'render');

	it('scores by the share of query trigrams found', () => {
		const matches = index.search('parseQuery', 10);
		expect(matches.map(m => m.key)).toEqual(['d1', 'd2']);
		expect(matches[0]?.score).toBe(1);
		expect(matches[1]?.score).toBeCloseTo(5 / 12, 12);
	});

	it('applies the threshold and the limit', () => {
		expect(index.search('parseQuery', 10, 0.5).map(m => m.key)).toEqual(['d1']);
		expect(index.search('parseQuery', 1).map(m => m.key)).toEqual(['d1']);
		expect(index.search('parseQuery', 0)).toEqual([]);
	});

	it('forgets deleted keys', () => {
		const local = new TrigramIndex();
		local.set('a', 'alpha');
		expect(local.delete('a')).toBe(true);
		expect(local.delete('a')).toBe(false);
		expect(local.search('alpha', 5)).toEqual([]);
		expect(local.size).toBe(0);
	});
});

describe('TrigramSymbolBackend', () => {
	it('returns keys best first', async () => {
		const index = new TrigramIndex();
		index.set('d1', 'parseQuery');
		index.set('d2', 'parseConfig');
		const backend = new TrigramSymbolBackend(() => index);
		await expect(backend.search('parsequery', 5)).resolves.toEqual(['d1', 'd2']);
	});

	it('rejects when already cancelled', async () => {
		const backend = new TrigramSymbolBackend(() => new TrigramIndex());
		const controller = new AbortController();
		controller.abort('stop');
		await expect(
			backend.search('x', 5, controller.signal),
		).rejects.toMatchObject({name: 'AbortError'});
	});
});

describe('symbolFromFields', () => {
	it('reads symbol, kind, path and line', () => {
		expect(
			symbolFromFields('d1', {
				symbol: 'parseQuery',
				kind: 'function',
				path: 'src/q.ts',
				line: '12',
			}),
		).toEqual({
			docId: 'd1',
			name: 'parseQuery',
			kind: 'function',
			path: 'src/q.ts',
			line: 12,
		});
	});

	it('ignores unusable lines and missing names', () => {
		expect(symbolFromFields('d1', {symbol: 'x', line: '0'})?.line).toBeNull();
		expect(symbolFromFields('d1', {symbol: 'x', line: 'abc'})?.line).toBeNull();
		expect(symbolFromFields('d1', {symbol: '  '})).toBeNull();
	});
});

describe('SymbolTable', () => {
	it('looks up exact names ordered by docId', () => {
		const table = new SymbolTable();
		table.set('d2', {symbol: 'parseQuery'});
		table.set('d1', {symbol: 'parseQuery'});
		table.set('d3', {symbol: 'ParseQuery'});

		expect(table.lookup('parseQuery').map(s => s.docId)).toEqual(['d1', 'd2']);
		expect(table.lookup(' parseQuery ').length).toBe(2);
		expect(table.lookup('parsequery')).toEqual([]);
		expect(table.size).toBe(3);
	});

	it('replaces a document symbol and keeps trigrams in step', () => {
		const table = new SymbolTable();
		table.set('d1', {symbol: 'parseQuery'});
		table.set('d1', {symbol: 'renderView'});

		expect(table.has('parseQuery')).toBe(false);
		expect(table.forDocument('d1')?.name).toBe('renderView');
		expect(table.trigrams.search('renderView', 5).map(m => m.key)).toEqual(['d1']);

		expect(table.delete('d1')).toBe(true);
		expect(table.has('renderView')).toBe(false);
		expect(table.trigrams.size).toBe(0);
	});

	it('drops a symbol when the document loses its name', () => {
		const table = new SymbolTable();
		table.set('d1', {symbol: 'parseQuery'});
		table.set('d1', {path: 'src/q.ts'});
		expect(table.size).toBe(0);
	});
});

import {describe, it, expect} from 'vitest';
import {Tokenizer} from '../tokenizer/index.js';

describe('Tokenizer', () => {
	const tokenizer = new Tokenizer();

	it('lower-cases and splits on non-alphanumeric boundaries', () => {
		const terms = tokenizer.tokenize('Parse(JSON) + emit_event; x==y').map(t => t.term);
		expect(terms).toEqual(['parse', 'json', 'emit_event', 'x', 'y']);
	});

	it('keeps unicode letters and digits', () => {
		const terms = tokenizer.tokenize('Über café 42').map(t => t.term);
		expect(terms).toEqual(['über', 'café', '42']);
	});

	it('emits dotted parts plus the compound at the first part position', () => {
		const tokens = tokenizer.tokenize('foo.bar_baz qux');
		expect(tokens).toEqual([
			{term: 'foo', position: 0, start: 0, end: 3, compound: false},
			{term: 'bar_baz', position: 1, start: 4, end: 11, compound: false},
			{term: 'foo.bar_baz', position: 0, start: 0, end: 11, compound: true},
			{term: 'qux', position: 2, start: 12, end: 15, compound: false},
		]);
	});

	it('does not treat a trailing dot as part of a word', () => {
		const tokens = tokenizer.tokenize('the end.');
		expect(tokens.map(t => t.term)).toEqual(['the', 'end']);
	});

	it('counts positions without compounds', () => {
		expect(tokenizer.countPositions('foo.bar baz')).toBe(3);
		expect(tokenizer.countPositions('')).toBe(0);
	});

	describe('queryTerms', () => {
		it('maps a dotted identifier to its compound', () => {
			expect(tokenizer.queryTerms('Foo.Bar')).toEqual(['foo.bar']);
		});

		it('maps anything else to its parts', () => {
			expect(tokenizer.queryTerms('foo-bar')).toEqual(['foo', 'bar']);
			expect(tokenizer.queryTerms('foo.bar-baz')).toEqual(['foo', 'bar', 'baz']);
			expect(tokenizer.queryTerms('foo()')).toEqual(['foo']);
			expect(tokenizer.queryTerms('+++')).toEqual([]);
		});
	});

	it('phraseTerms yields one term per position', () => {
		expect(tokenizer.phraseTerms('foo.bar baz')).toEqual(['foo', 'bar', 'baz']);
	});
});

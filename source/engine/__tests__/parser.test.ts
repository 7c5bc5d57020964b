import {describe, it, expect} from 'vitest';
import {QuerySyntaxError} from '../errors.js';
import {
	andNode,
	formatQuery,
	nearNode,
	notNode,
	orNode,
	parseQuery,
	phraseNode,
	prefixNode,
	termNode,
} from '../query/index.js';

function syntaxError(query: string): QuerySyntaxError {
	try {
		parseQuery(query);
	} catch (error) {
		if (error instanceof QuerySyntaxError) return error;
		throw error;
	}
	throw new Error(`Expected "${query}" to be rejected`);
}

describe('QueryParser', () => {
	const a = termNode('a');
	const b = termNode('b');
	const c = termNode('c');

	it('joins bare terms with implicit AND', () => {
		expect(parseQuery('foo Bar')).toEqual(
			andNode([termNode('foo'), termNode('bar')]),
		);
	});

	it('parses a single term', () => {
		expect(parseQuery('  foo ')).toEqual(termNode('foo'));
	});

	it('binds NOT tighter than AND, AND tighter than OR', () => {
		expect(parseQuery('a OR b AND c')).toEqual(orNode([a, andNode([b, c])]));
		expect(parseQuery('a AND NOT b')).toEqual(andNode([a, notNode(b)]));
		expect(parseQuery('a NOT b')).toEqual(andNode([a, notNode(b)]));
	});

	it('binds implicit AND loosest', () => {
		expect(parseQuery('a OR b c')).toEqual(andNode([orNode([a, b]), c]));
		expect(parseQuery('a b OR c')).toEqual(andNode([a, orNode([b, c])]));
	});

	it('treats lower-case keywords as terms', () => {
		expect(parseQuery('a or b')).toEqual(andNode([a, termNode('or'), b]));
	});

	it('groups with parentheses', () => {
		expect(parseQuery('(a OR b) AND c')).toEqual(andNode([orNode([a, b]), c]));
		expect(parseQuery('a AND (b OR c)')).toEqual(andNode([a, orNode([b, c])]));
	});

	it('parses phrases', () => {
		expect(parseQuery('"Returns Bar"')).toEqual(phraseNode(['returns', 'bar']));
		expect(parseQuery('"single"')).toEqual(termNode('single'));
	});

	it('splits dotted identifiers inside phrases', () => {
		expect(parseQuery('"foo.bar baz"')).toEqual(phraseNode(['foo', 'bar', 'baz']));
	});

	it('parses prefixes', () => {
		expect(parseQuery('fo*')).toEqual(prefixNode('fo'));
		expect(parseQuery('Foo.Ba*')).toEqual(prefixNode('foo.ba'));
		expect(parseQuery('get-us*')).toEqual(andNode([termNode('get'), prefixNode('us')]));
	});

	it('parses NEAR', () => {
		expect(parseQuery('NEAR(alpha beta, 3)')).toEqual(nearNode(['alpha', 'beta'], 3));
		expect(parseQuery('x NEAR(alpha beta gamma, 0)')).toEqual(
			andNode([termNode('x'), nearNode(['alpha', 'beta', 'gamma'], 0)]),
		);
	});

	it('keeps parentheses attached to a word', () => {
		expect(parseQuery('foo()')).toEqual(termNode('foo'));
		expect(parseQuery('call(a, b)')).toEqual(phraseNode(['call', 'a', 'b']));
	});

	it('turns a word with several tokens into a phrase', () => {
		expect(parseQuery('snake-case')).toEqual(phraseNode(['snake', 'case']));
		expect(parseQuery('foo.bar')).toEqual(termNode('foo.bar'));
	});

	it('skips punctuation-only words', () => {
		expect(parseQuery('foo ++ bar')).toEqual(andNode([termNode('foo'), termNode('bar')]));
	});

	it('returns frozen trees', () => {
		const tree = parseQuery('a OR b');
		expect(Object.isFrozen(tree)).toBe(true);
	});

	it('formats trees back to query syntax', () => {
		expect(formatQuery(parseQuery('a OR b c NOT "x y"'))).toBe(
			'(a OR b) AND c AND NOT "x y"',
		);
	});

	describe('errors', () => {
		it.each([
			['', 'Empty query', 0],
			['   ', 'Empty query', 0],
			['!!!', 'Empty query', 0],
			['"abc', 'Unbalanced quote', 0],
			['foo "abc', 'Unbalanced quote', 4],
			['(a', 'Unbalanced parenthesis', 0],
			['a)', 'Unbalanced parenthesis', 1],
			['foo(a', 'Unbalanced parenthesis', 0],
			['a AND', 'Query ends with an operator', 5],
			['AND a', 'AND is missing a left operand', 0],
			['a OR OR b', 'OR is missing a left operand', 5],
			['NOT', 'Query ends with an operator', 3],
			['()', 'Empty group', 1],
			['(a AND)', 'Missing operand before )', 6],
			['""', 'Empty phrase', 0],
			['*', 'Empty prefix', 0],
			['NEAR(a, 2)', 'NEAR needs at least two terms', 0],
			['NEAR(a b, x)', 'Malformed NEAR: distance must be a non-negative integer, got "x"', 0],
			['NEAR(a b 2)', 'Malformed NEAR: expected NEAR(a b, distance)', 0],
			['NEAR(a b, 2', 'Malformed NEAR: missing )', 0],
		])('rejects %j with "%s"', (query, message, position) => {
			const error = syntaxError(query);
			expect(error.message).toBe(`${message} (at position ${position})`);
			expect(error.position).toBe(position);
			expect(error.code).toBe('QUERY_SYNTAX');
		});
	});
});

/**
 * Query parser.
 *
 * Grammar (informal):
 *   query    := expr+                 (juxtaposition = implicit AND)
 *   expr     := expr AND expr | expr OR expr | NOT expr | '(' query ')'
 *             | '"' words '"' | word '*' | NEAR(word word+, k) | word
 *
 * Precedence, tightest first: NOT, AND, OR, implicit AND. Binary operators
 * are left-associative and keywords are case-sensitive (`and` is a term).
 *
 * The parser is a single left-to-right pass (shunting-yard) over lexemes.
 */

import {QuerySyntaxError} from '../errors.js';
import {Tokenizer, type Term} from '../tokenizer/index.js';
import {
	andNode,
	nearNode,
	notNode,
	orNode,
	phraseNode,
	prefixNode,
	termNode,
	type QueryNode,
} from './types.js';

type Lexeme =
	| {kind: 'word'; text: string; pos: number}
	| {kind: 'phrase'; text: string; pos: number}
	| {kind: 'near'; words: string[]; distance: number; pos: number}
	| {kind: 'lparen' | 'rparen' | 'and' | 'or' | 'not'; pos: number};

type Operator = 'and' | 'or' | 'not' | 'implicit';

type StackEntry = {op: Operator; pos: number} | {op: 'lparen'; pos: number};

const PRECEDENCE: Record<Operator, number> = {
	not: 4,
	and: 3,
	or: 2,
	implicit: 1,
};

const KEYWORDS = new Map<string, 'and' | 'or' | 'not'>([
	['AND', 'and'],
	['OR', 'or'],
	['NOT', 'not'],
]);

const NEAR_OPEN = 'NEAR(';

function isSpace(ch: string): boolean {
	return /\s/.test(ch);
}

export class QueryParser {
	private readonly tokenizer: Tokenizer;

	constructor(tokenizer: Tokenizer = new Tokenizer()) {
		this.tokenizer = tokenizer;
	}

	/**
	 * Parse a query string into a frozen query tree.
	 *
	 * @throws QuerySyntaxError on malformed input
	 */
	parse(query: string): QueryNode {
		const lexemes = this.lex(query);
		const output: QueryNode[] = [];
		const stack: StackEntry[] = [];
		let expectOperand = true;
		let previous: Lexeme | null = null;

		const fail = (message: string, pos: number): never => {
			throw new QuerySyntaxError(message, query, pos);
		};

		const apply = (entry: StackEntry) => {
			if (entry.op === 'lparen') {
				fail('Unbalanced parenthesis', entry.pos);
				return;
			}
			if (entry.op === 'not') {
				const child = output.pop();
				if (!child) fail('NOT is missing an operand', entry.pos);
				else output.push(notNode(child));
				return;
			}
			const right = output.pop();
			const left = output.pop();
			if (!left || !right) {
				fail(`${entry.op.toUpperCase()} is missing an operand`, entry.pos);
				return;
			}
			output.push(
				entry.op === 'or' ? orNode([left, right]) : andNode([left, right]),
			);
		};

		const pushBinary = (op: 'and' | 'or' | 'implicit', pos: number) => {
			for (;;) {
				const top = stack[stack.length - 1];
				if (!top || top.op === 'lparen') break;
				if (PRECEDENCE[top.op] < PRECEDENCE[op]) break;
				stack.pop();
				apply(top);
			}
			stack.push({op, pos});
		};

		for (const lexeme of lexemes) {
			switch (lexeme.kind) {
				case 'word':
				case 'phrase':
				case 'near': {
					const node = this.operand(lexeme, query);
					if (!node) break;
					if (!expectOperand) pushBinary('implicit', lexeme.pos);
					output.push(node);
					expectOperand = false;
					break;
				}
				case 'lparen':
				case 'not': {
					if (!expectOperand) pushBinary('implicit', lexeme.pos);
					stack.push({op: lexeme.kind, pos: lexeme.pos});
					expectOperand = true;
					break;
				}
				case 'and':
				case 'or': {
					if (expectOperand) {
						fail(`${lexeme.kind.toUpperCase()} is missing a left operand`, lexeme.pos);
					}
					pushBinary(lexeme.kind, lexeme.pos);
					expectOperand = true;
					break;
				}
				case 'rparen': {
					if (expectOperand) {
						fail(
							previous?.kind === 'lparen'
								? 'Empty group'
								: 'Missing operand before )',
							lexeme.pos,
						);
					}
					let top = stack.pop();
					while (top && top.op !== 'lparen') {
						apply(top);
						top = stack.pop();
					}
					if (!top) fail('Unbalanced parenthesis', lexeme.pos);
					expectOperand = false;
					break;
				}
			}
			previous = lexeme;
		}

		if (output.length === 0 && stack.length === 0) {
			fail('Empty query', 0);
		}
		if (expectOperand) {
			if (previous?.kind === 'lparen') {
				fail('Unbalanced parenthesis', previous.pos);
			}
			fail('Query ends with an operator', query.length);
		}

		let top = stack.pop();
		while (top) {
			apply(top);
			top = stack.pop();
		}

		const root = output[0];
		if (!root || output.length !== 1) {
			return fail('Malformed query', 0);
		}
		return root;
	}

	private operand(
		lexeme: Extract<Lexeme, {kind: 'word' | 'phrase' | 'near'}>,
		query: string,
	): QueryNode | null {
		switch (lexeme.kind) {
			case 'word':
				return this.wordOperand(lexeme.text, lexeme.pos, query);
			case 'phrase': {
				const terms = this.tokenizer.phraseTerms(lexeme.text);
				if (terms.length === 0) {
					throw new QuerySyntaxError('Empty phrase', query, lexeme.pos);
				}
				return terms.length === 1 && terms[0] !== undefined
					? termNode(terms[0])
					: phraseNode(terms);
			}
			case 'near': {
				const terms = unique(
					lexeme.words.flatMap(word => this.tokenizer.queryTerms(word)),
				);
				if (terms.length === 0) {
					throw new QuerySyntaxError(
						'NEAR needs at least two terms',
						query,
						lexeme.pos,
					);
				}
				return terms.length === 1 && terms[0] !== undefined
					? termNode(terms[0])
					: nearNode(terms, lexeme.distance);
			}
		}
	}

	private wordOperand(
		word: string,
		pos: number,
		query: string,
	): QueryNode | null {
		if (word.endsWith('*')) {
			const stem = word.replace(/\*+$/, '');
			const terms = this.tokenizer.queryTerms(stem);
			const last = terms.pop();
			if (last === undefined) {
				throw new QuerySyntaxError('Empty prefix', query, pos);
			}
			return andNode([...terms.map(termNode), prefixNode(last)]);
		}

		const terms = this.tokenizer.queryTerms(word);
		if (terms.length === 0) return null;
		return terms.length === 1 && terms[0] !== undefined
			? termNode(terms[0])
			: phraseNode(terms);
	}

	private lex(query: string): Lexeme[] {
		const lexemes: Lexeme[] = [];
		const n = query.length;
		let i = 0;

		while (i < n) {
			const ch = query.charAt(i);
			if (isSpace(ch)) {
				i++;
				continue;
			}

			if (ch === '"') {
				const close = query.indexOf('"', i + 1);
				if (close < 0) {
					throw new QuerySyntaxError('Unbalanced quote', query, i);
				}
				lexemes.push({kind: 'phrase', text: query.slice(i + 1, close), pos: i});
				i = close + 1;
				continue;
			}

			if (ch === '(') {
				lexemes.push({kind: 'lparen', pos: i});
				i++;
				continue;
			}

			if (ch === ')') {
				lexemes.push({kind: 'rparen', pos: i});
				i++;
				continue;
			}

			if (query.startsWith(NEAR_OPEN, i)) {
				const {lexeme, end} = lexNear(query, i);
				lexemes.push(lexeme);
				i = end;
				continue;
			}

			// Bare word. Parentheses opened inside a word (foo(), call(a, b))
			// belong to it, spaces included; an unmatched ')' ends the word.
			const start = i;
			let depth = 0;
			while (i < n) {
				const c = query.charAt(i);
				if (depth === 0 && (isSpace(c) || c === '"')) break;
				if (c === '(') depth++;
				else if (c === ')') {
					if (depth === 0) break;
					depth--;
				}
				i++;
			}
			if (depth > 0) {
				throw new QuerySyntaxError('Unbalanced parenthesis', query, start);
			}

			const text = query.slice(start, i);
			const keyword = KEYWORDS.get(text);
			lexemes.push(
				keyword ? {kind: keyword, pos: start} : {kind: 'word', text, pos: start},
			);
		}

		return lexemes;
	}
}

/**
 * Lex `NEAR(a b, k)` starting at `start`.
 */
function lexNear(
	query: string,
	start: number,
): {lexeme: Lexeme; end: number} {
	const open = start + NEAR_OPEN.length;
	const close = query.indexOf(')', open);
	if (close < 0) {
		throw new QuerySyntaxError('Malformed NEAR: missing )', query, start);
	}

	const body = query.slice(open, close);
	if (body.includes('(') || body.includes('"')) {
		throw new QuerySyntaxError(
			'Malformed NEAR: nested groups are not allowed',
			query,
			start,
		);
	}

	const comma = body.lastIndexOf(',');
	if (comma < 0) {
		throw new QuerySyntaxError(
			'Malformed NEAR: expected NEAR(a b, distance)',
			query,
			start,
		);
	}

	const words = body
		.slice(0, comma)
		.split(/[\s,]+/)
		.filter(word => word.length > 0);
	const distanceText = body.slice(comma + 1).trim();

	if (words.length < 2) {
		throw new QuerySyntaxError('NEAR needs at least two terms', query, start);
	}
	if (!/^\d+$/.test(distanceText)) {
		throw new QuerySyntaxError(
			`Malformed NEAR: distance must be a non-negative integer, got "${distanceText}"`,
			query,
			start,
		);
	}

	return {
		lexeme: {
			kind: 'near',
			words,
			distance: Number.parseInt(distanceText, 10),
			pos: start,
		},
		end: close + 1,
	};
}

function unique(terms: Term[]): Term[] {
	return [...new Set(terms)];
}

const defaultParser = new QueryParser();

/**
 * Parse a query with the default tokenizer.
 */
export function parseQuery(query: string): QueryNode {
	return defaultParser.parse(query);
}

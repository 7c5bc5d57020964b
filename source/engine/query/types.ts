import type {Term} from '../tokenizer/index.js';

/**
 * Parsed query tree. Nodes are frozen once built.
 */
export type QueryNode =
	| TermNode
	| PhraseNode
	| AndNode
	| OrNode
	| NotNode
	| PrefixNode
	| NearNode;

export interface TermNode {
	readonly type: 'term';
	readonly term: Term;
}

export interface PhraseNode {
	readonly type: 'phrase';
	readonly terms: readonly Term[];
}

export interface AndNode {
	readonly type: 'and';
	readonly children: readonly QueryNode[];
}

export interface OrNode {
	readonly type: 'or';
	readonly children: readonly QueryNode[];
}

export interface NotNode {
	readonly type: 'not';
	readonly child: QueryNode;
}

export interface PrefixNode {
	readonly type: 'prefix';
	readonly stem: string;
}

export interface NearNode {
	readonly type: 'near';
	readonly terms: readonly Term[];
	/** Maximum distance in token positions */
	readonly distance: number;
}

export function termNode(term: Term): TermNode {
	const node: TermNode = {type: 'term', term};
	return Object.freeze(node);
}

export function phraseNode(terms: readonly Term[]): PhraseNode {
	const node: PhraseNode = {type: 'phrase', terms: Object.freeze([...terms])};
	return Object.freeze(node);
}

export function prefixNode(stem: string): PrefixNode {
	const node: PrefixNode = {type: 'prefix', stem};
	return Object.freeze(node);
}

export function nearNode(terms: readonly Term[], distance: number): NearNode {
	const node: NearNode = {
		type: 'near',
		terms: Object.freeze([...terms]),
		distance,
	};
	return Object.freeze(node);
}

export function notNode(child: QueryNode): NotNode {
	const node: NotNode = {type: 'not', child};
	return Object.freeze(node);
}

/**
 * Build an AND node, flattening nested ANDs.
 */
export function andNode(children: readonly QueryNode[]): QueryNode {
	const flat = children.flatMap(c => (c.type === 'and' ? c.children : [c]));
	if (flat.length === 1 && flat[0]) return flat[0];
	const node: AndNode = {type: 'and', children: Object.freeze(flat)};
	return Object.freeze(node);
}

/**
 * Build an OR node, flattening nested ORs.
 */
export function orNode(children: readonly QueryNode[]): QueryNode {
	const flat = children.flatMap(c => (c.type === 'or' ? c.children : [c]));
	if (flat.length === 1 && flat[0]) return flat[0];
	const node: OrNode = {type: 'or', children: Object.freeze(flat)};
	return Object.freeze(node);
}

/**
 * Render a query tree back to query syntax. Stable for equal trees.
 */
export function formatQuery(node: QueryNode): string {
	switch (node.type) {
		case 'term':
			return node.term;
		case 'phrase':
			return `"${node.terms.join(' ')}"`;
		case 'prefix':
			return `${node.stem}*`;
		case 'near':
			return `NEAR(${node.terms.join(' ')}, ${node.distance})`;
		case 'not':
			return `NOT ${wrap(node.child)}`;
		case 'and':
			return node.children.map(wrap).join(' AND ');
		case 'or':
			return node.children.map(wrap).join(' OR ');
	}
}

function wrap(node: QueryNode): string {
	return node.type === 'and' || node.type === 'or'
		? `(${formatQuery(node)})`
		: formatQuery(node);
}

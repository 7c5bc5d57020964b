export {QueryParser, parseQuery} from './parser.js';
export {
	andNode,
	formatQuery,
	nearNode,
	notNode,
	orNode,
	phraseNode,
	prefixNode,
	termNode,
	type AndNode,
	type NearNode,
	type NotNode,
	type OrNode,
	type PhraseNode,
	type PrefixNode,
	type QueryNode,
	type TermNode,
} from './types.js';

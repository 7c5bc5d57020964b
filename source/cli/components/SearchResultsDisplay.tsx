/**
 * Search results display: symbol definitions or ranked hits with
 * highlighted snippets.
 */

import React from 'react';
import {Box, Text} from 'ink';
import type {
	DegradedSource,
	DispatchResult,
	Snippet,
	SourceName,
	SymbolDefinition,
} from '../../engine/index.js';

type Props = {
	result: DispatchResult;
};

type Hit = {
	docId: string;
	score: number;
	/** Sources that ranked the hit (hybrid only) */
	sources: SourceName[];
	snippet?: Snippet;
};

export type SnippetPart = {
	text: string;
	highlighted: boolean;
};

/**
 * Color mapping for symbol kinds.
 */
const KIND_COLORS: Record<string, string> = {
	function: 'cyan',
	class: 'magenta',
	method: 'blue',
	module: 'gray',
};

/**
 * Split snippet text into plain and highlighted runs.
 */
export function splitHighlights(snippet: Snippet): SnippetPart[] {
	const parts: SnippetPart[] = [];
	let cursor = 0;
	for (const [start, end] of snippet.highlights) {
		if (start < cursor) continue;
		if (start > cursor) {
			parts.push({text: snippet.text.slice(cursor, start), highlighted: false});
		}
		parts.push({text: snippet.text.slice(start, end), highlighted: true});
		cursor = end;
	}
	if (cursor < snippet.text.length) {
		parts.push({text: snippet.text.slice(cursor), highlighted: false});
	}
	return parts;
}

function HighlightedSnippet({snippet}: {snippet: Snippet}) {
	return (
		<Box marginLeft={3}>
			<Text>
				{splitHighlights(snippet).map((part, index) =>
					part.highlighted ? (
						<Text key={index} bold color="yellow">
							{part.text}
						</Text>
					) : (
						<Text key={index} dimColor>
							{part.text}
						</Text>
					),
				)}
			</Text>
		</Box>
	);
}

function SearchHit({hit, rank}: {hit: Hit; rank: number}) {
	return (
		<Box flexDirection="column">
			<Box>
				<Text dimColor>{rank}. </Text>
				<Text color="green">{hit.docId}</Text>
				<Text> {hit.score.toFixed(4)}</Text>
				{hit.sources.length > 0 && (
					<Text dimColor> ({hit.sources.join(', ')})</Text>
				)}
			</Box>
			{hit.snippet && <HighlightedSnippet snippet={hit.snippet} />}
		</Box>
	);
}

function SourceNotices({
	degraded,
	narrowed,
}: {
	degraded: DegradedSource[];
	narrowed: SourceName[];
}) {
	return (
		<>
			{degraded.map(source => (
				<Text key={source.source} color="yellow">
					! {source.source} {source.reason}: {source.message}
				</Text>
			))}
			{narrowed.length > 0 && (
				<Text dimColor>not configured: {narrowed.join(', ')}</Text>
			)}
		</>
	);
}

function SymbolMatches({
	query,
	symbols,
}: {
	query: string;
	symbols: SymbolDefinition[];
}) {
	if (symbols.length === 0) {
		return (
			<Box>
				<Text dimColor>No symbol named "{query}"</Text>
			</Box>
		);
	}

	return (
		<Box flexDirection="column">
			<Box marginBottom={1}>
				<Text bold>Found {symbols.length} definitions of </Text>
				<Text color="cyan">"{query}"</Text>
			</Box>
			{symbols.map(symbol => (
				<Box key={symbol.docId}>
					<Text color={KIND_COLORS[symbol.kind ?? ''] ?? 'white'}>
						[{symbol.kind ?? 'symbol'}]
					</Text>
					<Text> {symbol.name} </Text>
					<Text color="green">{symbol.path ?? symbol.docId}</Text>
					{symbol.line !== null && <Text dimColor>:{symbol.line}</Text>}
				</Box>
			))}
		</Box>
	);
}

function RankedHits({
	query,
	label,
	hits,
	degraded,
	narrowed,
}: {
	query: string;
	label: string;
	hits: Hit[];
	degraded: DegradedSource[];
	narrowed: SourceName[];
}) {
	return (
		<Box flexDirection="column">
			{hits.length === 0 ? (
				<Text dimColor>No results found for "{query}"</Text>
			) : (
				<Box marginBottom={1}>
					<Text bold>Found {hits.length} results for </Text>
					<Text color="cyan">"{query}"</Text>
					<Text dimColor> ({label})</Text>
				</Box>
			)}
			{hits.map((hit, index) => (
				<SearchHit key={hit.docId} hit={hit} rank={index + 1} />
			))}
			<SourceNotices degraded={degraded} narrowed={narrowed} />
		</Box>
	);
}

/**
 * Search results display component.
 */
export default function SearchResultsDisplay({result}: Props) {
	switch (result.handler) {
		case 'symbol_exact':
			return <SymbolMatches query={result.query} symbols={result.symbols} />;
		case 'hybrid': {
			const {response} = result;
			return (
				<RankedHits
					query={response.query}
					label={response.cached ? 'hybrid, cached' : 'hybrid'}
					hits={response.results.map(hit => ({
						docId: hit.docId,
						score: hit.fusedScore,
						sources: hit.contributingSources,
						snippet: hit.snippet,
					}))}
					degraded={response.degraded}
					narrowed={response.narrowed}
				/>
			);
		}
		default: {
			const {response} = result;
			return (
				<RankedHits
					query={response.query}
					label={result.source}
					hits={response.results.map(hit => ({
						docId: hit.docId,
						score: hit.score,
						sources: [],
						snippet: hit.snippet,
					}))}
					degraded={response.degraded ? [response.degraded] : []}
					narrowed={result.narrowed}
				/>
			);
		}
	}
}

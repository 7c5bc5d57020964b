/**
 * CLI command handlers. Search returns the dispatch result for the
 * results display; the other commands return the text to print.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';
import {
	CodeSearchService,
	LanceDocumentStore,
	SEARCH_MODES,
	createLogger,
	loadConfig,
	parsedDocumentSchema,
	type DispatchResult,
	type ParsedDocument,
	type SearchMode,
	type ServiceStats,
} from '../../engine/index.js';

/** Documents handed to the service per write */
const INDEX_BATCH_SIZE = 500;

export interface SearchCommandOptions {
	mode?: string;
	limit?: number;
	language?: string;
	path?: string;
	snippets?: boolean;
}

export interface IndexCommandResult {
	indexed: number;
	/** One entry per rejected line: "line N: reason" */
	errors: string[];
}

/**
 * Open the service for a project: LanceDB store, file logger, snapshot.
 */
export async function openProjectService(
	projectRoot: string,
): Promise<CodeSearchService> {
	const config = await loadConfig(projectRoot);
	const store = LanceDocumentStore.forProject(projectRoot);
	await store.connect();

	const service = CodeSearchService.forProject(projectRoot, {
		store,
		config,
		logger: createLogger(projectRoot),
	});
	await service.open();
	return service;
}

export function isSearchMode(value: string): value is SearchMode {
	return SEARCH_MODES.some(mode => mode === value);
}

/**
 * Parse JSON-lines parser output. Blank lines are skipped; malformed lines
 * are reported and skipped.
 */
export function parseJsonLines(content: string): {
	documents: ParsedDocument[];
	errors: string[];
} {
	const documents: ParsedDocument[] = [];
	const errors: string[] = [];

	content.split(/\r?\n/).forEach((line, i) => {
		if (line.trim().length === 0) return;
		let raw: unknown;
		try {
			raw = JSON.parse(line);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			errors.push(`line ${i + 1}: ${message}`);
			return;
		}
		const parsed = parsedDocumentSchema.safeParse(raw);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
			errors.push(`line ${i + 1}: ${where}${issue?.message ?? 'invalid document'}`);
			return;
		}
		documents.push(parsed.data);
	});

	return {documents, errors};
}

/**
 * Ingest a JSON-lines file of parsed documents.
 */
export async function runIndex(
	service: CodeSearchService,
	filePath: string,
): Promise<IndexCommandResult> {
	const content = await fs.readFile(path.resolve(filePath), 'utf-8');
	const {documents, errors} = parseJsonLines(content);

	for (let i = 0; i < documents.length; i += INDEX_BATCH_SIZE) {
		await service.addDocuments(documents.slice(i, i + INDEX_BATCH_SIZE));
	}
	await service.persist();

	return {indexed: documents.length, errors};
}

export function formatIndexResult(result: IndexCommandResult): string {
	const lines = [`Indexed ${result.indexed} documents`];
	if (result.errors.length > 0) {
		lines.push(chalk.yellow(`Skipped ${result.errors.length} lines:`));
		for (const error of result.errors) lines.push(`  ${error}`);
	}
	return lines.join('\n');
}

export async function runSearch(
	service: CodeSearchService,
	query: string,
	options: SearchCommandOptions = {},
): Promise<DispatchResult> {
	const mode = options.mode ?? 'auto';
	if (!isSearchMode(mode)) {
		throw new Error(
			`Unknown mode "${mode}". Expected one of: ${SEARCH_MODES.join(', ')}`,
		);
	}

	return service.search(query, {
		mode,
		limit: options.limit,
		filters: {language: options.language, pathGlob: options.path},
		snippets: options.snippets,
	});
}

export function formatStats(stats: ServiceStats): string {
	const latency = Object.entries(stats.avgLatencyPerSource)
		.map(([source, ms]) => `${source}=${ms === null ? '-' : `${ms.toFixed(1)}ms`}`)
		.join(' ');
	return [
		`Documents:      ${stats.indexSize.documents}`,
		`Terms:          ${stats.indexSize.terms}`,
		`Postings:       ${stats.indexSize.postings}`,
		`Avg length:     ${stats.indexSize.averageDocumentLength.toFixed(1)}`,
		`Symbols:        ${stats.symbols}`,
		`Index version:  ${stats.indexVersion}`,
		`Cache hit rate: ${(stats.cacheHitRate * 100).toFixed(1)}%`,
		`Latency:        ${latency}`,
	].join('\n');
}

export async function runStats(service: CodeSearchService): Promise<string> {
	return formatStats(service.stats());
}

export async function runRebuild(service: CodeSearchService): Promise<string> {
	const result = await service.rebuild();
	await service.persist();
	const skipped =
		result.skipped.length > 0 ? `, ${result.skipped.length} unreadable` : '';
	return `Rebuilt index with ${result.documents} documents${skipped} in ${Math.round(result.elapsedMs)}ms`;
}

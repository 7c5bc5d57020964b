#!/usr/bin/env node
import path from 'node:path';
import React from 'react';
import {render} from 'ink';
import chalk from 'chalk';
import meow from 'meow';
import {QuerySyntaxError, type CodeSearchService} from '../engine/index.js';
import {
	formatIndexResult,
	openProjectService,
	runIndex,
	runRebuild,
	runSearch,
	runStats,
} from './commands/handlers.js';
import SearchResultsDisplay from './components/SearchResultsDisplay.js';

const cli = meow(
	`
	Usage
	  $ hybridex index <file.jsonl>
	  $ hybridex search <query>
	  $ hybridex stats
	  $ hybridex rebuild

	Options
	  --project   Project directory (default: current directory)
	  --mode      auto, symbol, fulltext, hybrid, bm25, semantic or fuzzy
	  --limit     Maximum number of results (default: 10)
	  --language  Only return documents in this language
	  --path      Only return documents whose path matches this glob
	  --snippets  Print an excerpt under each result
	  --help      Show help
	  --version   Show version

	Examples
	  $ hybridex index parsed.jsonl
	  $ hybridex search 'parse* NOT test' --language typescript
	  $ hybridex search '"returns bar"' --mode fulltext --snippets
`,
	{
		importMeta: import.meta,
		flags: {
			project: {type: 'string'},
			mode: {type: 'string', default: 'auto'},
			limit: {type: 'number', default: 10},
			language: {type: 'string'},
			path: {type: 'string'},
			snippets: {type: 'boolean', default: false},
		},
	},
);

/**
 * Render a component once and leave its output on screen.
 */
async function renderOnce(node: React.ReactElement): Promise<void> {
	const instance = render(node);
	instance.unmount();
	await instance.waitUntilExit();
}

async function run(service: CodeSearchService): Promise<void> {
	const [command, ...rest] = cli.input;

	switch (command) {
		case 'index': {
			const [file] = rest;
			if (!file) throw new Error('Usage: hybridex index <file.jsonl>');
			console.log(formatIndexResult(await runIndex(service, file)));
			return;
		}
		case 'search': {
			const query = rest.join(' ');
			if (query.trim().length === 0) {
				throw new Error('Usage: hybridex search <query>');
			}
			const result = await runSearch(service, query, {
				mode: cli.flags.mode,
				limit: cli.flags.limit,
				language: cli.flags.language,
				path: cli.flags.path,
				snippets: cli.flags.snippets,
			});
			await renderOnce(<SearchResultsDisplay result={result} />);
			return;
		}
		case 'stats':
			console.log(await runStats(service));
			return;
		case 'rebuild':
			console.log(await runRebuild(service));
			return;
		default:
			throw new Error(
				command ? `Unknown command "${command}"` : 'Missing command',
			);
	}
}

async function main(): Promise<void> {
	if (cli.input.length === 0) {
		cli.showHelp(0);
		return;
	}

	const projectRoot = path.resolve(cli.flags.project ?? process.cwd());
	const service = await openProjectService(projectRoot);
	try {
		await run(service);
	} finally {
		await service.close();
	}
}

main().catch((error: unknown) => {
	if (error instanceof QuerySyntaxError) {
		console.error(chalk.red(`Invalid query: ${error.message}`));
	} else {
		console.error(chalk.red(error instanceof Error ? error.message : String(error)));
	}
	process.exitCode = 1;
});

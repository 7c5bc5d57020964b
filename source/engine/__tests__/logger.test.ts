import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {createLogger, formatEntry, getLogPath} from '../logger/index.js';

describe('formatEntry', () => {
	it('formats level, component and data', () => {
		const entry = formatEntry('warn', 'Search', 'Source degraded', {
			source: 'semantic',
		});
		expect(entry).toMatch(
			/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN \] Search: Source degraded\n {2}\{"source":"semantic"\}$/,
		);
	});

	it('includes error messages', () => {
		const entry = formatEntry('error', 'Snapshot', 'Dropped', new Error('bad'));
		expect(entry.split('\n')[1]).toBe('  Error: bad');
	});
});

describe('createLogger', () => {
	const originalHome = process.env['HYBRIDEX_HOME'];
	let home: string;

	beforeEach(async () => {
		home = await fs.mkdtemp(path.join(os.tmpdir(), 'hybridex-logs-'));
		process.env['HYBRIDEX_HOME'] = home;
	});

	afterEach(async () => {
		if (originalHome === undefined) delete process.env['HYBRIDEX_HOME'];
		else process.env['HYBRIDEX_HOME'] = originalHome;
		await fs.rm(home, {recursive: true, force: true});
	});

	it('appends entries at or above the minimum level', async () => {
		const projectRoot = path.join(home, 'project');
		const logger = createLogger(projectRoot, 'info');
		logger.debug('Service', 'hidden');
		logger.info('Service', 'Index rebuilt', {documents: 3});

		const content = await fs.readFile(getLogPath(projectRoot), 'utf-8');
		expect(content).not.toContain('hidden');
		expect(content).toContain('Service: Index rebuilt\n  {"documents":3}\n');
	});
});

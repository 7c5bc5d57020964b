import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {afterEach, beforeEach, describe, it, expect, vi} from 'vitest';
import {
	InvertedIndex,
	readSnapshot,
	restoreIndex,
	serializeIndex,
	writeSnapshot,
	type IndexSnapshot,
} from '../index/index.js';
import type {Logger} from '../logger/index.js';

function sampleIndex(): InvertedIndex {
	const index = new InvertedIndex();
	index.addDocument('a', 'alpha beta', {path: 'src/a.ts'});
	index.addDocument('b', 'beta gamma');
	return index;
}

function snapshotOf(index: InvertedIndex): IndexSnapshot {
	return structuredClone(serializeIndex(index));
}

describe('serializeIndex / restoreIndex', () => {
	it('restores documents, postings and statistics', () => {
		const index = sampleIndex();
		const raw: unknown = JSON.parse(JSON.stringify(serializeIndex(index)));
		const {index: restored, dropped} = restoreIndex(raw);

		expect(dropped).toEqual([]);
		expect(restored.documentIds()).toEqual(['a', 'b']);
		expect(restored.getPostings('beta')).toEqual(index.getPostings('beta'));
		expect(restored.getDocument('a')).toEqual(index.getDocument('a'));
		expect(restored.size()).toEqual(index.size());
		expect(restored.version).toBeGreaterThanOrEqual(index.version);
	});

	it('drops a document with an invalid length', () => {
		const snapshot = snapshotOf(sampleIndex());
		const first = snapshot.documents[0];
		if (first) first.length = -1;

		const {index, dropped} = restoreIndex(snapshot);
		expect(dropped.map(error => error.message)).toEqual([
			'Document a is corrupted: invalid document length -1',
		]);
		expect(index.documentIds()).toEqual(['b']);
		expect(index.documentFrequency('beta')).toBe(1);
	});

	it('drops a document whose positions overrun its length', () => {
		const snapshot = snapshotOf(sampleIndex());
		snapshot.postings['gamma'] = [['b', [5]]];

		const logger: Logger = {
			debug: vi.fn(),
			info: vi.fn(),
			warn: vi.fn(),
			error: vi.fn(),
		};
		const {index, dropped} = restoreIndex(snapshot, {logger});

		expect(dropped.map(error => error.reason)).toEqual([
			'position 5 beyond document length 2 under term "gamma"',
		]);
		expect(index.hasDocument('b')).toBe(false);
		expect(index.hasDocument('a')).toBe(true);
		expect(logger.error).toHaveBeenCalledWith(
			'Snapshot',
			'Dropped document b',
			dropped[0],
		);
	});

	it('reports postings for unknown documents', () => {
		const snapshot = snapshotOf(sampleIndex());
		snapshot.postings['ghostly'] = [['ghost', [0]]];

		const {index, dropped} = restoreIndex(snapshot);
		expect(dropped.map(error => error.docId)).toEqual(['ghost']);
		expect(index.documentIds()).toEqual(['a', 'b']);
		expect(index.hasTerm('ghostly')).toBe(false);
	});

	it('throws on something that is not a snapshot', () => {
		expect(() => restoreIndex({version: 99})).toThrow();
	});
});

describe('snapshot files', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hybridex-snapshot-'));
	});

	afterEach(async () => {
		await fs.rm(dir, {recursive: true, force: true});
	});

	it('writes and reads back a snapshot', async () => {
		const file = path.join(dir, 'nested', 'index.json');
		await writeSnapshot(file, sampleIndex());

		const result = await readSnapshot(file);
		expect(result?.index.documentIds()).toEqual(['a', 'b']);
		expect(result?.dropped).toEqual([]);
	});

	it('returns null for a missing file', async () => {
		expect(await readSnapshot(path.join(dir, 'missing.json'))).toBeNull();
	});
});

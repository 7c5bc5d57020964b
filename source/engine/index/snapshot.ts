/**
 * Index snapshots.
 *
 * A snapshot is the inverted index serialized to JSON so a restart does not
 * need to re-tokenize every document. Restore validates the postings and
 * document-length invariants per document: a document that violates them
 * is dropped (and logged) while the rest of the index is restored.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {SNAPSHOT_VERSION} from '../constants.js';
import {IndexCorruptionError} from '../errors.js';
import type {Logger} from '../logger/index.js';
import type {Term, Tokenizer} from '../tokenizer/index.js';
import {InvertedIndex} from './inverted-index.js';
import type {DocId} from './types.js';

const snapshotSchema = z.object({
	version: z.literal(SNAPSHOT_VERSION),
	indexVersion: z.number().int().nonnegative(),
	documents: z.array(
		z.object({
			id: z.string().min(1),
			length: z.number(),
			fieldLengths: z.record(z.string(), z.number()),
			fields: z.record(z.string(), z.string()),
		}),
	),
	/** term -> [docId, positions][] */
	postings: z.record(
		z.string(),
		z.array(z.tuple([z.string(), z.array(z.number())])),
	),
});

export type IndexSnapshot = z.infer<typeof snapshotSchema>;

export interface RestoreResult {
	index: InvertedIndex;
	/** Documents dropped because their data violated index invariants */
	dropped: IndexCorruptionError[];
}

/**
 * Serialize an index.
 */
export function serializeIndex(index: InvertedIndex): IndexSnapshot {
	const documents: IndexSnapshot['documents'] = [];
	for (const id of index.documentIds()) {
		const document = index.getDocument(id);
		if (!document) continue;
		documents.push({
			id: document.id,
			length: document.length,
			fieldLengths: {...document.fieldLengths},
			fields: {...document.fields},
		});
	}

	const postings: IndexSnapshot['postings'] = {};
	for (const [term, list] of index.entries()) {
		postings[term] = list.map(p => [p.docId, [...p.positions]]);
	}

	return {
		version: SNAPSHOT_VERSION,
		indexVersion: index.version,
		documents,
		postings,
	};
}

function checkPositions(positions: number[], length: number): string | null {
	if (positions.length === 0) return 'posting without positions';
	let previous = -1;
	for (const position of positions) {
		if (!Number.isInteger(position) || position < 0) {
			return `invalid position ${position}`;
		}
		if (position >= length) {
			return `position ${position} beyond document length ${length}`;
		}
		if (position <= previous) return 'positions not strictly ascending';
		previous = position;
	}
	return null;
}

/**
 * Rebuild an index from a snapshot.
 *
 * @throws ZodError when the snapshot does not have the snapshot shape at all
 */
export function restoreIndex(
	raw: unknown,
	options: {tokenizer?: Tokenizer; logger?: Logger} = {},
): RestoreResult {
	const snapshot = snapshotSchema.parse(raw);
	const corrupt = new Map<DocId, IndexCorruptionError>();
	const markCorrupt = (id: DocId, reason: string) => {
		if (!corrupt.has(id)) corrupt.set(id, new IndexCorruptionError(id, reason));
	};

	const lengths = new Map<DocId, number>();
	for (const doc of snapshot.documents) {
		if (lengths.has(doc.id)) {
			markCorrupt(doc.id, 'duplicate document entry');
			continue;
		}
		lengths.set(doc.id, doc.length);
		if (!Number.isInteger(doc.length) || doc.length < 0) {
			markCorrupt(doc.id, `invalid document length ${doc.length}`);
		}
		for (const [field, fieldLength] of Object.entries(doc.fieldLengths)) {
			if (!Number.isInteger(fieldLength) || fieldLength < 0) {
				markCorrupt(doc.id, `invalid length ${fieldLength} for field ${field}`);
			}
		}
	}

	const termPositions = new Map<DocId, Map<Term, number[]>>();
	for (const [term, list] of Object.entries(snapshot.postings)) {
		for (const [docId, positions] of list) {
			const length = lengths.get(docId);
			if (length === undefined) {
				markCorrupt(docId, `posting for unknown document under term "${term}"`);
				continue;
			}
			const problem = checkPositions(positions, length);
			if (problem) {
				markCorrupt(docId, `${problem} under term "${term}"`);
				continue;
			}
			let byTerm = termPositions.get(docId);
			if (!byTerm) {
				byTerm = new Map();
				termPositions.set(docId, byTerm);
			}
			if (byTerm.has(term)) {
				markCorrupt(docId, `duplicate posting under term "${term}"`);
				continue;
			}
			byTerm.set(term, positions);
		}
	}

	const index = new InvertedIndex({
		tokenizer: options.tokenizer,
		initialVersion: snapshot.indexVersion,
	});
	for (const doc of snapshot.documents) {
		if (corrupt.has(doc.id)) continue;
		index.insertDocument({
			document: {
				id: doc.id,
				length: doc.length,
				fieldLengths: doc.fieldLengths,
				fields: doc.fields,
			},
			termPositions: termPositions.get(doc.id) ?? new Map(),
		});
	}

	const dropped = [...corrupt.values()];
	for (const error of dropped) {
		options.logger?.error('Snapshot', `Dropped document ${error.docId}`, error);
	}

	return {index, dropped};
}

export async function writeSnapshot(
	filePath: string,
	index: InvertedIndex,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), {recursive: true});
	const tmpPath = `${filePath}.tmp`;
	await fs.writeFile(tmpPath, JSON.stringify(serializeIndex(index)));
	await fs.rename(tmpPath, filePath);
}

/**
 * Read a snapshot file.
 * @returns null when the file does not exist
 */
export async function readSnapshot(
	filePath: string,
	options: {tokenizer?: Tokenizer; logger?: Logger} = {},
): Promise<RestoreResult | null> {
	let content: string;
	try {
		content = await fs.readFile(filePath, 'utf-8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return null;
		}
		throw error;
	}
	return restoreIndex(JSON.parse(content), options);
}

/**
 * Exact symbol lookup fed by parser fields.
 */

import {FIELD_KEYS} from '../constants.js';
import type {DocId} from '../index/index.js';
import {TrigramIndex} from './trigram.js';

export {
	DEFAULT_TRIGRAM_THRESHOLD,
	TrigramIndex,
	TrigramSymbolBackend,
	extractTrigrams,
	type TrigramBackendOptions,
	type TrigramMatch,
} from './trigram.js';

export interface SymbolDefinition {
	docId: DocId;
	name: string;
	kind: string | null;
	path: string | null;
	/** 1-based line of the definition, when the parser reported one */
	line: number | null;
}

function parseLine(value: string | undefined): number | null {
	if (value === undefined || !/^\d+$/.test(value.trim())) return null;
	const line = Number.parseInt(value, 10);
	return line > 0 ? line : null;
}

/**
 * Build a definition from a document's fields. Null without a symbol name.
 */
export function symbolFromFields(
	docId: DocId,
	fields: Readonly<Record<string, string>>,
): SymbolDefinition | null {
	const name = fields[FIELD_KEYS.SYMBOL]?.trim();
	if (!name) return null;
	return {
		docId,
		name,
		kind: fields[FIELD_KEYS.KIND] ?? null,
		path: fields[FIELD_KEYS.PATH] ?? null,
		line: parseLine(fields[FIELD_KEYS.LINE]),
	};
}

/**
 * Symbol name -> definitions, plus a trigram index for fuzzy matching.
 * Names are matched case-sensitively.
 */
export class SymbolTable {
	readonly trigrams = new TrigramIndex();
	private readonly byName = new Map<string, Map<DocId, SymbolDefinition>>();
	private readonly byDoc = new Map<DocId, SymbolDefinition>();

	get size(): number {
		return this.byDoc.size;
	}

	/**
	 * Record the symbol a document defines, replacing any previous one.
	 */
	set(docId: DocId, fields: Readonly<Record<string, string>>): void {
		this.delete(docId);
		const definition = symbolFromFields(docId, fields);
		if (!definition) return;

		let definitions = this.byName.get(definition.name);
		if (!definitions) {
			definitions = new Map();
			this.byName.set(definition.name, definitions);
		}
		definitions.set(docId, definition);
		this.byDoc.set(docId, definition);
		this.trigrams.set(docId, definition.name);
	}

	delete(docId: DocId): boolean {
		const definition = this.byDoc.get(docId);
		if (!definition) return false;

		const definitions = this.byName.get(definition.name);
		definitions?.delete(docId);
		if (definitions?.size === 0) this.byName.delete(definition.name);
		this.byDoc.delete(docId);
		this.trigrams.delete(docId);
		return true;
	}

	has(name: string): boolean {
		return this.byName.has(name.trim());
	}

	/**
	 * Definitions of an exact name, ordered by docId.
	 */
	lookup(name: string): SymbolDefinition[] {
		const definitions = this.byName.get(name.trim());
		if (!definitions) return [];
		return [...definitions.values()].sort((a, b) =>
			a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0,
		);
	}

	forDocument(docId: DocId): SymbolDefinition | undefined {
		return this.byDoc.get(docId);
	}
}

import * as lancedb from '@lancedb/lancedb';
import type {Connection, Table} from '@lancedb/lancedb';
import {getLanceDbPath, TABLE_NAMES} from '../constants.js';
import {createDocumentsSchema} from './schema.js';
import {
	documentToRow,
	rowToDocument,
	type DocumentStore,
	type ParsedDocument,
} from './types.js';

/**
 * Document store wrapping a LanceDB table.
 */
export class LanceDocumentStore implements DocumentStore {
	private readonly dbPath: string;
	private db: Connection | null = null;
	private table: Table | null = null;

	constructor(dbPath: string) {
		this.dbPath = dbPath;
	}

	/**
	 * Store under the project's data directory.
	 */
	static forProject(projectRoot: string): LanceDocumentStore {
		return new LanceDocumentStore(getLanceDbPath(projectRoot));
	}

	/**
	 * Connect to the LanceDB database.
	 * Creates the documents table if it doesn't exist.
	 */
	async connect(): Promise<void> {
		this.db = await lancedb.connect(this.dbPath);

		const tableNames = await this.db.tableNames();
		if (tableNames.includes(TABLE_NAMES.DOCUMENTS)) {
			this.table = await this.db.openTable(TABLE_NAMES.DOCUMENTS);
		} else {
			this.table = await this.db.createEmptyTable(
				TABLE_NAMES.DOCUMENTS,
				createDocumentsSchema(),
			);
		}
	}

	async close(): Promise<void> {
		this.table?.close();
		this.db?.close();
		this.table = null;
		this.db = null;
	}

	private requireTable(): Table {
		if (!this.table) {
			throw new Error('Document store not connected. Call connect() first.');
		}
		return this.table;
	}

	/**
	 * Upsert documents. Uses merge insert keyed on id.
	 */
	async put(documents: readonly ParsedDocument[]): Promise<void> {
		const table = this.requireTable();
		if (documents.length === 0) return;

		await table
			.mergeInsert('id')
			.whenMatchedUpdateAll()
			.whenNotMatchedInsertAll()
			.execute(documents.map(documentToRow));
	}

	async delete(id: string): Promise<boolean> {
		const table = this.requireTable();
		const predicate = `id = '${escapeString(id)}'`;
		const existing = await table.countRows(predicate);
		if (existing === 0) return false;
		await table.delete(predicate);
		return true;
	}

	async get(id: string): Promise<ParsedDocument | undefined> {
		const table = this.requireTable();
		const rows = await table
			.query()
			.where(`id = '${escapeString(id)}'`)
			.limit(1)
			.toArray();

		const [row] = rows;
		return row === undefined ? undefined : rowToDocument(row);
	}

	async listIds(): Promise<string[]> {
		const table = this.requireTable();
		const rows = await table.query().select(['id']).toArray();

		const ids: string[] = [];
		for (const row of rows) {
			const id: unknown = row.id;
			if (typeof id === 'string') ids.push(id);
		}
		return ids.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
	}

	async count(): Promise<number> {
		return this.requireTable().countRows();
	}

	async clear(): Promise<void> {
		const table = this.requireTable();
		const count = await table.countRows();
		if (count > 0) {
			// LanceDB has no truncate
			await table.delete('id IS NOT NULL');
		}
	}
}

/**
 * Escape a string for use in SQL-like LanceDB filter expressions.
 * Escapes single quotes by doubling them.
 */
function escapeString(s: string): string {
	return s.replace(/'/g, "''");
}

import {z} from 'zod';

/**
 * Parser output for one file or symbol: the unit of ingestion.
 */
export interface ParsedDocument {
	id: string;
	text: string;
	/** Well-known keys: path, language, symbol, kind, line */
	fields: Record<string, string>;
}

/**
 * Durable source of truth for documents. The inverted index is derived
 * from it and can always be rebuilt from `listIds` + `get`.
 */
export interface DocumentStore {
	/** Insert or replace documents by id */
	put(documents: readonly ParsedDocument[]): Promise<void>;
	/** @returns whether the document existed */
	delete(id: string): Promise<boolean>;
	get(id: string): Promise<ParsedDocument | undefined>;
	/** All ids, ascending */
	listIds(): Promise<string[]>;
	count(): Promise<number>;
	clear(): Promise<void>;
	close(): Promise<void>;
}

/**
 * Row format for the LanceDB documents table.
 * Uses snake_case to match Arrow/LanceDB conventions.
 */
export type DocumentRow = {
	id: string;
	text: string;
	/** JSON object of string fields */
	fields_json: string;
};

export const fieldsSchema = z.record(z.string(), z.string());

export const parsedDocumentSchema = z.object({
	id: z.string().min(1),
	text: z.string(),
	fields: fieldsSchema.default({}),
});

export const documentRowSchema = z.object({
	id: z.string().min(1),
	text: z.string(),
	fields_json: z.string(),
});

export function documentToRow(document: ParsedDocument): DocumentRow {
	return {
		id: document.id,
		text: document.text,
		fields_json: JSON.stringify(document.fields),
	};
}

/**
 * Validate a row read back from storage.
 *
 * @throws ZodError or SyntaxError when the row is malformed
 */
export function rowToDocument(row: unknown): ParsedDocument {
	const parsed = documentRowSchema.parse(row);
	return {
		id: parsed.id,
		text: parsed.text,
		fields: fieldsSchema.parse(JSON.parse(parsed.fields_json)),
	};
}

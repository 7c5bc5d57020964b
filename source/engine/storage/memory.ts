import type {DocumentStore, ParsedDocument} from './types.js';

function copy(document: ParsedDocument): ParsedDocument {
	return {id: document.id, text: document.text, fields: {...document.fields}};
}

/**
 * Map-backed store for tests and ephemeral indexes.
 */
export class MemoryDocumentStore implements DocumentStore {
	private readonly documents = new Map<string, ParsedDocument>();

	async put(documents: readonly ParsedDocument[]): Promise<void> {
		for (const document of documents) {
			this.documents.set(document.id, copy(document));
		}
	}

	async delete(id: string): Promise<boolean> {
		return this.documents.delete(id);
	}

	async get(id: string): Promise<ParsedDocument | undefined> {
		const document = this.documents.get(id);
		return document ? copy(document) : undefined;
	}

	async listIds(): Promise<string[]> {
		return [...this.documents.keys()].sort((a, b) =>
			a < b ? -1 : a > b ? 1 : 0,
		);
	}

	async count(): Promise<number> {
		return this.documents.size;
	}

	async clear(): Promise<void> {
		this.documents.clear();
	}

	async close(): Promise<void> {}
}

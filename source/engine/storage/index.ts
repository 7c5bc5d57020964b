export {LanceDocumentStore} from './lance.js';
export {MemoryDocumentStore} from './memory.js';
export {createDocumentsSchema} from './schema.js';
export {
	documentRowSchema,
	documentToRow,
	fieldsSchema,
	parsedDocumentSchema,
	rowToDocument,
	type DocumentRow,
	type DocumentStore,
	type ParsedDocument,
} from './types.js';

import {Field, Schema, Utf8} from 'apache-arrow';

/**
 * Arrow schema for the documents table.
 */
export function createDocumentsSchema(): Schema {
	return new Schema([
		new Field('id', new Utf8(), false), // Primary key
		new Field('text', new Utf8(), false),
		new Field('fields_json', new Utf8(), false),
	]);
}

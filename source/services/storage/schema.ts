/**
 * Arrow schema for the symbols table.
 */

import {Bool, Field, FixedSizeList, Float32, Int32, Schema, Utf8} from 'apache-arrow';

/**
 * Columns of the symbols table.
 *
 * `symbol_key` hashes the identity tuple (project_id, file_path,
 * start_line, end_line) and is the merge key for upserts. `embedding` is
 * always present; rows without a real vector hold zeros and
 * `has_embedding = false`.
 */
export function createSymbolsSchema(dimensions: number): Schema {
	return new Schema([
		// Identity / location
		new Field('symbol_key', new Utf8(), false),
		new Field('project_id', new Utf8(), false),
		new Field('file_path', new Utf8(), false),
		new Field('start_line', new Int32(), true),
		new Field('end_line', new Int32(), true),

		// Symbol facts
		new Field('name', new Utf8(), false),
		new Field('name_lower', new Utf8(), false),
		new Field('symbol_type', new Utf8(), false),
		new Field('code', new Utf8(), false),
		new Field('docstring', new Utf8(), true),
		new Field('parent_name', new Utf8(), true),
		new Field('language', new Utf8(), false),
		new Field('file_hash', new Utf8(), false),

		// Vector
		new Field('has_embedding', new Bool(), false),
		new Field(
			'embedding',
			new FixedSizeList(dimensions, new Field('item', new Float32(), true)),
			false,
		),

		// Timestamps (ISO 8601)
		new Field('created_at', new Utf8(), false),
		new Field('updated_at', new Utf8(), false),
	]);
}

/**
 * Columns returned by reads that do not need the vector.
 */
export const SYMBOL_COLUMNS = [
	'symbol_key',
	'project_id',
	'file_path',
	'start_line',
	'end_line',
	'name',
	'symbol_type',
	'code',
	'docstring',
	'parent_name',
	'language',
	'file_hash',
	'has_embedding',
	'created_at',
	'updated_at',
];

/**
 * SymbolStore - LanceDB table of symbol rows.
 *
 * Owns identity, upsert and pruning semantics:
 * - one row per (project_id, file_path, start_line, end_line), enforced by
 *   merge-insert on `symbol_key`
 * - `created_at` survives updates
 * - writes without a project identity are refused
 */

import fs from 'node:fs/promises';
import * as lancedb from '@lancedb/lancedb';
import {makeArrowTable} from '@lancedb/lancedb';
import type {Connection, Table} from '@lancedb/lancedb';
import pLimit from 'p-limit';
import {MIN_ROWS_FOR_VECTOR_INDEX} from '../../lib/constants.js';
import {
	ConfigurationError,
	errorMessage,
	IntegrityError,
} from '../../lib/errors.js';
import {computeSymbolKey} from '../../lib/hash.js';
import {createNullLogger, type Logger} from '../../lib/logger.js';
import {compareByNameMatch} from '../../lib/name-match.js';
import {createSymbolsSchema, SYMBOL_COLUMNS} from './schema.js';
import type {
	LineSpan,
	StoredFileState,
	StoredSymbol,
	StoredSymbolWithEmbedding,
	SymbolInput,
	UpsertResult,
	VectorMatch,
} from './types.js';

export type * from './types.js';

/** Keys per IN (...) list */
const IN_LIST_BATCH = 500;

const REQUIRED_COLUMNS = ['symbol_key', 'project_id', 'name_lower', 'has_embedding'];

export type SymbolStoreOptions = {
	databasePath: string;
	tableName: string;
	dimensions: number;
	logger?: Logger;
};

export class SymbolStore {
	private readonly databasePath: string;
	private readonly tableName: string;
	readonly dimensions: number;
	private readonly logger: Logger;
	private readonly writeLimit = pLimit(1);
	private db: Connection | null = null;
	private table: Table | null = null;

	constructor(options: SymbolStoreOptions) {
		this.databasePath = options.databasePath;
		this.tableName = options.tableName;
		this.dimensions = options.dimensions;
		this.logger = options.logger ?? createNullLogger();
	}

	// ============================================================
	// Lifecycle
	// ============================================================

	/**
	 * Open (or create) the symbols table.
	 *
	 * @throws ConfigurationError when the database location is unusable or
	 * the stored vector width differs from the configured dimension
	 */
	async connect(): Promise<void> {
		try {
			await fs.mkdir(this.databasePath, {recursive: true});
			this.db = await lancedb.connect(this.databasePath);
		} catch (error) {
			throw new ConfigurationError(
				`Cannot open symbol store at ${this.databasePath}: ${errorMessage(error)}`,
				{cause: error},
			);
		}

		const db = this.getDb();
		const tableNames = await db.tableNames();
		if (!tableNames.includes(this.tableName)) {
			this.table = await db.createEmptyTable(
				this.tableName,
				createSymbolsSchema(this.dimensions),
			);
			this.logger.info('SymbolStore', 'Created symbols table', {
				table: this.tableName,
				dimensions: this.dimensions,
			});
			return;
		}

		const table = await db.openTable(this.tableName);
		await this.validateTable(table);
		this.table = table;
	}

	private async validateTable(table: Table): Promise<void> {
		const schema = await table.schema();
		const names = schema.fields.map(f => f.name);
		const missing = REQUIRED_COLUMNS.filter(c => !names.includes(c));
		if (missing.length > 0) {
			throw new ConfigurationError(
				`Table ${this.tableName} is not a symbols table (missing ${missing.join(', ')})`,
			);
		}

		const vectorField = schema.fields.find(f => f.name === 'embedding');
		const type = vectorField?.type;
		const stored =
			type && 'listSize' in type && typeof type.listSize === 'number'
				? type.listSize
				: null;
		if (stored !== this.dimensions) {
			throw new ConfigurationError(
				`Embedding dimension mismatch: table ${this.tableName} stores ${stored ?? 'no'} ` +
					`dimensions, configuration expects ${this.dimensions}. ` +
					`Use a matching embedding model or a different database path.`,
			);
		}
	}

	close(): void {
		this.table?.close();
		this.db?.close();
		this.table = null;
		this.db = null;
	}

	private getDb(): Connection {
		if (!this.db) {
			throw new Error('SymbolStore not connected');
		}
		return this.db;
	}

	private getTable(): Table {
		if (!this.table) {
			throw new Error('SymbolStore not connected');
		}
		return this.table;
	}

	// ============================================================
	// Writes
	// ============================================================

	/**
	 * Insert or update one symbol.
	 *
	 * @throws IntegrityError when the symbol has no project identity
	 */
	async upsert(symbol: SymbolInput): Promise<string> {
		const result = await this.upsertMany([symbol]);
		const key = result.keys[0];
		if (result.rejected > 0 || !key) {
			throw new IntegrityError(
				`Refusing to store symbol ${symbol.name} (${symbol.filePath}) without a project_id`,
			);
		}
		return key;
	}

	/**
	 * Insert or update a batch of symbols in one merge-insert commit.
	 * Inputs without a project identity are refused and counted; the rest
	 * are written. Later duplicates of an identity within the batch win.
	 */
	async upsertMany(symbols: readonly SymbolInput[]): Promise<UpsertResult> {
		const byKey = new Map<string, SymbolInput & {projectId: string}>();
		let rejected = 0;

		for (const symbol of symbols) {
			const projectId = symbol.projectId?.trim();
			if (!projectId) {
				rejected++;
				this.logger.warn('SymbolStore', 'Rejected write without project_id', {
					name: symbol.name,
					filePath: symbol.filePath,
				});
				continue;
			}
			this.checkEmbedding(symbol.embedding);
			const key = computeSymbolKey(
				projectId,
				symbol.filePath,
				symbol.startLine,
				symbol.endLine,
			);
			const previous = byKey.get(key);
			if (previous) {
				this.logger.warn('SymbolStore', 'Duplicate identity in batch', {
					filePath: symbol.filePath,
					replaced: previous.name,
					name: symbol.name,
				});
			}
			byKey.set(key, {...symbol, projectId});
		}

		if (byKey.size === 0) {
			return {written: 0, rejected, keys: []};
		}

		const keys = [...byKey.keys()];
		await this.writeLimit(async () => {
			const createdAt = await this.getCreatedAt(keys);
			const now = new Date().toISOString();
			const rows = [...byKey.entries()].map(([key, symbol]) =>
				this.toRow(key, symbol, createdAt.get(key) ?? now, now),
			);

			const data = makeArrowTable(rows, {
				schema: createSymbolsSchema(this.dimensions),
			});
			await this.getTable()
				.mergeInsert('symbol_key')
				.whenMatchedUpdateAll()
				.whenNotMatchedInsertAll()
				.execute(data);
		});

		return {written: keys.length, rejected, keys};
	}

	private checkEmbedding(embedding: number[] | null): void {
		if (embedding && embedding.length !== this.dimensions) {
			throw new ConfigurationError(
				`Embedding has ${embedding.length} dimensions, store expects ${this.dimensions}`,
			);
		}
	}

	private toRow(
		key: string,
		symbol: SymbolInput & {projectId: string},
		createdAt: string,
		updatedAt: string,
	): Record<string, unknown> {
		return {
			symbol_key: key,
			project_id: symbol.projectId,
			file_path: symbol.filePath,
			start_line: symbol.startLine,
			end_line: symbol.endLine,
			name: symbol.name,
			name_lower: symbol.name.toLowerCase(),
			symbol_type: symbol.symbolType,
			code: symbol.code,
			docstring: symbol.docstring,
			parent_name: symbol.parentName,
			language: symbol.language,
			file_hash: symbol.fileHash,
			has_embedding: symbol.embedding !== null,
			embedding: symbol.embedding ?? new Array<number>(this.dimensions).fill(0),
			created_at: createdAt,
			updated_at: updatedAt,
		};
	}

	private async getCreatedAt(keys: string[]): Promise<Map<string, string>> {
		const createdAt = new Map<string, string>();
		for (let i = 0; i < keys.length; i += IN_LIST_BATCH) {
			const batch = keys.slice(i, i + IN_LIST_BATCH);
			const rows: unknown[] = await this.getTable()
				.query()
				.where(`symbol_key IN (${quoteList(batch)})`)
				.select(['symbol_key', 'created_at'])
				.limit(batch.length)
				.toArray();
			for (const row of rows) {
				if (!isRecord(row)) continue;
				createdAt.set(readString(row, 'symbol_key'), readString(row, 'created_at'));
			}
		}
		return createdAt;
	}

	/**
	 * Delete rows of one file whose span is not among `stillValidSpans`.
	 * An empty list removes every row of the file.
	 *
	 * @returns number of rows removed
	 */
	async deleteStale(
		projectId: string,
		filePath: string,
		stillValidSpans: readonly LineSpan[],
	): Promise<number> {
		const keys = stillValidSpans.map(span =>
			computeSymbolKey(projectId, filePath, span.startLine, span.endLine),
		);
		let filter =
			`project_id = '${escapeString(projectId)}' AND ` +
			`file_path = '${escapeString(filePath)}'`;
		if (keys.length > 0) {
			filter += ` AND symbol_key NOT IN (${quoteList(keys)})`;
		}
		return this.deleteWhere(filter);
	}

	/**
	 * Delete every row of the given files.
	 */
	async deleteFiles(
		projectId: string,
		filePaths: readonly string[],
	): Promise<number> {
		let deleted = 0;
		for (let i = 0; i < filePaths.length; i += IN_LIST_BATCH) {
			const batch = filePaths.slice(i, i + IN_LIST_BATCH);
			deleted += await this.deleteWhere(
				`project_id = '${escapeString(projectId)}' AND file_path IN (${quoteList(batch)})`,
			);
		}
		return deleted;
	}

	/**
	 * Delete every row of a project.
	 */
	async deleteProject(projectId: string): Promise<number> {
		return this.deleteWhere(`project_id = '${escapeString(projectId)}'`);
	}

	private async deleteWhere(filter: string): Promise<number> {
		return this.writeLimit(async () => {
			const table = this.getTable();
			const count = await table.countRows(filter);
			if (count > 0) {
				await table.delete(filter);
			}
			return count;
		});
	}

	// ============================================================
	// Reads
	// ============================================================

	/**
	 * Case-insensitive name search ranked exact, prefix, then substring,
	 * shortest name first.
	 */
	async lexicalSearch(
		projectId: string | null,
		namePattern: string,
		limit: number,
	): Promise<StoredSymbol[]> {
		const pattern = namePattern.trim().toLowerCase();
		if (!pattern || limit <= 0) {
			return [];
		}

		// Every exact and prefix match is also a substring match. Rank the
		// whole candidate set on light columns before cutting to the limit.
		const filter = scopeFilter(
			projectId,
			`name_lower LIKE '%${escapeForLike(pattern)}%'`,
		);
		const matches = await this.getTable().countRows(filter);
		if (matches === 0) {
			return [];
		}

		const candidates: unknown[] = await this.getTable()
			.query()
			.where(filter)
			.select(['symbol_key', 'name', 'file_path', 'start_line'])
			.limit(matches)
			.toArray();
		const ranked = candidates
			.filter(isRecord)
			.map(row => ({
				symbolKey: readString(row, 'symbol_key'),
				name: readString(row, 'name'),
				filePath: readString(row, 'file_path'),
				startLine: readOptionalInt(row, 'start_line'),
			}))
			.sort(compareByNameMatch(pattern))
			.slice(0, limit)
			.map(candidate => candidate.symbolKey);

		const byKey = new Map<string, StoredSymbol>();
		for (let i = 0; i < ranked.length; i += IN_LIST_BATCH) {
			const batch = ranked.slice(i, i + IN_LIST_BATCH);
			const rows = await this.select(
				`symbol_key IN (${quoteList(batch)})`,
				batch.length,
			);
			for (const row of rows) {
				byKey.set(row.symbolKey, row);
			}
		}
		return ranked.flatMap(key => {
			const row = byKey.get(key);
			return row ? [row] : [];
		});
	}

	/**
	 * Cosine nearest neighbours among rows that have an embedding.
	 */
	async vectorSearch(
		projectId: string | null,
		queryVector: readonly number[],
		limit: number,
	): Promise<VectorMatch[]> {
		this.checkEmbedding([...queryVector]);
		const magnitude = Math.sqrt(queryVector.reduce((s, v) => s + v * v, 0));
		if (magnitude === 0 || limit <= 0) {
			return [];
		}

		const rows: unknown[] = await this.getTable()
			.vectorSearch([...queryVector])
			.column('embedding')
			.distanceType('cosine')
			.where(scopeFilter(projectId, 'has_embedding = true'))
			.select(SYMBOL_COLUMNS)
			.limit(limit)
			.toArray();

		const matches: VectorMatch[] = [];
		for (const row of rows) {
			if (!isRecord(row)) continue;
			const distance = Number(row['_distance']);
			matches.push({
				symbol: toStoredSymbol(row),
				similarity: Number.isFinite(distance) ? 1 - distance : 0,
			});
		}
		return matches.sort((a, b) => b.similarity - a.similarity);
	}

	/**
	 * Rows of a project (optionally one file), ordered by file and line.
	 */
	async listSymbols(
		projectId: string,
		filePath?: string,
	): Promise<StoredSymbolWithEmbedding[]> {
		let filter = `project_id = '${escapeString(projectId)}'`;
		if (filePath !== undefined) {
			filter += ` AND file_path = '${escapeString(filePath)}'`;
		}
		const table = this.getTable();
		const count = await table.countRows(filter);
		if (count === 0) {
			return [];
		}

		const rows: unknown[] = await table.query().where(filter).limit(count).toArray();
		return rows
			.filter(isRecord)
			.map(row => ({
				...toStoredSymbol(row),
				embedding: readBoolean(row, 'has_embedding')
					? normalizeVector(row['embedding'])
					: null,
			}))
			.sort(
				(a, b) =>
					a.filePath.localeCompare(b.filePath) ||
					(a.startLine ?? 0) - (b.startLine ?? 0),
			);
	}

	/**
	 * What the store holds per file for a project, used to skip unchanged
	 * files.
	 */
	async getFileStates(projectId: string): Promise<Map<string, StoredFileState>> {
		const filter = `project_id = '${escapeString(projectId)}'`;
		const table = this.getTable();
		const states = new Map<string, StoredFileState>();
		const count = await table.countRows(filter);
		if (count === 0) {
			return states;
		}

		const rows: unknown[] = await table
			.query()
			.where(filter)
			.select(['file_path', 'file_hash', 'has_embedding'])
			.limit(count)
			.toArray();
		for (const row of rows) {
			if (!isRecord(row)) continue;
			const filePath = readString(row, 'file_path');
			const state = states.get(filePath) ?? {
				fileHashes: new Set<string>(),
				symbols: 0,
				missingEmbeddings: 0,
			};
			state.fileHashes.add(readString(row, 'file_hash'));
			state.symbols++;
			if (!readBoolean(row, 'has_embedding')) {
				state.missingEmbeddings++;
			}
			states.set(filePath, state);
		}
		return states;
	}

	async countSymbols(projectId: string | null): Promise<number> {
		return this.getTable().countRows(projectFilter(projectId));
	}

	async countEmbedded(projectId: string | null): Promise<number> {
		return this.getTable().countRows(
			scopeFilter(projectId, 'has_embedding = true'),
		);
	}

	/**
	 * Build scalar indexes on project_id and name_lower, and the cosine ANN
	 * index on embedding, once the table holds `minRows` rows. The ANN index
	 * waits until every row has an embedding; a failed ANN build is logged
	 * and retried on the next call.
	 *
	 * @returns names of the indexes created
	 */
	async ensureIndexes(minRows: number): Promise<string[]> {
		return this.writeLimit(async () => {
			const table = this.getTable();
			const rows = await table.countRows();
			if (rows < minRows) {
				return [];
			}

			const existing = await table.listIndices();
			const indexed = new Set(existing.flatMap(index => index.columns));
			const created: string[] = [];

			for (const column of ['project_id', 'name_lower']) {
				if (!indexed.has(column)) {
					await table.createIndex(column, {config: lancedb.Index.btree()});
					created.push(column);
				}
			}

			// Rows without an embedding hold zero vectors, which IVF-PQ
			// training cannot take; wait until every row is embedded.
			const embedded = await table.countRows('has_embedding = true');
			if (
				!indexed.has('embedding') &&
				embedded >= MIN_ROWS_FOR_VECTOR_INDEX &&
				embedded === rows
			) {
				try {
					await table.createIndex('embedding', {
						config: lancedb.Index.ivfPq({distanceType: 'cosine'}),
					});
					created.push('embedding');
				} catch (error) {
					this.logger.warn('SymbolStore', 'Vector index build failed', {
						rows,
						error: errorMessage(error),
					});
				}
			}

			if (created.length > 0) {
				this.logger.info('SymbolStore', 'Created indexes', {columns: created});
			}
			return created;
		});
	}

	private async select(filter: string, limit: number): Promise<StoredSymbol[]> {
		const rows: unknown[] = await this.getTable()
			.query()
			.where(filter)
			.select(SYMBOL_COLUMNS)
			.limit(limit)
			.toArray();
		return rows.filter(isRecord).map(toStoredSymbol);
	}
}

// ============================================================
// Filters
// ============================================================

/**
 * Escape a value for use inside a single-quoted SQL string.
 */
export function escapeString(value: string): string {
	return value.replace(/'/g, "''");
}

/**
 * Escape a value for use inside a LIKE pattern.
 */
export function escapeForLike(value: string): string {
	return value
		.replace(/\\/g, '\\\\')
		.replace(/'/g, "''")
		.replace(/%/g, '\\%')
		.replace(/_/g, '\\_');
}

function quoteList(values: readonly string[]): string {
	return values.map(v => `'${escapeString(v)}'`).join(', ');
}

/**
 * Filter selecting one project, or undefined for all projects.
 */
function projectFilter(projectId: string | null): string | undefined {
	return projectId === null
		? undefined
		: `project_id = '${escapeString(projectId)}'`;
}

/**
 * AND a project scope onto a filter. Null project means all projects.
 */
function scopeFilter(projectId: string | null, filter: string): string {
	const scope = projectFilter(projectId);
	return scope ? `${scope} AND ${filter}` : filter;
}

// ============================================================
// Row decoding
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}

function readString(row: Record<string, unknown>, key: string): string {
	const value = row[key];
	return typeof value === 'string' ? value : String(value ?? '');
}

function readOptionalString(
	row: Record<string, unknown>,
	key: string,
): string | null {
	const value = row[key];
	return typeof value === 'string' ? value : null;
}

function readOptionalInt(
	row: Record<string, unknown>,
	key: string,
): number | null {
	const value = row[key];
	if (value === null || value === undefined) return null;
	const n = Number(value);
	return Number.isFinite(n) ? n : null;
}

function readBoolean(row: Record<string, unknown>, key: string): boolean {
	return row[key] === true;
}

function toStoredSymbol(row: Record<string, unknown>): StoredSymbol {
	return {
		symbolKey: readString(row, 'symbol_key'),
		projectId: readString(row, 'project_id'),
		name: readString(row, 'name'),
		symbolType: readString(row, 'symbol_type'),
		filePath: readString(row, 'file_path'),
		startLine: readOptionalInt(row, 'start_line'),
		endLine: readOptionalInt(row, 'end_line'),
		code: readString(row, 'code'),
		docstring: readOptionalString(row, 'docstring'),
		parentName: readOptionalString(row, 'parent_name'),
		language: readString(row, 'language'),
		fileHash: readString(row, 'file_hash'),
		hasEmbedding: readBoolean(row, 'has_embedding'),
		createdAt: readString(row, 'created_at'),
		updatedAt: readString(row, 'updated_at'),
	};
}

/**
 * Arrow vectors come back as typed arrays or Vector objects.
 */
function normalizeVector(value: unknown): number[] | null {
	if (!value) return null;
	if (Array.isArray(value)) {
		return value.map(v => Number(v));
	}
	if (value instanceof Float32Array || value instanceof Float64Array) {
		return Array.from(value);
	}
	if (typeof value === 'object' && 'toArray' in value) {
		const {toArray} = value;
		if (typeof toArray === 'function') {
			return normalizeVector(toArray.call(value));
		}
	}
	return null;
}

/**
 * Symbol store types.
 */

/**
 * A symbol as handed to the store. Inputs with a missing or blank
 * `projectId` are rejected by the store.
 */
export type SymbolInput = {
	projectId: string | null | undefined;
	name: string;
	symbolType: string;
	filePath: string;
	startLine: number | null;
	endLine: number | null;
	code: string;
	docstring: string | null;
	parentName: string | null;
	language: string;
	/** SHA256 of the file content the symbol was parsed from */
	fileHash: string;
	/** Absent when the embedding gateway failed */
	embedding: number[] | null;
};

/**
 * A persisted symbol row.
 */
export type StoredSymbol = {
	symbolKey: string;
	projectId: string;
	name: string;
	symbolType: string;
	filePath: string;
	startLine: number | null;
	endLine: number | null;
	code: string;
	docstring: string | null;
	parentName: string | null;
	language: string;
	fileHash: string;
	hasEmbedding: boolean;
	createdAt: string;
	updatedAt: string;
};

export type StoredSymbolWithEmbedding = StoredSymbol & {
	embedding: number[] | null;
};

export type VectorMatch = {
	symbol: StoredSymbol;
	/** Cosine similarity, 1 = identical direction */
	similarity: number;
};

export type LineSpan = {
	startLine: number | null;
	endLine: number | null;
};

export type UpsertResult = {
	/** Rows inserted or updated */
	written: number;
	/** Inputs refused for a missing project identity */
	rejected: number;
	/** Keys of the written rows */
	keys: string[];
};

/**
 * Per-file summary of what the store holds for a project.
 */
export type StoredFileState = {
	fileHashes: Set<string>;
	symbols: number;
	missingEmbeddings: number;
};

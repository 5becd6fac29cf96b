/**
 * Grammars - web-tree-sitter initialisation and WASM grammar loading.
 *
 * Grammars come from the tree-sitter-wasms package
 * (node_modules/tree-sitter-wasms/out/).
 */

import path from 'node:path';
import {createRequire} from 'node:module';
import Parser from 'web-tree-sitter';
import type {GrammarLanguage} from './types.js';

// Use createRequire to resolve WASM file paths from tree-sitter-wasms
const require = createRequire(import.meta.url);

/**
 * Mapping from language names to tree-sitter-wasms filenames.
 */
export const LANGUAGE_WASM_FILES: Record<GrammarLanguage, string> = {
	python: 'tree-sitter-python.wasm',
	typescript: 'tree-sitter-typescript.wasm',
	tsx: 'tree-sitter-tsx.wasm',
	javascript: 'tree-sitter-javascript.wasm',
};

export type GrammarSet = Record<GrammarLanguage, Parser.Language>;

let initPromise: Promise<void> | null = null;

/**
 * Initialise the web-tree-sitter WASM module once per process.
 */
export function initTreeSitter(): Promise<void> {
	if (!initPromise) {
		initPromise = Parser.init().catch((error: unknown) => {
			initPromise = null;
			throw error;
		});
	}
	return initPromise;
}

function getWasmBasePath(): string {
	const wasmPackagePath = require.resolve('tree-sitter-wasms/package.json');
	return path.join(path.dirname(wasmPackagePath), 'out');
}

/**
 * Load every supported grammar.
 *
 * Must be sequential: web-tree-sitter has global state that gets corrupted
 * when loading multiple WASM modules in parallel.
 */
export async function loadGrammars(): Promise<GrammarSet> {
	await initTreeSitter();
	const basePath = getWasmBasePath();

	const python = await Parser.Language.load(
		path.join(basePath, LANGUAGE_WASM_FILES.python),
	);
	const typescript = await Parser.Language.load(
		path.join(basePath, LANGUAGE_WASM_FILES.typescript),
	);
	const tsx = await Parser.Language.load(
		path.join(basePath, LANGUAGE_WASM_FILES.tsx),
	);
	const javascript = await Parser.Language.load(
		path.join(basePath, LANGUAGE_WASM_FILES.javascript),
	);

	return {python, typescript, tsx, javascript};
}

/**
 * ParserRegistry - Immutable extension to extractor mapping.
 *
 * Built once at startup and handed to the indexing pipeline; selection is by
 * file extension only.
 */

import path from 'node:path';
import {loadGrammars} from './grammars.js';
import {JavaScriptSymbolExtractor} from './javascript.js';
import {MarkdownSectionExtractor} from './markdown.js';
import {PythonSymbolExtractor} from './python.js';
import {TypeScriptSymbolExtractor} from './typescript.js';
import type {SymbolExtractor} from './types.js';

export class ParserRegistry {
	private readonly byExtension: ReadonlyMap<string, SymbolExtractor>;

	private constructor(byExtension: Map<string, SymbolExtractor>) {
		this.byExtension = byExtension;
	}

	/**
	 * Build a registry. Two extractors claiming one extension is a
	 * programming error.
	 */
	static fromExtractors(extractors: readonly SymbolExtractor[]): ParserRegistry {
		const byExtension = new Map<string, SymbolExtractor>();
		for (const extractor of extractors) {
			for (const ext of extractor.extensions) {
				const key = ext.toLowerCase();
				const existing = byExtension.get(key);
				if (existing) {
					throw new Error(
						`Extension ${key} claimed by both ${existing.name} and ${extractor.name}`,
					);
				}
				byExtension.set(key, extractor);
			}
		}
		return new ParserRegistry(byExtension);
	}

	/**
	 * Extractor for a file, or null when the extension is unsupported.
	 */
	forPath(filePath: string): SymbolExtractor | null {
		return this.byExtension.get(path.extname(filePath).toLowerCase()) ?? null;
	}

	supports(filePath: string): boolean {
		return this.forPath(filePath) !== null;
	}

	get extensions(): string[] {
		return [...this.byExtension.keys()].sort();
	}
}

export type ParserRegistryOptions = {
	/** Also index markdown sections */
	documents?: boolean;
};

/**
 * Load grammars and build the default registry (Python, TypeScript/TSX,
 * JavaScript, and markdown when `documents` is set).
 */
export async function createParserRegistry(
	options: ParserRegistryOptions = {},
): Promise<ParserRegistry> {
	const grammars = await loadGrammars();
	const extractors: SymbolExtractor[] = [
		new PythonSymbolExtractor(grammars.python),
		new TypeScriptSymbolExtractor(grammars.typescript, grammars.tsx),
		new JavaScriptSymbolExtractor(grammars.javascript),
	];
	if (options.documents) {
		extractors.push(new MarkdownSectionExtractor());
	}
	return ParserRegistry.fromExtractors(extractors);
}

/**
 * TypeScriptSymbolExtractor - .ts and .tsx sources (TSX grammar for JSX files).
 */

import path from 'node:path';
import type Parser from 'web-tree-sitter';
import {EcmaScriptSymbolExtractor} from './ecmascript.js';
import type {SupportedLanguage} from './types.js';

export class TypeScriptSymbolExtractor extends EcmaScriptSymbolExtractor {
	readonly name = 'typescript';
	readonly extensions = ['.ts', '.tsx', '.mts', '.cts'] as const;

	constructor(
		private readonly typescript: Parser.Language,
		private readonly tsx: Parser.Language,
	) {
		super();
	}

	protected grammarFor(filePath: string): {
		language: SupportedLanguage;
		grammar: Parser.Language;
	} {
		return path.extname(filePath).toLowerCase() === '.tsx'
			? {language: 'tsx', grammar: this.tsx}
			: {language: 'typescript', grammar: this.typescript};
	}
}

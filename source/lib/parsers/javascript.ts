/**
 * JavaScriptSymbolExtractor - .js/.jsx/.mjs/.cjs sources.
 */

import type Parser from 'web-tree-sitter';
import {EcmaScriptSymbolExtractor} from './ecmascript.js';
import type {SupportedLanguage} from './types.js';

export class JavaScriptSymbolExtractor extends EcmaScriptSymbolExtractor {
	readonly name = 'javascript';
	readonly extensions = ['.js', '.jsx', '.mjs', '.cjs'] as const;

	constructor(private readonly grammar: Parser.Language) {
		super();
	}

	protected grammarFor(): {
		language: SupportedLanguage;
		grammar: Parser.Language;
	} {
		return {language: 'javascript', grammar: this.grammar};
	}
}

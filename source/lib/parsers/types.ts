/**
 * Parser types - Symbol records and the extractor capability.
 */

/**
 * Grammars the parsers can load.
 */
export type GrammarLanguage = 'python' | 'typescript' | 'tsx' | 'javascript';

export type SupportedLanguage = GrammarLanguage | 'markdown';

/**
 * Kind of definition a symbol represents.
 */
export type SymbolType =
	| 'function'
	| 'class'
	| 'method'
	| 'interface'
	| 'type'
	| 'enum'
	/** Heading-delimited part of a documentation file */
	| 'section';

/**
 * A definition extracted from one file. Carries no project identity and
 * no embedding; the pipeline attaches both.
 */
export type ParsedSymbol = {
	name: string;
	symbolType: SymbolType;
	/** Path relative to the project root, `/`-separated */
	filePath: string;
	/** 1-based, inclusive */
	startLine: number;
	/** 1-based, inclusive */
	endLine: number;
	/** Verbatim text of the full definition */
	code: string;
	docstring: string | null;
	/** Name of the enclosing definition (class for methods) */
	parentName: string | null;
	language: SupportedLanguage;
};

export type ParseFailure = {
	filePath: string;
	reason: string;
};

export type ParseResult =
	| {ok: true; symbols: ParsedSymbol[]}
	| {ok: false; failure: ParseFailure};

/**
 * One implementation per language family. `parse` never throws: malformed
 * input yields `{ok: false}` and no symbols.
 */
export interface SymbolExtractor {
	/** Language family name, used in logs */
	readonly name: string;
	/** Lowercase extensions including the dot */
	readonly extensions: readonly string[];
	parse(text: string, filePath: string): ParseResult;
}

export {
	createParserRegistry,
	ParserRegistry,
	type ParserRegistryOptions,
} from './registry.js';
export {PythonSymbolExtractor} from './python.js';
export {TypeScriptSymbolExtractor} from './typescript.js';
export {JavaScriptSymbolExtractor} from './javascript.js';
export {
	extractHeadings,
	MarkdownSectionExtractor,
	type MarkdownHeading,
} from './markdown.js';
export {TreeSitterSymbolExtractor, isGeneratedSource} from './tree-sitter.js';
export type {
	GrammarLanguage,
	ParsedSymbol,
	ParseFailure,
	ParseResult,
	SupportedLanguage,
	SymbolExtractor,
	SymbolType,
} from './types.js';

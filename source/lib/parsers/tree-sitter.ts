/**
 * TreeSitterSymbolExtractor - Shared parse/validate/emit flow for
 * grammar-backed extractors. Subclasses pick a grammar per file and walk
 * the syntax tree.
 */

import Parser from 'web-tree-sitter';
import {GENERATED_HEADER_LINES} from '../constants.js';
import {errorMessage} from '../errors.js';
import type {
	ParsedSymbol,
	ParseResult,
	SupportedLanguage,
	SymbolExtractor,
	SymbolType,
} from './types.js';

const GENERATED_MARKER = /@generated|do not edit|auto-?generated/i;

/**
 * Enclosing definition while walking the tree.
 */
export type Scope = {name: string; kind: 'class' | 'function'} | null;

export type ExtractionContext = {
	filePath: string;
	language: SupportedLanguage;
	symbols: ParsedSymbol[];
};

/**
 * True when the file header marks the file as tool-generated.
 */
export function isGeneratedSource(text: string): boolean {
	const header = text.split('\n', GENERATED_HEADER_LINES).join('\n');
	return GENERATED_MARKER.test(header);
}

function findErrorNode(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
	if (node.type === 'ERROR' || node.isMissing) {
		return node;
	}
	for (const child of node.children) {
		if (child.hasError || child.isMissing) {
			const found = findErrorNode(child);
			if (found) {
				return found;
			}
		}
	}
	return null;
}

/**
 * 1-based line of the first ERROR or MISSING node, or null for a clean tree.
 * Recovered trees (an unclosed brace parsed as MISSING) count as errors.
 */
export function firstErrorLine(root: Parser.SyntaxNode): number | null {
	if (!root.hasError) {
		return null;
	}
	return (findErrorNode(root) ?? root).startPosition.row + 1;
}

export abstract class TreeSitterSymbolExtractor implements SymbolExtractor {
	abstract readonly name: string;
	abstract readonly extensions: readonly string[];

	private readonly parser = new Parser();

	protected abstract grammarFor(filePath: string): {
		language: SupportedLanguage;
		grammar: Parser.Language;
	};

	protected abstract collect(
		root: Parser.SyntaxNode,
		context: ExtractionContext,
	): void;

	parse(text: string, filePath: string): ParseResult {
		if (isGeneratedSource(text)) {
			return {ok: true, symbols: []};
		}

		let tree: Parser.Tree | null = null;
		try {
			const {language, grammar} = this.grammarFor(filePath);
			this.parser.setLanguage(grammar);
			tree = this.parser.parse(text);
			if (!tree) {
				return {ok: false, failure: {filePath, reason: 'Parser returned no tree'}};
			}

			const errorLine = firstErrorLine(tree.rootNode);
			if (errorLine !== null) {
				return {
					ok: false,
					failure: {filePath, reason: `Syntax error at line ${errorLine}`},
				};
			}

			const context: ExtractionContext = {filePath, language, symbols: []};
			this.collect(tree.rootNode, context);
			context.symbols.sort(
				(a, b) => a.startLine - b.startLine || a.endLine - b.endLine,
			);
			return {ok: true, symbols: context.symbols};
		} catch (error) {
			return {ok: false, failure: {filePath, reason: errorMessage(error)}};
		} finally {
			tree?.delete();
		}
	}

	/**
	 * Record a symbol spanning `spanNode`.
	 */
	protected emit(
		context: ExtractionContext,
		spanNode: Parser.SyntaxNode,
		fields: {
			name: string;
			symbolType: SymbolType;
			docstring: string | null;
			parentName: string | null;
		},
	): void {
		context.symbols.push({
			...fields,
			filePath: context.filePath,
			startLine: spanNode.startPosition.row + 1,
			endLine: spanNode.endPosition.row + 1,
			code: spanNode.text,
			language: context.language,
		});
	}
}

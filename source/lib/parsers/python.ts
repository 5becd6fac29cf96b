/**
 * PythonSymbolExtractor - Classes, functions and methods from Python source.
 */

import type Parser from 'web-tree-sitter';
import {
	TreeSitterSymbolExtractor,
	type ExtractionContext,
	type Scope,
} from './tree-sitter.js';
import type {SupportedLanguage} from './types.js';

/**
 * Strip quotes (and string prefixes) from a Python string literal.
 */
export function cleanPythonDocstring(literal: string): string | null {
	const match = /^[rRbBuUfF]{0,2}("""|'''|"|')([\s\S]*)\1$/.exec(literal);
	const body = match?.[2] ?? literal;
	return body.trim() || null;
}

export class PythonSymbolExtractor extends TreeSitterSymbolExtractor {
	readonly name = 'python';
	readonly extensions = ['.py', '.pyi'] as const;

	constructor(private readonly grammar: Parser.Language) {
		super();
	}

	protected grammarFor(): {
		language: SupportedLanguage;
		grammar: Parser.Language;
	} {
		return {language: 'python', grammar: this.grammar};
	}

	protected collect(root: Parser.SyntaxNode, context: ExtractionContext): void {
		this.walk(root, null, context);
	}

	private walk(
		node: Parser.SyntaxNode,
		scope: Scope,
		context: ExtractionContext,
	): void {
		for (const child of node.namedChildren) {
			if (child.type === 'decorated_definition') {
				const definition = child.childForFieldName('definition');
				if (definition) {
					this.visitDefinition(definition, child, scope, context);
				}
				continue;
			}
			if (
				child.type === 'class_definition' ||
				child.type === 'function_definition'
			) {
				this.visitDefinition(child, child, scope, context);
				continue;
			}
			this.walk(child, scope, context);
		}
	}

	/**
	 * Decorated definitions span their decorators.
	 */
	private visitDefinition(
		definition: Parser.SyntaxNode,
		spanNode: Parser.SyntaxNode,
		scope: Scope,
		context: ExtractionContext,
	): void {
		const name = definition.childForFieldName('name')?.text;
		if (!name) {
			this.walk(definition, scope, context);
			return;
		}

		const isClass = definition.type === 'class_definition';
		this.emit(context, spanNode, {
			name,
			symbolType: isClass
				? 'class'
				: scope?.kind === 'class'
					? 'method'
					: 'function',
			docstring: this.docstringOf(definition),
			parentName: scope?.name ?? null,
		});

		const body = definition.childForFieldName('body');
		if (body) {
			this.walk(body, {name, kind: isClass ? 'class' : 'function'}, context);
		}
	}

	/**
	 * First statement of the body, when it is a bare string.
	 */
	private docstringOf(definition: Parser.SyntaxNode): string | null {
		const body = definition.childForFieldName('body');
		const first = body?.namedChildren[0];
		if (first?.type !== 'expression_statement') {
			return null;
		}
		const literal = first.namedChildren[0];
		if (literal?.type !== 'string') {
			return null;
		}
		return cleanPythonDocstring(literal.text);
	}
}

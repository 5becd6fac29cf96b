/**
 * EcmaScriptSymbolExtractor - Shared walker for the JavaScript, TypeScript
 * and TSX grammars.
 *
 * Emits classes, interfaces, type aliases, enums, function declarations,
 * methods, and functions bound to module-level `const`/`let`/`var`.
 */

import type Parser from 'web-tree-sitter';
import {
	TreeSitterSymbolExtractor,
	type ExtractionContext,
	type Scope,
} from './tree-sitter.js';
import type {SymbolType} from './types.js';

const CLASS_TYPES = new Set([
	'class_declaration',
	'abstract_class_declaration',
]);

const FUNCTION_DECLARATION_TYPES = new Set([
	'function_declaration',
	'generator_function_declaration',
]);

const DECLARATION_SYMBOL_TYPES: Record<string, SymbolType> = {
	interface_declaration: 'interface',
	type_alias_declaration: 'type',
	enum_declaration: 'enum',
};

/**
 * Values that make a variable declarator a function definition.
 */
const FUNCTION_VALUE_TYPES = new Set([
	'arrow_function',
	'function_expression',
	'function',
	'generator_function',
]);

/**
 * Nodes a JSDoc comment may sit in front of instead of the declaration.
 */
const DOC_WRAPPER_TYPES = new Set([
	'export_statement',
	'lexical_declaration',
	'variable_declaration',
	'variable_declarator',
]);

/**
 * Clean a JSDoc block into plain text.
 */
export function cleanJsDoc(text: string): string | null {
	return (
		text
			.replace(/^\/\*\*/, '')
			.replace(/\*\/$/, '')
			.replace(/^\s*\* ?/gm, '')
			.trim() || null
	);
}

export abstract class EcmaScriptSymbolExtractor extends TreeSitterSymbolExtractor {
	protected collect(root: Parser.SyntaxNode, context: ExtractionContext): void {
		this.walk(root, null, context);
	}

	private walk(
		node: Parser.SyntaxNode,
		scope: Scope,
		context: ExtractionContext,
	): void {
		for (const child of node.namedChildren) {
			this.visit(child, scope, context);
		}
	}

	private visit(
		node: Parser.SyntaxNode,
		scope: Scope,
		context: ExtractionContext,
	): void {
		const declaredType = DECLARATION_SYMBOL_TYPES[node.type];
		if (declaredType) {
			this.emitNamed(node, declaredType, scope, context);
			return;
		}

		if (CLASS_TYPES.has(node.type)) {
			const name = this.emitNamed(node, 'class', scope, context);
			const body = node.childForFieldName('body');
			if (name && body) {
				this.walk(body, {name, kind: 'class'}, context);
			}
			return;
		}

		if (FUNCTION_DECLARATION_TYPES.has(node.type)) {
			this.visitFunction(node, node, 'function', scope, context);
			return;
		}

		if (node.type === 'method_definition' && scope?.kind === 'class') {
			this.visitFunction(node, node, 'method', scope, context);
			return;
		}

		if (node.type === 'public_field_definition' && scope?.kind === 'class') {
			const value = node.childForFieldName('value');
			if (value && FUNCTION_VALUE_TYPES.has(value.type)) {
				this.visitFunction(node, value, 'method', scope, context);
				return;
			}
		}

		if (
			(node.type === 'lexical_declaration' ||
				node.type === 'variable_declaration') &&
			scope === null
		) {
			this.visitVariableDeclaration(node, context);
			return;
		}

		this.walk(node, scope, context);
	}

	/**
	 * Emit `node` under its `name` field. Returns the name, or null when the
	 * node is anonymous.
	 */
	private emitNamed(
		node: Parser.SyntaxNode,
		symbolType: SymbolType,
		scope: Scope,
		context: ExtractionContext,
	): string | null {
		const name = node.childForFieldName('name')?.text;
		if (!name) {
			return null;
		}
		this.emit(context, node, {
			name,
			symbolType,
			docstring: this.jsDocFor(node),
			parentName: scope?.name ?? null,
		});
		return name;
	}

	private visitFunction(
		node: Parser.SyntaxNode,
		functionNode: Parser.SyntaxNode,
		symbolType: SymbolType,
		scope: Scope,
		context: ExtractionContext,
	): void {
		const name = this.emitNamed(node, symbolType, scope, context);
		const body = functionNode.childForFieldName('body');
		if (body) {
			this.walk(body, name ? {name, kind: 'function'} : scope, context);
		}
	}

	/**
	 * `const handler = () => {}` spans the whole declaration when it binds a
	 * single function, otherwise just the declarator.
	 */
	private visitVariableDeclaration(
		node: Parser.SyntaxNode,
		context: ExtractionContext,
	): void {
		const declarators = node.namedChildren.filter(
			child => child.type === 'variable_declarator',
		);

		for (const declarator of declarators) {
			const nameNode = declarator.childForFieldName('name');
			const value = declarator.childForFieldName('value');
			if (!value) {
				continue;
			}
			if (
				nameNode?.type !== 'identifier' ||
				!FUNCTION_VALUE_TYPES.has(value.type)
			) {
				this.walk(value, null, context);
				continue;
			}

			const spanNode = declarators.length === 1 ? node : declarator;
			this.emit(context, spanNode, {
				name: nameNode.text,
				symbolType: 'function',
				docstring: this.jsDocFor(spanNode),
				parentName: null,
			});
			const body = value.childForFieldName('body');
			if (body) {
				this.walk(body, {name: nameNode.text, kind: 'function'}, context);
			}
		}
	}

	/**
	 * JSDoc comment directly above the node, or above an export/declaration
	 * wrapper around it.
	 */
	private jsDocFor(node: Parser.SyntaxNode): string | null {
		let current: Parser.SyntaxNode | null = node;

		while (current) {
			const prev: Parser.SyntaxNode | null = current.previousSibling;
			if (prev?.type === 'comment') {
				const adjacent =
					prev.endPosition.row >= current.startPosition.row - 1;
				return adjacent && prev.text.startsWith('/**')
					? cleanJsDoc(prev.text)
					: null;
			}

			const parent: Parser.SyntaxNode | null = current.parent;
			if (!parent || !DOC_WRAPPER_TYPES.has(parent.type)) {
				return null;
			}
			current = parent;
		}

		return null;
	}
}

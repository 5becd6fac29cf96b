/**
 * MarkdownSectionExtractor - Documentation files as `section` symbols.
 *
 * Each ATX heading opens a section that runs until the next heading of the
 * same or a higher level, so sections nest the way classes and methods do:
 * `parentName` is the enclosing heading. Front matter is stripped with
 * gray-matter; a file without headings but with a front-matter `title`
 * becomes one section.
 */

import matter from 'gray-matter';
import {errorMessage} from '../errors.js';
import type {ParsedSymbol, ParseResult, SymbolExtractor} from './types.js';

const HEADING = /^ {0,3}(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE = /^ {0,3}(`{3,}|~{3,})/;

export type MarkdownHeading = {
	title: string;
	level: number;
	/** 0-based index into the lines it was read from */
	index: number;
};

/**
 * ATX headings outside fenced code blocks.
 */
export function extractHeadings(lines: readonly string[]): MarkdownHeading[] {
	const headings: MarkdownHeading[] = [];
	let fence: string | null = null;

	lines.forEach((line, index) => {
		const fenceMatch = FENCE.exec(line);
		if (fence !== null) {
			if (fenceMatch?.[1]?.startsWith(fence)) {
				fence = null;
			}
			return;
		}
		if (fenceMatch?.[1]) {
			fence = fenceMatch[1];
			return;
		}

		const match = HEADING.exec(line);
		const marks = match?.[1];
		const title = match?.[2]?.trim();
		if (marks && title) {
			headings.push({title, level: marks.length, index});
		}
	});

	return headings;
}

/**
 * First paragraph after a heading, joined onto one line.
 */
function leadParagraph(lines: readonly string[]): string | null {
	const paragraph: string[] = [];
	for (const line of lines) {
		const trimmed = line.trim();
		if (trimmed === '') {
			if (paragraph.length > 0) break;
			continue;
		}
		if (FENCE.test(line) || HEADING.test(line)) break;
		paragraph.push(trimmed);
	}
	return paragraph.length > 0 ? paragraph.join(' ') : null;
}

/**
 * Index of the last non-blank line in [start, end], or start.
 */
function lastContentLine(
	lines: readonly string[],
	start: number,
	end: number,
): number {
	let last = end;
	while (last > start && (lines[last] ?? '').trim() === '') {
		last--;
	}
	return last;
}

function countNewlines(text: string): number {
	let count = 0;
	for (const char of text) {
		if (char === '\n') count++;
	}
	return count;
}

export class MarkdownSectionExtractor implements SymbolExtractor {
	readonly name = 'markdown';
	readonly extensions = ['.md', '.markdown', '.mdx'] as const;

	parse(text: string, filePath: string): ParseResult {
		let body: string;
		let title: unknown;
		try {
			const parsed = matter(text);
			body = parsed.content;
			title = parsed.data['title'];
		} catch (error) {
			return {
				ok: false,
				failure: {
					filePath,
					reason: `Invalid front matter: ${errorMessage(error)}`,
				},
			};
		}

		// Lines removed with the front matter, to report file line numbers
		const offset = text.endsWith(body)
			? countNewlines(text.slice(0, text.length - body.length))
			: 0;
		const lines = body.split('\n');
		const headings = extractHeadings(lines);

		if (headings.length === 0) {
			if (
				typeof title !== 'string' ||
				title.trim() === '' ||
				body.trim() === ''
			) {
				return {ok: true, symbols: []};
			}
			const end = lastContentLine(lines, 0, lines.length - 1);
			return {
				ok: true,
				symbols: [
					{
						name: title.trim(),
						symbolType: 'section',
						filePath,
						startLine: offset + 1,
						endLine: offset + end + 1,
						code: lines.slice(0, end + 1).join('\n'),
						docstring: leadParagraph(lines),
						parentName: null,
						language: 'markdown',
					},
				],
			};
		}

		const symbols: ParsedSymbol[] = [];
		const open: MarkdownHeading[] = [];
		headings.forEach((heading, i) => {
			while ((open[open.length - 1]?.level ?? 0) >= heading.level) {
				open.pop();
			}
			const parent = open[open.length - 1] ?? null;
			open.push(heading);

			const next = headings
				.slice(i + 1)
				.find(candidate => candidate.level <= heading.level);
			const end = lastContentLine(
				lines,
				heading.index,
				(next?.index ?? lines.length) - 1,
			);

			symbols.push({
				name: heading.title,
				symbolType: 'section',
				filePath,
				startLine: offset + heading.index + 1,
				endLine: offset + end + 1,
				code: lines.slice(heading.index, end + 1).join('\n'),
				docstring: leadParagraph(lines.slice(heading.index + 1, end + 1)),
				parentName: parent?.title ?? null,
				language: 'markdown',
			});
		});

		return {ok: true, symbols};
	}
}

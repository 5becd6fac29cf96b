/**
 * Exclusion - Path predicate deciding which project files are never parsed.
 *
 * Rules are gitignore-style patterns evaluated with the `ignore` package:
 * built-in directory and artifact rules, the project's .gitignore, and
 * any configured extra patterns. The resulting predicate is pure.
 */

import {createRequire} from 'node:module';
import {BINARY_EXTENSIONS} from './hash.js';

// ignore is a CJS module, use createRequire to import it
const require = createRequire(import.meta.url);
const ignore = require('ignore') as () => Ignore;

interface Ignore {
	add(patterns: string | string[]): this;
	ignores(pathname: string): boolean;
}

/**
 * Returns true when the path (relative to the project root, `/`-separated)
 * must not be indexed.
 */
export type ExclusionPolicy = (relativePath: string) => boolean;

/**
 * Directories that never hold indexable first-party source.
 */
export const DEFAULT_IGNORED_DIRECTORIES: readonly string[] = [
	'.git',
	'.github',
	'.vscode',
	'.idea',
	'.next',
	'.vercel',
	'.symdex',
	'node_modules',
	'dist',
	'build',
	'out',
	'coverage',
	'venv',
	'.venv',
	'env',
	'__pycache__',
	'.mypy_cache',
	'.pytest_cache',
	'tests',
	'test',
	'__tests__',
	'migrations',
	'vendor',
	'staticfiles',
	'static',
	'public',
	'assets',
	'locales',
];

/**
 * Test files living next to sources.
 */
export const DEFAULT_TEST_PATTERNS: readonly string[] = [
	'*.test.*',
	'*.spec.*',
	'test_*.py',
	'*_test.py',
	'conftest.py',
];

/**
 * Compiled, minified and generated artifacts.
 */
export const DEFAULT_ARTIFACT_PATTERNS: readonly string[] = [
	'*.min.js',
	'*.min.css',
	'*.bundle.js',
	'*.chunk.js',
	'*.d.ts',
	'*.map',
	'*.lock',
	'package-lock.json',
];

export type ExclusionOptions = {
	/** Contents of the project's .gitignore, if any */
	gitignore?: string;
	/** Extra gitignore-style patterns */
	patterns?: readonly string[];
	/** Replace the default directory list */
	ignoredDirectories?: readonly string[];
	/** Keep test files (default: excluded) */
	includeTests?: boolean;
};

/**
 * Build the exclusion predicate.
 */
export function createExclusionPolicy(
	options: ExclusionOptions = {},
): ExclusionPolicy {
	const ig = ignore();

	const directories = options.ignoredDirectories ?? DEFAULT_IGNORED_DIRECTORIES;
	ig.add(directories.map(dir => `${dir}/`));
	ig.add(BINARY_EXTENSIONS.map(ext => `*${ext}`));
	ig.add([...DEFAULT_ARTIFACT_PATTERNS]);
	if (!options.includeTests) {
		ig.add([...DEFAULT_TEST_PATTERNS]);
	}
	if (options.gitignore) {
		ig.add(options.gitignore);
	}
	if (options.patterns && options.patterns.length > 0) {
		ig.add([...options.patterns]);
	}

	return (relativePath: string) => {
		const normalized = relativePath.replace(/\\/g, '/').replace(/^\.\//, '');
		// Outside the project root, or not a file path at all
		if (
			normalized === '' ||
			normalized.startsWith('/') ||
			normalized === '..' ||
			normalized.startsWith('../')
		) {
			return true;
		}
		return ig.ignores(normalized);
	};
}

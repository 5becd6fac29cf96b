/**
 * Scanner - Enumerate a project's indexable files.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import {
	createExclusionPolicy,
	DEFAULT_IGNORED_DIRECTORIES,
	type ExclusionPolicy,
} from '../../lib/exclusion.js';
import {createNullLogger, type Logger} from '../../lib/logger.js';

export type ScannedFile = {
	/** Relative to the project root, `/`-separated */
	relativePath: string;
	absolutePath: string;
	size: number;
};

export type ScanOptions = {
	exclude: ExclusionPolicy;
	/** Whether a parser exists for the path */
	supports: (relativePath: string) => boolean;
	maxFileBytes: number;
	/** Directories fast-glob never descends into */
	ignoredDirectories?: readonly string[];
	logger?: Logger;
};

/**
 * fast-glob ignore patterns for directory names at any depth.
 */
export function toGlobIgnorePatterns(directories: readonly string[]): string[] {
	return directories.map(dir => `**/${dir}/**`);
}

/**
 * Build the exclusion predicate for a project: defaults, its .gitignore,
 * and configured patterns.
 */
export async function loadExclusionPolicy(
	rootPath: string,
	patterns: readonly string[] = [],
): Promise<ExclusionPolicy> {
	let gitignore: string | undefined;
	try {
		gitignore = await fs.readFile(path.join(rootPath, '.gitignore'), 'utf-8');
	} catch (error) {
		if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
			throw error;
		}
	}
	return createExclusionPolicy({gitignore, patterns});
}

/**
 * List files under `rootPath` that pass the exclusion policy, have a
 * parser, and are within the size limit. Sorted by path.
 */
export async function scanProjectFiles(
	rootPath: string,
	options: ScanOptions,
): Promise<ScannedFile[]> {
	const logger = options.logger ?? createNullLogger();
	const entries = await fg('**/*', {
		cwd: rootPath,
		dot: true,
		onlyFiles: true,
		followSymbolicLinks: false,
		ignore: toGlobIgnorePatterns(
			options.ignoredDirectories ?? DEFAULT_IGNORED_DIRECTORIES,
		),
		stats: true,
	});

	const files: ScannedFile[] = [];
	for (const entry of entries) {
		const relativePath = entry.path;
		if (options.exclude(relativePath) || !options.supports(relativePath)) {
			continue;
		}
		const size = entry.stats?.size ?? 0;
		if (size > options.maxFileBytes) {
			logger.debug('Scanner', 'Skipping oversized file', {
				file: relativePath,
				size,
			});
			continue;
		}
		files.push({
			relativePath,
			absolutePath: path.join(rootPath, relativePath),
			size,
		});
	}

	return files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}

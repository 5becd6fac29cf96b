/**
 * Hash - Content hashing and binary detection.
 */

import {createHash} from 'node:crypto';

/**
 * Compute SHA256 hash of a string.
 */
export function computeStringHash(content: string): string {
	return createHash('sha256').update(content).digest('hex');
}

/**
 * Compute the store key for a symbol's identity tuple
 * (project_id, file_path, start_line, end_line).
 *
 * Absent lines hash as empty fields so they stay distinct from line 0.
 */
export function computeSymbolKey(
	projectId: string,
	filePath: string,
	startLine: number | null,
	endLine: number | null,
): string {
	return computeStringHash(
		[projectId, filePath, startLine ?? '', endLine ?? ''].join('\u0000'),
	);
}

// ============================================================================
// Binary Detection
// ============================================================================

/**
 * Known binary file extensions.
 */
export const BINARY_EXTENSIONS: readonly string[] = [
	'.png',
	'.jpg',
	'.jpeg',
	'.gif',
	'.bmp',
	'.ico',
	'.webp',
	'.mp3',
	'.mp4',
	'.wav',
	'.mov',
	'.zip',
	'.tar',
	'.gz',
	'.7z',
	'.pdf',
	'.exe',
	'.dll',
	'.so',
	'.dylib',
	'.bin',
	'.ttf',
	'.woff',
	'.woff2',
	'.wasm',
	'.node',
	'.pyc',
	'.pyo',
	'.class',
	'.o',
	'.a',
];

/**
 * Check for null bytes in the first 8KB of already-read content.
 */
export function hasNullBytes(buffer: Uint8Array): boolean {
	const end = Math.min(buffer.length, 8192);
	for (let i = 0; i < end; i++) {
		if (buffer[i] === 0) {
			return true;
		}
	}
	return false;
}

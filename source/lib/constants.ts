/**
 * Constants - Paths, table names, and default limits.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// ============================================================================
// Directory Paths
// ============================================================================

/**
 * Environment variable to override the symdex home directory.
 */
export const SYMDEX_HOME_ENV = 'SYMDEX_HOME';

/**
 * Get the symdex home directory.
 *
 * Default: ~/.local/share/symdex
 * Override: $SYMDEX_HOME
 * Linux (conventional): $XDG_DATA_HOME/symdex
 */
export function getSymdexHomeDir(): string {
	const override = process.env[SYMDEX_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_DATA_HOME']?.trim();
	if (xdg) return path.join(xdg, 'symdex');

	return path.join(os.homedir(), '.local', 'share', 'symdex');
}

/**
 * Resolve the canonical project root for stable project identity.
 * Uses realpath to avoid treating symlinked paths as different projects.
 */
export function getCanonicalProjectRoot(projectRoot: string): string {
	return fs.realpathSync(projectRoot);
}

/**
 * Get a stable project identifier derived from the canonical project root.
 */
export function getProjectId(projectRoot: string): string {
	const canonical = getCanonicalProjectRoot(projectRoot);
	return crypto
		.createHash('sha256')
		.update(`symdex:${canonical}`)
		.digest('hex')
		.slice(0, 20);
}

export function getConfigPath(): string {
	return path.join(getSymdexHomeDir(), 'config.json');
}

/**
 * Get the path to the project registry file.
 */
export function getProjectsPath(): string {
	return path.join(getSymdexHomeDir(), 'projects.json');
}

/**
 * Get the default path to the LanceDB database directory.
 */
export function getLanceDbPath(): string {
	return path.join(getSymdexHomeDir(), 'lancedb');
}

// ============================================================================
// Logging Paths
// ============================================================================

export function getLogsDir(): string {
	return path.join(getSymdexHomeDir(), 'logs');
}

/**
 * Service names for logging.
 */
export type ServiceName = 'indexer' | 'search' | 'symdex';

export function getServiceLogsDir(service: ServiceName): string {
	return path.join(getLogsDir(), service);
}

/**
 * Get the path to a service's current hourly log file.
 * Format: {home}/logs/{service}/YYYY-MM-DD-HH.log
 */
export function getServiceLogPath(service: ServiceName): string {
	const now = new Date();
	const year = now.getFullYear();
	const month = String(now.getMonth() + 1).padStart(2, '0');
	const day = String(now.getDate()).padStart(2, '0');
	const hour = String(now.getHours()).padStart(2, '0');
	const filename = `${year}-${month}-${day}-${hour}.log`;
	return path.join(getServiceLogsDir(service), filename);
}

// ============================================================================
// Storage
// ============================================================================

/** Default table holding symbol rows. */
export const SYMBOLS_TABLE = 'symbols';

/**
 * Rows needed before an IVF-PQ index can be trained on the embedding column.
 */
export const MIN_ROWS_FOR_VECTOR_INDEX = 256;

/** Lines inspected when looking for a generated-file marker. */
export const GENERATED_HEADER_LINES = 5;

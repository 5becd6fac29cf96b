/**
 * Tests for configuration layering and validation.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {loadConfig, mergeConfigLayers, resolveConfig, saveConfig} from '../config.js';
import {getLanceDbPath} from '../constants.js';
import {ConfigurationError} from '../errors.js';

describe('config', () => {
	let dir: string;
	let configPath: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'symdex-config-'));
		configPath = path.join(dir, 'config.json');
	});

	afterEach(async () => {
		await fs.rm(dir, {recursive: true, force: true});
	});

	it('uses provider defaults when no file exists', async () => {
		const config = await loadConfig({configPath, env: {}});

		expect(config.embeddingProvider).toBe('ollama');
		expect(config.embeddingModel).toBe('nomic-embed-text');
		expect(config.embeddingDimensions).toBe(768);
		expect(config.databasePath).toBe(getLanceDbPath());
		expect(config.tableName).toBe('symbols');
		expect(config.indexing.parseConcurrency).toBe(4);
		expect(config.indexing.indexDocuments).toBe(false);
		expect(config.search.minSimilarity).toBe(0.3);
	});

	it('layers file, environment and overrides', async () => {
		await fs.writeFile(
			configPath,
			JSON.stringify({
				embeddingProvider: 'openai',
				indexing: {parseConcurrency: 8},
			}),
		);

		const config = await loadConfig({
			configPath,
			env: {
				SYMDEX_EMBEDDING_DIMENSIONS: '512',
				OPENAI_API_KEY: 'test-secret',
			},
			overrides: {search: {defaultLimit: 5}},
		});

		expect(config.embeddingProvider).toBe('openai');
		expect(config.embeddingModel).toBe('text-embedding-3-small');
		expect(config.embeddingDimensions).toBe(512);
		expect(config.apiKey).toBe('test-secret');
		expect(config.indexing.parseConcurrency).toBe(8);
		expect(config.indexing.embedConcurrency).toBe(2);
		expect(config.search.defaultLimit).toBe(5);
		expect(config.search.lexicalLimit).toBe(50);
	});

	it('rejects a config file that is not JSON', async () => {
		await fs.writeFile(configPath, '{not json');
		await expect(loadConfig({configPath, env: {}})).rejects.toBeInstanceOf(
			ConfigurationError,
		);
	});

	it('rejects invalid values', () => {
		expect(() => resolveConfig({embeddingProvider: 'telepathy'})).toThrow(
			/^Invalid configuration: embeddingProvider: /,
		);
		expect(() => resolveConfig({indexing: {queueCapacity: 0}})).toThrow(
			/^Invalid configuration: indexing\.queueCapacity: /,
		);
	});

	it('merges nested sections one level deep', () => {
		expect(
			mergeConfigLayers(
				{search: {defaultLimit: 3, lexicalLimit: 20}, tableName: 'a'},
				{search: {defaultLimit: 7}, tableName: undefined},
			),
		).toEqual({search: {defaultLimit: 7, lexicalLimit: 20}, tableName: 'a'});
	});

	it('round-trips through saveConfig', async () => {
		const nested = path.join(dir, 'nested', 'config.json');
		await saveConfig({embeddingProvider: 'mock', embeddingDimensions: 32}, nested);

		const config = await loadConfig({configPath: nested, env: {}});
		expect(config.embeddingProvider).toBe('mock');
		expect(config.embeddingModel).toBe('mock-hash');
		expect(config.embeddingDimensions).toBe(32);
	});
});

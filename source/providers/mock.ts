/**
 * Mock embedding provider for testing and offline use.
 *
 * Generates deterministic hash-based embeddings that:
 * - Run instantly (no model or network)
 * - Are deterministic (same input = same output)
 * - Are normalized to unit length
 * - Support any dimension count
 *
 * Distinct texts map to near-orthogonal vectors, so similarity only
 * signals identical input.
 */

import type {EmbeddingProvider} from './types.js';

const DEFAULT_DIMENSIONS = 768;

export class MockEmbeddingProvider implements EmbeddingProvider {
	readonly name = 'mock';
	readonly dimensions: number;

	constructor(dimensions: number = DEFAULT_DIMENSIONS) {
		this.dimensions = dimensions;
	}

	async initialize(): Promise<void> {
		// No initialization needed - instant startup
	}

	async embed(texts: string[]): Promise<number[][]> {
		return texts.map(t => this.hashToVector(t));
	}

	async embedSingle(text: string): Promise<number[]> {
		return this.hashToVector(text);
	}

	/**
	 * Convert text to a deterministic unit vector (mulberry32 stream seeded
	 * by the text hash).
	 */
	private hashToVector(text: string): number[] {
		let state = this.hash(text);
		const next = () => {
			state = (state + 0x6d2b79f5) >>> 0;
			let t = state;
			t = Math.imul(t ^ (t >>> 15), t | 1);
			t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
			return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
		};

		const vec = Array.from({length: this.dimensions}, () => next() * 2 - 1);

		// Normalize to unit length
		const magnitude = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
		return vec.map(v => (magnitude > 0 ? v / magnitude : 0));
	}

	/**
	 * Simple string hash function (djb2).
	 */
	private hash(str: string): number {
		let h = 5381;
		for (let i = 0; i < str.length; i++) {
			h = (Math.imul(h, 33) ^ str.charCodeAt(i)) >>> 0;
		}
		return h;
	}

	close(): void {
		// Nothing to close
	}
}

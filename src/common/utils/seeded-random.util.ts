import { createHash } from 'crypto';

/** First 32 bits of sha256(text), big-endian */
export function seedFromString(text: string): number {
	return createHash('sha256').update(text, 'utf8').digest().readUInt32BE(0);
}

/**
 * mulberry32: small, fast, fully deterministic PRNG.
 * Each call to the returned function yields a float in [0, 1).
 */
export function createSeededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

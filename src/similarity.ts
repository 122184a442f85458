import { InvalidInputError } from "./errors.js";
import type { SimilarityComparator } from "./types.js";

/**
 * Packs a float vector into the little-endian float32 blob layout the
 * bundled comparator reads. Callers with other layouts bring their own
 * comparator.
 */
export function encodeFloat32(vector: readonly number[]): Uint8Array {
  const bytes = new Uint8Array(vector.length * 4);
  const view = new DataView(bytes.buffer);
  vector.forEach((v, i) => view.setFloat32(i * 4, v, true));
  return bytes;
}

export function decodeFloat32(blob: Uint8Array): number[] {
  if (blob.byteLength % 4 !== 0) {
    throw new InvalidInputError(`Embedding length ${blob.byteLength} is not a multiple of 4 bytes`);
  }
  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
  const out: number[] = [];
  for (let offset = 0; offset < blob.byteLength; offset += 4) {
    out.push(view.getFloat32(offset, true));
  }
  return out;
}

/**
 * Compute cosine similarity between two vectors.
 * Returns a value between -1 and 1, where 1 means identical direction.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new InvalidInputError(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

/** Comparator over float32 blobs. Blobs of different dimension compare as 0. */
export const float32Cosine: SimilarityComparator = (a, b) => {
  if (a.byteLength !== b.byteLength) return 0;
  return cosineSimilarity(decodeFloat32(a), decodeFloat32(b));
};

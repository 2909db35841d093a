import { EmbeddingServiceError } from "../errors.js";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingServiceError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let a2 = 0;
  let b2 = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    a2 += av * av;
    b2 += bv * bv;
  }
  const denom = Math.sqrt(a2) * Math.sqrt(b2);
  return denom === 0 ? 0 : dot / denom;
}

/** `1 - cosineDistance`, clamped to [0, 1]: opposite vectors score 0, not negative. */
export function similarityScore(a: number[], b: number[]): number {
  return Math.min(1, Math.max(0, cosineSimilarity(a, b)));
}

import type { EmbeddedChunk, RetrievalHit } from "./types.js";

/** Cosine similarity of two vectors of equal dimension; 0 when either has zero norm. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  a.forEach((x, i) => {
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  });
  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}

/** Opposite or orthogonal vectors score 0. */
export function relevanceFromCosine(similarity: number): number {
  if (!Number.isFinite(similarity)) return 0;
  return Math.min(1, Math.max(0, similarity));
}

/**
 * Entries embedded with a different model, or with another dimension, are
 * never compared against the query.
 */
export function topKSimilarChunks(params: {
  queryEmbedding: number[];
  chunks: Iterable<EmbeddedChunk>;
  k: number;
  embeddingModel: string;
}): Array<{ chunk: EmbeddedChunk; score: number }> {
  const expectedDim = params.queryEmbedding.length;
  if (expectedDim === 0 || params.k <= 0) return [];

  const scored: Array<{ chunk: EmbeddedChunk; score: number }> = [];
  for (const chunk of params.chunks) {
    if (chunk.embeddingModel !== params.embeddingModel) continue;
    if (chunk.embedding.length !== expectedDim) continue;
    scored.push({ chunk, score: cosineSimilarity(params.queryEmbedding, chunk.embedding) });
  }

  return scored.sort((a, b) => b.score - a.score).slice(0, params.k);
}

export function toRetrievalHit(chunk: EmbeddedChunk, similarity: number): RetrievalHit {
  return {
    sourceKind: "vector",
    score: relevanceFromCosine(similarity),
    text: chunk.text,
    provenance: {
      kind: "document",
      id: chunk.documentId,
      title: chunk.filename,
      label: chunk.unitLabel,
      span: { start: chunk.start, end: chunk.end },
      extractionConfidence: chunk.extractionConfidence,
      updatedAt: chunk.ingestedAt,
      format: chunk.format
    }
  };
}

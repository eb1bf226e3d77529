import type { FormatId } from "../loaders/types.js";
import type { Chunk } from "../rag/chunker.js";

export type EmbeddedChunk = Chunk & {
  embedding: number[];
  embeddingModel: string;
};

export type StoredDocument = {
  documentId: string;
  filename: string;
  format: FormatId;
  version: number;
  ingestedAt: string;
  chunks: EmbeddedChunk[];
};

export type StoredIndex = {
  version: 2;
  metric: "cosine";
  documents: StoredDocument[];
};

export type SourceKind = "vector" | "structured";

export type ProvenanceKind = "document" | "ticket" | "kb";

export type Provenance = {
  kind: ProvenanceKind;
  id: string;
  title: string;
  url?: string;
  /** Structural label of the unit a vector hit came from. */
  label?: string;
  span?: { start: number; end: number };
  extractionConfidence: number;
  updatedAt?: string;
  category?: string;
  format?: FormatId;
};

export type RetrievalHit = {
  sourceKind: SourceKind;
  /** Normalized relevance in [0, 1]. */
  score: number;
  text: string;
  provenance: Provenance;
};

import { IndexUnavailableError } from "../errors.js";
import type { IndexPersistence } from "./indexStore.js";
import { toRetrievalHit, topKSimilarChunks } from "./search.js";
import type { EmbeddedChunk, RetrievalHit, StoredDocument, StoredIndex } from "./types.js";

export type IndexedDocumentSummary = {
  documentId: string;
  filename: string;
  format: StoredDocument["format"];
  version: number;
  ingestedAt: string;
  chunkCount: number;
  embeddingModels: string[];
};

export interface VectorIndex {
  /** Idempotent by (document id, unit label, chunk ordinal). */
  upsert(chunk: EmbeddedChunk): Promise<void>;
  /** Atomically replaces every chunk of one document; returns the new version. */
  replaceDocument(documentId: string, chunks: EmbeddedChunk[]): Promise<number>;
  search(queryVector: number[], k: number, modelId: string): Promise<RetrievalHit[]>;
  /** Cascades to every chunk of the document; false when it was absent. */
  delete(documentId: string): Promise<boolean>;
  documents(): Promise<IndexedDocumentSummary[]>;
}

export function chunkKey(chunk: Pick<EmbeddedChunk, "documentId" | "unitLabel" | "ordinal">): string {
  return `${chunk.documentId}\u0000${chunk.unitLabel}\u0000${chunk.ordinal}`;
}

/** Serializes async sections per key; different keys run concurrently. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}

type DocumentState = Omit<StoredDocument, "chunks"> & { chunks: Map<string, EmbeddedChunk> };

function toStored(doc: DocumentState): StoredDocument {
  const { chunks, ...meta } = doc;
  return { ...meta, chunks: [...chunks.values()] };
}

/**
 * In-process index over cosine similarity, optionally mirrored to durable
 * storage. A mutation is committed to memory only after the snapshot that
 * contains it has been saved.
 */
export class LocalVectorIndex implements VectorIndex {
  readonly metric = "cosine" as const;
  private readonly docs = new Map<string, DocumentState>();
  private readonly locks = new KeyedMutex();
  private writes: Promise<void> = Promise.resolve();

  private constructor(private readonly persistence: IndexPersistence | null) {}

  static inMemory(): LocalVectorIndex {
    return new LocalVectorIndex(null);
  }

  static async open(persistence: IndexPersistence): Promise<LocalVectorIndex> {
    let stored: StoredIndex | null;
    try {
      stored = await persistence.load();
    } catch (err: unknown) {
      throw new IndexUnavailableError("Vector index could not be loaded", { cause: err });
    }

    const index = new LocalVectorIndex(persistence);
    for (const doc of stored?.documents ?? []) {
      index.docs.set(doc.documentId, {
        ...doc,
        chunks: new Map(doc.chunks.map((c) => [chunkKey(c), c]))
      });
    }
    return index;
  }

  /**
   * Saves the index as it would look with `next` in place of the document,
   * then commits. Saves are chained so snapshots land in commit order.
   */
  private commit(documentId: string, next: DocumentState | null): Promise<void> {
    const step = this.writes.then(async () => {
      if (this.persistence) {
        const documents: StoredDocument[] = [];
        for (const [id, doc] of this.docs) {
          if (id !== documentId) documents.push(toStored(doc));
        }
        if (next) documents.push(toStored(next));
        try {
          await this.persistence.save({ version: 2, metric: this.metric, documents });
        } catch (err: unknown) {
          throw new IndexUnavailableError("Vector index could not be written", {
            context: { documentId },
            cause: err
          });
        }
      }
      if (next) this.docs.set(documentId, next);
      else this.docs.delete(documentId);
    });
    // The caller sees the failure through `step`; the chain only needs ordering.
    this.writes = step.catch(() => undefined);
    return step;
  }

  upsert(chunk: EmbeddedChunk): Promise<void> {
    return this.locks.run(chunk.documentId, async () => {
      const current = this.docs.get(chunk.documentId);
      const chunks = new Map<string, EmbeddedChunk>(current?.chunks ?? []);
      chunks.set(chunkKey(chunk), chunk);
      await this.commit(chunk.documentId, {
        documentId: chunk.documentId,
        filename: chunk.filename,
        format: chunk.format,
        version: current?.version ?? 1,
        ingestedAt: chunk.ingestedAt,
        chunks
      });
    });
  }

  replaceDocument(documentId: string, chunks: EmbeddedChunk[]): Promise<number> {
    return this.locks.run(documentId, async () => {
      const current = this.docs.get(documentId);
      const first = chunks[0];
      if (!first) {
        if (current) await this.commit(documentId, null);
        return 0;
      }
      if (chunks.some((c) => c.documentId !== documentId)) {
        throw new Error(`Chunks for ${documentId} include another document's chunks`);
      }

      const version = (current?.version ?? 0) + 1;
      await this.commit(documentId, {
        documentId,
        filename: first.filename,
        format: first.format,
        version,
        ingestedAt: first.ingestedAt,
        chunks: new Map(chunks.map((c) => [chunkKey(c), c]))
      });
      return version;
    });
  }

  delete(documentId: string): Promise<boolean> {
    return this.locks.run(documentId, async () => {
      if (!this.docs.has(documentId)) return false;
      await this.commit(documentId, null);
      return true;
    });
  }

  async search(queryVector: number[], k: number, modelId: string): Promise<RetrievalHit[]> {
    return topKSimilarChunks({
      queryEmbedding: queryVector,
      chunks: [...this.docs.values()].flatMap((doc) => [...doc.chunks.values()]),
      k,
      embeddingModel: modelId
    }).map(({ chunk, score }) => toRetrievalHit(chunk, score));
  }

  async documents(): Promise<IndexedDocumentSummary[]> {
    return [...this.docs.values()].map((doc) => ({
      documentId: doc.documentId,
      filename: doc.filename,
      format: doc.format,
      version: doc.version,
      ingestedAt: doc.ingestedAt,
      chunkCount: doc.chunks.size,
      embeddingModels: [...new Set([...doc.chunks.values()].map((c) => c.embeddingModel))]
    }));
  }
}

import crypto from "node:crypto";

import { EmbeddingError, ExtractionError, SupportBrainError } from "../errors.js";
import type { FormatId, SourceDocument } from "../loaders/types.js";
import type { EmbeddedChunk } from "../retrieval/types.js";
import { mapSettled } from "../util/async.js";
import type { RagDeps } from "./deps.js";

export type IngestFile = {
  filename: string;
  data: Uint8Array;
  /** Defaults to an id derived from the filename, so re-ingesting a file replaces it. */
  documentId?: string;
};

export type IngestResult = {
  documentId: string;
  format: FormatId;
  unitCount: number;
  chunkCount: number;
  /** Index version of the document, or null when it has no chunks and is no longer indexed. */
  version: number | null;
};

export type IngestOutcome =
  | { filename: string; ok: true; result: IngestResult }
  | { filename: string; ok: false; error: unknown };

export function defaultDocumentId(filename: string): string {
  const digest = crypto.createHash("sha256").update(filename).digest("hex");
  return `doc_${digest.slice(0, 16)}`;
}

export async function ingestDocument(params: {
  file: IngestFile;
  declaredFormat: string;
  deps: RagDeps;
  signal?: AbortSignal;
}): Promise<IngestResult> {
  const { file, deps, signal } = params;
  const documentId = file.documentId ?? defaultDocumentId(file.filename);
  const context = { documentId, filename: file.filename };
  const format = deps.router.resolve(params.declaredFormat, context);

  const source: SourceDocument = {
    id: documentId,
    filename: file.filename,
    format,
    data: file.data,
    ingestedAt: new Date().toISOString()
  };

  const units = await deps.router.extract(source).catch((err: unknown) => {
    if (err instanceof SupportBrainError) throw err;
    throw new ExtractionError(`Unable to extract ${file.filename}`, {
      context: { ...context, format },
      cause: err
    });
  });

  const chunks = units.flatMap((unit) =>
    deps.splitter.chunk(unit, {
      filename: source.filename,
      format,
      ingestedAt: source.ingestedAt
    })
  );
  if (chunks.length === 0) {
    signal?.throwIfAborted();
    const removed = await deps.index.delete(documentId);
    deps.log(`${file.filename}: no extractable text${removed ? ", previous version removed" : ""}`);
    return { documentId, format, unitCount: units.length, chunkCount: 0, version: null };
  }

  let vectors: number[][];
  try {
    vectors = await deps.embedder.embedMany(
      chunks.map((c) => c.text),
      { signal }
    );
  } catch (err: unknown) {
    if (!(err instanceof EmbeddingError)) throw err;
    throw new EmbeddingError(err.message, {
      transient: err.transient,
      context: { ...err.context, ...context, format },
      cause: err
    });
  }

  const embedded: EmbeddedChunk[] = chunks.map((chunk, i) => ({
    ...chunk,
    embedding: vectors[i] ?? [],
    embeddingModel: deps.embedder.modelId
  }));

  signal?.throwIfAborted();
  const version = await deps.index.replaceDocument(documentId, embedded);
  deps.log(`${file.filename}: ${units.length} units, ${embedded.length} chunks, version ${version}`);

  return { documentId, format, unitCount: units.length, chunkCount: embedded.length, version };
}

/** Ingests files concurrently; each file succeeds or fails on its own. */
export async function ingestDocuments(params: {
  files: Array<IngestFile & { declaredFormat: string }>;
  deps: RagDeps;
  signal?: AbortSignal;
}): Promise<IngestOutcome[]> {
  const { files, deps, signal } = params;
  const settled = await mapSettled(files, deps.settings.ingestConcurrency, (file) =>
    ingestDocument({ file, declaredFormat: file.declaredFormat, deps, signal })
  );

  return settled.map((outcome, i): IngestOutcome => {
    const filename = files[i]?.filename ?? "";
    return outcome.status === "fulfilled"
      ? { filename, ok: true, result: outcome.value }
      : { filename, ok: false, error: outcome.reason };
  });
}

/** Removes a document and all of its chunks; false when it was not indexed. */
export function deleteDocument(documentId: string, deps: RagDeps): Promise<boolean> {
  return deps.index.delete(documentId);
}

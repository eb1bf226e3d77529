export { loadSettings } from "./config/settings.js";
export type { AnswerTuning, ChunkingSettings, Settings } from "./config/settings.js";
export * from "./errors.js";

export { EmbeddingClient } from "./integrations/embeddingClient.js";
export type { CallPolicy } from "./integrations/embeddingClient.js";
export { ChatTextGenerator } from "./integrations/generator.js";
export type { GenerationPrompt, TextGenerator } from "./integrations/generator.js";
export { TesseractRecognizer } from "./integrations/tesseract/recognizer.js";

export { createFormatRouter, normalizeFormat, FORMAT_EXTENSIONS } from "./loaders/formatRouter.js";
export type { FormatRouter } from "./loaders/formatRouter.js";
export { TextExtractor } from "./loaders/textExtractor.js";
export { PdfExtractor } from "./loaders/pdfExtractor.js";
export { DocxExtractor } from "./loaders/docxExtractor.js";
export { TabularExtractor } from "./loaders/tabularExtractor.js";
export { ImageExtractor } from "./loaders/imageExtractor.js";
export type { RecognizedBlock, TextRecognizer } from "./loaders/imageExtractor.js";
export type { ExtractedUnit, Extractor, FormatId, SourceDocument } from "./loaders/types.js";

export { PassageSplitter } from "./rag/chunker.js";
export type { Chunk } from "./rag/chunker.js";
export { assembleContext, formatContext } from "./rag/context.js";
export type { AssembledContext } from "./rag/context.js";
export { synthesizeAnswer } from "./rag/synthesize.js";
export type { AnswerResult, AnswerStatus, CitedSource } from "./rag/synthesize.js";
export { createRagDeps, createRouter } from "./rag/deps.js";
export type { RagDeps } from "./rag/deps.js";
export { defaultDocumentId, deleteDocument, ingestDocument, ingestDocuments } from "./rag/ingest.js";
export type { IngestFile, IngestOutcome, IngestResult } from "./rag/ingest.js";
export { answerQuestion } from "./rag/answer.js";
export type { AnswerOptions } from "./rag/answer.js";

export { fileIndexPersistence } from "./retrieval/indexStore.js";
export type { IndexPersistence } from "./retrieval/indexStore.js";
export { LocalVectorIndex } from "./retrieval/vectorIndex.js";
export type { IndexedDocumentSummary, VectorIndex } from "./retrieval/vectorIndex.js";
export { InMemoryRecordStore, loadRecordStore, matchesRecordFilter } from "./retrieval/structured.js";
export type {
  RecordFilter,
  RecordKind,
  StructuredRecord,
  StructuredSearchAdapter
} from "./retrieval/structured.js";
export type { Provenance, RetrievalHit } from "./retrieval/types.js";

export { createLogger } from "./util/logger.js";
export type { Logger } from "./util/logger.js";

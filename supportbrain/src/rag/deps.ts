import type { Settings } from "../config/settings.js";
import { EmbeddingClient } from "../integrations/embeddingClient.js";
import { createChatModel } from "../integrations/gemini/chat.js";
import { createEmbeddings } from "../integrations/gemini/embeddings.js";
import { ChatTextGenerator } from "../integrations/generator.js";
import type { TextGenerator } from "../integrations/generator.js";
import { TesseractRecognizer } from "../integrations/tesseract/recognizer.js";
import { DocxExtractor } from "../loaders/docxExtractor.js";
import { createFormatRouter } from "../loaders/formatRouter.js";
import type { FormatRouter } from "../loaders/formatRouter.js";
import { ImageExtractor } from "../loaders/imageExtractor.js";
import type { TextRecognizer } from "../loaders/imageExtractor.js";
import { PdfExtractor } from "../loaders/pdfExtractor.js";
import { TabularExtractor } from "../loaders/tabularExtractor.js";
import { TextExtractor } from "../loaders/textExtractor.js";
import { fileIndexPersistence } from "../retrieval/indexStore.js";
import { loadRecordStore } from "../retrieval/structured.js";
import type { StructuredSearchAdapter } from "../retrieval/structured.js";
import { LocalVectorIndex } from "../retrieval/vectorIndex.js";
import type { VectorIndex } from "../retrieval/vectorIndex.js";
import type { Logger } from "../util/logger.js";
import { createLogger } from "../util/logger.js";
import { PassageSplitter } from "./chunker.js";

/** Everything the ingestion and query entry points need, wired once per process. */
export type RagDeps = {
  settings: Settings;
  router: FormatRouter;
  splitter: PassageSplitter;
  embedder: EmbeddingClient;
  index: VectorIndex;
  /** null when no ticket/KB store is configured. */
  records: StructuredSearchAdapter | null;
  generator: TextGenerator;
  log: Logger;
};

export function createRouter(settings: Settings, recognizer: TextRecognizer, log: Logger): FormatRouter {
  return createFormatRouter([
    new TextExtractor(),
    new PdfExtractor(),
    new DocxExtractor(),
    new TabularExtractor(settings.rowsPerUnit),
    new ImageExtractor(recognizer, settings.ocrMinConfidence, log)
  ]);
}

/**
 * Production wiring: Gemini for embeddings and generation, tesseract.js for
 * OCR, the JSON index at `settings.indexPath`. Call `close` when done so the
 * OCR worker exits.
 */
export async function createRagDeps(
  settings: Settings
): Promise<{ deps: RagDeps; close: () => Promise<void> }> {
  const log = createLogger("supportbrain", settings.verbose);
  const recognizer = new TesseractRecognizer({
    language: settings.ocrLanguage,
    langPath: settings.ocrLangPath
  });

  const index = await LocalVectorIndex.open(fileIndexPersistence(settings.indexPath));
  const records = settings.recordsPath ? await loadRecordStore(settings.recordsPath) : null;

  const deps: RagDeps = {
    settings,
    router: createRouter(settings, recognizer, createLogger("ocr", settings.verbose)),
    splitter: new PassageSplitter(settings.chunking),
    embedder: new EmbeddingClient(
      createEmbeddings(settings),
      settings.embeddingModel,
      {
        timeoutMs: settings.embedTimeoutMs,
        maxRetries: settings.maxRetries,
        retryBaseDelayMs: settings.retryBaseDelayMs,
        maxChars: settings.embedMaxChars
      },
      createLogger("embed", settings.verbose)
    ),
    index,
    records,
    generator: new ChatTextGenerator(
      createChatModel(settings),
      {
        timeoutMs: settings.generationTimeoutMs,
        maxRetries: settings.maxRetries,
        retryBaseDelayMs: settings.retryBaseDelayMs
      },
      createLogger("generate", settings.verbose)
    ),
    log
  };

  return { deps, close: () => recognizer.close() };
}

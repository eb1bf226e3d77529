import { Embeddings } from "@langchain/core/embeddings";
import ExcelJS from "exceljs";

import { loadSettings } from "../src/config/settings.js";
import type { Settings } from "../src/config/settings.js";
import { EmbeddingClient } from "../src/integrations/embeddingClient.js";
import type { GenerationPrompt, TextGenerator } from "../src/integrations/generator.js";
import type { RecognizedBlock, TextRecognizer } from "../src/loaders/imageExtractor.js";
import type { RagDeps } from "../src/rag/deps.js";
import { createRouter } from "../src/rag/deps.js";
import { PassageSplitter } from "../src/rag/chunker.js";
import { tokenize } from "../src/retrieval/keyword.js";
import type { StructuredSearchAdapter } from "../src/retrieval/structured.js";
import type { RetrievalHit } from "../src/retrieval/types.js";
import { LocalVectorIndex } from "../src/retrieval/vectorIndex.js";
import type { VectorIndex } from "../src/retrieval/vectorIndex.js";
import { silentLogger } from "../src/util/logger.js";

export const TEST_MODEL = "bow-test";

/** Counts vocabulary words, so texts sharing words point the same way. */
export class BagOfWordsEmbeddings extends Embeddings {
  documentCalls = 0;
  queryCalls = 0;

  constructor(private readonly vocabulary: readonly string[]) {
    super({});
  }

  vector(text: string): number[] {
    const tokens = tokenize(text);
    return this.vocabulary.map((word) => tokens.filter((t) => t === word).length);
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.documentCalls += 1;
    return texts.map((t) => this.vector(t));
  }

  async embedQuery(text: string): Promise<number[]> {
    this.queryCalls += 1;
    return this.vector(text);
  }
}

export const VOCABULARY = [
  "printer", "found", "driver", "queue", "vpn", "token", "connect", "password",
  "reset", "laptop", "network", "error", "toner", "install"
];

export class ScriptedGenerator implements TextGenerator {
  readonly prompts: GenerationPrompt[] = [];

  constructor(private readonly reply: string | Error) {}

  async generate(prompt: GenerationPrompt): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export class FakeRecognizer implements TextRecognizer {
  calls = 0;

  constructor(private readonly blocks: RecognizedBlock[] | Error) {}

  async recognize(): Promise<RecognizedBlock[]> {
    this.calls += 1;
    if (this.blocks instanceof Error) throw this.blocks;
    return this.blocks;
  }
}

export function testSettings(env: Record<string, string> = {}): Settings {
  return loadSettings({
    GOOGLE_API_KEY: "test-key",
    SUPPORTBRAIN_RETRY_BASE_DELAY_MS: "0",
    SUPPORTBRAIN_SOURCE_TIMEOUT_MS: "1000",
    ...env
  });
}

export function makeDeps(
  overrides: Partial<Omit<RagDeps, "embedder">> & {
    embeddings?: Embeddings;
    recognizer?: TextRecognizer;
    index?: VectorIndex;
  } = {}
): RagDeps & { embeddings: Embeddings } {
  const settings = overrides.settings ?? testSettings();
  const embeddings = overrides.embeddings ?? new BagOfWordsEmbeddings(VOCABULARY);
  return {
    settings,
    router:
      overrides.router ??
      createRouter(settings, overrides.recognizer ?? new FakeRecognizer([]), silentLogger),
    splitter: overrides.splitter ?? new PassageSplitter(settings.chunking),
    embedder: new EmbeddingClient(embeddings, TEST_MODEL, {
      timeoutMs: settings.embedTimeoutMs,
      maxRetries: settings.maxRetries,
      retryBaseDelayMs: settings.retryBaseDelayMs,
      maxChars: settings.embedMaxChars
    }),
    index: overrides.index ?? LocalVectorIndex.inMemory(),
    records: overrides.records ?? null,
    generator: overrides.generator ?? new ScriptedGenerator("unused"),
    log: silentLogger,
    embeddings
  };
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function vectorHit(
  id: string,
  score: number,
  text: string,
  extra: Partial<RetrievalHit["provenance"]> = {}
): RetrievalHit {
  return {
    sourceKind: "vector",
    score,
    text,
    provenance: {
      kind: "document",
      id,
      title: `${id}.txt`,
      label: "document",
      span: { start: 0, end: text.length },
      extractionConfidence: 1,
      updatedAt: "2026-01-01T00:00:00.000Z",
      ...extra
    }
  };
}

export function structuredHit(
  id: string,
  score: number,
  text: string,
  extra: Partial<RetrievalHit["provenance"]> = {}
): RetrievalHit {
  return {
    sourceKind: "structured",
    score,
    text,
    provenance: {
      kind: "ticket",
      id,
      title: `Ticket ${id}`,
      extractionConfidence: 1,
      updatedAt: "2026-01-01T00:00:00.000Z",
      ...extra
    }
  };
}

export class FailingSearch implements StructuredSearchAdapter {
  async searchRelevant(): Promise<never> {
    throw new Error("ticket store offline");
  }
}

/** Two sheets: Printers (3 rows) and VPN (2 rows). */
export async function supportWorkbook(): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook();
  const printers = workbook.addWorksheet("Printers");
  printers.addRow(["Model", "Issue", "Fix"]);
  printers.addRow(["LaserJet 400", "printer not found", "Reinstall the driver"]);
  printers.addRow(["OfficeJet 250", "paper jam", "Open the rear tray"]);
  printers.addRow(["LaserJet 500", "toner low", "Order toner"]);

  const vpn = workbook.addWorksheet("VPN");
  vpn.addRow(["Client", "Issue", "Fix"]);
  vpn.addRow(["AnyConnect", "token rejected", "Resync the token"]);
  vpn.addRow(["WireGuard", "cannot connect", "Renew the profile"]);

  return new Uint8Array(await workbook.xlsx.writeBuffer());
}

const DEFAULT_SYSTEM_PROMPT = `You are the support assistant of an IT help desk.
- Answer only from the provided context: documentation passages, knowledge base articles and resolved tickets.
- Cite every passage you rely on by its label, for example [S1].
- If the context does not contain the answer, say explicitly that there is insufficient information in the available sources.
- Prefer concrete, step-by-step resolutions taken from resolved tickets and KB articles.
- Keep the answer short and professional. Do not invent ticket numbers, URLs or product names.`;

export type ChunkingSettings = {
  minChars: number;
  maxChars: number;
  overlapChars: number;
};

export type AnswerTuning = {
  /** Retained hits at which retrieval coverage stops adding confidence. */
  targetHits: number;
  /** Multiplier applied when the answer admits insufficient information. */
  uncertaintyPenalty: number;
  /** Minimum score-weighted share a ticket category needs to be suggested. */
  categoryMinShare: number;
  maxSuggestedActions: number;
};

export type Settings = {
  googleApiKey: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  indexPath: string;
  recordsPath: string | null;
  systemPrompt: string;
  chunking: ChunkingSettings;
  vectorTopK: number;
  structuredTopK: number;
  contextBudgetChars: number;
  sourceTimeoutMs: number;
  embedTimeoutMs: number;
  embedMaxChars: number;
  generationTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  ocrMinConfidence: number;
  ocrLanguage: string;
  ocrLangPath: string | null;
  rowsPerUnit: number;
  ingestConcurrency: number;
  answer: AnswerTuning;
  verbose: boolean;
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function readRatio(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : fallback;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw == null) return fallback;
  return !(raw === "0" || raw.toLowerCase() === "false");
}

export function loadSettings(env: Env = process.env): Settings {
  const googleApiKey = env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY;
  if (!googleApiKey) {
    throw new Error("GOOGLE_API_KEY is required");
  }

  const maxChars = readInt(env, "SUPPORTBRAIN_CHUNK_MAX_CHARS", 1000, 1);
  const minChars = Math.min(readInt(env, "SUPPORTBRAIN_CHUNK_MIN_CHARS", 200, 1), maxChars);
  const overlapRaw = readInt(env, "SUPPORTBRAIN_CHUNK_OVERLAP_CHARS", 150);
  const overlapChars = overlapRaw < minChars ? overlapRaw : Math.max(0, minChars - 1);

  const temperature = Number.parseFloat(env.SUPPORTBRAIN_TEMPERATURE ?? "");

  return {
    googleApiKey,
    chatModel: env.SUPPORTBRAIN_GEMINI_MODEL ?? "gemini-2.5-flash",
    embeddingModel: env.SUPPORTBRAIN_GEMINI_EMBEDDING_MODEL ?? "gemini-embedding-001",
    temperature: Number.isFinite(temperature) ? temperature : 0.2,
    indexPath: env.SUPPORTBRAIN_INDEX_PATH ?? ".supportbrain/index.json",
    recordsPath: env.SUPPORTBRAIN_RECORDS_PATH ?? null,
    systemPrompt: env.SUPPORTBRAIN_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    chunking: { minChars, maxChars, overlapChars },
    vectorTopK: readInt(env, "SUPPORTBRAIN_VECTOR_TOP_K", 5, 1),
    structuredTopK: readInt(env, "SUPPORTBRAIN_STRUCTURED_TOP_K", 5, 1),
    contextBudgetChars: readInt(env, "SUPPORTBRAIN_CONTEXT_BUDGET_CHARS", 6000, 1),
    sourceTimeoutMs: readInt(env, "SUPPORTBRAIN_SOURCE_TIMEOUT_MS", 8000),
    embedTimeoutMs: readInt(env, "SUPPORTBRAIN_EMBED_TIMEOUT_MS", 15000),
    embedMaxChars: readInt(env, "SUPPORTBRAIN_EMBED_MAX_CHARS", 8000, 1),
    generationTimeoutMs: readInt(env, "SUPPORTBRAIN_GENERATION_TIMEOUT_MS", 60000),
    maxRetries: readInt(env, "SUPPORTBRAIN_MAX_RETRIES", 2),
    retryBaseDelayMs: readInt(env, "SUPPORTBRAIN_RETRY_BASE_DELAY_MS", 500),
    ocrMinConfidence: readRatio(env, "SUPPORTBRAIN_OCR_MIN_CONFIDENCE", 0.6),
    ocrLanguage: env.SUPPORTBRAIN_OCR_LANGUAGE ?? "eng",
    ocrLangPath: env.SUPPORTBRAIN_OCR_LANG_PATH ?? null,
    rowsPerUnit: readInt(env, "SUPPORTBRAIN_ROWS_PER_UNIT", 25, 1),
    ingestConcurrency: readInt(env, "SUPPORTBRAIN_INGEST_CONCURRENCY", 4, 1),
    answer: {
      targetHits: readInt(env, "SUPPORTBRAIN_CONFIDENCE_TARGET_HITS", 3, 1),
      uncertaintyPenalty: readRatio(env, "SUPPORTBRAIN_UNCERTAINTY_PENALTY", 0.25),
      categoryMinShare: readRatio(env, "SUPPORTBRAIN_CATEGORY_MIN_SHARE", 0.5),
      maxSuggestedActions: readInt(env, "SUPPORTBRAIN_MAX_SUGGESTED_ACTIONS", 4)
    },
    verbose: readBool(env, "SUPPORTBRAIN_VERBOSE", false)
  };
}

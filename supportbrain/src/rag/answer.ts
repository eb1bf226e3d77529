import { IndexUnavailableError, describeError } from "../errors.js";
import { scoreStructuredRecords } from "../retrieval/structured.js";
import type { RecordFilter, RecordKind } from "../retrieval/structured.js";
import type { RetrievalHit } from "../retrieval/types.js";
import { withTimeout } from "../util/async.js";
import { assembleContext } from "./context.js";
import type { RagDeps } from "./deps.js";
import type { AnswerResult } from "./synthesize.js";
import { synthesizeAnswer } from "./synthesize.js";

type SourceName = "vector" | "structured";

export type AnswerOptions = {
  /** Search resolved tickets; default true. */
  includeTickets?: boolean;
  /** Search KB articles; default true. */
  includeKb?: boolean;
  /** Restrict tickets and KB articles to one category. */
  category?: string;
};

function recordFilter(options: AnswerOptions): RecordFilter {
  const kinds: RecordKind[] = [];
  if (options.includeTickets ?? true) kinds.push("ticket");
  if (options.includeKb ?? true) kinds.push("kb");
  const category = options.category?.trim();
  return category ? { kinds, category } : { kinds };
}

/** Runs one retrieval source under its own deadline; a late source's calls are aborted. */
async function runSource<T>(
  label: string,
  ms: number,
  parent: AbortSignal | undefined,
  work: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onAbort, { once: true });
  try {
    return await withTimeout(work(controller.signal), ms, label, parent);
  } finally {
    parent?.removeEventListener("abort", onAbort);
    controller.abort();
  }
}

/**
 * Hybrid retrieval followed by grounded generation. A failing or late source
 * contributes no hits and is reported in `degradedSources`; when every source
 * fails the query rejects with IndexUnavailableError. The structured source
 * is skipped when both tickets and KB articles are excluded.
 */
export async function answerQuestion(params: {
  question: string;
  deps: RagDeps;
  options?: AnswerOptions;
  signal?: AbortSignal;
}): Promise<AnswerResult> {
  const { question, deps, signal } = params;
  const { settings } = deps;
  const synthesize = (vectorHits: RetrievalHit[], structuredHits: RetrievalHit[]) =>
    synthesizeAnswer(
      question,
      assembleContext(vectorHits, structuredHits, settings.contextBudgetChars),
      {
        generator: deps.generator,
        tuning: settings.answer,
        systemPrompt: settings.systemPrompt,
        signal,
        log: deps.log
      }
    );

  if (!question.trim()) return synthesize([], []);

  const sources: Array<{ name: SourceName; run: Promise<RetrievalHit[]> }> = [
    {
      name: "vector",
      run: runSource("vector search", settings.sourceTimeoutMs, signal, async (sourceSignal) => {
        const query = question.slice(0, settings.embedMaxChars);
        const vector = await deps.embedder.embed(query, { signal: sourceSignal });
        return deps.index.search(vector, settings.vectorTopK, deps.embedder.modelId);
      })
    }
  ];
  const { records } = deps;
  const filter = recordFilter(params.options ?? {});
  if (records && filter.kinds?.length) {
    sources.push({
      name: "structured",
      run: runSource("structured search", settings.sourceTimeoutMs, signal, async () => {
        const found = await records.searchRelevant(question, settings.structuredTopK, filter);
        return scoreStructuredRecords(question, found).filter((hit) => hit.score > 0);
      })
    });
  }

  const settled = await Promise.allSettled(sources.map((s) => s.run));
  signal?.throwIfAborted();

  const hits: Record<SourceName, RetrievalHit[]> = { vector: [], structured: [] };
  const degradedSources: string[] = [];
  const failures: unknown[] = [];
  settled.forEach((outcome, i) => {
    const name = sources[i]?.name;
    if (!name) return;
    if (outcome.status === "fulfilled") {
      hits[name] = outcome.value;
      return;
    }
    degradedSources.push(name);
    failures.push(outcome.reason);
    deps.log(`${name} search failed: ${describeError(outcome.reason)}`);
  });

  if (degradedSources.length === sources.length) {
    throw new IndexUnavailableError(
      `No retrieval source is reachable (${failures.map(describeError).join("; ")})`,
      { cause: failures[0] }
    );
  }

  const result = await synthesize(hits.vector, hits.structured);
  return { ...result, degradedSources };
}

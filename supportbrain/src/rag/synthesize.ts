import type { AnswerTuning } from "../config/settings.js";
import { GenerationUnavailableError } from "../errors.js";
import type { TextGenerator } from "../integrations/generator.js";
import type { RetrievalHit } from "../retrieval/types.js";
import type { Logger } from "../util/logger.js";
import { silentLogger } from "../util/logger.js";
import type { AssembledContext } from "./context.js";
import { formatContext, sourceLabel } from "./context.js";

export type AnswerStatus = "answered" | "no-information" | "generation-unavailable";

export type CitedSource = RetrievalHit & { label: string };

export type AnswerResult = {
  question: string;
  answer: string;
  sources: CitedSource[];
  confidence: number;
  suggestedActions: string[];
  suggestedCategory: string | null;
  status: AnswerStatus;
  /** Retrieval sources that failed or timed out and contributed no hits. */
  degradedSources: string[];
};

export const NO_INFORMATION_ANSWER =
  "No information found in the available sources for this question.";

export const GENERATION_UNAVAILABLE_ANSWER =
  "An answer could not be generated right now. The retrieved sources below may still help.";

const INSTRUCTIONS = [
  "Answer only from the context above.",
  "Cite every source you use by its label, for example [S1].",
  'If the context is insufficient, say "There is insufficient information in the available sources."',
  'If a ticket category clearly applies, end with a line "Category: <name>".'
].join("\n");

const UNCERTAINTY =
  /\b(insufficient information|not enough information|no (?:relevant )?information|does not (?:contain|mention|say)|cannot (?:find|determine|answer)|unable to (?:find|determine|answer)|i don'?t know|not sure)\b/i;

const PROBLEM = /\b(help|problem|issue|error|broken|fail(?:s|ed|ing|ure)?|not working|can'?t|cannot|unable)\b/i;

const CATEGORY_LINE = /^[ \t]*\**category\**:\**[ \t]*(.*?)[ \t]*$/im;
const NO_CATEGORY = new Set(["", "none", "n/a", "unknown", "-"]);

export function buildPrompt(
  question: string,
  hits: readonly RetrievalHit[],
  systemPrompt: string
): { system: string; user: string } {
  return {
    system: systemPrompt,
    user: `Question:\n${question}\n\nContext:\n${formatContext(hits)}\n\n${INSTRUCTIONS}`
  };
}

function labelled(hits: readonly RetrievalHit[]): CitedSource[] {
  return hits.map((hit, i) => ({ ...hit, label: sourceLabel(i) }));
}

/** Sources referenced as [S<n>] (also "[S1, S3]"); every source when none is referenced. */
export function citedSources(answer: string, sources: readonly CitedSource[]): CitedSource[] {
  const cited = new Set<number>();
  for (const group of answer.matchAll(/\[([^\]]+)\]/g)) {
    for (const ref of (group[1] ?? "").matchAll(/\bS(\d+)\b/g)) {
      const n = Number(ref[1]);
      if (n >= 1 && n <= sources.length) cited.add(n - 1);
    }
  }
  if (cited.size === 0) return [...sources];
  return sources.filter((_, i) => cited.has(i));
}

export function signalsUncertainty(answer: string): boolean {
  return UNCERTAINTY.test(answer);
}

/** Splits off a trailing "Category: <name>" line the generator may add. */
export function extractCategoryLine(answer: string): { text: string; category: string | null } {
  const match = CATEGORY_LINE.exec(answer);
  if (!match) return { text: answer.trim(), category: null };
  const value = (match[1] ?? "").replace(/[.*]+$/, "").trim();
  const text = answer.replace(match[0], "").trim();
  return { text, category: NO_CATEGORY.has(value.toLowerCase()) ? null : value };
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function computeConfidence(params: {
  retained: readonly RetrievalHit[];
  cited: readonly RetrievalHit[];
  uncertain: boolean;
  tuning: AnswerTuning;
}): number {
  const { retained, cited, uncertain, tuning } = params;
  if (retained.length === 0) return 0;

  const coverage = Math.min(1, retained.length / Math.max(1, tuning.targetHits));
  let confidence = 0.7 * mean(retained.map((h) => h.score)) + 0.3 * coverage;
  confidence *= mean((cited.length > 0 ? cited : retained).map((h) => h.provenance.extractionConfidence));
  if (uncertain) confidence *= tuning.uncertaintyPenalty;

  const clamped = Math.min(1, Math.max(0, confidence));
  return Math.round(clamped * 1000) / 1000;
}

/** Category holding the largest score-weighted share of the structured sources. */
export function suggestCategory(sources: readonly RetrievalHit[], minShare: number): string | null {
  const structured = sources.filter((h) => h.sourceKind === "structured");
  const total = structured.reduce((sum, h) => sum + h.score, 0);
  if (total <= 0) return null;

  const weights = new Map<string, number>();
  for (const hit of structured) {
    const category = hit.provenance.category;
    if (category) weights.set(category, (weights.get(category) ?? 0) + hit.score);
  }

  let best: { category: string; weight: number } | null = null;
  for (const [category, weight] of weights) {
    if (!best || weight > best.weight) best = { category, weight };
  }
  return best && best.weight / total >= minShare ? best.category : null;
}

export function suggestActions(params: {
  question: string;
  sources: readonly RetrievalHit[];
  uncertain: boolean;
  limit: number;
}): string[] {
  const { question, sources, uncertain, limit } = params;
  const ids = (kind: string): string[] => [
    ...new Set(sources.filter((h) => h.provenance.kind === kind).map((h) => h.provenance.id))
  ];
  const titles = [
    ...new Set(sources.filter((h) => h.provenance.kind === "document").map((h) => h.provenance.title))
  ];

  const actions: string[] = [];
  if (PROBLEM.test(question)) {
    actions.push("Create a support ticket if the suggested solutions don't resolve your issue");
  }
  const kb = ids("kb");
  if (kb.length > 0) {
    actions.push(`Review the KB articles for detailed procedures: ${kb.join(", ")}`);
  }
  const tickets = ids("ticket");
  if (tickets.length > 0) {
    actions.push(`Check the resolution steps from similar tickets: ${tickets.join(", ")}`);
  }
  if (titles.length > 0) {
    actions.push(`Open the source documents: ${titles.join(", ")}`);
  }
  if (uncertain) {
    actions.push("Escalate to a support agent, the available sources do not fully answer the question");
  }
  return [...new Set(actions)].slice(0, Math.max(0, limit));
}

export async function synthesizeAnswer(
  question: string,
  context: AssembledContext,
  options: {
    generator: TextGenerator;
    tuning: AnswerTuning;
    systemPrompt: string;
    signal?: AbortSignal;
    log?: Logger;
  }
): Promise<AnswerResult> {
  const { tuning } = options;
  const log = options.log ?? silentLogger;
  const sources = labelled(context.hits);

  if (!question.trim() || sources.length === 0) {
    return {
      question,
      answer: NO_INFORMATION_ANSWER,
      sources: [],
      confidence: 0,
      suggestedActions: suggestActions({
        question,
        sources: [],
        uncertain: false,
        limit: tuning.maxSuggestedActions
      }),
      suggestedCategory: null,
      status: "no-information",
      degradedSources: []
    };
  }

  let raw: string;
  try {
    raw = await options.generator.generate(buildPrompt(question, context.hits, options.systemPrompt), {
      signal: options.signal
    });
  } catch (err: unknown) {
    if (!(err instanceof GenerationUnavailableError)) throw err;
    log(`generation unavailable: ${err.message}`);
    return {
      question,
      answer: GENERATION_UNAVAILABLE_ANSWER,
      sources,
      confidence: 0,
      suggestedActions: suggestActions({
        question,
        sources,
        uncertain: false,
        limit: tuning.maxSuggestedActions
      }),
      suggestedCategory: suggestCategory(sources, tuning.categoryMinShare),
      status: "generation-unavailable",
      degradedSources: []
    };
  }

  const { text, category } = extractCategoryLine(raw);
  const cited = citedSources(text, sources);
  const uncertain = signalsUncertainty(text);

  return {
    question,
    answer: text,
    sources: cited,
    confidence: computeConfidence({ retained: context.hits, cited, uncertain, tuning }),
    suggestedActions: suggestActions({
      question,
      sources: cited,
      uncertain,
      limit: tuning.maxSuggestedActions
    }),
    suggestedCategory: category ?? suggestCategory(cited, tuning.categoryMinShare),
    status: "answered",
    degradedSources: []
  };
}

import type { RetrievalHit } from "../retrieval/types.js";

export type DropReason = "duplicate" | "budget";

export type AssembledContext = {
  hits: RetrievalHit[];
  dropped: Array<{ hit: RetrievalHit; reason: DropReason }>;
  totalChars: number;
  budgetChars: number;
};

function updatedTime(hit: RetrievalHit): number {
  const parsed = Date.parse(hit.provenance.updatedAt ?? "");
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

function provenanceKey(hit: RetrievalHit): string {
  return `${hit.sourceKind}:${hit.provenance.kind}:${hit.provenance.id}`;
}

/**
 * Higher score first. Equal scores: structured before vector, then the most
 * recently updated record, then provenance for a stable order.
 */
export function compareHits(a: RetrievalHit, b: RetrievalHit): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.sourceKind !== b.sourceKind) return a.sourceKind === "structured" ? -1 : 1;

  const recency = updatedTime(b) - updatedTime(a);
  if (recency !== 0 && !Number.isNaN(recency)) return recency > 0 ? 1 : -1;

  const byKey = provenanceKey(a).localeCompare(provenanceKey(b));
  if (byKey !== 0) return byKey;
  return (a.provenance.span?.start ?? 0) - (b.provenance.span?.start ?? 0);
}

/** Same provenance and intersecting text; a hit without a span covers its whole record. */
export function isDuplicate(a: RetrievalHit, b: RetrievalHit): boolean {
  if (provenanceKey(a) !== provenanceKey(b)) return false;
  const sa = a.provenance.span;
  const sb = b.provenance.span;
  if (!sa || !sb) return true;
  if (a.provenance.label !== b.provenance.label) return false;
  return sa.start < sb.end && sb.start < sa.end;
}

export function assembleContext(
  vectorHits: readonly RetrievalHit[],
  structuredHits: readonly RetrievalHit[],
  budgetChars: number
): AssembledContext {
  const ranked = [...structuredHits, ...vectorHits].sort(compareHits);

  const unique: RetrievalHit[] = [];
  const dropped: AssembledContext["dropped"] = [];
  for (const hit of ranked) {
    if (unique.some((kept) => isDuplicate(kept, hit))) {
      dropped.push({ hit, reason: "duplicate" });
    } else {
      unique.push(hit);
    }
  }

  const hits: RetrievalHit[] = [];
  let totalChars = 0;
  let exhausted = false;
  for (const hit of unique) {
    if (!exhausted && totalChars + hit.text.length <= budgetChars) {
      hits.push(hit);
      totalChars += hit.text.length;
      continue;
    }
    exhausted = true;
    dropped.push({ hit, reason: "budget" });
  }

  return { hits, dropped, totalChars, budgetChars };
}

export function sourceLabel(index: number): string {
  return `S${index + 1}`;
}

function describeProvenance(hit: RetrievalHit): string {
  const p = hit.provenance;
  const parts: string[] = [];
  if (p.kind === "ticket") parts.push(`ticket ${p.id}: ${p.title}`);
  else if (p.kind === "kb") parts.push(`KB article ${p.id}: ${p.title}`);
  else parts.push(`document ${p.title}${p.label ? ` (${p.label})` : ""}`);
  if (p.category) parts.push(`category ${p.category}`);
  if (p.updatedAt) parts.push(`updated ${p.updatedAt}`);
  if (p.extractionConfidence < 1) parts.push(`OCR confidence ${p.extractionConfidence.toFixed(2)}`);
  if (p.url) parts.push(p.url);
  return parts.join(" | ");
}

export function formatContext(hits: readonly RetrievalHit[]): string {
  return hits
    .map((hit, i) => `[${sourceLabel(i)}] SOURCE: ${describeProvenance(hit)}\n${hit.text}`)
    .join("\n\n---\n\n");
}

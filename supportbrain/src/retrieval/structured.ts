import { promises as fs } from "node:fs";

import { z } from "zod";

import { extractKeywords, keywordRelevance } from "./keyword.js";
import type { RetrievalHit } from "./types.js";

export type StructuredRecord = {
  id: string;
  title: string;
  text: string;
  kind: "ticket" | "kb";
  updatedAt: string;
  category?: string;
  url?: string;
};

export type RecordKind = StructuredRecord["kind"];

export type RecordFilter = {
  /** Record kinds to search; all kinds when omitted. */
  kinds?: readonly RecordKind[];
  /** Case-insensitive category match. */
  category?: string;
};

export function matchesRecordFilter(record: StructuredRecord, filter: RecordFilter = {}): boolean {
  if (filter.kinds && !filter.kinds.includes(record.kind)) return false;
  const category = filter.category?.trim().toLowerCase();
  if (category && record.category?.trim().toLowerCase() !== category) return false;
  return true;
}

/** Read-only view of the ticket and knowledge-base store. */
export interface StructuredSearchAdapter {
  /** `limit` applies after the filter. */
  searchRelevant(query: string, limit: number, filter?: RecordFilter): Promise<StructuredRecord[]>;
}

export function toStructuredHit(keywords: readonly string[], record: StructuredRecord): RetrievalHit {
  return {
    sourceKind: "structured",
    score: keywordRelevance(keywords, record),
    text: record.text,
    provenance: {
      kind: record.kind,
      id: record.id,
      title: record.title,
      url: record.url,
      extractionConfidence: 1,
      updatedAt: record.updatedAt,
      category: record.category
    }
  };
}

export function scoreStructuredRecords(query: string, records: StructuredRecord[]): RetrievalHit[] {
  const keywords = extractKeywords(query);
  return records.map((record) => toStructuredHit(keywords, record));
}

/** Keyword search over records held in memory, e.g. an export of resolved tickets and KB articles. */
export class InMemoryRecordStore implements StructuredSearchAdapter {
  constructor(private readonly records: readonly StructuredRecord[]) {}

  async searchRelevant(query: string, limit: number, filter?: RecordFilter): Promise<StructuredRecord[]> {
    const keywords = extractKeywords(query);
    if (keywords.length === 0 || limit <= 0) return [];

    return this.records
      .filter((record) => matchesRecordFilter(record, filter))
      .map((record) => ({ record, score: keywordRelevance(keywords, record) }))
      .filter((r) => r.score > 0)
      .sort(
        (a, b) =>
          b.score - a.score || Date.parse(b.record.updatedAt) - Date.parse(a.record.updatedAt)
      )
      .slice(0, limit)
      .map((r) => r.record);
  }
}

const recordSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string(),
  text: z.string(),
  kind: z.enum(["ticket", "kb"]),
  updatedAt: z.string(),
  category: z.string().optional(),
  url: z.string().optional()
});

export async function loadRecordStore(filePath: string): Promise<InMemoryRecordStore> {
  const raw = await fs.readFile(filePath, "utf-8");
  const parsed = z.array(recordSchema).safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid records file ${filePath}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`
    );
  }
  return new InMemoryRecordStore(parsed.data);
}

import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import type { StoredIndex } from "./types.js";

const formatSchema = z.enum(["text", "markdown", "pdf", "docx", "xlsx", "csv", "image"]);

const chunkSchema = z.object({
  documentId: z.string(),
  filename: z.string(),
  format: formatSchema,
  unitLabel: z.string(),
  ordinal: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  text: z.string(),
  extractionConfidence: z.number().min(0).max(1),
  ingestedAt: z.string(),
  embedding: z.array(z.number()),
  embeddingModel: z.string()
});

const indexSchema = z.object({
  version: z.literal(2),
  metric: z.literal("cosine"),
  documents: z.array(
    z.object({
      documentId: z.string(),
      filename: z.string(),
      format: formatSchema,
      version: z.number().int().positive(),
      ingestedAt: z.string(),
      chunks: z.array(chunkSchema)
    })
  )
});

function isMissingFile(err: unknown): boolean {
  return Boolean(err && typeof err === "object" && "code" in err && err.code === "ENOENT");
}

/** Writes beside the target and renames, so readers never see a half-written index. */
export async function saveIndex(filePath: string, index: StoredIndex): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(index), "utf-8");
  await fs.rename(tmpPath, filePath);
}

/** Returns null when no index has been written yet. */
export async function loadIndex(filePath: string): Promise<StoredIndex | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  const parsed = indexSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Unsupported or corrupt index ${filePath}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export interface IndexPersistence {
  load(): Promise<StoredIndex | null>;
  save(index: StoredIndex): Promise<void>;
}

export function fileIndexPersistence(filePath: string): IndexPersistence {
  return {
    load: () => loadIndex(filePath),
    save: (index) => saveIndex(filePath, index)
  };
}

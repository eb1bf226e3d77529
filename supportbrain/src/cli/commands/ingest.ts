import { promises as fs } from "node:fs";
import path from "node:path";

import { describeError } from "../../errors.js";
import type { RagDeps } from "../../rag/deps.js";
import { deleteDocument, ingestDocuments } from "../../rag/ingest.js";

export async function runIngestCommand(
  args: string[],
  deps: RagDeps,
  options: { format?: string }
): Promise<void> {
  if (args.length === 0) {
    throw new Error("Usage: supportbrain ingest [--format <format>] <file...>");
  }

  const files = await Promise.all(
    args.map(async (filePath) => ({
      filename: path.basename(filePath),
      data: new Uint8Array(await fs.readFile(filePath)),
      declaredFormat: options.format ?? path.extname(filePath)
    }))
  );

  const outcomes = await ingestDocuments({ files, deps });
  let failed = 0;
  for (const outcome of outcomes) {
    if (outcome.ok) {
      const r = outcome.result;
      process.stdout.write(
        `${outcome.filename}\t${r.documentId}\t${r.format}\tchunks=${r.chunkCount}\tversion=${r.version ?? "-"}\n`
      );
    } else {
      failed += 1;
      process.stderr.write(`${outcome.filename}\t${describeError(outcome.error)}\n`);
    }
  }
  if (failed > 0) process.exitCode = 1;
}

export async function runDeleteCommand(args: string[], deps: RagDeps): Promise<void> {
  const documentId = args[0];
  if (!documentId) {
    throw new Error("Usage: supportbrain delete <documentId>");
  }
  const removed = await deleteDocument(documentId, deps);
  process.stdout.write(removed ? `deleted ${documentId}\n` : `not found ${documentId}\n`);
}

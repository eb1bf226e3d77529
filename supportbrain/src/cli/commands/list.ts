import { FORMAT_EXTENSIONS } from "../../loaders/formatRouter.js";
import type { RagDeps } from "../../rag/deps.js";

export function runFormatsCommand(): void {
  for (const [format, extensions] of Object.entries(FORMAT_EXTENSIONS)) {
    process.stdout.write(`${format}\t${extensions.join(" ")}\n`);
  }
}

export async function runListCommand(deps: RagDeps): Promise<void> {
  const documents = await deps.index.documents();
  if (documents.length === 0) {
    process.stdout.write("index is empty\n");
    return;
  }
  for (const d of documents) {
    process.stdout.write(
      `${d.documentId}\t${d.filename}\t${d.format}\tv${d.version}\tchunks=${d.chunkCount}\t${d.ingestedAt}\n`
    );
  }
}

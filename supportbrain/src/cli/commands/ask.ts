import { answerQuestion } from "../../rag/answer.js";
import type { AnswerOptions } from "../../rag/answer.js";
import type { RagDeps } from "../../rag/deps.js";
import type { AnswerResult } from "../../rag/synthesize.js";

function renderAnswer(result: AnswerResult): string {
  const lines = [result.answer, "", `confidence: ${result.confidence}`];
  if (result.suggestedCategory) lines.push(`category: ${result.suggestedCategory}`);
  if (result.sources.length > 0) {
    lines.push("", "sources:");
    for (const s of result.sources) {
      const where = s.provenance.label ? ` (${s.provenance.label})` : "";
      lines.push(`  [${s.label}] ${s.provenance.kind} ${s.provenance.title}${where} score=${s.score.toFixed(3)}`);
    }
  }
  if (result.suggestedActions.length > 0) {
    lines.push("", "suggested actions:", ...result.suggestedActions.map((a) => `  - ${a}`));
  }
  if (result.degradedSources.length > 0) {
    lines.push("", `degraded sources: ${result.degradedSources.join(", ")}`);
  }
  return lines.join("\n");
}

export async function runAskCommand(
  args: string[],
  deps: RagDeps,
  options: AnswerOptions & { json: boolean }
): Promise<void> {
  const question = args.join(" ").trim();
  if (!question) {
    throw new Error("Usage: supportbrain ask [--json] [--no-tickets] [--no-kb] [--category <name>] <question>");
  }
  const { json, ...filters } = options;

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);
  try {
    const result = await answerQuestion({ question, deps, options: filters, signal: controller.signal });
    process.stdout.write(`${json ? JSON.stringify(result, null, 2) : renderAnswer(result)}\n`);
  } finally {
    process.off("SIGINT", onSigint);
  }
}

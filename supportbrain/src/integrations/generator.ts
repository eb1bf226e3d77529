import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";

import { GenerationUnavailableError, isTransientError } from "../errors.js";
import { isAbortError, withRetry, withTimeout } from "../util/async.js";
import type { Logger } from "../util/logger.js";
import { silentLogger } from "../util/logger.js";
import type { CallPolicy } from "./embeddingClient.js";

export type GenerationPrompt = {
  system: string;
  user: string;
};

export interface TextGenerator {
  /** Rejects with GenerationUnavailableError when no answer could be produced. */
  generate(prompt: GenerationPrompt, options?: { signal?: AbortSignal }): Promise<string>;
}

function messageText(content: unknown): string {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    return content
      .map((part: unknown) =>
        part && typeof part === "object" && "text" in part && typeof part.text === "string"
          ? part.text
          : ""
      )
      .join("");
  }
  return "";
}

export class ChatTextGenerator implements TextGenerator {
  constructor(
    private readonly model: BaseChatModel,
    private readonly policy: CallPolicy,
    private readonly log: Logger = silentLogger
  ) {}

  async generate(prompt: GenerationPrompt, options: { signal?: AbortSignal } = {}): Promise<string> {
    const { signal } = options;
    try {
      const text = await withRetry(
        async () => {
          // One signal per attempt, aborted once the attempt settles or times out.
          const attempt = new AbortController();
          const onAbort = (): void => attempt.abort(signal?.reason);
          signal?.addEventListener("abort", onAbort, { once: true });
          try {
            const result = await withTimeout(
              this.model.invoke([new SystemMessage(prompt.system), new HumanMessage(prompt.user)], {
                signal: attempt.signal
              }),
              this.policy.timeoutMs,
              "generation",
              signal
            );
            return messageText(result.content);
          } finally {
            signal?.removeEventListener("abort", onAbort);
            attempt.abort();
          }
        },
        {
          retries: this.policy.maxRetries,
          baseDelayMs: this.policy.retryBaseDelayMs,
          isRetryable: isTransientError,
          signal,
          onRetry: (err, attempt) => {
            this.log(`generation retry ${attempt}: ${err instanceof Error ? err.message : String(err)}`);
          }
        }
      );
      if (!text.trim()) {
        throw new GenerationUnavailableError("Generator returned an empty answer");
      }
      return text;
    } catch (err: unknown) {
      if (isAbortError(err, signal) || err instanceof GenerationUnavailableError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new GenerationUnavailableError(`Generation failed: ${message}`, { cause: err });
    }
  }
}

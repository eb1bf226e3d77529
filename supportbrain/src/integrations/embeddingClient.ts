import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { EmbeddingError, errorStatus, isTransientError } from "../errors.js";
import { isAbortError, withRetry, withTimeout } from "../util/async.js";
import type { Logger } from "../util/logger.js";
import { silentLogger } from "../util/logger.js";

export type CallPolicy = {
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
};

function toEmbeddingError(err: unknown): unknown {
  if (err instanceof EmbeddingError || isAbortError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new EmbeddingError(`Embedding request failed: ${message}`, {
    transient: isTransientError(err),
    context: { status: errorStatus(err) },
    cause: err
  });
}

/**
 * Embeds text with one fixed model. Transient failures are retried with
 * backoff; over-long input is rejected before any call is made.
 */
export class EmbeddingClient {
  constructor(
    private readonly embeddings: EmbeddingsInterface,
    readonly modelId: string,
    private readonly policy: CallPolicy & { maxChars: number },
    private readonly log: Logger = silentLogger
  ) {}

  private assertLength(text: string): void {
    if (text.length > this.policy.maxChars) {
      throw new EmbeddingError(
        `Text of ${text.length} characters exceeds the embedding limit of ${this.policy.maxChars}`,
        { transient: false }
      );
    }
  }

  private call<T>(label: string, work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await withTimeout(work(), this.policy.timeoutMs, label, signal);
        } catch (err: unknown) {
          throw toEmbeddingError(err);
        }
      },
      {
        retries: this.policy.maxRetries,
        baseDelayMs: this.policy.retryBaseDelayMs,
        isRetryable: isTransientError,
        signal,
        onRetry: (err, attempt) => {
          this.log(`${label} retry ${attempt}: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    );
  }

  embed(text: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    this.assertLength(text);
    return this.call("embed query", () => this.embeddings.embedQuery(text), options.signal);
  }

  async embedMany(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    if (texts.length === 0) return [];
    texts.forEach((t) => this.assertLength(t));

    const vectors = await this.call(
      "embed documents",
      () => this.embeddings.embedDocuments(texts),
      options.signal
    );
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding count mismatch: texts=${texts.length} embeddings=${vectors.length}`,
        { transient: false }
      );
    }

    const dimension = vectors[0]?.length ?? 0;
    if (dimension <= 0) {
      throw new EmbeddingError(`Embedding dimension invalid (${dimension}) for model ${this.modelId}`, {
        transient: false
      });
    }
    vectors.forEach((v, i) => {
      if (v.length !== dimension) {
        throw new EmbeddingError(
          `Embedding dimension mismatch at chunk ${i}: expected=${dimension} actual=${v.length}`,
          { transient: false }
        );
      }
    });
    return vectors;
  }
}

import { createRequire } from "node:module";
import path from "node:path";

import Tesseract from "tesseract.js";

import type { RecognizedBlock, TextRecognizer } from "../../loaders/imageExtractor.js";

export type TesseractOptions = {
  language: string;
  /** Directory holding `<lang>.traineddata.gz`; the installed language package otherwise. */
  langPath: string | null;
};

const DATA_VARIANT = "4.0.0_best_int";

/**
 * Directory of the `@tesseract.js-data/<lang>` package installed beside this
 * module. Throws when the package is missing, so the worker never falls back
 * to fetching language data over the network.
 */
export function bundledLangPath(language: string): string {
  const require = createRequire(import.meta.url);
  let manifest: string;
  try {
    manifest = require.resolve(`@tesseract.js-data/${language}/package.json`);
  } catch (err: unknown) {
    throw new Error(
      `OCR language data for "${language}" is not installed; add @tesseract.js-data/${language} or set SUPPORTBRAIN_OCR_LANG_PATH`,
      { cause: err }
    );
  }
  return path.join(path.dirname(manifest), DATA_VARIANT);
}

/** Lazily starts one worker and reuses it until `close()`. */
export class TesseractRecognizer implements TextRecognizer {
  private worker: Promise<Tesseract.Worker> | null = null;

  constructor(private readonly options: TesseractOptions) {}

  private async getWorker(): Promise<Tesseract.Worker> {
    if (!this.worker) {
      const langPath = this.options.langPath ?? bundledLangPath(this.options.language);
      const workerOptions: Partial<Tesseract.WorkerOptions> = { langPath };
      this.worker = Tesseract.createWorker(this.options.language, undefined, workerOptions);
    }
    try {
      return await this.worker;
    } catch (err: unknown) {
      this.worker = null;
      throw err;
    }
  }

  async recognize(image: Uint8Array): Promise<RecognizedBlock[]> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(Buffer.from(image));
    const blocks = data.blocks ?? [];
    if (blocks.length === 0) {
      return data.text.trim() ? [{ text: data.text, confidence: data.confidence }] : [];
    }
    return blocks.map((b) => ({ text: b.text, confidence: b.confidence }));
  }

  async close(): Promise<void> {
    const pending = this.worker;
    this.worker = null;
    if (pending) {
      const worker = await pending;
      await worker.terminate();
    }
  }
}

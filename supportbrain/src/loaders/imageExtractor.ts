import { ExtractionError } from "../errors.js";
import type { Logger } from "../util/logger.js";
import { silentLogger } from "../util/logger.js";
import type { ExtractedUnit, Extractor, SourceDocument } from "./types.js";
import { contextOf } from "./types.js";

export type RecognizedBlock = {
  text: string;
  /** Recognizer scale, 0-100. */
  confidence: number;
};

export interface TextRecognizer {
  recognize(image: Uint8Array): Promise<RecognizedBlock[]>;
}

/**
 * OCR for scanned images. A document whose recognized text is empty or whose
 * average block confidence is under `minConfidence` yields no units.
 */
export class ImageExtractor implements Extractor {
  readonly formats = ["image"] as const;

  constructor(
    private readonly recognizer: TextRecognizer,
    private readonly minConfidence: number,
    private readonly log: Logger = silentLogger
  ) {}

  async extract(source: SourceDocument): Promise<ExtractedUnit[]> {
    let blocks: RecognizedBlock[];
    try {
      blocks = await this.recognizer.recognize(source.data);
    } catch (err: unknown) {
      throw new ExtractionError(`Unable to read image ${source.filename}`, {
        context: contextOf(source),
        cause: err
      });
    }

    const usable = blocks.filter((b) => b.text.trim().length > 0);
    const text = usable.map((b) => b.text.trim()).join("\n\n");
    if (!text) {
      this.log(`${source.filename}: no text recognized`);
      return [];
    }

    const average = usable.reduce((sum, b) => sum + b.confidence, 0) / usable.length;
    const confidence = Math.min(1, Math.max(0, average / 100));
    if (confidence < this.minConfidence) {
      this.log(
        `${source.filename}: OCR confidence ${confidence.toFixed(2)} below ${this.minConfidence}`
      );
      return [];
    }

    return [
      {
        documentId: source.id,
        text,
        label: "ocr-block",
        confidence,
        attributes: { blocks: usable.length }
      }
    ];
  }
}

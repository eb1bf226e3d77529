import { TextLoader } from "@langchain/classic/document_loaders/fs/text";

import { ExtractionError } from "../errors.js";
import type { ExtractedUnit, Extractor, SourceDocument } from "./types.js";
import { contextOf } from "./types.js";

const PAGE_BREAK = "\f";

function decodeStrict(source: SourceDocument): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(source.data);
  } catch (err: unknown) {
    throw new ExtractionError(`Unable to decode ${source.filename} as UTF-8`, {
      context: contextOf(source),
      cause: err
    });
  }
}

/** Plain text and markdown. Form feeds mark page boundaries. */
export class TextExtractor implements Extractor {
  readonly formats = ["text", "markdown"] as const;

  async extract(source: SourceDocument): Promise<ExtractedUnit[]> {
    const decoded = decodeStrict(source);
    const loader = new TextLoader(new Blob([decoded], { type: "text/plain" }));
    const docs = await loader.load();
    const text = docs.map((d) => d.pageContent).join("");

    if (!text.includes(PAGE_BREAK)) {
      if (!text.trim()) return [];
      return [
        {
          documentId: source.id,
          text,
          label: "document",
          confidence: 1,
          attributes: { length: text.length }
        }
      ];
    }

    const units: ExtractedUnit[] = [];
    text.split(PAGE_BREAK).forEach((page, i) => {
      if (!page.trim()) return;
      units.push({
        documentId: source.id,
        text: page,
        label: `page:${i + 1}`,
        confidence: 1,
        attributes: { page: i + 1, length: page.length }
      });
    });
    return units;
  }
}

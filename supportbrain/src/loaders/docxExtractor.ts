import { ExtractionError } from "../errors.js";
import type { ExtractedUnit, Extractor, SourceDocument } from "./types.js";
import { contextOf, toArrayBuffer } from "./types.js";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export class DocxExtractor implements Extractor {
  readonly formats = ["docx"] as const;

  async extract(source: SourceDocument): Promise<ExtractedUnit[]> {
    let text: string;
    try {
      const { DocxLoader } = await import("@langchain/community/document_loaders/fs/docx");
      const loader = new DocxLoader(new Blob([toArrayBuffer(source.data)], { type: DOCX_MIME }));
      const docs = await loader.load();
      text = docs.map((d) => d.pageContent).join("\n");
    } catch (err: unknown) {
      throw new ExtractionError(`Unable to read DOCX ${source.filename}`, {
        context: contextOf(source),
        cause: err
      });
    }

    if (!text.trim()) return [];
    return [
      {
        documentId: source.id,
        text,
        label: "document",
        confidence: 1,
        attributes: { paragraphs: text.split("\n").filter((p) => p.trim()).length }
      }
    ];
  }
}

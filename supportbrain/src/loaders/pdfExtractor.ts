import { ExtractionError } from "../errors.js";
import type { ExtractedUnit, Extractor, SourceDocument } from "./types.js";
import { contextOf, toArrayBuffer } from "./types.js";

function pageNumberOf(loc: unknown, fallback: number): number {
  if (loc && typeof loc === "object" && "pageNumber" in loc) {
    const page = loc.pageNumber;
    if (typeof page === "number" && Number.isInteger(page)) return page;
  }
  return fallback;
}

/** One unit per PDF page. The parser is loaded on first use. */
export class PdfExtractor implements Extractor {
  readonly formats = ["pdf"] as const;

  async extract(source: SourceDocument): Promise<ExtractedUnit[]> {
    try {
      const { PDFLoader } = await import("@langchain/community/document_loaders/fs/pdf");
      const loader = new PDFLoader(new Blob([toArrayBuffer(source.data)], { type: "application/pdf" }), {
        splitPages: true
      });
      const pages = await loader.load();

      const units: ExtractedUnit[] = [];
      pages.forEach((page, i) => {
        if (!page.pageContent.trim()) return;
        const loc: unknown = page.metadata.loc;
        const pageNumber = pageNumberOf(loc, i + 1);
        units.push({
          documentId: source.id,
          text: page.pageContent,
          label: `page:${pageNumber}`,
          confidence: 1,
          attributes: { page: pageNumber, pages: pages.length }
        });
      });
      return units;
    } catch (err: unknown) {
      throw new ExtractionError(`Unable to read PDF ${source.filename}`, {
        context: contextOf(source),
        cause: err
      });
    }
  }
}

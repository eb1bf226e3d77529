export type FormatId = "text" | "markdown" | "pdf" | "docx" | "xlsx" | "csv" | "image";

export type SourceDocument = {
  id: string;
  filename: string;
  format: FormatId;
  data: Uint8Array;
  ingestedAt: string;
};

export type UnitAttributes = Record<string, string | number>;

export type ExtractedUnit = {
  documentId: string;
  text: string;
  /** e.g. "document", "page:3", "sheet:VPN:rows-2-3 (2 rows, 3 cols)", "ocr-block" */
  label: string;
  /** 1.0 for exact-text extractors, recognizer-derived for OCR. */
  confidence: number;
  attributes: UnitAttributes;
};

export interface Extractor {
  readonly formats: readonly FormatId[];
  extract(source: SourceDocument): Promise<ExtractedUnit[]>;
}

export function contextOf(source: SourceDocument): {
  documentId: string;
  filename: string;
  format: string;
} {
  return { documentId: source.id, filename: source.filename, format: source.format };
}

export function toArrayBuffer(data: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(buffer).set(data);
  return buffer;
}

import { UnsupportedFormatError } from "../errors.js";
import type { ErrorContext } from "../errors.js";
import type { ExtractedUnit, Extractor, FormatId, SourceDocument } from "./types.js";

export const FORMAT_EXTENSIONS: Record<FormatId, readonly string[]> = {
  text: [".txt", ".text", ".log"],
  markdown: [".md", ".markdown"],
  pdf: [".pdf"],
  docx: [".docx"],
  xlsx: [".xlsx"],
  csv: [".csv"],
  image: [".png", ".jpg", ".jpeg", ".gif", ".bmp", ".webp", ".tif", ".tiff"]
};

const MIME_FORMATS: Record<string, FormatId> = {
  "text/plain": "text",
  "text/markdown": "markdown",
  "application/pdf": "pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "xlsx",
  "text/csv": "csv"
};

function isFormatId(value: string): value is FormatId {
  return Object.hasOwn(FORMAT_EXTENSIONS, value);
}

/**
 * Maps a declared format (format id, file extension or MIME type) to a
 * FormatId, or null when nothing matches.
 */
export function normalizeFormat(declared: string): FormatId | null {
  const value = declared.trim().toLowerCase();
  if (!value) return null;
  if (isFormatId(value)) return value;

  const mime = MIME_FORMATS[value];
  if (mime) return mime;
  if (value.startsWith("image/")) return "image";

  const ext = value.startsWith(".") ? value : `.${value}`;
  for (const [format, extensions] of Object.entries(FORMAT_EXTENSIONS)) {
    if (extensions.includes(ext) && isFormatId(format)) return format;
  }
  return null;
}

export type FormatRouter = {
  resolve(declaredFormat: string, context?: ErrorContext): FormatId;
  extract(source: SourceDocument): Promise<ExtractedUnit[]>;
  supportedFormats(): Array<{ format: FormatId; extensions: readonly string[] }>;
};

/** Registry resolved once at startup; a later extractor for a format replaces an earlier one. */
export function createFormatRouter(extractors: readonly Extractor[]): FormatRouter {
  const registry = new Map<FormatId, Extractor>();
  for (const extractor of extractors) {
    for (const format of extractor.formats) {
      registry.set(format, extractor);
    }
  }

  const resolve = (declaredFormat: string, context: ErrorContext = {}): FormatId => {
    const format = normalizeFormat(declaredFormat);
    if (!format || !registry.has(format)) {
      throw new UnsupportedFormatError(declaredFormat, context);
    }
    return format;
  };

  return {
    resolve,
    async extract(source) {
      const extractor = registry.get(source.format);
      if (!extractor) {
        throw new UnsupportedFormatError(source.format, {
          documentId: source.id,
          filename: source.filename
        });
      }
      return extractor.extract(source);
    },
    supportedFormats() {
      return [...registry.keys()].map((format) => ({
        format,
        extensions: FORMAT_EXTENSIONS[format]
      }));
    }
  };
}

import { readFile } from "node:fs/promises";

import { describe, expect, it } from "vitest";

import { ExtractionError, UnsupportedFormatError } from "../src/errors.js";
import { DocxExtractor } from "../src/loaders/docxExtractor.js";
import { createFormatRouter, normalizeFormat } from "../src/loaders/formatRouter.js";
import { PdfExtractor } from "../src/loaders/pdfExtractor.js";
import { TextExtractor } from "../src/loaders/textExtractor.js";
import type { FormatId, SourceDocument } from "../src/loaders/types.js";
import { utf8 } from "./helpers.js";

function source(format: FormatId, data: Uint8Array, filename = "notes.txt"): SourceDocument {
  return { id: "doc_a", filename, format, data, ingestedAt: "2026-03-01T00:00:00.000Z" };
}

describe("normalizeFormat", () => {
  it("accepts format ids, extensions and MIME types", () => {
    expect(normalizeFormat("markdown")).toBe("markdown");
    expect(normalizeFormat("md")).toBe("markdown");
    expect(normalizeFormat(".XLSX")).toBe("xlsx");
    expect(normalizeFormat("application/pdf")).toBe("pdf");
    expect(normalizeFormat("image/png")).toBe("image");
    expect(normalizeFormat(".jpeg")).toBe("image");
  });

  it("returns null for anything else", () => {
    expect(normalizeFormat("exe")).toBeNull();
    expect(normalizeFormat("   ")).toBeNull();
  });
});

describe("createFormatRouter", () => {
  const router = createFormatRouter([new TextExtractor()]);

  it("rejects unknown and unregistered formats with the document identity", () => {
    expect(() => router.resolve("exe", { documentId: "doc_x", filename: "setup.exe" })).toThrow(
      UnsupportedFormatError
    );
    try {
      router.resolve("pdf", { documentId: "doc_y", filename: "manual.pdf" });
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(UnsupportedFormatError);
      if (err instanceof UnsupportedFormatError) {
        expect(err.code).toBe("UNSUPPORTED_FORMAT");
        expect(err.context).toEqual({ documentId: "doc_y", filename: "manual.pdf", format: "pdf" });
      }
    }
  });

  it("lists registered formats with their extensions", () => {
    expect(router.supportedFormats()).toEqual([
      { format: "text", extensions: [".txt", ".text", ".log"] },
      { format: "markdown", extensions: [".md", ".markdown"] }
    ]);
  });

  it("routes to the registered extractor", async () => {
    const units = await router.extract(source("markdown", utf8("# VPN\nUse the token app.")));
    expect(units).toEqual([
      {
        documentId: "doc_a",
        text: "# VPN\nUse the token app.",
        label: "document",
        confidence: 1,
        attributes: { length: 24 }
      }
    ]);
  });
});

describe("TextExtractor", () => {
  const extractor = new TextExtractor();

  it("splits form-feed pages and skips blank ones", async () => {
    const units = await extractor.extract(source("text", utf8("Page one\f  \fPage three")));
    expect(units.map((u) => [u.label, u.text])).toEqual([
      ["page:1", "Page one"],
      ["page:3", "Page three"]
    ]);
  });

  it("yields nothing for blank text", async () => {
    expect(await extractor.extract(source("text", utf8(" \n ")))).toEqual([]);
  });

  it("rejects bytes that are not UTF-8", async () => {
    await expect(extractor.extract(source("text", new Uint8Array([0xff, 0xfe, 0xfd])))).rejects.toBeInstanceOf(
      ExtractionError
    );
  });
});

async function fixture(name: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(new URL(`./fixtures/${name}`, import.meta.url)));
}

const squash = (text: string): string => text.replace(/\s+/g, " ").trim();

describe("binary document extractors", () => {
  it("yields one unit per PDF page", async () => {
    const units = await new PdfExtractor().extract(source("pdf", await fixture("vpn-guide.pdf"), "vpn-guide.pdf"));
    expect(units.map((u) => [u.label, squash(u.text), u.attributes])).toEqual([
      ["page:1", "VPN token reset steps", { page: 1, pages: 2 }],
      ["page:2", "Reconnect after the reset", { page: 2, pages: 2 }]
    ]);
  });

  it("yields one document unit for a DOCX file", async () => {
    const units = await new DocxExtractor().extract(source("docx", await fixture("vpn-guide.docx"), "vpn-guide.docx"));
    expect(units).toHaveLength(1);
    expect(units[0]?.label).toBe("document");
    expect(units[0]?.text.split("\n").filter((line) => line.trim())).toEqual([
      "Reset the VPN token.",
      "Reconnect the client."
    ]);
    expect(units[0]?.attributes).toEqual({ paragraphs: 2 });
  });

  it("reports a corrupt DOCX as an extraction error", async () => {
    await expect(
      new DocxExtractor().extract(source("docx", utf8("not a zip archive"), "broken.docx"))
    ).rejects.toBeInstanceOf(ExtractionError);
  });

  it("reports a corrupt PDF as an extraction error", async () => {
    await expect(
      new PdfExtractor().extract(source("pdf", utf8("not a pdf"), "broken.pdf"))
    ).rejects.toBeInstanceOf(ExtractionError);
  });
});

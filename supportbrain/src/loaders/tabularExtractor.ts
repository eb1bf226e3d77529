import { Readable } from "node:stream";

import ExcelJS from "exceljs";
import type { Worksheet } from "exceljs";

import { ExtractionError } from "../errors.js";
import type { ExtractedUnit, Extractor, SourceDocument } from "./types.js";
import { contextOf, toArrayBuffer } from "./types.js";

type SheetRow = { rowNumber: number; cells: string[] };

function readRows(sheet: Worksheet): SheetRow[] {
  const rows: SheetRow[] = [];
  const columnCount = sheet.columnCount;
  for (let r = 1; r <= sheet.rowCount; r += 1) {
    const row = sheet.getRow(r);
    const cells: string[] = [];
    for (let c = 1; c <= columnCount; c += 1) {
      cells.push(row.getCell(c).text.trim());
    }
    rows.push({ rowNumber: r, cells });
  }
  return rows;
}

function isBlank(row: SheetRow): boolean {
  return row.cells.every((cell) => cell === "");
}

function headerNames(header: SheetRow): string[] {
  return header.cells.map((name, i) => name || `Column ${i + 1}`);
}

function renderRow(row: SheetRow, headers: string[]): string {
  const parts = row.cells
    .map((cell, i) => (cell ? `${headers[i] ?? `Column ${i + 1}`}: ${cell}` : ""))
    .filter(Boolean);
  return `Row ${row.rowNumber}: ${parts.join(" | ")}`;
}

/** Consecutive non-blank rows, split into runs of at most `maxRows`. */
function rowRanges(rows: SheetRow[], maxRows: number): SheetRow[][] {
  const ranges: SheetRow[][] = [];
  let current: SheetRow[] = [];
  for (const row of rows) {
    if (isBlank(row)) {
      if (current.length) ranges.push(current);
      current = [];
      continue;
    }
    current.push(row);
    if (current.length >= maxRows) {
      ranges.push(current);
      current = [];
    }
  }
  if (current.length) ranges.push(current);
  return ranges;
}

/**
 * Workbooks and CSV files. Every cell is prefixed with its column header so a
 * chunk taken out of the sheet still reads as a record.
 */
export class TabularExtractor implements Extractor {
  readonly formats = ["xlsx", "csv"] as const;

  constructor(private readonly rowsPerUnit: number) {}

  async extract(source: SourceDocument): Promise<ExtractedUnit[]> {
    const workbook = new ExcelJS.Workbook();
    try {
      if (source.format === "csv") {
        await workbook.csv.read(Readable.from([Buffer.from(source.data)]));
      } else {
        await workbook.xlsx.load(toArrayBuffer(source.data));
      }
    } catch (err: unknown) {
      throw new ExtractionError(`Unable to read spreadsheet ${source.filename}`, {
        context: contextOf(source),
        cause: err
      });
    }

    const units: ExtractedUnit[] = [];
    for (const sheet of workbook.worksheets) {
      const rows = readRows(sheet);
      const headerIndex = rows.findIndex((row) => !isBlank(row));
      const header = rows[headerIndex];
      if (!header) continue;

      const headers = headerNames(header);
      const sheetName = source.format === "csv" ? "csv" : sheet.name;

      for (const range of rowRanges(rows.slice(headerIndex + 1), this.rowsPerUnit)) {
        const first = range[0];
        const last = range[range.length - 1];
        if (!first || !last) continue;

        const columnCount = headers.length;
        const text = [
          `Sheet: ${sheetName}`,
          `Columns: ${headers.join(", ")}`,
          ...range.map((row) => renderRow(row, headers))
        ].join("\n");

        units.push({
          documentId: source.id,
          text,
          label: `sheet:${sheetName}:rows-${first.rowNumber}-${last.rowNumber} (${range.length} rows, ${columnCount} cols)`,
          confidence: 1,
          attributes: {
            sheet: sheetName,
            firstRow: first.rowNumber,
            lastRow: last.rowNumber,
            rowCount: range.length,
            columnCount
          }
        });
      }
    }
    return units;
  }
}

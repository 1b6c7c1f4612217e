import fs from "fs";
import * as XLSX from "xlsx";
import { RawProductRow } from "../types";
import { InputFileNotFoundError } from "./errors";

/**
 * Reads the first worksheet of a product feed workbook (.xlsx, .xls or .csv).
 * Each data row comes back keyed by its trimmed header name.
 */
export function readProductSheet(filePath: string): RawProductRow[] {
  if (!fs.existsSync(filePath)) {
    throw new InputFileNotFoundError(filePath);
  }

  const workbook = XLSX.read(fs.readFileSync(filePath), { type: "buffer" });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) return [];

  const worksheet = workbook.Sheets[firstSheetName];
  if (!worksheet) return [];

  const rows = XLSX.utils.sheet_to_json<RawProductRow>(worksheet);

  return rows.map((row) => {
    const trimmed: RawProductRow = {};
    for (const [key, value] of Object.entries(row)) {
      trimmed[key.trim()] = value;
    }
    return trimmed;
  });
}

export function buildProductWorkbook(rows: RawProductRow[]): Buffer {
  const worksheet = XLSX.utils.json_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, "Products");
  return XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
}

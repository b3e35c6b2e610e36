import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";

export type SheetRow = Record<string, unknown>;

/**
 * Rows of the first sheet keyed by header. CSV text is read as UTF-8 and left
 * unparsed so codes like "007" and dates keep their exact spelling; XLSX cells
 * keep their stored types.
 */
export function readSheetRows(filePath: string): SheetRow[] {
  const resolved = path.resolve(filePath);
  const workbook = /\.(csv|txt)$/i.test(resolved)
    ? XLSX.read(fs.readFileSync(resolved, "utf8").replace(/^\uFEFF/, ""), { type: "string", raw: true })
    : XLSX.read(fs.readFileSync(resolved), { type: "buffer" });

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) return [];
  return XLSX.utils.sheet_to_json<SheetRow>(sheet, { defval: "" });
}

export function writeCsv(filePath: string, rows: Array<Record<string, unknown>>, header?: string[]): void {
  const sheet = rows.length > 0 ? XLSX.utils.json_to_sheet(rows, { header }) : XLSX.utils.aoa_to_sheet([header ?? []]);
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(path.resolve(filePath), `${XLSX.utils.sheet_to_csv(sheet)}\n`, "utf8");
}

import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { normalizeStoreUrl } from "./utils";

/** Header names tried, in order, when no column is given */
const URL_COLUMN_NAMES = ["url", "store_url", "store", "website", "domain", "shop"];

/**
 * Read store addresses from a CSV or XLSX file, normalized to root URLs.
 * Both formats go through the same sheet reader; cells that are not a
 * usable address are skipped.
 * @param filePath  Absolute or relative path to the file.
 * @param columnName  Optional header name of the store column.
 */
export function readStoreUrlsFromFile(filePath: string, columnName?: string): string[] {
  const [header, ...rows] = readRows(filePath);
  if (!header) {
    throw new Error(`File "${filePath}" is empty.`);
  }

  const colIdx = findStoreColumn(header.map(cellText), columnName);
  const urls: string[] = [];
  for (const row of rows) {
    const root = normalizeStoreUrl(cellText(row[colIdx]));
    if (root) urls.push(root);
  }
  return urls;
}

function loadWorkbook(filePath: string): XLSX.WorkBook {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case ".csv": {
      // raw keeps every field as text, so "1e3" or "2024-01-01" stay as typed
      const text = fs.readFileSync(filePath, "utf-8").replace(/^\uFEFF/, "");
      if (!text.trim()) throw new Error(`File "${filePath}" is empty.`);
      return XLSX.read(text, { type: "string", raw: true });
    }
    case ".xlsx":
    case ".xls":
      return XLSX.readFile(filePath);
    default:
      throw new Error(`Unsupported file type "${ext}". Only .csv and .xlsx/.xls are supported.`);
  }
}

/** First worksheet as rows of cells, blank rows dropped */
function readRows(filePath: string): unknown[][] {
  const wb = loadWorkbook(filePath);
  const sheetName = wb.SheetNames[0];
  const ws = sheetName === undefined ? undefined : wb.Sheets[sheetName];
  if (!ws) {
    throw new Error(`File "${filePath}" has no worksheets.`);
  }
  return XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, blankrows: false, defval: "" });
}

function findStoreColumn(headers: string[], preferred?: string): number {
  const names = headers.map((h) => h.trim().toLowerCase());
  const wanted = preferred ? [preferred.trim().toLowerCase()] : URL_COLUMN_NAMES;

  for (const name of wanted) {
    const idx = names.indexOf(name);
    if (idx !== -1) return idx;
  }

  const present = headers.map((h) => `"${h}"`).join(", ");
  if (preferred) {
    throw new Error(`Column "${preferred}" not found.\n   Available headers: ${present}`);
  }
  throw new Error(
    `No store URL column found automatically.\n` +
      `   Headers present: ${present}\n` +
      `   Re-run with --column=<name> to specify the correct column.`
  );
}

function cellText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "";
  return String(value);
}

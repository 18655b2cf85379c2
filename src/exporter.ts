import * as fs from "fs";
import * as path from "path";
import type { BrandContext, InsightsResult, PipelineError, RunSummary, StoreSummary } from "./types";
import { hostOf } from "./core/html";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

/** Generate a filename with a timestamp suffix to avoid overwriting old runs. */
export function timestampedPath(
  outputDir: string,
  base: string,
  ext: string,
  now: Date = new Date()
): string {
  const ts = now
    .toISOString()
    .replace(/[-:]/g, "")
    .replace("T", "_")
    .slice(0, 15); // "20260224_143022"
  return path.join(outputDir, `${base}_${ts}${ext}`);
}

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 * @param value - The raw cell value
 */
export function escapeCsv(value: string | number | null): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Convert an array of objects to a CSV string with a header row.
 * @param rows - Data rows
 * @param columns - Ordered column keys
 */
export function toCsv<T extends object>(
  rows: T[],
  columns: { key: keyof T & string }[]
): string {
  const header = columns.map((c) => escapeCsv(c.key)).join(",");
  const lines = rows.map((row) =>
    columns
      .map((col) => {
        const raw: unknown = row[col.key];
        return escapeCsv(raw == null ? "" : String(raw));
      })
      .join(",")
  );
  return BOM + [header, ...lines].join("\n") + "\n";
}

const SUMMARY_COLUMNS: { key: keyof StoreSummary & string }[] = [
  { key: "store_url" },
  { key: "status" },
  { key: "brand" },
  { key: "products" },
  { key: "hero_products" },
  { key: "policies" },
  { key: "faqs" },
  { key: "social_handles" },
  { key: "emails" },
  { key: "phones" },
  { key: "warnings" },
  { key: "error" },
];

const ERROR_COLUMNS: { key: keyof PipelineError & string }[] = [
  { key: "storeUrl" },
  { key: "kind" },
  { key: "stage" },
  { key: "message" },
];

/**
 * Write one store's brand context to `<host>_<timestamp>.json`.
 * @returns Absolute path to the written file
 */
export function exportBrandContext(context: BrandContext, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const base = hostOf(context.storeUrl).replace(/[^a-z0-9.-]/g, "_");
  const filePath = timestampedPath(outputDir, base, ".json");
  fs.writeFileSync(filePath, JSON.stringify(context, null, 2) + "\n", "utf-8");
  return filePath;
}

/**
 * Flatten a pipeline outcome into one summary row.
 */
export function toStoreSummary(
  storeUrl: string,
  outcome: InsightsResult
): StoreSummary {
  if (!outcome.success) {
    return {
      store_url: storeUrl,
      status: "failed",
      brand: "",
      products: 0,
      hero_products: 0,
      policies: 0,
      faqs: 0,
      social_handles: 0,
      emails: 0,
      phones: 0,
      warnings: 0,
      error: `${outcome.error.kind}: ${outcome.error.message}`,
    };
  }
  const { data } = outcome;
  return {
    store_url: data.storeUrl,
    status: outcome.status,
    brand: data.name ?? "",
    products: data.products.length,
    hero_products: data.heroProducts.length,
    policies: Object.keys(data.policies).length,
    faqs: data.faqs.length,
    social_handles: Object.keys(data.socialHandles).length,
    emails: data.contact.emails.length,
    phones: data.contact.phones.length,
    warnings: data.warnings.length,
    error: "",
  };
}

/**
 * Export one row per store to stores.csv.
 * @returns Absolute path to the written file
 */
export function exportStoreSummaries(rows: StoreSummary[], outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "stores", ".csv");
  fs.writeFileSync(filePath, toCsv(rows, SUMMARY_COLUMNS), "utf-8");
  return filePath;
}

/**
 * Export failed stores to errors.csv.
 * @returns Absolute path to the written file
 */
export function exportErrors(errors: PipelineError[], outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "errors", ".csv");
  fs.writeFileSync(filePath, toCsv(errors, ERROR_COLUMNS), "utf-8");
  return filePath;
}

/**
 * Write run statistics to summary.json.
 * @returns Absolute path to the written file
 */
export function exportRunSummary(summary: RunSummary, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "summary", ".json");
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return filePath;
}

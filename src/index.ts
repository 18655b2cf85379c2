#!/usr/bin/env node
import * as readline from "readline";
import * as path from "path";
import type { InsightsConfig, InsightsResult, PipelineError, RunSummary, StoreSummary } from "./types";
import { readStoreUrlsFromFile } from "./core/file-reader";
import { createFetcher } from "./core/fetcher";
import { getInsights } from "./aggregator";
import {
  exportBrandContext,
  exportErrors,
  exportRunSummary,
  exportStoreSummaries,
  toStoreSummary,
} from "./exporter";
import {
  createHttpClient,
  deduplicateUrls,
  formatDuration,
  getErrorMessage,
  normalizeStoreUrl,
  runInBatches,
} from "./core/utils";

interface CliArgs {
  storeUrl?: string;
  inputFile?: string;
  urlColumn?: string;
  concurrency?: number;
  delayMs?: number;
  timeout?: number;
  deadlineMs?: number;
  maxAttempts?: number;
  useSitemap: boolean;
  outputDir?: string;
}

/**
 * Parse `--key=value` CLI arguments.
 * Supports --url, --input, --column, --concurrency, --delay, --timeout,
 * --deadline, --retries, --output and --no-sitemap.
 */
function parseArgs(argv: string[]): CliArgs {
  const opts: Record<string, string> = {};
  let useSitemap = true;

  for (const arg of argv) {
    if (arg === "--no-sitemap") { useSitemap = false; continue; }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    }
  }

  return {
    storeUrl: opts.url,
    inputFile: opts.input,
    urlColumn: opts.column,
    concurrency: positiveInt(opts.concurrency),
    delayMs: positiveInt(opts.delay),
    timeout: positiveInt(opts.timeout),
    deadlineMs: positiveInt(opts.deadline),
    maxAttempts: positiveInt(opts.retries),
    useSitemap,
    outputDir: opts.output,
  };
}

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

/**
 * Prompt the user interactively for a store URL via stdin.
 */
function promptForUrl(): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question("Enter store URL: ", (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function loadStoreUrls(args: CliArgs): Promise<string[]> {
  if (args.inputFile) {
    console.log(`Step 1: Reading stores from file: ${args.inputFile}...`);
    return readStoreUrlsFromFile(args.inputFile, args.urlColumn);
  }
  const input = args.storeUrl || (await promptForUrl());
  const root = normalizeStoreUrl(input);
  if (!root) throw new Error(`Not a store URL: "${input}"`);
  console.log(`Step 1: Store ${root}`);
  return [root];
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  console.log("Shopify Brand Insights v1.0\n");

  let storeUrls: string[];
  try {
    storeUrls = deduplicateUrls(await loadStoreUrls(args));
  } catch (err: unknown) {
    console.error(`\n   Error: ${getErrorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  const config: InsightsConfig = {
    storeUrls,
    concurrency: args.concurrency || 3,
    delayMs: args.delayMs ?? 500,
    timeout: args.timeout || 15_000,
    deadlineMs: args.deadlineMs || 60_000,
    maxAttempts: args.maxAttempts || 3,
    useSitemap: args.useSitemap,
    outputDir: path.resolve(args.outputDir || "./output"),
  };

  console.log(`   ${config.storeUrls.length} store(s) to analyse\n`);
  if (config.storeUrls.length === 0) {
    console.log("Nothing to analyse. Exiting.");
    return;
  }

  const http = createHttpClient(config.timeout);
  const fetcher = createFetcher(http.client, {
    timeoutMs: config.timeout,
    retryPolicy: { maxAttempts: config.maxAttempts },
  });

  // ── Step 2: Run the pipeline per store ────────────────────────────
  console.log(
    `Step 2: Extracting ${config.storeUrls.length} stores (concurrency: ${config.concurrency})...`
  );
  const startTime = Date.now();

  let results: InsightsResult[];
  try {
    results = await runInBatches(
      config.storeUrls,
      config.concurrency,
      config.delayMs,
      (storeUrl) =>
        getInsights(storeUrl, {
          fetcher,
          deadlineMs: config.deadlineMs,
          useSitemap: config.useSitemap,
          logger: console,
        }),
      (completed, total, storeUrl, result) => {
        const label = result.success
          ? `${result.status === "complete" ? "+" : "~"} ${storeUrl}`
          : `x ${storeUrl} (${result.error.kind})`;
        console.log(`   [${completed}/${total}]  ${label}`);
      }
    );
  } finally {
    http.close();
  }

  const elapsed = Date.now() - startTime;

  // ── Step 3: Export ────────────────────────────────────────────────
  console.log("\nStep 3: Exporting...");
  const outputFiles: string[] = [];
  const rows: StoreSummary[] = [];
  const errors: PipelineError[] = [];

  results.forEach((result, i) => {
    rows.push(toStoreSummary(config.storeUrls[i], result));
    if (result.success) {
      const filePath = exportBrandContext(result.data, config.outputDir);
      outputFiles.push(filePath);
      console.log(`   ${filePath} (${result.data.products.length} products, ${result.data.warnings.length} warnings)`);
    } else {
      errors.push(result.error);
    }
  });

  const storesPath = exportStoreSummaries(rows, config.outputDir);
  outputFiles.push(storesPath);
  console.log(`   ${storesPath} (${rows.length} rows)`);

  if (errors.length > 0) {
    const errPath = exportErrors(errors, config.outputDir);
    outputFiles.push(errPath);
    console.log(`   ${errPath} (${errors.length} rows)`);
  }

  const successes = rows.filter((r) => r.status !== "failed").length;
  const partial = rows.filter((r) => r.status === "partial").length;
  const successRate = ((successes / rows.length) * 100).toFixed(1) + "%";

  const summary: RunSummary = {
    total_stores: rows.length,
    total_success: successes,
    total_partial: partial,
    total_errors: errors.length,
    success_rate: successRate,
    elapsed_time: formatDuration(elapsed),
    output_files: outputFiles,
    finished_at: new Date().toISOString(),
  };
  const summaryPath = exportRunSummary(summary, config.outputDir);
  console.log(`   ${summaryPath}`);

  // ── Done ──────────────────────────────────────────────────────────
  console.log(`\nDone in ${formatDuration(elapsed)}`);
  console.log(`   Success: ${successes}/${rows.length} (${successRate}, ${partial} partial)`);
  console.log(`   Errors:  ${errors.length}/${rows.length}`);
  console.log(`   Output:  ${config.outputDir}/`);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`Fatal: ${getErrorMessage(err)}`);
    process.exitCode = 1;
  });
}

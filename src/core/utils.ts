import * as http from "http";
import * as https from "https";
import axios, { AxiosError, type AxiosInstance } from "axios";

const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/18.0 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64; rv:133.0) Gecko/20100101 Firefox/133.0",
];

/**
 * Pick a random User-Agent string from the rotation pool.
 */
function randomUA(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

/** Process-scoped HTTP client: one connection pool shared by every fetch */
export interface HttpClient {
  client: AxiosInstance;
  close(): void;
}

/**
 * Create a configured axios instance with realistic browser headers and
 * keep-alive agents. Call `close()` once the process is done fetching.
 * @param timeout - Default request timeout in milliseconds
 */
export function createHttpClient(timeout: number): HttpClient {
  const httpAgent = new http.Agent({ keepAlive: true, maxSockets: 16 });
  const httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 16 });

  const client = axios.create({
    timeout,
    headers: {
      Accept:
        "text/html,application/xhtml+xml,application/json;q=0.9,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
    },
    maxRedirects: 5,
    httpAgent,
    httpsAgent,
  });

  // Rotate User-Agent on every request
  client.interceptors.request.use((config) => {
    config.headers.set("User-Agent", randomUA());
    return config;
  });

  return {
    client,
    close: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}

/**
 * Sleep for the given number of milliseconds. Resolves early when the
 * signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Process items in batches with configurable concurrency and delay.
 * @param items - Array of items to process
 * @param concurrency - Max items to process in parallel per batch
 * @param delayMs - Milliseconds to wait between batches
 * @param processor - Async function to run on each item
 * @param onItemDone - Callback after each item completes
 * @returns Array of results in input order
 */
export async function runInBatches<T, R>(
  items: T[],
  concurrency: number,
  delayMs: number,
  processor: (item: T) => Promise<R>,
  onItemDone: (completed: number, total: number, item: T, result: R) => void
): Promise<R[]> {
  const results: R[] = [];
  let completed = 0;

  for (let i = 0; i < items.length; i += concurrency) {
    const batch = items.slice(i, i + concurrency);
    const batchResults = await Promise.all(
      batch.map(async (item) => {
        const result = await processor(item);
        completed++;
        onItemDone(completed, items.length, item, result);
        return result;
      })
    );
    results.push(...batchResults);

    if (i + concurrency < items.length) {
      await sleep(delayMs);
    }
  }

  return results;
}

/**
 * Normalize a user-supplied store address to `scheme://host[/path]` with
 * no trailing slash, query or fragment. Bare hosts get https.
 * @returns The normalized root URL, or null when it cannot be parsed
 */
export function normalizeStoreUrl(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  const withScheme = /^https?:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;
  try {
    const u = new URL(withScheme);
    if (!u.hostname.includes(".") && u.hostname !== "localhost") return null;
    return `${u.protocol}//${u.host}${u.pathname.replace(/\/+$/, "")}`;
  } catch {
    return null;
  }
}

/**
 * Key used to recognise two spellings of the same page: fragment dropped,
 * trailing slash removed from non-root paths.
 */
export function urlKey(url: string): string {
  try {
    const u = new URL(url);
    u.hash = "";
    if (u.pathname.length > 1) u.pathname = u.pathname.replace(/\/+$/, "");
    return u.href;
  } catch {
    return url;
  }
}

/**
 * Deduplicate an array of URL strings, preserving order of first occurrence.
 * @param urls - Array of URLs (may contain duplicates)
 * @returns Deduplicated array
 */
export function deduplicateUrls(urls: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const url of urls) {
    const normalized = urlKey(url);
    if (!seen.has(normalized)) {
      seen.add(normalized);
      unique.push(url);
    }
  }
  return unique;
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT")
      return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.code === "ERR_FR_TOO_MANY_REDIRECTS") return "Too many redirects";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}

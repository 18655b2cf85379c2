import { AxiosError, isCancel, type AxiosInstance, type AxiosResponse } from "axios";
import type {
  ContentKind,
  FetchFailureKind,
  FetchOptions,
  FetchResult,
  Fetcher,
} from "../types";
import { getErrorMessage, sleep } from "./utils";

export interface RetryPolicy {
  /** Attempts for transient failures (connection reset, timeout, 5xx) */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Upper bound on a server-supplied Retry-After wait */
  maxRetryAfterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  backoffMultiplier: 2,
  maxRetryAfterMs: 10_000,
};

export interface HttpFetcherOptions {
  retryPolicy?: Partial<RetryPolicy>;
  timeoutMs?: number;
  maxRedirects?: number;
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);
const RESET_CODES = new Set(["ECONNRESET", "EPIPE", "EAI_AGAIN"]);

type Retry = "transient" | "throttle" | null;

interface Attempt {
  result: FetchResult;
  retry: Retry;
  delayMs: number;
}

/**
 * Create a Fetcher over a shared axios instance.
 * Never throws: every outcome is folded into a FetchResult.
 * @param http - Process-scoped axios instance
 */
export function createFetcher(
  http: AxiosInstance,
  options: HttpFetcherOptions = {}
): Fetcher {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retryPolicy };

  return {
    async fetch(url: string, fetchOptions: FetchOptions = {}): Promise<FetchResult> {
      const opts: FetchOptions = {
        timeoutMs: options.timeoutMs,
        maxRedirects: options.maxRedirects,
        ...fetchOptions,
      };
      const { signal } = opts;
      let attempt = 0;
      let throttled = false;

      for (;;) {
        attempt++;
        const outcome = await fetchOnce(http, url, opts, policy);
        if (signal?.aborted) return cancelled(url);

        if (outcome.retry === "throttle" && !throttled) {
          // A 429 gets one extra try that does not count against maxAttempts
          throttled = true;
          attempt--;
          await sleep(outcome.delayMs, signal);
          continue;
        }
        if (outcome.retry === "transient" && attempt < policy.maxAttempts) {
          await sleep(backoffDelay(policy, attempt), signal);
          continue;
        }
        return outcome.result;
      }
    },
  };
}

/**
 * Single request, classified. Statuses never throw (validateStatus accepts
 * everything), so only transport errors reach the catch.
 */
async function fetchOnce(
  http: AxiosInstance,
  url: string,
  opts: FetchOptions,
  policy: RetryPolicy
): Promise<Attempt> {
  let response: AxiosResponse<string>;
  try {
    response = await http.get<string>(url, {
      responseType: "text",
      timeout: opts.timeoutMs,
      maxRedirects: opts.maxRedirects,
      signal: opts.signal,
      validateStatus: () => true,
    });
  } catch (err) {
    return classifyError(url, err, opts.signal);
  }

  const status = response.status;

  if (status === 429) {
    return {
      result: failure(url, "http_error", status, "HTTP 429: Too Many Requests"),
      retry: "throttle",
      delayMs: retryAfterDelay(headerString(response.headers["retry-after"]), policy),
    };
  }
  if (status >= 500) {
    return {
      result: failure(url, "server_error", status, `HTTP ${status}: ${response.statusText}`),
      retry: "transient",
      delayMs: 0,
    };
  }
  if (status === 404) {
    return settled(failure(url, "not_found", status, "HTTP 404: Not Found"));
  }
  if (status === 401 || status === 403) {
    return settled(failure(url, "forbidden", status, `HTTP ${status}: Access denied`));
  }
  if (status < 200 || status >= 300) {
    return settled(failure(url, "http_error", status, `HTTP ${status}: ${response.statusText}`));
  }

  const contentType = headerString(response.headers["content-type"]).toLowerCase();
  const body = typeof response.data === "string" ? response.data : "";
  const kind = detectContentKind(contentType, body);
  if (!kind) {
    return settled(
      failure(url, "unsupported_content", status, `Unsupported content type: ${contentType}`)
    );
  }

  return settled({
    success: true,
    data: {
      url,
      finalUrl: responseUrl(response.request) ?? url,
      statusCode: status,
      contentType,
      kind,
      body,
    },
  });
}

function classifyError(url: string, err: unknown, signal?: AbortSignal): Attempt {
  if (signal?.aborted || isCancel(err)) {
    return settled(cancelled(url));
  }
  const message = getErrorMessage(err);
  if (err instanceof AxiosError && err.code) {
    if (TIMEOUT_CODES.has(err.code)) {
      return { result: failure(url, "timeout", null, message), retry: "transient", delayMs: 0 };
    }
    if (RESET_CODES.has(err.code)) {
      return { result: failure(url, "unreachable", null, message), retry: "transient", delayMs: 0 };
    }
  }
  return settled(failure(url, "unreachable", null, message));
}

/**
 * Map a Content-Type header to the kind of document it carries.
 * Missing or text/plain types are sniffed from the body.
 * @returns null for anything the extractors cannot read (images, PDFs, ...)
 */
export function detectContentKind(contentType: string, body: string): ContentKind | null {
  if (contentType.includes("json")) return "json";
  if (contentType.includes("html")) return "html";
  if (contentType.includes("xml")) return "xml";
  if (contentType && !contentType.startsWith("text/plain")) return null;

  const head = body.trimStart().slice(0, 100).toLowerCase();
  if (head.startsWith("{") || head.startsWith("[")) return "json";
  if (head.startsWith("<?xml") || head.startsWith("<urlset") || head.startsWith("<sitemapindex"))
    return "xml";
  return "html";
}

/**
 * Parse a Retry-After value (delta seconds or an HTTP date) into a wait,
 * capped by the policy.
 */
export function retryAfterDelay(value: string, policy: RetryPolicy, now = Date.now()): number {
  let delay = policy.initialDelayMs;
  if (/^\d+$/.test(value.trim())) {
    delay = parseInt(value, 10) * 1000;
  } else if (value) {
    const at = Date.parse(value);
    if (!isNaN(at)) delay = Math.max(0, at - now);
  }
  return Math.min(delay, policy.maxRetryAfterMs);
}

function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelayMs
  );
}

function headerString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return "";
}

/** URL after redirects, as recorded by Node's follow-redirects request */
function responseUrl(request: unknown): string | null {
  if (typeof request === "object" && request !== null && "res" in request) {
    const res = request.res;
    if (
      typeof res === "object" &&
      res !== null &&
      "responseUrl" in res &&
      typeof res.responseUrl === "string"
    ) {
      return res.responseUrl;
    }
  }
  return null;
}

function failure(
  url: string,
  kind: FetchFailureKind,
  statusCode: number | null,
  message: string
): FetchResult {
  return { success: false, error: { url, kind, statusCode, message } };
}

function cancelled(url: string): FetchResult {
  return failure(url, "cancelled", null, "Request cancelled");
}

function settled(result: FetchResult): Attempt {
  return { result, retry: null, delayMs: 0 };
}

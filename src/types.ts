/** CLI configuration parsed from command-line arguments */
export interface InsightsConfig {
  storeUrls: string[];
  concurrency: number;
  delayMs: number;
  timeout: number;
  deadlineMs: number;
  maxAttempts: number;
  useSitemap: boolean;
  outputDir: string;
}

// ── Fetching ────────────────────────────────────────────────────────

export type ContentKind = "html" | "json" | "xml";

export type FetchFailureKind =
  | "unreachable"
  | "timeout"
  | "not_found"
  | "forbidden"
  | "server_error"
  | "http_error"
  | "unsupported_content"
  | "cancelled";

/** Body of a successful fetch, after redirects */
export interface FetchedContent {
  url: string;
  finalUrl: string;
  statusCode: number;
  contentType: string;
  kind: ContentKind;
  body: string;
}

export interface FetchFailure {
  url: string;
  kind: FetchFailureKind;
  statusCode: number | null;
  message: string;
}

/** Result of fetching a single URL: discriminated union */
export type FetchResult =
  | { success: true; data: FetchedContent }
  | { success: false; error: FetchFailure };

export interface FetchOptions {
  timeoutMs?: number;
  maxRedirects?: number;
  signal?: AbortSignal;
}

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
}

// ── Brand context ───────────────────────────────────────────────────

export interface Money {
  amount: string;
  currency: string | null;
}

export interface Product {
  id: string;
  title: string;
  handle: string;
  url: string;
  price?: Money;
  compareAtPrice?: Money;
  image?: string;
  available?: boolean;
  description?: string;
  vendor?: string;
  productType?: string;
  tags: string[];
}

export const POLICY_KINDS = [
  "privacy",
  "return",
  "refund",
  "terms",
  "shipping",
] as const;

export type PolicyKind = (typeof POLICY_KINDS)[number];

export interface PolicyDocument {
  kind: PolicyKind;
  title: string;
  url: string;
  body: string;
  extractedAt: string;
}

export interface FAQ {
  question: string;
  answer: string;
}

export interface ContactInfo {
  emails: string[];
  phones: string[];
}

export interface BrandContext {
  storeUrl: string;
  domain: string;
  name?: string;
  description?: string;
  currency?: string;
  about?: string;
  products: Product[];
  heroProducts: Product[];
  policies: Partial<Record<PolicyKind, PolicyDocument>>;
  faqs: FAQ[];
  socialHandles: Record<string, string>;
  contact: ContactInfo;
  importantLinks: Record<string, string>;
  warnings: string[];
  extractedAt: string;
}

// ── Pipeline ────────────────────────────────────────────────────────

export type PipelineStage =
  | "started"
  | "locating"
  | "fetching"
  | "extracting"
  | "merged"
  | "failed";

export type PipelineErrorKind =
  | "StoreUnreachable"
  | "NotAShopifyStore"
  | "Timeout"
  | "InternalFailure";

export interface PipelineError {
  kind: PipelineErrorKind;
  storeUrl: string;
  stage: PipelineStage;
  message: string;
}

/** Outcome of one pipeline run: discriminated union */
export type InsightsResult =
  | { success: true; status: "complete" | "partial"; data: BrandContext }
  | { success: false; error: PipelineError };

/** Anchor found on a page, resolved to an absolute URL */
export interface PageLink {
  label: string;
  url: string;
}

/** Ordered candidate URLs per resource category */
export interface ResourceMap {
  homepage: string;
  catalog: string[];
  catalogListing: string[];
  policies: Record<PolicyKind, string[]>;
  faq: string[];
  contact: string[];
  about: string[];
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

/** Per-store row written to the run summary */
export interface StoreSummary {
  store_url: string;
  status: "complete" | "partial" | "failed";
  brand: string;
  products: number;
  hero_products: number;
  policies: number;
  faqs: number;
  social_handles: number;
  emails: number;
  phones: number;
  warnings: number;
  error: string;
}

/** Statistics written to summary.json after a run completes */
export interface RunSummary {
  total_stores: number;
  total_success: number;
  total_partial: number;
  total_errors: number;
  success_rate: string;
  elapsed_time: string;
  output_files: string[];
  finished_at: string;
}

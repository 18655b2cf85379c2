import type {
  BrandContext,
  ContactInfo,
  FetchResult,
  Fetcher,
  InsightsResult,
  Logger,
  PipelineErrorKind,
  PipelineStage,
} from "./types";
import { collectNavLinks, parsePage, type ParsedPage } from "./core/html";
import { getErrorMessage, normalizeStoreUrl, urlKey } from "./core/utils";
import { catalogEndpoints, locate } from "./resource-locator";
import { discoverPageUrls } from "./sitemap-parser";
import { hasShopifyMarkers } from "./shopify-detector";
import { firstMatch, type ExtractionContext, type ExtractionStrategies } from "./extractors/context";
import { extractCatalog, parseProductFeed, type CatalogResult } from "./extractors/catalog";
import {
  extractHeroProducts,
  firstFeaturedSectionStrategy,
  type HeroProductsResult,
} from "./extractors/hero-products";
import { containerTextStrategy } from "./extractors/main-text";
import { extractPolicies, type PoliciesResult } from "./extractors/policies";
import { extractAbout, type AboutResult } from "./extractors/about";
import { DEFAULT_FAQ_STRATEGIES, extractFaqs, type FaqsResult } from "./extractors/faqs";
import { extractSocialHandles } from "./extractors/social-handles";
import { extractContactInfo } from "./extractors/contact-info";
import { detectCurrency, extractBrandMeta, type BrandMeta } from "./extractors/brand-meta";
import { extractImportantLinks } from "./extractors/important-links";

export const DEFAULT_DEADLINE_MS = 60_000;
export const DEFAULT_MAX_CATALOG_PAGES = 4;
export const DEFAULT_MAX_HERO_PRODUCTS = 10;

export const DEFAULT_STRATEGIES: ExtractionStrategies = {
  featuredSection: firstFeaturedSectionStrategy,
  mainText: containerTextStrategy,
  faq: DEFAULT_FAQ_STRATEGIES,
};

export interface PipelineOptions {
  fetcher: Fetcher;
  /** Whole-run budget; on expiry the run fails with Timeout */
  deadlineMs?: number;
  /** Caller cancellation; treated like an expired deadline */
  signal?: AbortSignal;
  /** Read /sitemap.xml for extra page candidates (default true) */
  useSitemap?: boolean;
  maxCatalogPages?: number;
  maxHeroProducts?: number;
  strategies?: Partial<ExtractionStrategies>;
  now?: () => Date;
  logger?: Logger;
}

const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
};

/**
 * Fetches shared by one pipeline run, memoized by URL so concurrent
 * categories never request the same page twice.
 */
class PageCache {
  private readonly pages = new Map<string, Promise<FetchResult>>();

  constructor(
    private readonly fetcher: Fetcher,
    private readonly signal: AbortSignal
  ) {}

  get(url: string): Promise<FetchResult> {
    const key = urlKey(url);
    let pending = this.pages.get(key);
    if (!pending) {
      pending = this.fetcher.fetch(url, { signal: this.signal });
      this.pages.set(key, pending);
    }
    return pending;
  }
}

interface RunState {
  storeUrl: string;
  stage: PipelineStage;
}

/**
 * Extract the brand context of a Shopify storefront.
 * Resolves to a BrandContext (complete, or partial with warnings) or to a
 * classified PipelineError; never rejects.
 * @param storeUrl - Store root, with or without scheme
 */
export async function getInsights(
  storeUrl: string,
  options: PipelineOptions
): Promise<InsightsResult> {
  const deadlineMs = options.deadlineMs ?? DEFAULT_DEADLINE_MS;
  const state: RunState = { storeUrl, stage: "started" };
  const controller = new AbortController();
  const abort = () => controller.abort();

  if (options.signal?.aborted) controller.abort();
  else options.signal?.addEventListener("abort", abort, { once: true });
  const timer = setTimeout(abort, deadlineMs);

  const timedOut = (): InsightsResult =>
    failed(
      state,
      "Timeout",
      options.signal?.aborted
        ? "Pipeline cancelled"
        : `Pipeline exceeded its ${deadlineMs}ms deadline`
    );

  try {
    if (controller.signal.aborted) return timedOut();

    const work = runPipeline(state, options, controller.signal).catch((err: unknown) =>
      failed(state, "InternalFailure", getErrorMessage(err))
    );
    const outcome = await Promise.race([work, whenAborted(controller.signal)]);

    // Partial results are never returned for a global timeout
    if (outcome === "aborted" || controller.signal.aborted) return timedOut();
    return outcome;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", abort);
    controller.abort();
  }
}

/**
 * HTTP status a REST layer should answer with for each failure kind.
 */
export function pipelineErrorStatus(kind: PipelineErrorKind): number {
  switch (kind) {
    case "StoreUnreachable":
      return 404;
    case "NotAShopifyStore":
      return 400;
    case "Timeout":
      return 504;
    case "InternalFailure":
      return 500;
  }
}

async function runPipeline(
  state: RunState,
  options: PipelineOptions,
  signal: AbortSignal
): Promise<InsightsResult> {
  const logger = options.logger ?? silentLogger;
  const strategies: ExtractionStrategies = { ...DEFAULT_STRATEGIES, ...options.strategies };
  const extractedAt = (options.now ?? (() => new Date()))().toISOString();

  const rootUrl = normalizeStoreUrl(state.storeUrl);
  if (!rootUrl) {
    return failed(state, "StoreUnreachable", `Invalid store URL: ${state.storeUrl}`);
  }
  const cache = new PageCache(options.fetcher, signal);

  // ── Root page: the only fetch whose failure aborts the run ────────
  const root = await cache.get(rootUrl);
  if (!root.success) {
    const kind: PipelineErrorKind =
      root.error.kind === "cancelled"
        ? "Timeout"
        : root.error.kind === "unsupported_content"
          ? "NotAShopifyStore"
          : "StoreUnreachable";
    return failed(state, kind, `Could not fetch ${rootUrl}: ${root.error.message}`);
  }
  if (root.data.kind !== "html") {
    return failed(state, "NotAShopifyStore", `${rootUrl} returned ${root.data.kind}, not a storefront page`);
  }

  const homepage = parsePage(root.data);
  const currency = detectCurrency(homepage);

  if (!hasShopifyMarkers(homepage.html)) {
    // Headless or heavily customised themes: accept if the feed answers
    const probe = await cache.get(catalogEndpoints(rootUrl)[0]);
    if (!probe.success || parseProductFeed(probe.data.body, rootUrl, currency) === null) {
      return failed(state, "NotAShopifyStore", `${rootUrl} shows no sign of being a Shopify store`);
    }
    logger.log(`   ${rootUrl}: no theme markers, identified by products.json`);
  }

  // ── Locate ────────────────────────────────────────────────────────
  state.stage = "locating";
  const navLinks = collectNavLinks(homepage, true);
  const sitemapUrls =
    options.useSitemap === false
      ? []
      : await discoverPageUrls(rootUrl, (url) => cache.get(url), logger);
  const resources = locate(rootUrl, navLinks, sitemapUrls);

  const ctx: ExtractionContext = {
    rootUrl,
    homepage,
    currency,
    extractedAt,
    strategies,
    fetchPage: (url) => cache.get(url),
  };

  // ── Fetch: one task group per category, all concurrent ────────────
  state.stage = "fetching";
  const [catalog, policies, faqs, about, contactPage] = await Promise.all([
    guarded<CatalogResult>(
      "catalog",
      () => extractCatalog(resources.catalog, resources.catalogListing, ctx, options.maxCatalogPages ?? DEFAULT_MAX_CATALOG_PAGES),
      (warning) => ({ products: [], warnings: [warning] })
    ),
    guarded<PoliciesResult>(
      "policies",
      () => extractPolicies(resources.policies, ctx),
      (warning) => ({ policies: {}, pages: [], warnings: [warning] })
    ),
    guarded<FaqsResult>(
      "faqs",
      () => extractFaqs(resources.faq, ctx),
      (warning) => ({ faqs: [], page: null, warnings: [warning] })
    ),
    guarded<AboutResult>(
      "about",
      () => extractAbout(resources.about, ctx),
      (warning) => ({ page: null, warnings: [warning] })
    ),
    guarded<ParsedPage | null>(
      "contactInfo",
      async () => {
        const outcome = await firstMatch(resources.contact, ctx, (page) => page);
        return outcome.found ? outcome.value : null;
      },
      (warning) => {
        logger.warn(`   ${rootUrl}: ${warning}`);
        return null;
      }
    ),
  ]);

  // ── Extract: cross-page categories over what was fetched ──────────
  state.stage = "extracting";
  const pages = uniquePages([
    homepage,
    contactPage,
    about.page,
    faqs.page,
    ...policies.pages,
  ]);

  const hero = await guarded<HeroProductsResult>(
    "heroProducts",
    () =>
      extractHeroProducts(ctx, catalog.products, options.maxHeroProducts ?? DEFAULT_MAX_HERO_PRODUCTS),
    (warning) => ({ products: [], warnings: [warning] })
  );
  const social = await guarded<Flagged<Record<string, string>>>(
    "socialHandles",
    () => {
      const handles = extractSocialHandles(pages);
      return withWarning(handles, Object.keys(handles).length === 0, "socialHandles: no social profile links found");
    },
    (warning) => ({ value: {}, warnings: [warning] })
  );
  const contact = await guarded<Flagged<ContactInfo>>(
    "contactInfo",
    () => {
      const info = extractContactInfo(pages);
      const empty = info.emails.length === 0 && info.phones.length === 0;
      return withWarning(info, empty, "contactInfo: no email addresses or phone numbers found");
    },
    (warning) => ({ value: { emails: [], phones: [] }, warnings: [warning] })
  );
  const meta = await guarded<Flagged<BrandMeta>>(
    "brandMeta",
    () => {
      const found = extractBrandMeta(homepage);
      return withWarning(found, !found.name, "brandMeta: no brand name found");
    },
    (warning) => ({ value: {}, warnings: [warning] })
  );
  const links = await guarded<Flagged<Record<string, string>>>(
    "importantLinks",
    () => {
      const found = extractImportantLinks(homepage);
      return withWarning(found, Object.keys(found).length === 0, "importantLinks: no navigation links matched");
    },
    (warning) => ({ value: {}, warnings: [warning] })
  );

  // ── Merge in fixed category order ─────────────────────────────────
  const warnings = [
    ...catalog.warnings,
    ...hero.warnings,
    ...policies.warnings,
    ...faqs.warnings,
    ...about.warnings,
    ...social.warnings,
    ...contact.warnings,
    ...meta.warnings,
    ...links.warnings,
  ];

  const data: BrandContext = {
    storeUrl: rootUrl,
    domain: new URL(rootUrl).hostname,
    products: catalog.products,
    heroProducts: hero.products,
    policies: policies.policies,
    faqs: faqs.faqs,
    socialHandles: social.value,
    contact: contact.value,
    importantLinks: links.value,
    warnings,
    extractedAt,
  };
  if (meta.value.name) data.name = meta.value.name;
  if (meta.value.description) data.description = meta.value.description;
  if (currency) data.currency = currency;
  if (about.about) data.about = about.about;

  state.stage = "merged";
  for (const warning of warnings) logger.warn(`   ${rootUrl}: ${warning}`);
  return { success: true, status: warnings.length > 0 ? "partial" : "complete", data };
}

/**
 * Run one category; an unexpected exception becomes that category's
 * warning instead of failing the run.
 */
async function guarded<T>(
  category: string,
  task: () => Promise<T> | T,
  fallback: (warning: string) => T
): Promise<T> {
  try {
    return await task();
  } catch (err) {
    return fallback(`${category}: extraction failed: ${getErrorMessage(err)}`);
  }
}

/** A category value with the warnings it produced */
type Flagged<T> = { value: T; warnings: string[] };

function withWarning<T>(value: T, empty: boolean, warning: string): Flagged<T> {
  return { value, warnings: empty ? [warning] : [] };
}

function uniquePages(pages: Array<ParsedPage | null>): ParsedPage[] {
  const seen = new Set<string>();
  const unique: ParsedPage[] = [];
  for (const page of pages) {
    if (!page) continue;
    const key = urlKey(page.finalUrl);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(page);
  }
  return unique;
}

function failed(state: RunState, kind: PipelineErrorKind, message: string): InsightsResult {
  const stage = state.stage;
  state.stage = "failed";
  return { success: false, error: { kind, storeUrl: state.storeUrl, stage, message } };
}

function whenAborted(signal: AbortSignal): Promise<"aborted"> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve("aborted");
    else signal.addEventListener("abort", () => resolve("aborted"), { once: true });
  });
}

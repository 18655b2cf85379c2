import type { FetchResult } from "../types";
import { parsePage, type ParsedPage } from "../core/html";
import type { FeaturedSectionStrategy } from "./hero-products";
import type { MainTextStrategy } from "./main-text";
import type { FaqStrategy } from "./faqs";

/** Heuristics an extractor can have swapped out */
export interface ExtractionStrategies {
  featuredSection: FeaturedSectionStrategy;
  mainText: MainTextStrategy;
  /** Tried in order; the first one that yields pairs wins */
  faq: FaqStrategy[];
}

/** What every extractor gets from the pipeline run */
export interface ExtractionContext {
  rootUrl: string;
  homepage: ParsedPage;
  currency: string | null;
  extractedAt: string;
  strategies: ExtractionStrategies;
  fetchPage(url: string): Promise<FetchResult>;
}

export type CandidateOutcome<T> =
  | { found: true; page: ParsedPage; value: T }
  | { found: false; located: boolean };

/**
 * Walk candidate URLs in order and stop at the first HTML page for which
 * `extract` returns a value. Candidates are never merged.
 * `located` reports whether any candidate was an HTML page at all.
 */
export async function firstMatch<T>(
  candidates: string[],
  ctx: ExtractionContext,
  extract: (page: ParsedPage) => T | null
): Promise<CandidateOutcome<T>> {
  let located = false;
  for (const url of candidates) {
    const result = await ctx.fetchPage(url);
    if (!result.success || result.data.kind !== "html") continue;
    located = true;
    const page = parsePage(result.data);
    const value = extract(page);
    if (value !== null) return { found: true, page, value };
  }
  return { found: false, located };
}

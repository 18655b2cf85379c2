import { XMLParser } from "fast-xml-parser";
import type { FetchResult, Logger } from "./types";
import { isRecord } from "./core/html";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  isArray: (name) => name === "sitemap" || name === "url",
});

/** Shopify splits its sitemap by resource; only the pages one is useful here */
const PAGES_SITEMAP = /sitemap_pages_\d+\.xml/i;

const MAX_CHILD_SITEMAPS = 2;

export interface ParsedSitemap {
  /** Child sitemap URLs of a sitemap index */
  sitemaps: string[];
  /** Page URLs of a standard sitemap */
  urls: string[];
}

/**
 * Parse sitemap XML into child sitemaps (<sitemapindex>) and page URLs
 * (<urlset>). Unknown documents yield two empty lists.
 */
export function parseSitemapXml(xml: string): ParsedSitemap {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml);
  } catch {
    return { sitemaps: [], urls: [] };
  }
  if (!isRecord(parsed)) return { sitemaps: [], urls: [] };

  return {
    sitemaps: locs(parsed.sitemapindex, "sitemap"),
    urls: locs(parsed.urlset, "url"),
  };
}

function locs(container: unknown, entry: string): string[] {
  if (!isRecord(container)) return [];
  const items = container[entry];
  if (!Array.isArray(items)) return [];
  return items
    .map((item: unknown) => (isRecord(item) ? item.loc : undefined))
    .filter((loc): loc is string => typeof loc === "string" && loc.trim() !== "")
    .map((loc) => loc.trim());
}

/**
 * Read the store's /sitemap.xml and return the storefront page URLs it
 * lists (`/pages/...`). Only the pages child sitemaps of an index are
 * followed. Any failure just means no extra candidates.
 * @param rootUrl - Normalized store root
 * @param fetchPage - Fetch function (normally the pipeline's page cache)
 */
export async function discoverPageUrls(
  rootUrl: string,
  fetchPage: (url: string) => Promise<FetchResult>,
  logger: Logger
): Promise<string[]> {
  const sitemapUrl = `${rootUrl}/sitemap.xml`;
  const index = await fetchSitemapXml(sitemapUrl, fetchPage);
  if (index === null) {
    logger.log(`   No sitemap at ${sitemapUrl}`);
    return [];
  }

  const parsed = parseSitemapXml(index);
  let urls = parsed.urls;

  const children = parsed.sitemaps
    .filter((loc) => PAGES_SITEMAP.test(loc))
    .slice(0, MAX_CHILD_SITEMAPS);
  for (const childUrl of children) {
    const xml = await fetchSitemapXml(childUrl, fetchPage);
    if (xml !== null) urls = urls.concat(parseSitemapXml(xml).urls);
  }

  const pages = urls.filter((url) => /\/pages\//i.test(url));
  if (pages.length === 0 && parsed.sitemaps.length + parsed.urls.length > 0) {
    logger.warn(`   Warning: No page URLs found in ${sitemapUrl}`);
  }
  return pages;
}

async function fetchSitemapXml(
  url: string,
  fetchPage: (url: string) => Promise<FetchResult>
): Promise<string | null> {
  const result = await fetchPage(url);
  if (!result.success || result.data.kind !== "xml") return null;
  return result.data.body;
}

import { cleanText, type ParsedPage } from "../core/html";

export interface BrandMeta {
  name?: string;
  description?: string;
}

const TITLE_SEPARATOR = /\s+[|–—-]\s+|\s*[|–—]\s*/;
const GENERIC_TITLES = /^(home|homepage|home page|welcome)$/i;

/** `Shopify.currency = {"active":"EUR","rate":"1.0"};` in the theme bootstrap */
const SHOPIFY_CURRENCY = /Shopify\.currency\s*=\s*\{[^}]*?"active"\s*:\s*"([A-Z]{3})"/;

/**
 * Brand name and description from the homepage head.
 * Name: og:site_name, application-name, then the <title> segment that is
 * not a generic "Home". Description: meta description, then og:description.
 */
export function extractBrandMeta(page: ParsedPage): BrandMeta {
  const { $ } = page;
  const meta: BrandMeta = {};

  const name =
    metaContent(page, "meta[property='og:site_name']") ||
    metaContent(page, "meta[name='application-name']") ||
    nameFromTitle(cleanText($("title").first().text()));
  if (name) meta.name = name;

  const description =
    metaContent(page, "meta[name='description']") ||
    metaContent(page, "meta[property='og:description']");
  if (description) meta.description = description;

  return meta;
}

function nameFromTitle(title: string): string {
  const segments = title
    .split(TITLE_SEPARATOR)
    .map((s) => s.trim())
    .filter(Boolean);
  return segments.find((s) => !GENERIC_TITLES.test(s)) ?? "";
}

function metaContent(page: ParsedPage, selector: string): string {
  return cleanText(page.$(selector).first().attr("content") ?? "");
}

/**
 * ISO currency the storefront prices in, from the theme bootstrap script
 * or Open Graph price tags; null when the page does not say.
 */
export function detectCurrency(page: ParsedPage): string | null {
  const match = page.html.match(SHOPIFY_CURRENCY);
  if (match) return match[1];
  const tagged =
    metaContent(page, "meta[property='og:price:currency']") ||
    metaContent(page, "meta[itemprop='priceCurrency']");
  return /^[A-Za-z]{3}$/.test(tagged) ? tagged.toUpperCase() : null;
}

import type { Money, Product } from "../types";
import {
  anchorLabel,
  CHROME_SELECTOR,
  cleanText,
  htmlToText,
  isRecord,
  parseJson,
  productHandle,
  toAbsoluteUrl,
  type CheerioEl,
  type ParsedPage,
} from "../core/html";
import { firstMatch, type ExtractionContext } from "./context";

/** products.json returns at most this many entries per page */
export const CATALOG_PAGE_SIZE = 250;

export interface CatalogResult {
  products: Product[];
  warnings: string[];
}

export interface ParsedFeed {
  products: Product[];
  /** Entries dropped for lacking a title or handle */
  dropped: number;
  /** Raw entry count, used to decide whether another page exists */
  total: number;
}

/** Product link found in storefront markup */
export interface ProductCard {
  handle: string;
  url: string;
  title: string;
  image?: string;
}

/**
 * Parse a products.json body. Returns null when the body is not JSON or
 * has no `products` array; malformed entries are dropped and counted.
 */
export function parseProductFeed(
  body: string,
  rootUrl: string,
  currency: string | null
): ParsedFeed | null {
  const data = parseJson(body);
  if (!isRecord(data) || !Array.isArray(data.products)) return null;

  const products: Product[] = [];
  let dropped = 0;
  for (const raw of data.products) {
    const product = toProduct(raw, rootUrl, currency);
    if (product) products.push(product);
    else dropped++;
  }
  return { products, dropped, total: data.products.length };
}

function toProduct(raw: unknown, rootUrl: string, currency: string | null): Product | null {
  if (!isRecord(raw)) return null;
  const title = typeof raw.title === "string" ? cleanText(raw.title) : "";
  const handle = typeof raw.handle === "string" ? raw.handle.trim() : "";
  if (!title || !handle) return null;

  const variants = Array.isArray(raw.variants) ? raw.variants.filter(isRecord) : [];
  const images = Array.isArray(raw.images) ? raw.images.filter(isRecord) : [];
  const first = variants[0];

  const product: Product = {
    id: typeof raw.id === "number" || typeof raw.id === "string" ? String(raw.id) : handle,
    title,
    handle,
    url: `${rootUrl}/products/${handle}`,
    tags: parseTags(raw.tags),
  };

  const price = first ? toMoney(first.price, currency) : null;
  if (price) product.price = price;
  const compareAtPrice = first ? toMoney(first.compare_at_price, currency) : null;
  if (compareAtPrice) product.compareAtPrice = compareAtPrice;

  const image = images.map((img) => img.src).find((src) => typeof src === "string" && src);
  if (typeof image === "string") product.image = image;

  const availability = variants
    .map((v) => v.available)
    .filter((a): a is boolean => typeof a === "boolean");
  if (availability.length > 0) product.available = availability.some(Boolean);

  const description = typeof raw.body_html === "string" ? htmlToText(raw.body_html) : "";
  if (description) product.description = description;
  if (typeof raw.vendor === "string" && raw.vendor.trim()) product.vendor = raw.vendor.trim();
  if (typeof raw.product_type === "string" && raw.product_type.trim())
    product.productType = raw.product_type.trim();

  return product;
}

function toMoney(value: unknown, currency: string | null): Money | null {
  if (typeof value === "number") return { amount: value.toFixed(2), currency };
  if (typeof value === "string" && value.trim()) return { amount: value.trim(), currency };
  return null;
}

function parseTags(value: unknown): string[] {
  const raw = Array.isArray(value)
    ? value.filter((t): t is string => typeof t === "string")
    : typeof value === "string"
      ? value.split(",")
      : [];
  return raw.map((t) => t.trim()).filter(Boolean);
}

/**
 * Product links inside `$scope`, one card per handle in document order.
 * A product usually has several anchors (image, title, button); later
 * anchors fill in what earlier ones lacked. Menu links in the header,
 * nav and footer are not cards.
 */
export function collectProductCards(
  page: ParsedPage,
  $scope: CheerioEl,
  rootUrl: string
): ProductCard[] {
  const { $ } = page;
  const cards = new Map<string, ProductCard>();

  $scope.find("a[href]").each((_, el) => {
    const $el = $(el);
    if ($el.closest(CHROME_SELECTOR).length > 0) return;
    const href = toAbsoluteUrl($el.attr("href") ?? "", page.finalUrl);
    const handle = href ? productHandle(href) : null;
    if (!handle) return;

    const $img = $el.find("img").first();
    const src = $img.attr("src") || $img.attr("data-src") || "";
    const image = src ? toAbsoluteUrl(src, page.finalUrl) ?? undefined : undefined;
    const title = cleanText($el.text()) || cleanText($img.attr("alt") ?? "") || anchorLabel($el);

    const existing = cards.get(handle);
    if (!existing) {
      const card: ProductCard = { handle, url: `${rootUrl}/products/${handle}`, title };
      if (image) card.image = image;
      cards.set(handle, card);
      return;
    }
    if (!existing.title && title) existing.title = title;
    if (!existing.image && image) existing.image = image;
  });

  return [...cards.values()];
}

/** Minimal product built from markup alone; null without a title */
export function cardToProduct(card: ProductCard): Product | null {
  if (!card.title) return null;
  const product: Product = {
    id: card.handle,
    title: card.title,
    handle: card.handle,
    url: card.url,
    tags: [],
  };
  if (card.image) product.image = card.image;
  return product;
}

/**
 * Products from a storefront listing page such as /collections/all.
 */
export function parseCatalogListing(page: ParsedPage, rootUrl: string): Product[] {
  const { $ } = page;
  const $main = $("main").first();
  const $scope = $main.length ? $main : $("body").first();
  return collectProductCards(page, $scope, rootUrl)
    .map(cardToProduct)
    .filter((p): p is Product => p !== null);
}

/**
 * Fetch the catalog: first JSON endpoint that returns products (paginated
 * up to `maxPages`), else the HTML listing fallback, else empty.
 */
export async function extractCatalog(
  candidates: string[],
  listingCandidates: string[],
  ctx: ExtractionContext,
  maxPages: number
): Promise<CatalogResult> {
  const warnings: string[] = [];

  for (const endpoint of candidates) {
    const first = await fetchFeed(endpoint, ctx);
    if (!first || first.products.length === 0) continue;

    const products = [...first.products];
    let dropped = first.dropped;
    let total = first.total;
    for (let page = 2; page <= maxPages && total >= CATALOG_PAGE_SIZE; page++) {
      const next = await fetchFeed(`${endpoint}&page=${page}`, ctx);
      if (!next || next.total === 0) break;
      products.push(...next.products);
      dropped += next.dropped;
      total = next.total;
    }

    if (dropped > 0) {
      warnings.push(
        `catalog: dropped ${dropped} malformed product ${dropped === 1 ? "entry" : "entries"}`
      );
    }
    return { products: dedupeByHandle(products), warnings };
  }

  const listing = await firstMatch(listingCandidates, ctx, (page) => {
    const products = parseCatalogListing(page, ctx.rootUrl);
    return products.length > 0 ? products : null;
  });
  if (listing.found) {
    warnings.push("catalog: products endpoint unavailable, used storefront listing page");
    return { products: listing.value, warnings };
  }

  warnings.push("catalog: no products found");
  return { products: [], warnings };
}

async function fetchFeed(url: string, ctx: ExtractionContext): Promise<ParsedFeed | null> {
  const result = await ctx.fetchPage(url);
  if (!result.success) return null;
  return parseProductFeed(result.data.body, ctx.rootUrl, ctx.currency);
}

function dedupeByHandle(products: Product[]): Product[] {
  const seen = new Set<string>();
  return products.filter((p) => {
    if (seen.has(p.handle)) return false;
    seen.add(p.handle);
    return true;
  });
}

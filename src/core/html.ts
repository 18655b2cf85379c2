import * as cheerio from "cheerio";
import type { FetchedContent, PageLink } from "../types";

export type CheerioEl = ReturnType<cheerio.CheerioAPI>;

/** A fetched HTML page, parsed once and shared read-only between extractors */
export interface ParsedPage {
  url: string;
  finalUrl: string;
  html: string;
  $: cheerio.CheerioAPI;
}

/** Elements that never carry readable page content */
export const NOISE_SELECTOR =
  "script, style, noscript, iframe, svg, template, nav, header, footer";

const BLOCK_SELECTOR =
  "p, div, li, dd, dt, td, th, tr, h1, h2, h3, h4, h5, h6, section, article, " +
  "aside, address, header, footer, nav, ul, ol, a, button, label, summary, details";

export function parsePage(content: FetchedContent): ParsedPage {
  return {
    url: content.url,
    finalUrl: content.finalUrl,
    html: content.body,
    $: cheerio.load(content.body),
  };
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolve an href against the page URL.
 * Returns null for fragments, mailto:, tel:, javascript: and malformed hrefs.
 */
export function toAbsoluteUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  if (/^(mailto|tel|javascript|sms|data):/i.test(trimmed)) return null;
  try {
    const u = new URL(trimmed, baseUrl);
    if (u.protocol !== "http:" && u.protocol !== "https:") return null;
    return u.href;
  } catch {
    return null;
  }
}

/**
 * Visible label of an anchor: its text, else aria-label, title or image alt.
 */
export function anchorLabel($el: CheerioEl): string {
  return (
    cleanText($el.text()) ||
    cleanText($el.attr("aria-label") ?? "") ||
    cleanText($el.attr("title") ?? "") ||
    cleanText($el.find("img[alt]").first().attr("alt") ?? "")
  );
}

/** Site chrome: the header, footer and navigation blocks of a theme */
export const CHROME_SELECTOR = "header, nav, footer, [role=navigation]";

/**
 * All navigable anchors of a page in document order, as absolute URLs.
 * @param sameOrigin - Keep only links on the page's own host
 */
export function collectLinks(page: ParsedPage, sameOrigin = false): PageLink[] {
  return linksOf(page, page.$("a[href]"), sameOrigin);
}

/** Anchors inside the page's header, footer and navigation blocks */
export function collectNavLinks(page: ParsedPage, sameOrigin = false): PageLink[] {
  const { $ } = page;
  const $anchors = $("a[href]").filter((_, el) => $(el).closest(CHROME_SELECTOR).length > 0);
  return linksOf(page, $anchors, sameOrigin);
}

function linksOf(page: ParsedPage, $anchors: CheerioEl, sameOrigin: boolean): PageLink[] {
  const { $ } = page;
  const baseHost = hostOf(page.finalUrl);
  const links: PageLink[] = [];

  $anchors.each((_, el) => {
    const $el = $(el);
    const url = toAbsoluteUrl($el.attr("href") ?? "", page.finalUrl);
    if (!url) return;
    if (sameOrigin && hostOf(url) !== baseHost) return;
    links.push({ label: anchorLabel($el), url });
  });

  return links;
}

/** Raw href values of every anchor, including mailto: and tel: */
export function rawHrefs(page: ParsedPage): string[] {
  const { $ } = page;
  return $("a[href]")
    .toArray()
    .map((el) => ($(el).attr("href") ?? "").trim())
    .filter(Boolean);
}

/**
 * Text a visitor would read: scripts and styles dropped, block boundaries
 * kept as spaces so adjacent cells do not run together.
 * Loads its own copy, so the shared parse is left untouched.
 */
export function visibleText(html: string): string {
  const $ = loadReadable(html);
  return cleanText($("body").text() || $.root().text());
}

/**
 * Private parse for text extraction: scripts and styles removed and
 * block elements padded with spaces, so `.text()` keeps word boundaries.
 */
export function loadReadable(html: string): cheerio.CheerioAPI {
  const $ = cheerio.load(html);
  $("script, style, noscript, template, svg").remove();
  $("br").replaceWith(" ");
  $(BLOCK_SELECTOR).each((_, el) => {
    $(el).prepend(" ").append(" ");
  });
  return $;
}

/**
 * Every JSON-LD block on the page, with top-level arrays and @graph
 * containers flattened. Blocks that fail to parse are skipped.
 */
export function extractJsonLd($: cheerio.CheerioAPI): Record<string, unknown>[] {
  const nodes: Record<string, unknown>[] = [];

  const visit = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(visit);
      return;
    }
    if (!isRecord(value)) return;
    nodes.push(value);
    const graph = value["@graph"];
    if (Array.isArray(graph)) graph.forEach(visit);
  };

  $('script[type="application/ld+json"]').each((_, el) => {
    const script = $(el).html();
    if (script) visit(parseJson(script));
  });

  return nodes;
}

/** Parsed JSON, or undefined when the text is not valid JSON */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Text of an HTML fragment (JSON-LD answers, product body_html) */
export function htmlToText(fragment: string): string {
  if (!fragment.includes("<")) return cleanText(fragment);
  return visibleText(`<body>${fragment}</body>`);
}

/**
 * Product handle from a storefront link such as `/products/blue-shirt` or
 * `/collections/sale/products/blue-shirt?variant=1`.
 */
export function productHandle(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url, "https://store.invalid").pathname;
  } catch {
    return null;
  }
  const match = pathname.match(/\/products\/([^/]+)\/?$/);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]).toLowerCase();
  } catch {
    return match[1].toLowerCase();
  }
}

export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return "";
  }
}

import { collectLinks, collectNavLinks, type ParsedPage } from "../core/html";
import type { PageLink } from "../types";

/** Labels in output order; matched against an anchor's text and path */
export const IMPORTANT_LINK_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  {
    label: "order_tracking",
    pattern: /order[\s_-]*track|track[\s_-]*(?:your[\s_-]*|my[\s_-]*)?(?:order|package|shipment)/i,
  },
  { label: "contact_us", pattern: /contact/i },
  { label: "blogs", pattern: /\bblogs?\b|\bnews\b|\bjournal\b|\barticles?\b/i },
  { label: "shipping", pattern: /shipping|delivery/i },
  { label: "careers", pattern: /careers?|\bjobs\b|join[\s_-]*(?:us|our[\s_-]*team)/i },
];

/**
 * Label → absolute URL for the homepage's navigation anchors. The first
 * header, nav or footer anchor in document order wins each label; the rest
 * of the page is searched only for labels navigation leaves unmatched.
 */
export function extractImportantLinks(page: ParsedPage): Record<string, string> {
  const navLinks = collectNavLinks(page);
  const allLinks = collectLinks(page);
  const found: Record<string, string> = {};

  for (const { label, pattern } of IMPORTANT_LINK_PATTERNS) {
    const matches = (link: PageLink) => pattern.test(`${link.label} ${pathOf(link.url)}`);
    const match = navLinks.find(matches) ?? allLinks.find(matches);
    if (match) found[label] = match.url;
  }
  return found;
}

function pathOf(url: string): string {
  return new URL(url).pathname;
}

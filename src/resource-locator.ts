import type { PageLink, PolicyKind, ResourceMap } from "./types";
import { deduplicateUrls } from "./core/utils";

/** Shopify's public catalog endpoints, most specific first */
const CATALOG_PATHS = [
  "/products.json?limit=250",
  "/collections/all/products.json?limit=250",
];

const CATALOG_LISTING_PATHS = ["/collections/all", "/collections"];

const POLICY_PATHS: Record<PolicyKind, string[]> = {
  privacy: ["/policies/privacy-policy", "/pages/privacy-policy", "/pages/privacy"],
  return: ["/policies/refund-policy", "/pages/return-policy", "/pages/returns"],
  refund: ["/policies/refund-policy", "/pages/refund-policy", "/pages/refunds"],
  terms: [
    "/policies/terms-of-service",
    "/pages/terms-of-service",
    "/pages/terms",
    "/pages/terms-conditions",
  ],
  shipping: ["/policies/shipping-policy", "/pages/shipping-policy", "/pages/shipping"],
};

const FAQ_PATHS = ["/pages/faq", "/pages/faqs", "/pages/frequently-asked-questions", "/faq"];
const CONTACT_PATHS = ["/pages/contact", "/pages/contact-us", "/contact"];
const ABOUT_PATHS = [
  "/pages/about",
  "/pages/about-us",
  "/pages/our-story",
  "/pages/story",
  "/about",
];

/** Matched against "<anchor label> <url path>" of discovered links */
const POLICY_KEYWORDS: Record<PolicyKind, RegExp> = {
  privacy: /privacy/i,
  return: /return/i,
  refund: /refund/i,
  terms: /terms|conditions/i,
  shipping: /shipping|delivery/i,
};

const FAQ_KEYWORDS = /faq|frequently[\s_-]*asked/i;
const CONTACT_KEYWORDS = /contact/i;
const ABOUT_KEYWORDS = /about|our[\s_-]*story/i;

/**
 * Build the ordered candidate URLs for every resource category.
 * Order: conventional paths, then homepage links whose label or path
 * matches the category keywords (document order), then sitemap pages.
 * @param rootUrl - Normalized store root, no trailing slash
 * @param navLinks - Same-origin header, nav and footer anchors of the homepage
 * @param sitemapUrls - Page URLs from the store sitemap
 */
export function locate(
  rootUrl: string,
  navLinks: PageLink[],
  sitemapUrls: string[] = []
): ResourceMap {
  const candidates = (paths: string[], keywords: RegExp): string[] => {
    const conventional = paths.map((p) => `${rootUrl}${p}`);
    const discovered = navLinks
      .filter((link) => keywords.test(`${link.label} ${pathOf(link.url)}`))
      .map((link) => link.url);
    const listed = sitemapUrls.filter((url) => keywords.test(pathOf(url)));
    return deduplicateUrls([...conventional, ...discovered, ...listed]);
  };

  const policy = (kind: PolicyKind): string[] =>
    candidates(POLICY_PATHS[kind], POLICY_KEYWORDS[kind]);

  return {
    homepage: rootUrl,
    catalog: catalogEndpoints(rootUrl),
    catalogListing: CATALOG_LISTING_PATHS.map((p) => `${rootUrl}${p}`),
    policies: {
      privacy: policy("privacy"),
      return: policy("return"),
      refund: policy("refund"),
      terms: policy("terms"),
      shipping: policy("shipping"),
    },
    faq: candidates(FAQ_PATHS, FAQ_KEYWORDS),
    contact: candidates(CONTACT_PATHS, CONTACT_KEYWORDS),
    about: candidates(ABOUT_PATHS, ABOUT_KEYWORDS),
  };
}

/** Absolute catalog feed URLs for a store root */
export function catalogEndpoints(rootUrl: string): string[] {
  return CATALOG_PATHS.map((p) => `${rootUrl}${p}`);
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

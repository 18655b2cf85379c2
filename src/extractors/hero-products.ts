import type { Product } from "../types";
import { CHROME_SELECTOR, type CheerioEl, type ParsedPage } from "../core/html";
import { cardToProduct, collectProductCards } from "./catalog";
import type { ExtractionContext } from "./context";

/** Picks the homepage block whose product links count as "featured" */
export interface FeaturedSectionStrategy {
  name: string;
  select(page: ParsedPage): CheerioEl | null;
}

const FEATURED = /featured/i;

/**
 * Default heuristic. Within <main> (else <body>), take the first section
 * whose id or class mentions "featured" and links to products outside the
 * site chrome; else the first such section; else the whole scope.
 */
export const firstFeaturedSectionStrategy: FeaturedSectionStrategy = {
  name: "first-featured-section",
  select(page: ParsedPage): CheerioEl | null {
    const { $ } = page;
    const $main = $("main").first();
    const $scope = $main.length ? $main : $("body").first();
    if ($scope.length === 0) return null;

    const sections = $scope
      .find(".shopify-section, section")
      .toArray()
      .filter((el) => {
        const $el = $(el);
        if ($el.closest(CHROME_SELECTOR).length > 0) return false;
        // A section may wrap the theme header; its menu links do not count
        return $el
          .find("a[href*='/products/']")
          .toArray()
          .some((a) => $(a).closest(CHROME_SELECTOR).length === 0);
      });

    const featured = sections.find((el) =>
      FEATURED.test(`${$(el).attr("id") ?? ""} ${$(el).attr("class") ?? ""}`)
    );
    const chosen = featured ?? sections[0];
    return chosen ? $(chosen) : $scope;
  },
};

export interface HeroProductsResult {
  products: Product[];
  warnings: string[];
}

/**
 * Products featured on the homepage, enriched from the catalog by handle.
 * Unmatched links keep what the homepage shows and are dropped without a
 * title.
 */
export function extractHeroProducts(
  ctx: ExtractionContext,
  catalog: Product[],
  limit: number
): HeroProductsResult {
  const $block = ctx.strategies.featuredSection.select(ctx.homepage);
  const cards = $block ? collectProductCards(ctx.homepage, $block, ctx.rootUrl) : [];
  const byHandle = new Map(catalog.map((p) => [p.handle.toLowerCase(), p]));

  const products: Product[] = [];
  for (const card of cards) {
    if (products.length >= limit) break;
    const product = byHandle.get(card.handle) ?? cardToProduct(card);
    if (product) products.push(product);
  }

  const warnings =
    products.length === 0 ? ["heroProducts: no featured products found on homepage"] : [];
  return { products, warnings };
}

/** Fingerprints Shopify themes leave in storefront markup */
const SHOPIFY_MARKERS: RegExp[] = [
  /cdn\.shopify\.com/i,
  /\/cdn\/shop\//i,
  /\.myshopify\.com/i,
  /\bShopify\.theme\b/,
  /\bwindow\.Shopify\b/,
  /shopify-section/,
  /shopify-digital-wallet/,
];

/**
 * True when the homepage markup carries any Shopify fingerprint.
 */
export function hasShopifyMarkers(html: string): boolean {
  return SHOPIFY_MARKERS.some((marker) => marker.test(html));
}

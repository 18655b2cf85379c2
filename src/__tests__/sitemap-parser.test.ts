import { describe, it, expect, vi } from "vitest";
import { discoverPageUrls, parseSitemapXml } from "../sitemap-parser";
import { FakeFetcher, xmlDoc } from "./fake-fetcher";

const INDEX = `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <sitemap><loc>https://brandx.com/sitemap_products_1.xml?from=1&amp;to=99</loc></sitemap>
  <sitemap><loc>https://brandx.com/sitemap_pages_1.xml</loc></sitemap>
</sitemapindex>`;

const PAGES = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc>https://brandx.com/pages/about-us</loc></url>
  <url><loc>https://brandx.com/pages/faq</loc></url>
</urlset>`;

const quiet = () => ({ log: vi.fn(), warn: vi.fn() });

describe("parseSitemapXml", () => {
  it("reads child sitemaps of an index", () => {
    expect(parseSitemapXml(INDEX)).toEqual({
      sitemaps: [
        "https://brandx.com/sitemap_products_1.xml?from=1&to=99",
        "https://brandx.com/sitemap_pages_1.xml",
      ],
      urls: [],
    });
  });

  it("reads a single-entry urlset as a list", () => {
    const xml = "<urlset><url><loc> https://brandx.com/pages/faq </loc></url></urlset>";
    expect(parseSitemapXml(xml).urls).toEqual(["https://brandx.com/pages/faq"]);
  });

  it("returns empty lists for other documents", () => {
    expect(parseSitemapXml("<rss><channel></channel></rss>")).toEqual({ sitemaps: [], urls: [] });
  });
});

describe("discoverPageUrls", () => {
  it("follows only the pages sitemap", async () => {
    const fetcher = new FakeFetcher([
      xmlDoc("https://brandx.com/sitemap.xml", INDEX),
      xmlDoc("https://brandx.com/sitemap_pages_1.xml", PAGES),
    ]);

    const urls = await discoverPageUrls("https://brandx.com", (u) => fetcher.fetch(u), quiet());

    expect(urls).toEqual(["https://brandx.com/pages/about-us", "https://brandx.com/pages/faq"]);
    expect(fetcher.calls).toEqual([
      "https://brandx.com/sitemap.xml",
      "https://brandx.com/sitemap_pages_1.xml",
    ]);
  });

  it("returns nothing when the store has no sitemap", async () => {
    const fetcher = new FakeFetcher([]);
    const logger = quiet();

    const urls = await discoverPageUrls("https://brandx.com", (u) => fetcher.fetch(u), logger);

    expect(urls).toEqual([]);
    expect(logger.log).toHaveBeenCalledWith("   No sitemap at https://brandx.com/sitemap.xml");
  });
});

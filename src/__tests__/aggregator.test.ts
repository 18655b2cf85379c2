import { describe, it, expect, vi } from "vitest";
import { getInsights, pipelineErrorStatus, DEFAULT_STRATEGIES, type PipelineOptions } from "../aggregator";
import type { Fetcher, InsightsResult } from "../types";
import {
  EXTRACTED_AT,
  FakeFetcher,
  ROOT,
  brandxRoutes,
  failed,
  fixture,
  htmlPage,
  jsonDoc,
} from "./fake-fetcher";

const now = () => new Date(EXTRACTED_AT);

const cleanFeed = jsonDoc(`${ROOT}/products.json?limit=250`, {
  products: [{ id: 1, title: "Linen Shirt", handle: "linen-shirt" }],
});

function run(fetcher: Fetcher, options: Partial<PipelineOptions> = {}, url = "brandx.com"): Promise<InsightsResult> {
  return getInsights(url, { fetcher, now, ...options });
}

describe("getInsights", () => {
  describe("full storefront", () => {
    it("assembles every category", async () => {
      const result = await run(new FakeFetcher(brandxRoutes()));

      expect(result.success).toBe(true);
      if (!result.success) return;
      const { data } = result;

      expect(result.status).toBe("partial");
      expect(data.warnings).toEqual(["catalog: dropped 1 malformed product entry"]);
      expect(data.storeUrl).toBe("https://brandx.com");
      expect(data.domain).toBe("brandx.com");
      expect(data.name).toBe("BrandX");
      expect(data.description).toBe("Linen and canvas goods made to last.");
      expect(data.currency).toBe("USD");
      expect(data.about).toBe("Our story BrandX started in a small Lisbon workshop in 2015.");
      expect(data.extractedAt).toBe(EXTRACTED_AT);
      expect(data.products.map((p) => p.handle)).toEqual(["linen-shirt", "canvas-tote", "wool-beanie"]);
      expect(data.heroProducts.map((p) => p.handle)).toEqual([
        "linen-shirt",
        "canvas-tote",
        "limited-scarf",
      ]);
      expect(Object.keys(data.policies)).toEqual(["privacy", "return", "refund", "shipping"]);
      expect(data.faqs).toHaveLength(2);
      expect(data.socialHandles).toEqual({
        instagram: "https://www.instagram.com/brandx/",
        twitter: "https://twitter.com/brandx",
      });
      expect(data.contact).toEqual({
        emails: ["hello@brandx.com", "support@brandx.com", "wholesale@brandx.com"],
        phones: ["+1 (555) 123-4567"],
      });
      expect(data.importantLinks).toEqual({
        order_tracking: "https://brandx.com/pages/track-order",
        contact_us: "https://brandx.com/pages/contact",
        blogs: "https://brandx.com/blogs/journal",
        shipping: "https://brandx.com/policies/shipping-policy",
      });
    });

    it("reports complete when nothing needed a warning", async () => {
      const result = await run(new FakeFetcher([...brandxRoutes(), cleanFeed]));

      expect(result.success && result.status).toBe("complete");
      expect(result.success && result.data.warnings).toEqual([]);
    });

    it("fetches the shared refund page once for return and refund", async () => {
      const fetcher = new FakeFetcher(brandxRoutes());

      const result = await run(fetcher);

      expect(fetcher.callsTo(`${ROOT}/policies/refund-policy`)).toBe(1);
      expect(result.success && result.data.policies.return?.url).toBe(`${ROOT}/policies/refund-policy`);
      expect(result.success && result.data.policies.refund?.url).toBe(`${ROOT}/policies/refund-policy`);
    });

    it("returns the same record for the same responses", async () => {
      const fetcher = new FakeFetcher(brandxRoutes());

      const first = await run(fetcher);
      const second = await run(fetcher);

      expect(second).toEqual(first);
    });

    it("does not depend on the order responses arrive in", async () => {
      const steady = await run(new FakeFetcher(brandxRoutes()));
      const jittery = await run(
        new FakeFetcher(brandxRoutes(), { latency: () => Math.floor(Math.random() * 5) })
      );

      expect(jittery).toEqual(steady);
    });

    it("logs warnings through the given logger", async () => {
      const logger = { log: vi.fn(), warn: vi.fn() };

      await run(new FakeFetcher(brandxRoutes()), { logger });

      expect(logger.warn).toHaveBeenCalledWith(
        "   https://brandx.com: catalog: dropped 1 malformed product entry"
      );
    });
  });

  describe("partial storefront", () => {
    it("returns empty categories for missing optional pages", async () => {
      const fetcher = new FakeFetcher([htmlPage(ROOT, fixture("home.html")), cleanFeed]);

      const result = await run(fetcher);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.status).toBe("partial");
      expect(result.data.warnings).toEqual(["policies: no policy pages found"]);
      expect(result.data.faqs).toEqual([]);
      expect(result.data.policies).toEqual({});
      expect(result.data.about).toBeUndefined();
      expect(result.data.contact.emails).toEqual(["hello@brandx.com"]);
    });

    it("turns an extractor exception into a warning", async () => {
      const fetcher = new FakeFetcher([...brandxRoutes(), cleanFeed]);

      const result = await run(fetcher, {
        strategies: {
          featuredSection: {
            name: "broken",
            select: () => {
              throw new Error("bad selector");
            },
          },
        },
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.heroProducts).toEqual([]);
      expect(result.data.warnings).toEqual(["heroProducts: extraction failed: bad selector"]);
    });

    it("accepts a store without theme markers when its product feed answers", async () => {
      const fetcher = new FakeFetcher([
        htmlPage(ROOT, "<html><head><title>BrandX</title></head><body><main><p>Hi</p></main></body></html>"),
        cleanFeed,
      ]);

      const result = await run(fetcher);

      expect(result.success).toBe(true);
      expect(result.success && result.data.products).toHaveLength(1);
      expect(result.success && result.data.name).toBe("BrandX");
      expect(fetcher.callsTo(`${ROOT}/products.json?limit=250`)).toBe(1);
    });
  });

  it("never reads a product page as a category page", async () => {
    const fetcher = new FakeFetcher([
      htmlPage(
        ROOT,
        `<html><body>
          <main class="shopify-section">
            <a href="/products/contact-lens-case">Contact Lens Case</a>
            <a href="/products/faq-notebook">FAQ Notebook</a>
          </main>
          <footer><a href="/pages/get-in-touch">Contact</a></footer>
        </body></html>`
      ),
      htmlPage(`${ROOT}/pages/get-in-touch`, "<html><body><main><p>Write to hi@brandx.com</p></main></body></html>"),
      cleanFeed,
    ]);

    const result = await run(fetcher, { useSitemap: false });

    expect(fetcher.callsTo(`${ROOT}/products/contact-lens-case`)).toBe(0);
    expect(fetcher.callsTo(`${ROOT}/products/faq-notebook`)).toBe(0);
    expect(fetcher.callsTo(`${ROOT}/pages/get-in-touch`)).toBe(1);
    expect(result.success && result.data.contact.emails).toEqual(["hi@brandx.com"]);
  });

  describe("failures", () => {
    it("classifies an unreachable root as StoreUnreachable", async () => {
      const result = await run(new FakeFetcher([failed(ROOT, "unreachable", null)]));

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("StoreUnreachable");
      expect(result.error.stage).toBe("started");
      expect(result.error.storeUrl).toBe("brandx.com");
    });

    it("classifies a missing root as StoreUnreachable", async () => {
      const result = await run(new FakeFetcher([]));

      expect(result.success === false && result.error.kind).toBe("StoreUnreachable");
    });

    it("rejects an address that cannot be parsed", async () => {
      const result = await run(new FakeFetcher([]), {}, "not a url");

      expect(result).toEqual({
        success: false,
        error: {
          kind: "StoreUnreachable",
          storeUrl: "not a url",
          stage: "started",
          message: "Invalid store URL: not a url",
        },
      });
    });

    it("classifies a site without Shopify markers or feed as NotAShopifyStore", async () => {
      const fetcher = new FakeFetcher([
        htmlPage(ROOT, "<html><head><title>Plain site</title></head><body><p>Hello</p></body></html>"),
      ]);

      const result = await run(fetcher);

      expect(result.success === false && result.error.kind).toBe("NotAShopifyStore");
    });

    it("classifies a root that is not a page as NotAShopifyStore", async () => {
      const result = await run(new FakeFetcher([jsonDoc(ROOT, { ok: true })]));

      expect(result.success === false && result.error.kind).toBe("NotAShopifyStore");
    });

    it("returns Timeout, not a partial record, when the deadline passes", async () => {
      const fetcher = new FakeFetcher(brandxRoutes(), { latency: () => 50 });

      const result = await run(fetcher, { deadlineMs: 10 });

      expect(result).toEqual({
        success: false,
        error: {
          kind: "Timeout",
          storeUrl: "brandx.com",
          stage: "started",
          message: "Pipeline exceeded its 10ms deadline",
        },
      });
    });

    it("returns Timeout, not a partial record, when the deadline passes after the homepage", async () => {
      const fetcher = new FakeFetcher(brandxRoutes(), {
        latency: (url) => (url === ROOT ? 0 : 200),
      });

      const result = await run(fetcher, { deadlineMs: 50, useSitemap: false });

      expect(fetcher.callsTo(ROOT)).toBe(1);
      expect(result.success).toBe(false);
      expect("data" in result).toBe(false);
      if (result.success) return;
      expect(result.error.kind).toBe("Timeout");
      expect(result.error.stage).not.toBe("started");
      expect(result.error.message).toBe("Pipeline exceeded its 50ms deadline");
    });

    it("returns Timeout without fetching when the caller already cancelled", async () => {
      const fetcher = new FakeFetcher(brandxRoutes());
      const controller = new AbortController();
      controller.abort();

      const result = await run(fetcher, { signal: controller.signal });

      expect(result.success === false && result.error.message).toBe("Pipeline cancelled");
      expect(fetcher.calls).toEqual([]);
    });

    it("reports a throwing fetcher as InternalFailure", async () => {
      const fetcher: Fetcher = { fetch: () => Promise.reject(new Error("socket exploded")) };

      const result = await run(fetcher);

      expect(result).toEqual({
        success: false,
        error: {
          kind: "InternalFailure",
          storeUrl: "brandx.com",
          stage: "started",
          message: "socket exploded",
        },
      });
    });
  });
});

describe("pipelineErrorStatus", () => {
  it("maps each failure kind to an HTTP status", () => {
    expect(pipelineErrorStatus("StoreUnreachable")).toBe(404);
    expect(pipelineErrorStatus("NotAShopifyStore")).toBe(400);
    expect(pipelineErrorStatus("Timeout")).toBe(504);
    expect(pipelineErrorStatus("InternalFailure")).toBe(500);
  });
});

describe("DEFAULT_STRATEGIES", () => {
  it("names the built-in heuristics", () => {
    expect(DEFAULT_STRATEGIES.featuredSection.name).toBe("first-featured-section");
    expect(DEFAULT_STRATEGIES.mainText.name).toBe("container-text");
    expect(DEFAULT_STRATEGIES.faq.map((s) => s.name)).toEqual(["json-ld", "accordion", "heading-pairs"]);
  });
});

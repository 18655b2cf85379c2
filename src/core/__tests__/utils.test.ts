import { describe, it, expect } from "vitest";
import { deduplicateUrls, formatDuration, normalizeStoreUrl, runInBatches, urlKey } from "../utils";

describe("normalizeStoreUrl", () => {
  it("adds https to a bare host", () => {
    expect(normalizeStoreUrl("brandx.com")).toBe("https://brandx.com");
  });

  it("lowercases the host and drops the trailing slash", () => {
    expect(normalizeStoreUrl("HTTP://Shop.Example.com/")).toBe("http://shop.example.com");
  });

  it("drops query and fragment but keeps a path prefix", () => {
    expect(normalizeStoreUrl("https://brandx.com/en/?ref=ad#top")).toBe("https://brandx.com/en");
  });

  it("accepts localhost with a port", () => {
    expect(normalizeStoreUrl("localhost:3000")).toBe("https://localhost:3000");
  });

  it("rejects input that is not a host", () => {
    expect(normalizeStoreUrl("")).toBeNull();
    expect(normalizeStoreUrl("shop")).toBeNull();
    expect(normalizeStoreUrl("not a url")).toBeNull();
  });
});

describe("urlKey / deduplicateUrls", () => {
  it("ignores fragments and trailing slashes", () => {
    expect(urlKey("https://brandx.com/pages/faq/#shipping")).toBe("https://brandx.com/pages/faq");
    expect(urlKey("https://brandx.com/")).toBe("https://brandx.com/");
  });

  it("keeps the first spelling of each page", () => {
    expect(
      deduplicateUrls([
        "https://brandx.com/pages/faq/",
        "https://brandx.com/pages/faq",
        "https://brandx.com/pages/contact",
      ])
    ).toEqual(["https://brandx.com/pages/faq/", "https://brandx.com/pages/contact"]);
  });
});

describe("runInBatches", () => {
  it("returns results in input order and reports progress", async () => {
    const progress: string[] = [];
    const results = await runInBatches(
      ["a", "b", "c"],
      2,
      0,
      async (item) => item.toUpperCase(),
      (completed, total, item) => progress.push(`${completed}/${total} ${item}`)
    );

    expect(results).toEqual(["A", "B", "C"]);
    expect(progress).toHaveLength(3);
    expect(progress[2]).toBe("3/3 c");
  });
});

describe("formatDuration", () => {
  it("formats seconds and minutes", () => {
    expect(formatDuration(4_900)).toBe("4s");
    expect(formatDuration(150_000)).toBe("2m 30s");
  });
});

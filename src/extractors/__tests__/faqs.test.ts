import { describe, it, expect } from "vitest";
import {
  DEFAULT_FAQ_STRATEGIES,
  accordionFaqStrategy,
  extractFaqs,
  headingFaqStrategy,
  jsonLdFaqStrategy,
  runFaqStrategies,
} from "../faqs";
import { DEFAULT_STRATEGIES } from "../../aggregator";
import { locate } from "../../resource-locator";
import { FakeFetcher, ROOT, fixture, htmlPage, testContext } from "../../__tests__/fake-fetcher";

const resources = locate(ROOT, []);

const JSON_LD_FAQ = `<html><head><script type="application/ld+json">
{"@context":"https://schema.org","@type":"FAQPage","mainEntity":[
  {"@type":"Question","name":"Do you offer gift wrap?","acceptedAnswer":{"@type":"Answer","text":"<p>Yes, at checkout.</p>"}},
  {"@type":"Question","name":"Where are you based?","acceptedAnswer":{"@type":"Answer","text":"Lisbon, Portugal."}}
]}
</script></head><body><main><h2>Other</h2><p>Unrelated.</p></main></body></html>`;

const ACCORDION_FAQ = `<html><body><main>
  <div class="faq-item">
    <button class="faq-question">Is the linen pre-washed?</button>
    <div class="faq-answer"><p>Yes, every piece is stone washed.</p></div>
  </div>
  <div class="faq-item">
    <button class="faq-question">Is the linen pre-washed?</button>
    <div class="faq-answer"><p>Repeated entry.</p></div>
  </div>
</main></body></html>`;

const HEADING_FAQ = `<html><body><main>
  <h1>Help</h1>
  <h2>Shipping</h2><p>We ship worldwide.</p>
  <h3>When will my order arrive?</h3><p>Within 5 to 7 days.</p><p>Tracking is emailed.</p>
  <h3>Can I change my address?</h3><p>Contact us within 24 hours.</p>
</main></body></html>`;

describe("FAQ strategies", () => {
  it("reads schema.org FAQPage blocks", () => {
    expect(jsonLdFaqStrategy.extract(JSON_LD_FAQ)).toEqual([
      { question: "Do you offer gift wrap?", answer: "Yes, at checkout." },
      { question: "Where are you based?", answer: "Lisbon, Portugal." },
    ]);
  });

  it("reads details/summary pairs", () => {
    expect(accordionFaqStrategy.extract(fixture("faq.html"))).toEqual([
      { question: "How long does shipping take?", answer: "Orders ship within 2 business days." },
      { question: "Can I return sale items?", answer: "Sale items are final sale." },
      { question: "Do you ship internationally?", answer: "" },
    ]);
  });

  it("prefers question headings over section headings", () => {
    expect(headingFaqStrategy.extract(HEADING_FAQ)).toEqual([
      { question: "When will my order arrive?", answer: "Within 5 to 7 days. Tracking is emailed." },
      { question: "Can I change my address?", answer: "Contact us within 24 hours." },
    ]);
  });
});

describe("runFaqStrategies", () => {
  it("drops pairs with an empty side", () => {
    expect(runFaqStrategies(DEFAULT_FAQ_STRATEGIES, fixture("faq.html"))).toHaveLength(2);
  });

  it("drops repeated questions from theme accordions", () => {
    expect(runFaqStrategies(DEFAULT_FAQ_STRATEGIES, ACCORDION_FAQ)).toEqual([
      { question: "Is the linen pre-washed?", answer: "Yes, every piece is stone washed." },
    ]);
  });

  it("stops at the first strategy that yields pairs", () => {
    expect(runFaqStrategies(DEFAULT_FAQ_STRATEGIES, JSON_LD_FAQ)).toHaveLength(2);
  });
});

describe("extractFaqs", () => {
  it("returns the pairs of the first FAQ page", async () => {
    const fetcher = new FakeFetcher([htmlPage(`${ROOT}/pages/faq`, fixture("faq.html"))]);

    const result = await extractFaqs(resources.faq, testContext(fetcher));

    expect(result.faqs.map((f) => f.question)).toEqual([
      "How long does shipping take?",
      "Can I return sale items?",
    ]);
    expect(result.page?.finalUrl).toBe(`${ROOT}/pages/faq`);
    expect(result.warnings).toEqual([]);
  });

  it("is silent when the store has no FAQ page", async () => {
    const result = await extractFaqs(resources.faq, testContext(new FakeFetcher([])));

    expect(result).toEqual({ faqs: [], page: null, warnings: [] });
  });

  it("warns when the FAQ page has no readable pairs", async () => {
    const fetcher = new FakeFetcher([
      htmlPage(`${ROOT}/pages/faq`, "<html><body><main><p>Coming soon</p></main></body></html>"),
    ]);

    const result = await extractFaqs(resources.faq, testContext(fetcher));

    expect(result.warnings).toEqual([
      "faqs: FAQ page found but no question/answer pairs could be extracted",
    ]);
  });

  it("uses injected strategies", async () => {
    const fetcher = new FakeFetcher([htmlPage(`${ROOT}/pages/faq`, fixture("faq.html"))]);
    const ctx = testContext(fetcher, {
      strategies: {
        ...DEFAULT_STRATEGIES,
        faq: [{ name: "fixed", extract: () => [{ question: "Fixed?", answer: "Yes." }] }],
      },
    });

    const result = await extractFaqs(resources.faq, ctx);

    expect(result.faqs).toEqual([{ question: "Fixed?", answer: "Yes." }]);
  });
});

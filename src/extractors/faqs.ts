import * as cheerio from "cheerio";
import type { FAQ } from "../types";
import {
  cleanText,
  extractJsonLd,
  htmlToText,
  isRecord,
  loadReadable,
  NOISE_SELECTOR,
} from "../core/html";
import type { ParsedPage } from "../core/html";
import { firstMatch, type ExtractionContext } from "./context";

/** One way of reading question/answer pairs off a page */
export interface FaqStrategy {
  name: string;
  extract(html: string): FAQ[];
}

/** schema.org FAQPage blocks, which many FAQ apps emit */
export const jsonLdFaqStrategy: FaqStrategy = {
  name: "json-ld",
  extract(html: string): FAQ[] {
    const faqs: FAQ[] = [];
    for (const node of extractJsonLd(cheerio.load(html))) {
      if (!asList(node["@type"]).includes("FAQPage")) continue;
      for (const entity of asList(node.mainEntity)) {
        if (!isRecord(entity)) continue;
        const answer = asList(entity.acceptedAnswer).find(isRecord);
        faqs.push({
          question: typeof entity.name === "string" ? htmlToText(entity.name) : "",
          answer: answer && typeof answer.text === "string" ? htmlToText(answer.text) : "",
        });
      }
    }
    return faqs;
  },
};

function asList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined || value === null ? [] : [value];
}

const ACCORDION_ITEM = "[class*='accordion'], [class*='faq-item'], [class*='collapsible']";
const QUESTION_SELECTOR =
  "summary, [class*='question'], [class*='title'], [class*='header'], button, h2, h3, h4";
const ANSWER_SELECTOR =
  "[class*='answer'], [class*='content'], [class*='body'], [class*='panel'], p";

/** <details>/<summary> pairs and theme accordion/collapsible blocks */
export const accordionFaqStrategy: FaqStrategy = {
  name: "accordion",
  extract(html: string): FAQ[] {
    const $ = loadReadable(html);
    const faqs: FAQ[] = [];

    $("details").each((_, el) => {
      const $details = $(el);
      const question = cleanText($details.children("summary").first().text());
      const $answer = $details.clone();
      $answer.children("summary").remove();
      faqs.push({ question, answer: cleanText($answer.text()) });
    });

    $(ACCORDION_ITEM)
      .not("details")
      .each((_, el) => {
        const $item = $(el);
        const $question = $item.find(QUESTION_SELECTOR).first();
        const $answer = $item.find(ANSWER_SELECTOR).not($question).first();
        if ($question.length === 0 || $answer.length === 0) return;
        faqs.push({
          question: cleanText($question.text()),
          answer: cleanText($answer.text()),
        });
      });

    return faqs;
  },
};

/**
 * Headings followed by their content up to the next heading. When any
 * heading reads as a question, only those are kept.
 */
export const headingFaqStrategy: FaqStrategy = {
  name: "heading-pairs",
  extract(html: string): FAQ[] {
    const $ = loadReadable(html);
    $(NOISE_SELECTOR).remove();
    const $main = $("main").first();
    const $scope = $main.length ? $main : $("body").first();

    const pairs: FAQ[] = $scope
      .find("h2, h3, h4")
      .toArray()
      .map((el) => ({
        question: cleanText($(el).text()),
        answer: cleanText($(el).nextUntil("h1, h2, h3, h4, h5, h6").text()),
      }));

    const questions = pairs.filter((p) => p.question.includes("?"));
    return questions.length > 0 ? questions : pairs;
  },
};

export const DEFAULT_FAQ_STRATEGIES: FaqStrategy[] = [
  jsonLdFaqStrategy,
  accordionFaqStrategy,
  headingFaqStrategy,
];

/**
 * Run strategies in order; the first that yields complete pairs wins.
 * Pairs with an empty side and repeated questions are discarded.
 */
export function runFaqStrategies(strategies: FaqStrategy[], html: string): FAQ[] {
  for (const strategy of strategies) {
    const faqs = completePairs(strategy.extract(html));
    if (faqs.length > 0) return faqs;
  }
  return [];
}

function completePairs(pairs: FAQ[]): FAQ[] {
  const seen = new Set<string>();
  return pairs.filter((p) => {
    if (!p.question || !p.answer) return false;
    const key = p.question.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export interface FaqsResult {
  faqs: FAQ[];
  page: ParsedPage | null;
  warnings: string[];
}

/**
 * FAQ pairs from the first candidate page that has any. No FAQ page is
 * not worth a warning; an FAQ page we could not read is.
 */
export async function extractFaqs(
  candidates: string[],
  ctx: ExtractionContext
): Promise<FaqsResult> {
  const outcome = await firstMatch(candidates, ctx, (page) => {
    const faqs = runFaqStrategies(ctx.strategies.faq, page.html);
    return faqs.length > 0 ? faqs : null;
  });
  if (outcome.found) return { faqs: outcome.value, page: outcome.page, warnings: [] };

  const warnings = outcome.located
    ? ["faqs: FAQ page found but no question/answer pairs could be extracted"]
    : [];
  return { faqs: [], page: null, warnings };
}

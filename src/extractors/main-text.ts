import { cleanText, loadReadable, NOISE_SELECTOR } from "../core/html";

export interface MainText {
  title: string;
  body: string;
}

/** Finds the primary text block of a content page (policy, about) */
export interface MainTextStrategy {
  name: string;
  extract(html: string): MainText | null;
}

/** Most specific first; Shopify's policy template, then theme rich text */
const CONTAINER_SELECTORS = [
  ".shopify-policy__body",
  ".rte",
  "main article",
  "main",
  "#MainContent",
  "[role='main']",
  "[class*='content']",
];

const TITLE_SELECTORS = [".shopify-policy__title", "main h1", "h1"];

/**
 * Default strategy: drop page chrome, then take the longest text among the
 * elements of the first container selector that matches anything.
 */
export const containerTextStrategy: MainTextStrategy = {
  name: "container-text",
  extract(html: string): MainText | null {
    const $ = loadReadable(html);
    $(NOISE_SELECTOR).remove();

    let title = "";
    for (const selector of TITLE_SELECTORS) {
      title = cleanText($(selector).first().text());
      if (title) break;
    }
    if (!title) title = cleanText($("title").first().text());

    for (const selector of CONTAINER_SELECTORS) {
      let body = "";
      $(selector).each((_, el) => {
        const text = cleanText($(el).text());
        if (text.length > body.length) body = text;
      });
      if (body) return { title, body };
    }
    return null;
  },
};

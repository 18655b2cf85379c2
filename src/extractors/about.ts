import type { ParsedPage } from "../core/html";
import { firstMatch, type ExtractionContext } from "./context";

export interface AboutResult {
  about?: string;
  page: ParsedPage | null;
  warnings: string[];
}

/** "About us" / "Our story" text; a store without one gets no warning */
export async function extractAbout(
  candidates: string[],
  ctx: ExtractionContext
): Promise<AboutResult> {
  const outcome = await firstMatch(candidates, ctx, (page) => {
    const text = ctx.strategies.mainText.extract(page.html);
    return text ? text.body : null;
  });
  if (!outcome.found) return { page: null, warnings: [] };
  return { about: outcome.value, page: outcome.page, warnings: [] };
}

import { POLICY_KINDS } from "../types";
import type { PolicyDocument, PolicyKind, ResourceMap } from "../types";
import type { ParsedPage } from "../core/html";
import { firstMatch, type ExtractionContext } from "./context";

const DEFAULT_TITLES: Record<PolicyKind, string> = {
  privacy: "Privacy policy",
  return: "Return policy",
  refund: "Refund policy",
  terms: "Terms of service",
  shipping: "Shipping policy",
};

export interface PoliciesResult {
  policies: Partial<Record<PolicyKind, PolicyDocument>>;
  /** Pages the policies were read from, in kind order */
  pages: ParsedPage[];
  warnings: string[];
}

/**
 * Resolve every policy kind concurrently. A kind with no page yields no
 * entry; return and refund usually share Shopify's refund-policy page.
 */
export async function extractPolicies(
  candidates: ResourceMap["policies"],
  ctx: ExtractionContext
): Promise<PoliciesResult> {
  const outcomes = await Promise.all(
    POLICY_KINDS.map((kind) =>
      firstMatch(candidates[kind], ctx, (page) => ctx.strategies.mainText.extract(page.html))
    )
  );

  const policies: Partial<Record<PolicyKind, PolicyDocument>> = {};
  const pages: ParsedPage[] = [];
  POLICY_KINDS.forEach((kind, i) => {
    const outcome = outcomes[i];
    if (!outcome.found) return;
    policies[kind] = {
      kind,
      title: outcome.value.title || DEFAULT_TITLES[kind],
      url: outcome.page.finalUrl,
      body: outcome.value.body,
      extractedAt: ctx.extractedAt,
    };
    pages.push(outcome.page);
  });

  const warnings =
    pages.length === 0 ? ["policies: no policy pages found"] : [];
  return { policies, pages, warnings };
}

import { collectLinks, hostOf, type ParsedPage } from "../core/html";

/** Known platforms and the hosts their profile links live on, in output order */
export const SOCIAL_PLATFORMS: ReadonlyArray<{ platform: string; domains: string[] }> = [
  { platform: "instagram", domains: ["instagram.com"] },
  { platform: "facebook", domains: ["facebook.com", "fb.com", "fb.me"] },
  { platform: "tiktok", domains: ["tiktok.com"] },
  { platform: "twitter", domains: ["twitter.com", "x.com"] },
  { platform: "youtube", domains: ["youtube.com", "youtu.be"] },
  { platform: "linkedin", domains: ["linkedin.com"] },
  { platform: "pinterest", domains: ["pinterest.com"] },
];

/** Share buttons link to the platform too, but not to the store's profile */
const SHARE_PATH = /^\/(sharer|share|intent|dialog|pin\/create|sharearticle)\b/i;

/**
 * Profile URL per platform: the first matching anchor across `pages`
 * (scanned in the order given). Keys follow the platform table order.
 */
export function extractSocialHandles(pages: ParsedPage[]): Record<string, string> {
  const urls = pages.flatMap((page) => collectLinks(page).map((link) => link.url));
  const handles: Record<string, string> = {};

  for (const { platform, domains } of SOCIAL_PLATFORMS) {
    const match = urls.find((url) => isProfileLink(url, domains));
    if (match) handles[platform] = match;
  }
  return handles;
}

function isProfileLink(url: string, domains: string[]): boolean {
  const host = hostOf(url).replace(/^m\./, "");
  if (!domains.some((d) => host === d || host.endsWith(`.${d}`))) return false;
  const path = new URL(url).pathname;
  return path !== "/" && !SHARE_PATH.test(path);
}

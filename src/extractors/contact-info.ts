import type { ContactInfo } from "../types";
import { rawHrefs, visibleText, type ParsedPage } from "../core/html";

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const EMAIL_EXACT = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

/** Retina asset names look like addresses: logo@2x.png */
const ASSET_SUFFIX = /\.(png|jpe?g|gif|webp|svg|avif)$/i;

/**
 * Optional +country code, an area code with or without parentheses, then
 * two or three digit groups separated by space, dot or dash.
 */
const PHONE_PATTERN =
  /(?<![\w+])(?:\+\d{1,3}[\s.-]?)?(?:\(\d{1,4}\)|\d{1,4})(?:[\s.-]?\d{2,4}){2,3}(?!\w)/g;

const MIN_PHONE_DIGITS = 10;
const MAX_PHONE_DIGITS = 15;

/**
 * Emails and phone numbers from the visible text and mailto:/tel: links of
 * `pages`, deduplicated in first-seen order.
 */
export function extractContactInfo(pages: ParsedPage[]): ContactInfo {
  const emails: string[] = [];
  const phones: string[] = [];

  for (const page of pages) {
    const text = visibleText(page.html);
    const hrefs = rawHrefs(page);

    for (const match of text.match(EMAIL_PATTERN) ?? []) addEmail(emails, match);
    for (const href of hrefs.filter((h) => /^mailto:/i.test(h))) {
      addEmail(emails, safeDecode(href.slice("mailto:".length).split("?")[0]));
    }

    for (const match of text.match(PHONE_PATTERN) ?? []) addPhone(phones, match);
    for (const href of hrefs.filter((h) => /^tel:/i.test(h))) {
      addPhone(phones, safeDecode(href.slice("tel:".length)), true);
    }
  }

  return { emails, phones };
}

function addEmail(emails: string[], raw: string): void {
  const email = raw.trim().toLowerCase();
  if (!EMAIL_EXACT.test(email) || ASSET_SUFFIX.test(email)) return;
  if (!emails.includes(email)) emails.push(email);
}

/**
 * Add a phone unless it is already known. The same number written with and
 * without its country code is one entry; the international form is kept.
 * @param fromLink - Taken from a tel: link, so a bare digit run is trusted
 */
export function addPhone(phones: string[], raw: string, fromLink = false): void {
  const phone = raw.replace(/\s+/g, " ").trim();
  const digits = phone.replace(/\D/g, "");
  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) return;
  // A bare run of digits is more likely an order or SKU number
  if (!fromLink && !/[\s.()+-]/.test(phone)) return;

  const index = phones.findIndex((known) => samePhone(known.replace(/\D/g, ""), digits));
  if (index === -1) {
    phones.push(phone);
  } else if (phones[index].replace(/\D/g, "").length < digits.length) {
    phones[index] = phone;
  }
}

function samePhone(a: string, b: string): boolean {
  if (a === b) return true;
  // Trunk prefix: 020 7946 0958 is +44 20 7946 0958
  const na = a.replace(/^0+/, "");
  const nb = b.replace(/^0+/, "");
  const [shorter, longer] = na.length <= nb.length ? [na, nb] : [nb, na];
  return shorter.length >= 9 && longer.endsWith(shorter);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

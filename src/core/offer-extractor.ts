/**
 * Offer Extractor
 *
 * Parses a rendered results page into priced broadband offers. Candidate
 * cards are chosen by loose structural selectors, then each card's flattened
 * text is mined for speed, monthly price, upfront fee, contract length and a
 * plan name.
 *
 * Pure function of the HTML: the same page always yields the same offers in
 * the same order.
 */

import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { OfferCandidate } from '../types/index.js';

/**
 * Containers that may hold one offer, in document order
 */
export const CARD_SELECTOR = [
  "[data-component*='product' i]",
  "[data-component*='card' i]",
  "[class*='card' i]",
  "[class*='Tile' i]",
  "[class*='Product' i]",
  'section',
  'article',
  'li',
].join(', ');

const GIGABIT_PATTERN =
  /(\d+(?:\.\d+)?)\s*(?:g(?:ig)?(?:a)?(?:b(?:it)?(?:\/s|ps)?)?|gigabit(?:\/s|ps)?)\b/gi;
const MEGABIT_PATTERN = /(\d+(?:\.\d+)?)\s*m(?:eg)?b(?:it)?(?:\/s|ps)?\b/gi;
const PRICE_PATTERN = /£\s*([0-9]+(?:\.[0-9]{2})?)\s*(?:\/(?:m|month)|per\s*month|a\s*month|pm)?/i;
const UPFRONT_PATTERN = /(?:upfront|activation|setup|set[-\s]*up)[^£]*£\s*([0-9]+(?:\.[0-9]{2})?)/i;
const TERM_PATTERN = /(\d{2})\s*month/i;
const PLAN_HINT_PATTERN =
  /(Gigafast|Gigabit|Gig1|Full Fibre|Fibre|Essential|Advanced|Pro|Halo|Complete|Unlimited|M125|M250|Superfast|Ultrafast|G\.?fast|FTTP|FTTC|Fast|Faster|Fastest)/i;

const SAMPLE_LENGTH = 240;
const PLAN_NAME_MAX = 80;
const SKIPPED_TAGS = 'script, style, noscript, template';

interface SpeedMention {
  mbps: number;
  start: number;
}

/**
 * Collapse every run of whitespace to one space and trim
 */
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

function collectText($: cheerio.CheerioAPI, $node: Cheerio<AnyNode>, out: string[]): void {
  $node.contents().each((_, child) => {
    if (child.nodeType === 3) {
      out.push($(child).text());
    } else if (child.nodeType === 1) {
      const $child = $(child);
      if (!$child.is(SKIPPED_TAGS)) {
        collectText($, $child, out);
      }
    }
  });
}

/**
 * Visible text of a node with a space between every text fragment
 */
function flattenText($: cheerio.CheerioAPI, node: AnyNode): string {
  const parts: string[] = [];
  collectText($, $(node), parts);
  return collapseWhitespace(parts.join(' '));
}

/**
 * Highest advertised speed in megabits; leftmost mention wins ties
 */
export function parseSpeed(text: string): SpeedMention | null {
  const mentions: SpeedMention[] = [];
  for (const match of text.matchAll(GIGABIT_PATTERN)) {
    mentions.push({ mbps: parseFloat(match[1]) * 1000, start: match.index ?? 0 });
  }
  for (const match of text.matchAll(MEGABIT_PATTERN)) {
    mentions.push({ mbps: parseFloat(match[1]), start: match.index ?? 0 });
  }
  if (mentions.length === 0) return null;

  let best = mentions[0];
  for (const mention of mentions.slice(1)) {
    if (mention.mbps > best.mbps || (mention.mbps === best.mbps && mention.start < best.start)) {
      best = mention;
    }
  }
  return { mbps: Math.round(best.mbps), start: best.start };
}

/**
 * First pound amount on the card, taken as the monthly price
 */
export function parseMonthlyPrice(text: string): number | null {
  const match = PRICE_PATTERN.exec(text);
  return match ? parseFloat(match[1]) : null;
}

/**
 * Pound amount following an upfront/activation/setup keyword
 */
export function parseUpfrontFee(text: string): number | null {
  const match = UPFRONT_PATTERN.exec(text);
  return match ? parseFloat(match[1]) : null;
}

/**
 * Two-digit month count, e.g. "24 month contract"
 */
export function parseContractMonths(text: string): number | null {
  const match = TERM_PATTERN.exec(text);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Best-effort plan label; not used for offer identity
 */
export function guessPlanName(text: string, speedStart: number): string | null {
  const hint = PLAN_HINT_PATTERN.exec(text);
  if (hint) {
    const from = Math.max(0, hint.index - 25);
    const to = Math.min(text.length, hint.index + hint[0].length + 50);
    return collapseWhitespace(text.slice(from, to)).slice(0, PLAN_NAME_MAX);
  }

  const words = text.slice(0, speedStart).trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) return null;
  return words.slice(-6).join(' ');
}

function sampleOf(text: string): string {
  return text.length > SAMPLE_LENGTH ? `${text.slice(0, SAMPLE_LENGTH)}…` : text;
}

/**
 * Parse one card's flattened text; null when it is not a priced offer
 */
export function parseCardText(text: string): OfferCandidate | null {
  if (!text.includes('£')) return null;
  const lower = text.toLowerCase();
  if (!lower.includes('mb') && !lower.includes('gb')) return null;

  const speed = parseSpeed(text);
  if (!speed || speed.mbps === 0) return null;
  const monthlyPriceGbp = parseMonthlyPrice(text);
  if (!monthlyPriceGbp) return null;

  return {
    planName: guessPlanName(text, speed.start),
    speedMbps: speed.mbps,
    monthlyPriceGbp,
    upfrontFeeGbp: parseUpfrontFee(text),
    contractMonths: parseContractMonths(text),
    cardTextSample: sampleOf(text),
  };
}

/**
 * Keep the first offer for each (speed, monthly price) pair
 */
export function dedupeOffers(offers: readonly OfferCandidate[]): OfferCandidate[] {
  const seenTuples = new Set<string>();
  const exact: OfferCandidate[] = [];
  for (const offer of offers) {
    const key = JSON.stringify([
      offer.speedMbps,
      offer.monthlyPriceGbp,
      offer.upfrontFeeGbp,
      offer.contractMonths,
      offer.planName,
    ]);
    if (seenTuples.has(key)) continue;
    seenTuples.add(key);
    exact.push(offer);
  }

  const seenPairs = new Set<string>();
  const result: OfferCandidate[] = [];
  for (const offer of exact) {
    const key = `${offer.speedMbps}|${offer.monthlyPriceGbp}`;
    if (seenPairs.has(key)) continue;
    seenPairs.add(key);
    result.push(offer);
  }
  return result;
}

/**
 * Extract deduplicated offers from a results page
 */
export function extractOffers(html: string): OfferCandidate[] {
  const $ = cheerio.load(html);
  const offers: OfferCandidate[] = [];

  for (const element of $(CARD_SELECTOR).toArray()) {
    const node: AnyNode = element;
    const offer = parseCardText(flattenText($, node));
    if (offer) {
      offers.push(offer);
    }
  }

  return dedupeOffers(offers);
}

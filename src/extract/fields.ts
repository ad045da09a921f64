import {
  BRACKET_TAG_PATTERN,
  BRACKET_TAG_WITH_SPACE_PATTERN,
  LABEL_NO_PATTERNS,
  LABEL_YES_PATTERNS,
  LOCATION_HINT_PATTERN,
  LOCATION_TOKENS,
  MAX_MODEL_LENGTH,
  PRICE_PATTERN,
  REGION_CODE_PATTERN,
  SHIP_DESTINATION_HINTS,
} from './patterns.js';
import type { ShipDestination } from './patterns.js';

export type BuyerLabel = 'yes' | 'no' | 'unknown';

export interface BrandModel {
  brand: string | null;
  model: string | null;
}

export interface LocationHint {
  country: string;
  region: string;
}

/**
 * First currency amount in reading order, as "USD 1234" or "EUR 1234.56".
 * A "$100 OBO, was $150" post yields the first amount; no attempt is made to pick a better one.
 */
export function extractPrice(text: string): string | null {
  if (!text) return null;
  const groups = PRICE_PATTERN.exec(text)?.groups;
  if (!groups) return null;

  const usd = groups.usd1 ?? groups.usd2;
  const amount = usd ?? groups.eur1 ?? groups.eur2;
  if (!amount) return null;

  const currency = usd ? 'USD' : 'EUR';
  return `${currency} ${amount.replace(',', '.')}`;
}

function locationFromTags(text: string): string | null {
  for (const match of text.matchAll(BRACKET_TAG_PATTERN)) {
    const tag = (match[1] ?? '').trim();
    const upper = tag.toUpperCase();
    if (LOCATION_TOKENS.some((token) => upper.includes(token))) {
      return tag;
    }
    // State-only tags like [CA] after [WTS]
    if (REGION_CODE_PATTERN.test(tag)) {
      return tag;
    }
  }
  return null;
}

/**
 * Seller location from bracket tags, title first, body as fallback.
 * Returns the tag as written, e.g. "USA-NY" or "CA".
 */
export function extractLocation(title: string, body: string): string | null {
  return locationFromTags(title) ?? locationFromTags(body);
}

/** Splits a location tag such as "USA-CA" into its country and region parts. */
export function parseLocationHint(location: string): LocationHint | null {
  const groups = LOCATION_HINT_PATTERN.exec(location.trim())?.groups;
  if (!groups?.country || !groups.region) return null;
  return { country: groups.country, region: groups.region };
}

export function extractShipDestinations(text: string): string | null {
  if (!text) return null;
  const found: ShipDestination[] = [];
  for (const [destination, pattern] of SHIP_DESTINATION_HINTS) {
    if (pattern.test(text) && !found.includes(destination)) {
      found.push(destination);
    }
  }
  return found.length > 0 ? found.join(', ') : null;
}

/** Buyer-supplied label phrases win over seller-supplied ones when a post has both. */
export function inferBuyerLabel(text: string): BuyerLabel {
  if (!text) return 'unknown';
  if (LABEL_YES_PATTERNS.some((pattern) => pattern.test(text))) return 'yes';
  if (LABEL_NO_PATTERNS.some((pattern) => pattern.test(text))) return 'no';
  return 'unknown';
}

/**
 * Positional split: first word after the bracket tags is the brand, the rest the model.
 * Titles that don't follow "Brand Model ..." get split wrong; there is no brand dictionary.
 */
export function extractBrandModel(title: string): BrandModel {
  if (!title) return { brand: null, model: null };

  const cleaned = title.replace(BRACKET_TAG_WITH_SPACE_PATTERN, '').trim();
  const parts = cleaned.split(/\s+/).filter((part) => part.length > 0);

  if (parts.length === 0) return { brand: null, model: null };
  if (parts.length === 1) return { brand: parts[0] ?? null, model: null };

  const [brand, ...rest] = parts;
  const model = Array.from(rest.join(' ')).slice(0, MAX_MODEL_LENGTH).join('');
  return { brand: brand ?? null, model };
}

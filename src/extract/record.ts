import type { RawPost } from '../scrapers/types.js';
import {
  extractBrandModel,
  extractLocation,
  extractPrice,
  extractShipDestinations,
  inferBuyerLabel,
} from './fields.js';
import type { BuyerLabel } from './fields.js';

export interface ExtractedRecord {
  readonly brand: string | null;
  readonly model: string | null;
  readonly price: string | null;
  readonly buyerProvidesLabel: BuyerLabel;
  readonly sellerLocation: string | null;
  readonly shipDestinations: string | null;
  readonly posterHandle: string | null;
  readonly dateListed: string; // YYYY-MM-DD, UTC
}

function textOrEmpty(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function formatUtcDay(instant: Date): string {
  if (Number.isNaN(instant.getTime())) return String(instant);
  return instant.toISOString().slice(0, 10);
}

export function buildRecord(post: RawPost): ExtractedRecord {
  const title = textOrEmpty(post.title);
  const body = textOrEmpty(post.body);
  const combined = `${title}\n${body}`;

  const { brand, model } = extractBrandModel(title);

  return Object.freeze({
    brand,
    model,
    price: extractPrice(combined),
    buyerProvidesLabel: inferBuyerLabel(combined),
    sellerLocation: extractLocation(title, body),
    shipDestinations: extractShipDestinations(combined),
    posterHandle: post.authorName ? `u/${post.authorName}` : null,
    dateListed: formatUtcDay(post.createdAtUtc),
  });
}

// Recognizers for r/watchexchange-style titles and bodies, e.g.
//   [WTS] [USA-CA] Brand Model ...
//   [WTS] [CAN/CONUS] Brand Model ...

const AMOUNT = String.raw`\d{2,6}(?:[.,]\d{2})?`;

// Alternative order matters: at a given position the first one that matches wins.
export const PRICE_PATTERN = new RegExp(
  [
    String.raw`\$\s?(?<usd1>${AMOUNT})`,
    String.raw`(?<usd2>${AMOUNT})\s?(?:usd|USD)`,
    String.raw`(?<eur1>${AMOUNT})\s?(?:eur|EUR|€)`,
    String.raw`€\s?(?<eur2>${AMOUNT})`,
  ].join('|')
);

export const BRACKET_TAG_PATTERN = /\[([^\]]+)\]/g;

// A bracket tag plus the whitespace after it, for stripping tags out of a title.
export const BRACKET_TAG_WITH_SPACE_PATTERN = /\[[^\]]+\]\s*/g;

export const LOCATION_HINT_PATTERN =
  /^(?<country>USA|US|CONUS|CAN|EU|UK|AUS|NZ|INTL)[-\s]?(?<region>[A-Z]{2}|[A-Za-z]{2,20}(?:\s?[A-Za-z]{2,20})?)$/;

// Substrings that mark a bracket tag as a seller location.
export const LOCATION_TOKENS = ['USA', 'US', 'CAN', 'EU', 'UK', 'AUS', 'NZ'] as const;

export const REGION_CODE_PATTERN = /^[A-Z]{2}$/;

export type ShipDestination = 'CONUS' | 'USA' | 'CANADA' | 'EU' | 'UK' | 'WORLDWIDE';

export const SHIP_DESTINATION_HINTS: ReadonlyArray<readonly [ShipDestination, RegExp]> = [
  ['CONUS', /\bCONUS\b/i],
  ['USA', /\bUSA\b|\bUS only\b/i],
  ['CANADA', /\bCanada\b|\bCAN\b/i],
  ['EU', /\bEU\b|\bEurope\b/i],
  ['UK', /\bUK\b|\bUnited Kingdom\b/i],
  ['WORLDWIDE', /\bworldwide\b|\bWW shipping\b|\binternational\b/i],
];

export const LABEL_YES_PATTERNS: readonly RegExp[] = [
  /\bbuyer (?:provides|supplies|sends) (?:a )?label\b/i,
  /\bbuyer['’]s label\b/i,
];

export const LABEL_NO_PATTERNS: readonly RegExp[] = [
  /\bseller (?:provides|supplies) (?:a )?label\b/i,
  /\bshipping included\b/i,
  /\bI will ship\b/i,
];

export const MAX_MODEL_LENGTH = 200;

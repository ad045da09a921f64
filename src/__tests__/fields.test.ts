import { describe, it, expect } from 'vitest';
import {
  extractBrandModel,
  extractLocation,
  extractPrice,
  extractShipDestinations,
  inferBuyerLabel,
  parseLocationHint,
} from '../extract/fields.js';

describe('extractPrice', () => {
  it('reads a dollar amount', () => {
    expect(extractPrice('Asking $1250 shipped')).toBe('USD 1250');
  });

  it('allows a space after the dollar sign', () => {
    expect(extractPrice('Price: $ 450')).toBe('USD 450');
  });

  it('reads an amount followed by USD in either case', () => {
    expect(extractPrice('300 usd firm')).toBe('USD 300');
    expect(extractPrice('[WTS] Seiko SKX007 - 250 USD')).toBe('USD 250');
  });

  it('reads euro amounts with the sign before or after', () => {
    expect(extractPrice('€950 or trade')).toBe('EUR 950');
    expect(extractPrice('Only 800€')).toBe('EUR 800');
  });

  it('normalizes a comma decimal separator', () => {
    expect(extractPrice('Price: 1234,56 EUR')).toBe('EUR 1234.56');
    expect(extractPrice('$1299,99')).toBe('USD 1299.99');
  });

  it('keeps cents written with a dot', () => {
    expect(extractPrice('$1299.99 OBO')).toBe('USD 1299.99');
  });

  it('takes the first price in reading order', () => {
    expect(extractPrice('$100 OBO, was $150')).toBe('USD 100');
    expect(extractPrice('[WTS] Tudor BB58\n2900 USD, retail was $4000')).toBe('USD 2900');
  });

  it('ignores single-digit amounts', () => {
    expect(extractPrice('$5 off for regulars')).toBeNull();
  });

  it('returns null when nothing looks like a price', () => {
    expect(extractPrice('')).toBeNull();
    expect(extractPrice('Open to offers')).toBeNull();
  });

  it('always produces "<CUR> <digits>[.<2 digits>]"', () => {
    const inputs = [
      '$12',
      '$123456789',
      '€ 99,00',
      '45 EUR',
      '1000usd',
      'Was $700, now $650',
      '[WTS] Omega 2254.50 - $2,950',
    ];
    for (const input of inputs) {
      const price = extractPrice(input);
      if (price !== null) {
        expect(price).toMatch(/^(USD|EUR) \d+(\.\d{2})?$/);
      }
    }
  });
});

describe('extractLocation', () => {
  it('accepts a state-only tag', () => {
    expect(extractLocation('[WTS] [CA] Rolex Submariner', '')).toBe('CA');
  });

  it('returns a country-region tag verbatim', () => {
    expect(extractLocation('[WTS] [USA-NY] Omega Speedmaster', '')).toBe('USA-NY');
  });

  it('matches country tokens case-insensitively and keeps the original case', () => {
    expect(extractLocation('[WTS] [ usa-tx ] Tudor Pelagos', '')).toBe('usa-tx');
  });

  it('does not take lowercase two-letter tags as region codes', () => {
    expect(extractLocation('[WTS] [ca] Seiko Alpinist', '')).toBeNull();
  });

  it('falls back to the body when the title has no location tag', () => {
    expect(extractLocation('[WTS] Omega Speedmaster', 'Located in [EU-DE], shipping worldwide')).toBe('EU-DE');
  });

  it('prefers the title over the body', () => {
    expect(extractLocation('[WTS] [UK] Bremont', 'Ships from [USA-FL]')).toBe('UK');
  });

  it('returns null when neither source has a usable tag', () => {
    expect(extractLocation('Omega Seamaster', 'No tags here')).toBeNull();
  });
});

describe('parseLocationHint', () => {
  it('splits country and region code', () => {
    expect(parseLocationHint('USA-CA')).toEqual({ country: 'USA', region: 'CA' });
  });

  it('accepts a space separator and a region name', () => {
    expect(parseLocationHint('UK London')).toEqual({ country: 'UK', region: 'London' });
  });

  it('returns null for tags without a country prefix', () => {
    expect(parseLocationHint('CA')).toBeNull();
    expect(parseLocationHint('CAN/CONUS')).toBeNull();
  });
});

describe('extractShipDestinations', () => {
  it('lists matched destinations in declaration order', () => {
    expect(extractShipDestinations('Shipping worldwide, UK buyers welcome, usa too')).toBe('USA, UK, WORLDWIDE');
  });

  it('does not read CONUS as a USA hint', () => {
    expect(extractShipDestinations('Ships CONUS only, open to Canada and EU')).toBe('CONUS, CANADA, EU');
  });

  it('lists each destination once', () => {
    expect(extractShipDestinations('EU EU Europe')).toBe('EU');
  });

  it('returns null when no hint matches', () => {
    expect(extractShipDestinations('Local pickup in Denver')).toBeNull();
    expect(extractShipDestinations('')).toBeNull();
  });
});

describe('inferBuyerLabel', () => {
  it.each([
    'Buyer provides label',
    'buyer sends a label please',
    'Buyer supplies label',
    "Buyer's label only",
    'Buyer’s label only',
  ])('returns yes for "%s"', (text) => {
    expect(inferBuyerLabel(text)).toBe('yes');
  });

  it.each([
    'Seller provides label',
    'Seller supplies a label',
    'Shipping included to CONUS',
    'I will ship within 2 days',
  ])('returns no for "%s"', (text) => {
    expect(inferBuyerLabel(text)).toBe('no');
  });

  it('gives buyer phrases precedence over seller phrases', () => {
    expect(inferBuyerLabel('Shipping included, or buyer provides label for a discount')).toBe('yes');
  });

  it('returns unknown when neither phrase set matches', () => {
    expect(inferBuyerLabel('Open to offers')).toBe('unknown');
    expect(inferBuyerLabel('')).toBe('unknown');
  });
});

describe('extractBrandModel', () => {
  it('splits the first word as brand after removing tags', () => {
    expect(extractBrandModel('[WTS] [USA-CA] Omega Seamaster 300')).toEqual({
      brand: 'Omega',
      model: 'Seamaster 300',
    });
  });

  it('returns a lone word as brand with no model', () => {
    expect(extractBrandModel('[WTS] SoloToken')).toEqual({ brand: 'SoloToken', model: null });
  });

  it('returns nothing for a title that is only tags', () => {
    expect(extractBrandModel('[WTS] [USA-CA]')).toEqual({ brand: null, model: null });
    expect(extractBrandModel('')).toEqual({ brand: null, model: null });
  });

  it('collapses runs of whitespace in the model', () => {
    expect(extractBrandModel('[WTS]Rolex   Datejust  16234')).toEqual({
      brand: 'Rolex',
      model: 'Datejust 16234',
    });
  });

  it('removes tags in the middle of the title', () => {
    expect(extractBrandModel('[WTS] Seiko [Mod] SKX')).toEqual({ brand: 'Seiko', model: 'SKX' });
  });

  it('truncates the model to 200 characters', () => {
    const { brand, model } = extractBrandModel(`[WTS] Casio ${'x'.repeat(250)}`);
    expect(brand).toBe('Casio');
    expect(model).toBe('x'.repeat(200));
  });
});

import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { BuyerLabel } from '../extract/fields.js';
import type { ExtractedRecord } from '../extract/record.js';

type RecordField = keyof ExtractedRecord;

export const CSV_COLUMNS: ReadonlyArray<{ key: RecordField; header: string }> = [
  { key: 'brand', header: 'Watch Brand' },
  { key: 'model', header: 'Watch Model' },
  { key: 'price', header: 'Sale Price' },
  { key: 'buyerProvidesLabel', header: 'Buyers Shipping Label (yes or no)' },
  { key: 'sellerLocation', header: 'Location of Seller' },
  { key: 'shipDestinations', header: 'Possible Shipping Destinations' },
  { key: 'posterHandle', header: 'Username of Poster' },
  { key: 'dateListed', header: 'Date Listed' },
];

export function exportFileName(monthsBack: number): string {
  return `listings_last_${monthsBack}_months.csv`;
}

function toRow(record: ExtractedRecord): Array<string | null> {
  return CSV_COLUMNS.map(({ key }) => {
    const value = record[key];
    return key === 'buyerProvidesLabel' && value === 'unknown' ? null : value;
  });
}

export function renderListingsCsv(records: readonly ExtractedRecord[]): string {
  return stringify(records.map(toRow), {
    header: true,
    columns: CSV_COLUMNS.map(({ header }) => header),
    // Empty strings are written as "" so they read back apart from absent (null) cells.
    // quoted_empty would quote the null cells as well.
    quoted_match: /^$/,
  });
}

/** Renders the whole file in memory first, so a failed render leaves no partial export behind. */
export async function writeListingsCsv(
  records: readonly ExtractedRecord[],
  outputDir: string,
  monthsBack: number
): Promise<string> {
  const content = renderListingsCsv(records);
  const filePath = path.join(outputDir, exportFileName(monthsBack));
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}

function toBuyerLabel(value: string | null): BuyerLabel {
  if (value === 'yes' || value === 'no') return value;
  if (value === null) return 'unknown';
  throw new Error(`Invalid buyer label value: "${value}"`);
}

function isCell(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

/**
 * Reads an export back into records. Unquoted empty cells are absent values;
 * a quoted empty cell ("") is kept as an empty string.
 */
export function parseListingsCsv(content: string): ExtractedRecord[] {
  const rows: unknown = parse(content, {
    cast: (value, context) => (value === '' && !context.quoting ? null : value),
    skip_empty_lines: true,
  });
  if (!Array.isArray(rows) || rows.length === 0) {
    throw new Error('Listings CSV is empty');
  }

  const [headerRow, ...dataRows] = rows;
  const expected = CSV_COLUMNS.map(({ header }) => header);
  if (!Array.isArray(headerRow) || headerRow.join(',') !== expected.join(',')) {
    throw new Error(`Unexpected listings CSV header: ${String(headerRow)}`);
  }

  return dataRows.map((row: unknown, index) => {
    if (!Array.isArray(row) || row.length !== expected.length || !row.every(isCell)) {
      throw new Error(`Malformed listings CSV row ${index + 2}`);
    }
    const cells: Array<string | null> = row;
    const [brand, model, price, label, sellerLocation, shipDestinations, posterHandle, dateListed] = cells;
    return Object.freeze({
      brand: brand ?? null,
      model: model ?? null,
      price: price ?? null,
      buyerProvidesLabel: toBuyerLabel(label ?? null),
      sellerLocation: sellerLocation ?? null,
      shipDestinations: shipDestinations ?? null,
      posterHandle: posterHandle ?? null,
      dateListed: dateListed ?? '',
    });
  });
}

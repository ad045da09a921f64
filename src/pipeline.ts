import path from 'node:path';
import { monthsBefore, parseUtcDay } from './dates.js';
import { exportFileName, writeListingsCsv } from './export/csv.js';
import { parseLocationHint } from './extract/fields.js';
import { buildRecord } from './extract/record.js';
import type { ExtractedRecord } from './extract/record.js';
import type { ListingSource } from './scrapers/types.js';

function ts(): string {
  return new Date().toISOString();
}

export interface CollectOptions {
  sourceId: string;
  maxCount: number;
  cutoff: Date;
}

export interface PipelineOptions {
  source: ListingSource;
  sourceId: string;
  monthsBack: number;
  maxCount: number;
  outputDir: string;
  dryRun: boolean;
  now?: Date;
}

export interface PipelineResult {
  rows: number;
  filePath: string | null;
  cutoff: Date;
}

/**
 * Builds records from a newest-first source until the first post older than the cutoff.
 * That post is not processed and nothing after it is pulled from the source.
 */
export async function collectRecords(source: ListingSource, opts: CollectOptions): Promise<ExtractedRecord[]> {
  const records: ExtractedRecord[] = [];
  for await (const post of source.fetchRecent(opts.sourceId, opts.maxCount)) {
    if (post.createdAtUtc.getTime() < opts.cutoff.getTime()) {
      break;
    }
    records.push(buildRecord(post));
  }
  return records;
}

/** Newest day first; records whose date doesn't parse go last. Ties keep their order. */
export function sortByDateListed(records: readonly ExtractedRecord[]): ExtractedRecord[] {
  return [...records].sort((a, b) => {
    const timeA = parseUtcDay(a.dateListed);
    const timeB = parseUtcDay(b.dateListed);
    if (timeA === null) return timeB === null ? 0 : 1;
    if (timeB === null) return -1;
    return timeB - timeA;
  });
}

export function countSellersByCountry(records: readonly ExtractedRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    const hint = record.sellerLocation ? parseLocationHint(record.sellerLocation) : null;
    if (hint) {
      counts.set(hint.country, (counts.get(hint.country) ?? 0) + 1);
    }
  }
  return counts;
}

export async function runPipeline(opts: PipelineOptions): Promise<PipelineResult> {
  const cutoff = monthsBefore(opts.now ?? new Date(), opts.monthsBack);

  console.log(`[${ts()}] Starting scan of r/${opts.sourceId}`);
  console.log(`[${ts()}] Dry run: ${opts.dryRun}`);
  console.log(`[${ts()}] Fetch limit: ${opts.maxCount} posts`);
  console.log(`[${ts()}] Cutoff: ${cutoff.toISOString()} (${opts.monthsBack} months back)`);

  try {
    // Step 1: Scan the source down to the cutoff
    const collected = await collectRecords(opts.source, {
      sourceId: opts.sourceId,
      maxCount: opts.maxCount,
      cutoff,
    });
    console.log(`[${ts()}] Collected ${collected.length} records`);

    // Step 2: Order by listing date
    const records = sortByDateListed(collected);

    const byCountry = countSellersByCountry(records);
    if (byCountry.size > 0) {
      const summary = [...byCountry.entries()].map(([country, count]) => `${country}=${count}`).join(', ');
      console.log(`[${ts()}] Sellers by country: ${summary}`);
    }

    // Step 3: Write the export
    if (opts.dryRun) {
      const target = path.join(opts.outputDir, exportFileName(opts.monthsBack));
      console.log(`[${ts()}] Dry-run: would write ${records.length} rows to ${target}`);
      return { rows: records.length, filePath: null, cutoff };
    }

    const filePath = await writeListingsCsv(records, opts.outputDir, opts.monthsBack);
    console.log(`[${ts()}] Wrote ${records.length} rows to ${filePath}`);
    return { rows: records.length, filePath, cutoff };
  } catch (error) {
    const errMessage = error instanceof Error ? error.message : String(error);
    console.error(`[${ts()}] Run failed: ${errMessage}`);
    throw error;
  }
}

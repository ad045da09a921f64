export interface RawPost {
  title: string;
  body: string;
  authorName?: string;
  createdAtUtc: Date;
}

/** Yields posts newest-first. Callers rely on that order to stop at a cutoff. */
export interface ListingSource {
  fetchRecent(sourceId: string, maxCount: number): AsyncIterable<RawPost>;
}

export class SourceError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'SourceError';
  }
}

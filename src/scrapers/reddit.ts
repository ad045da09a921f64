import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { SourceError } from './types.js';
import type { ListingSource, RawPost } from './types.js';

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
const API_BASE = 'https://oauth.reddit.com';

// Reddit caps listing pages at 100 items.
const PAGE_SIZE = 100;
const TOKEN_REFRESH_MARGIN_S = 60;

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  userAgent: string;
}

interface ListingPage {
  posts: RawPost[];
  after: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toRawPost(data: Record<string, unknown>): RawPost {
  const author = data.author;
  const created = data.created_utc;
  return {
    title: typeof data.title === 'string' ? data.title : '',
    body: typeof data.selftext === 'string' ? data.selftext : '',
    // Deleted accounts come back as "[deleted]"
    authorName: typeof author === 'string' && author !== '' && author !== '[deleted]' ? author : undefined,
    createdAtUtc: new Date(typeof created === 'number' ? created * 1000 : Number.NaN),
  };
}

export function parseListingPage(payload: unknown): ListingPage {
  if (!isRecord(payload) || !isRecord(payload.data)) {
    throw new SourceError('Unexpected listing response from Reddit');
  }
  const listing = payload.data;
  const children = Array.isArray(listing.children) ? listing.children : [];

  const posts: RawPost[] = [];
  for (const child of children) {
    if (isRecord(child) && isRecord(child.data)) {
      posts.push(toRawPost(child.data));
    }
  }

  return { posts, after: typeof listing.after === 'string' ? listing.after : null };
}

function toSourceError(error: unknown, action: string): SourceError {
  if (error instanceof SourceError) return error;
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const suffix = status ? ` (${status})` : '';
    return new SourceError(`${action} failed${suffix}: ${error.message}`, status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SourceError(`${action} failed: ${message}`);
}

/**
 * Application-only OAuth client for a subreddit's "new" feed.
 * Pages are requested lazily, so a consumer that stops iterating stops the requests too.
 */
export function createRedditSource(
  credentials: RedditCredentials,
  http: AxiosInstance = axios.create()
): ListingSource {
  let cachedToken: string | null = null;
  let tokenExpiresAt = 0;

  async function getAccessToken(): Promise<string> {
    if (cachedToken && Date.now() < tokenExpiresAt) {
      return cachedToken;
    }

    let payload: unknown;
    try {
      const response = await http.post<unknown>(TOKEN_URL, 'grant_type=client_credentials', {
        auth: { username: credentials.clientId, password: credentials.clientSecret },
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': credentials.userAgent,
        },
      });
      payload = response.data;
    } catch (error) {
      throw toSourceError(error, 'Reddit authentication');
    }

    if (!isRecord(payload) || typeof payload.access_token !== 'string') {
      throw new SourceError('Reddit authentication failed: no access_token in response');
    }
    const expiresIn = typeof payload.expires_in === 'number' ? payload.expires_in : 3600;

    cachedToken = payload.access_token;
    tokenExpiresAt = Date.now() + (expiresIn - TOKEN_REFRESH_MARGIN_S) * 1000;
    return cachedToken;
  }

  async function fetchPage(subreddit: string, limit: number, after: string | null): Promise<ListingPage> {
    const token = await getAccessToken();
    const params: Record<string, string | number> = { limit, raw_json: 1 };
    if (after) {
      params.after = after;
    }

    try {
      const { data } = await http.get<unknown>(`${API_BASE}/r/${encodeURIComponent(subreddit)}/new`, {
        params,
        headers: {
          Authorization: `Bearer ${token}`,
          'User-Agent': credentials.userAgent,
        },
      });
      return parseListingPage(data);
    } catch (error) {
      throw toSourceError(error, `Fetching r/${subreddit}`);
    }
  }

  async function* fetchRecent(subreddit: string, maxCount: number): AsyncGenerator<RawPost> {
    let after: string | null = null;
    let yielded = 0;

    while (yielded < maxCount) {
      const page = await fetchPage(subreddit, Math.min(PAGE_SIZE, maxCount - yielded), after);
      console.log(`[reddit] Fetched ${page.posts.length} posts from r/${subreddit} (after=${after ?? 'start'})`);

      for (const post of page.posts) {
        if (yielded >= maxCount) return;
        yield post;
        yielded++;
      }

      if (!page.after || page.posts.length === 0) return;
      after = page.after;
    }
  }

  return { fetchRecent };
}

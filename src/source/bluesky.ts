import { z } from 'zod';
import type { SourceAdapter, FetchResult } from './adapter.js';
import { IncrementalFilter } from './adapter.js';
import type { Config } from '../shared/config.js';
import type { JobClassifier } from '../classify/classifier.js';
import { tryCreateRecord, type PostingRecord } from '../record/record.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { backoffDelay, hasAttemptsLeft, type RetryPolicy } from '../shared/retry.js';
import { logger } from '../shared/logger.js';
import { sleep as realSleep } from '../shared/utils.js';

const SessionSchema = z.object({
  accessJwt: z.string(),
  did: z.string(),
  handle: z.string(),
});

const PostViewSchema = z.object({
  uri: z.string(),
  author: z.object({
    handle: z.string(),
    description: z.string().optional(),
  }),
  record: z.object({
    text: z.string().default(''),
    createdAt: z.string(),
    embed: z
      .object({
        external: z
          .object({
            title: z.string().optional(),
            description: z.string().optional(),
          })
          .optional(),
      })
      .passthrough()
      .optional(),
  }),
});

const SearchResponseSchema = z.object({
  posts: z.array(z.unknown()),
});

export type BlueskyPost = z.infer<typeof PostViewSchema>;

export interface BlueskyAdapterOptions {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  classifier?: JobClassifier | null;
}

class RateLimitedError extends SourceError {
  constructor(query: string) {
    super(`Bluesky rate limit hit for "${query}"`, { query });
    this.name = 'RateLimitedError';
  }
}

/**
 * at://did:plc:xxx/app.bsky.feed.post/yyy -> https://bsky.app/profile/<handle>/post/yyy
 */
export function uriToUrl(uri: string, handle: string): string {
  const postId = uri.split('/').pop() ?? '';
  return `https://bsky.app/profile/${handle}/post/${postId}`;
}

/**
 * Link preview metadata the API already carries, rendered as an annotation
 * the dedup normaliser knows how to strip.
 */
export function extractEmbedContext(post: BlueskyPost): string {
  const external = post.record.embed?.external;
  if (!external) return '';
  const title = external.title ?? '';
  const description = external.description ?? '';
  if (!title && !description) return '';
  return `[Linked page - ${title}: ${description}]`;
}

export function withBio(text: string, bio: string | undefined): string {
  const trimmed = bio?.trim();
  return trimmed ? `[Bio: ${trimmed}]\n\n${text}` : text;
}

export class BlueskyAdapter implements SourceAdapter {
  readonly name = 'bluesky' as const;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly classifier: JobClassifier | null;
  private readonly retry: RetryPolicy;
  private accessJwt: string | null = null;

  constructor(
    private readonly config: Config['sources']['bluesky'],
    options: BlueskyAdapterOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? realSleep;
    this.classifier = options.classifier ?? null;
    this.retry = { maxAttempts: config.max_retries, baseDelayMs: 1000, maxDelayMs: 60000 };
  }

  private xrpcUrl(method: string): string {
    return `${this.config.service_url.replace(/\/+$/, '')}/xrpc/${method}`;
  }

  private async login(): Promise<string> {
    if (this.accessJwt) return this.accessJwt;

    const { handle, password } = this.config;
    if (!handle || !password) {
      throw new SourceError('Set SCHOLARSYNC_BLUESKY_HANDLE and SCHOLARSYNC_BLUESKY_PASSWORD');
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.xrpcUrl('com.atproto.server.createSession'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ identifier: handle, password }),
      });
    } catch (err) {
      throw new SourceError(`Bluesky login failed: ${errorMessage(err)}`, { handle });
    }
    if (!response.ok) {
      throw new SourceError(`Bluesky login failed: ${response.status}`, { handle, status: response.status });
    }

    const session = SessionSchema.safeParse(await response.json().catch(() => null));
    if (!session.success) {
      throw new SourceError('Unexpected Bluesky session response', { handle });
    }
    logger.debug({ handle: session.data.handle }, 'Bluesky session created');
    this.accessJwt = session.data.accessJwt;
    return this.accessJwt;
  }

  private async searchOnce(query: string, accessJwt: string): Promise<BlueskyPost[]> {
    const params = new URLSearchParams({ q: query, limit: String(this.config.limit) });
    const response = await this.fetchImpl(`${this.xrpcUrl('app.bsky.feed.searchPosts')}?${params}`, {
      headers: { Authorization: `Bearer ${accessJwt}`, Accept: 'application/json' },
    });

    if (response.status === 429) throw new RateLimitedError(query);
    if (!response.ok) {
      throw new SourceError(`Bluesky search failed: ${response.status}`, { query, status: response.status });
    }

    const body = SearchResponseSchema.safeParse(await response.json().catch(() => null));
    if (!body.success) {
      throw new SourceError('Unexpected Bluesky search response', { query });
    }

    const posts: BlueskyPost[] = [];
    for (const raw of body.data.posts) {
      const parsed = PostViewSchema.safeParse(raw);
      if (parsed.success) posts.push(parsed.data);
    }
    return posts;
  }

  /**
   * Search with bounded retries. Rate limits wait longer than other
   * failures. Returns null once the attempts are spent.
   */
  async searchWithRetry(query: string): Promise<BlueskyPost[] | null> {
    const accessJwt = await this.login();

    for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
      try {
        return await this.searchOnce(query, accessJwt);
      } catch (err) {
        if (err instanceof RateLimitedError) {
          const wait = backoffDelay(this.retry, attempt + 2);
          logger.warn({ query, wait }, 'Bluesky rate limited, waiting');
          await this.sleep(wait);
          continue;
        }
        if (!hasAttemptsLeft(this.retry, attempt)) {
          logger.error({ query, attempts: this.retry.maxAttempts, error: errorMessage(err) }, 'Bluesky search failed');
          return null;
        }
        const wait = backoffDelay(this.retry, attempt);
        logger.warn({ query, wait, error: errorMessage(err) }, 'Bluesky search failed, retrying');
        await this.sleep(wait);
      }
    }
    return null;
  }

  async fetch(since: string | null, existing: ReadonlySet<string>): Promise<FetchResult> {
    const filter = new IncrementalFilter(since, existing);
    const records: PostingRecord[] = [];
    const queries = this.config.queries;
    let failedQueries = 0;
    let nonJobs = 0;

    for (const [index, query] of queries.entries()) {
      if (index > 0) await this.sleep(this.config.request_delay_ms);

      logger.info({ query }, 'Searching Bluesky');
      const posts = await this.searchWithRetry(query);
      if (posts === null) {
        failedQueries++;
        continue;
      }

      for (const post of posts) {
        if (!filter.accept(post.uri, post.record.createdAt)) continue;

        const rawText = post.record.text;
        const message = withBio(rawText, post.author.description);
        let record = tryCreateRecord({
          uri: post.uri,
          message,
          url: uriToUrl(post.uri, post.author.handle),
          user_handle: post.author.handle,
          created_at: post.record.createdAt,
          source: this.name,
        });
        if (!record) {
          logger.debug({ uri: post.uri }, 'Dropping post without text');
          continue;
        }

        if (this.classifier) {
          const embed = extractEmbedContext(post);
          const metadataText = embed ? `${message}\n\n${embed}` : message;
          record = await this.classifier.classifyRecord(record, rawText, metadataText);
          if (record.is_verified_job === false) {
            nonJobs++;
            logger.debug({ text: rawText.slice(0, 50) }, 'Non-job post');
          }
        }

        records.push(record);
      }
    }

    if (queries.length > 0 && failedQueries === queries.length) {
      throw new SourceError('Every Bluesky query failed', { queries: queries.length });
    }
    if (filter.skippedOld > 0) {
      logger.info({ skipped: filter.skippedOld }, 'Skipped posts older than last sync');
    }
    if (nonJobs > 0) {
      logger.info({ nonJobs }, 'Classified posts as non-jobs (still saved for analysis)');
    }

    return { records, seen: filter.seen, skippedOld: filter.skippedOld };
  }
}

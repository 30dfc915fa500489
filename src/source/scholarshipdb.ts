import { JSDOM } from 'jsdom';
import type { SourceAdapter, FetchResult } from './adapter.js';
import { IncrementalFilter } from './adapter.js';
import type { Config } from '../shared/config.js';
import { mapFieldToDiscipline, type PositionType } from '../classify/taxonomy.js';
import { tryCreateRecord, type PostingRecord } from '../record/record.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { md5, sleep as realSleep } from '../shared/utils.js';

// A page shorter than this is the last one.
const FULL_PAGE_SIZE = 10;

const LISTING_SELECTOR = 'h4 a[href*="/jobs-in-"], h4 a[href*="/scholarships-in-"]';

export interface Listing {
  title: string;
  link: string;
  href: string;
  country: string;
  dateText: string;
}

export interface ScholarshipDbAdapterOptions {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const UNIT_MS: Array<[string, number]> = [
  ['minute', 60 * 1000],
  ['hour', 60 * 60 * 1000],
  ['day', 24 * 60 * 60 * 1000],
  ['week', 7 * 24 * 60 * 60 * 1000],
  ['month', 30 * 24 * 60 * 60 * 1000],
];

function toSecondPrecision(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * "about 3 hours ago" -> ISO timestamp relative to `now`, at second
 * precision. Unparseable input yields `now`.
 */
export function parseRelativeDate(text: string, now: Date = new Date()): string {
  const clean = text.replace(/about|ago/g, '').trim().toLowerCase();
  const match = /^(\d+)\s*(\w+)/.exec(clean);
  if (!match) return toSecondPrecision(now);

  const amount = Number(match[1]);
  const unit = match[2];
  const unitMs = UNIT_MS.find(([name]) => unit.includes(name))?.[1] ?? 0;
  return toSecondPrecision(new Date(now.getTime() - amount * unitMs));
}

export function generateUri(link: string): string {
  return `scholarshipdb://${md5(link).slice(0, 16)}`;
}

export function inferPositionType(href: string, title: string): PositionType[] {
  const lower = title.toLowerCase();
  if (href.includes('/Postdoc') || lower.includes('postdoc')) return ['Postdoc'];
  if (href.includes('/jobs-in-') && lower.includes('research assistant')) return ['Research Assistant'];
  return ['PhD Student'];
}

export function parseListings(html: string, baseUrl: string): Listing[] {
  const { document } = new JSDOM(html).window;
  const listings: Listing[] = [];

  for (const anchor of Array.from(document.querySelectorAll(LISTING_SELECTOR))) {
    const href = anchor.getAttribute('href') ?? '';
    const parent = anchor.closest('li') ?? anchor.closest('div');
    if (!parent) continue;

    listings.push({
      title: anchor.textContent?.trim() ?? '',
      href,
      link: `${baseUrl}${href}`,
      country: parent.querySelector('a.text-success')?.textContent?.trim() || 'Unknown',
      dateText: parent.querySelector('span.text-muted')?.textContent?.trim() ?? '',
    });
  }
  return listings;
}

/**
 * Job board scraper. Listings are queried per field, so the discipline
 * comes from the search rather than the oracle and every listing counts as
 * a verified job.
 */
export class ScholarshipDbAdapter implements SourceAdapter {
  readonly name = 'scholarshipdb' as const;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly baseUrl: string;

  constructor(
    private readonly config: Config['sources']['scholarshipdb'],
    options: ScholarshipDbAdapterOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? (() => new Date());
    this.baseUrl = config.base_url.replace(/\/+$/, '');
  }

  private async fetchPage(field: string, page: number): Promise<string> {
    const params = new URLSearchParams({ page: String(page), q: field });
    const url = `${this.baseUrl}/scholarships/Program-PhD?${params}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.config.user_agent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.config.timeout_ms),
      });
    } catch (err) {
      throw new SourceError(`ScholarshipDB fetch failed: ${errorMessage(err)}`, { field, page });
    }
    if (!response.ok) {
      throw new SourceError(`ScholarshipDB fetch failed: ${response.status}`, {
        field,
        page,
        status: response.status,
      });
    }
    return response.text();
  }

  toRecord(listing: Listing, field: string): PostingRecord | null {
    return tryCreateRecord({
      uri: generateUri(listing.link),
      message: listing.title,
      url: listing.link,
      user_handle: 'scholarshipdb.net',
      created_at: parseRelativeDate(listing.dateText, this.now()),
      source: this.name,
      country: listing.country,
      disciplines: [mapFieldToDiscipline(field)],
      position_type: inferPositionType(listing.href, listing.title),
      is_verified_job: true,
    });
  }

  async fetch(since: string | null, existing: ReadonlySet<string>): Promise<FetchResult> {
    const filter = new IncrementalFilter(since, existing);
    const records: PostingRecord[] = [];
    let requests = 0;
    let failedFields = 0;

    for (const field of this.config.fields) {
      logger.info({ field }, 'Fetching ScholarshipDB');
      let fieldFailed = false;

      for (let page = 1; page <= this.config.max_pages; page++) {
        if (requests > 0) await this.sleep(this.config.request_delay_ms);
        requests++;

        let listings: Listing[];
        try {
          listings = parseListings(await this.fetchPage(field, page), this.baseUrl);
        } catch (err) {
          logger.warn({ field, page, error: errorMessage(err) }, 'ScholarshipDB page failed');
          fieldFailed = page === 1;
          break;
        }
        logger.debug({ field, page, count: listings.length }, 'ScholarshipDB page parsed');

        for (const listing of listings) {
          const record = this.toRecord(listing, field);
          if (!record) continue;
          if (!filter.accept(record.uri, record.created_at)) continue;
          records.push(record);
        }

        if (listings.length < FULL_PAGE_SIZE) break;
      }

      if (fieldFailed) failedFields++;
    }

    if (this.config.fields.length > 0 && failedFields === this.config.fields.length) {
      throw new SourceError('Every ScholarshipDB field failed', { fields: this.config.fields.length });
    }
    if (filter.skippedOld > 0) {
      logger.info({ skipped: filter.skippedOld }, 'Skipped listings older than last sync');
    }
    logger.info({ count: records.length }, 'Found new positions on ScholarshipDB');

    return { records, seen: filter.seen, skippedOld: filter.skippedOld };
  }
}

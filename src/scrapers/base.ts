import axios from 'axios';
import type { SearchConfig } from '../config.js';
import { identityKey } from '../listings/identity.js';
import { failure, success, type ListingRecord, type RunResult, type SiteId } from '../listings/types.js';
import { getText, type HttpGetter } from './http.js';

export type ScrapeErrorKind = 'network' | 'http' | 'parse' | 'blocked' | 'timeout';

export class ScrapeError extends Error {
  readonly kind: ScrapeErrorKind;

  constructor(kind: ScrapeErrorKind, message: string) {
    super(message);
    this.name = 'ScrapeError';
    this.kind = kind;
  }

  /** Reason reported in a failed RunResult. */
  get reason(): string {
    if (this.kind === 'blocked' || this.kind === 'timeout') return this.kind;
    return `${this.kind}: ${this.message}`;
  }
}

/**
 * Classify anything thrown while fetching or parsing a page.
 */
export function toScrapeError(error: unknown): ScrapeError {
  if (error instanceof ScrapeError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 401 || status === 403 || status === 429) {
      return new ScrapeError('blocked', `HTTP ${status}`);
    }
    if (status) {
      return new ScrapeError('http', `HTTP ${status}`);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ScrapeError('timeout', error.message);
    }
    return new ScrapeError('network', error.message || String(error.code));
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ScrapeError('parse', message);
}

/**
 * One source site. `fetchListings` never rejects: every failure comes back as
 * a failed RunResult.
 */
export interface SiteAdapter {
  readonly site: SiteId;
  fetchListings(): Promise<RunResult>;
}

export interface SearchPage {
  url: string;
  /** Town the page searches; used when a card carries no address */
  town: string;
}

export interface AdapterOptions {
  search: SearchConfig;
  http?: HttpGetter;
  requestTimeoutMs?: number;
  maxCardsPerPage?: number;
}

const BLOCK_MARKERS = [
  /px-captcha/i,
  /captcha-delivery/i,
  /are you a (human|robot)/i,
  /access to this page has been denied/i,
  /please verify you are a human/i,
];

export function townSlug(town: string, state: string): string {
  return `${town}-${state}`.trim().toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');
}

export abstract class BaseSiteAdapter implements SiteAdapter {
  abstract readonly site: SiteId;

  protected readonly search: SearchConfig;
  protected readonly maxCardsPerPage: number;
  private readonly httpGet: HttpGetter;
  private readonly requestTimeoutMs: number;

  constructor(options: AdapterOptions) {
    this.search = options.search;
    this.httpGet = options.http ?? getText;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 20000;
    this.maxCardsPerPage = options.maxCardsPerPage ?? 50;
  }

  protected abstract buildSearchPages(): SearchPage[];

  /**
   * Parse one results page. Throw a ScrapeError when the page can't be
   * read at all; return [] when it legitimately has no results.
   */
  protected abstract parsePage(html: string, page: SearchPage): ListingRecord[];

  protected isBlockedPage(html: string): boolean {
    return BLOCK_MARKERS.some((re) => re.test(html));
  }

  protected log(message: string): void {
    console.log(`[${this.site}] ${message}`);
  }

  async fetchListings(): Promise<RunResult> {
    try {
      const pages = this.buildSearchPages();
      const listings: ListingRecord[] = [];
      const seenKeys = new Set<string>();
      let pagesParsed = 0;
      let firstError: ScrapeError | null = null;

      for (const page of pages) {
        try {
          const html = await this.httpGet(page.url, this.requestTimeoutMs);
          if (this.isBlockedPage(html)) {
            throw new ScrapeError('blocked', 'bot wall detected');
          }
          const parsed = this.parsePage(html, page);
          pagesParsed++;

          let added = 0;
          for (const listing of parsed) {
            const key = identityKey(listing);
            if (seenKeys.has(key)) continue;
            seenKeys.add(key);
            listings.push(listing);
            added++;
          }
          this.log(`${page.url} -> ${added} listings`);
        } catch (error) {
          const scrapeError = toScrapeError(error);
          firstError ??= scrapeError;
          console.warn(`[${this.site}] ${page.url} failed: ${scrapeError.reason}`);
        }
      }

      if (pagesParsed === 0 && firstError) {
        return failure(firstError.reason);
      }
      return success(listings);
    } catch (error) {
      return failure(toScrapeError(error).reason);
    }
  }
}

/**
 * One scrape → filter → dedup → digest cycle.
 *
 * Sites are fetched with bounded concurrency and a per-site timeout; a failed
 * site only shows up in the summary. The seen store is committed strictly
 * after the digest was accepted by the mail transport, so a failed send is
 * retried as novel on the next run.
 */
import pLimit from 'p-limit';
import type { RunHistory } from '../database/index.js';
import type { DedupStore } from '../dedup/seen-store.js';
import type { DigestMessage } from '../email/digest.js';
import type { Mailer } from '../email/client.js';
import type { ListingFilter } from '../listings/filter.js';
import { failure, type ListingRecord, type RunResult, type SiteId } from '../listings/types.js';
import { toScrapeError, type SiteAdapter } from '../scrapers/base.js';

export type RunStatus = 'ok' | 'partial' | 'skipped' | 'error';
export type DispatchOutcome = 'not-needed' | 'sent' | 'failed' | 'dry-run';

export interface SiteReport {
  site: SiteId;
  ok: boolean;
  listingCount: number;
  reason?: string;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  status: RunStatus;
  sites: SiteReport[];
  failedSites: SiteId[];
  candidateCount: number;
  matchedCount: number;
  novelCount: number;
  alreadySeenCount: number;
  dispatch: DispatchOutcome;
  messageId?: string;
  dispatchError?: string;
  error?: string;
  warnings: string[];
}

export interface RunOptions {
  /** Compose the digest but neither send it nor commit the seen store */
  dryRun?: boolean;
}

export interface RunControllerOptions {
  adapters: SiteAdapter[];
  filter: ListingFilter;
  store: DedupStore;
  mailer: Mailer;
  compose: (novel: ListingRecord[]) => Promise<DigestMessage>;
  history?: RunHistory;
  concurrency?: number;
  siteTimeoutMs?: number;
  now?: () => Date;
  /** Receives the composed digest on dry runs */
  onDryRun?: (digest: DigestMessage) => void;
}

function emptySummary(startedAt: Date): RunSummary {
  return {
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    status: 'ok',
    sites: [],
    failedSites: [],
    candidateCount: 0,
    matchedCount: 0,
    novelCount: 0,
    alreadySeenCount: 0,
    dispatch: 'not-needed',
    warnings: [],
  };
}

export class RunController {
  private readonly options: RunControllerOptions;
  private readonly now: () => Date;
  private inFlight = false;
  private last: RunSummary | null = null;

  constructor(options: RunControllerOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.inFlight;
  }

  get lastSummary(): RunSummary | null {
    return this.last;
  }

  /**
   * Execute one run. Never rejects; every failure ends up in the summary.
   * A trigger that arrives while a run is in flight is skipped.
   */
  async runOnce(options: RunOptions = {}): Promise<RunSummary> {
    const startedAt = this.now();
    const summary = emptySummary(startedAt);

    if (this.inFlight) {
      console.warn('[run] previous run still in progress; skipping this trigger');
      summary.status = 'skipped';
      return summary;
    }

    this.inFlight = true;
    console.log(`[run] starting at ${summary.startedAt}${options.dryRun ? ' (dry run)' : ''}`);
    try {
      await this.execute(summary, startedAt, options.dryRun === true);
    } catch (error) {
      summary.status = 'error';
      summary.error = error instanceof Error ? error.message : String(error);
      console.error('[run] failed:', error);
    } finally {
      summary.finishedAt = this.now().toISOString();
      this.recordHistory(summary);
      this.last = summary;
      this.inFlight = false;
    }

    console.log(
      `[run] ${summary.status}: ${summary.novelCount} novel of ${summary.matchedCount} matched ` +
      `(${summary.candidateCount} scraped), dispatch ${summary.dispatch}` +
      (summary.failedSites.length ? `, failed sites: ${summary.failedSites.join(', ')}` : '')
    );
    return summary;
  }

  private async execute(summary: RunSummary, startedAt: Date, dryRun: boolean): Promise<void> {
    const { store, filter } = this.options;

    const loaded = store.load();
    if (loaded.anomaly) {
      summary.warnings.push(`seen store unreadable (${loaded.anomaly.reason}); started empty`);
    }

    const results = await this.collect();
    const candidates: ListingRecord[] = [];
    for (const { site, result } of results) {
      if (result.ok) {
        summary.sites.push({ site, ok: true, listingCount: result.listings.length });
        candidates.push(...result.listings);
      } else {
        summary.sites.push({ site, ok: false, listingCount: 0, reason: result.reason });
        summary.failedSites.push(site);
      }
    }
    if (summary.failedSites.length > 0) summary.status = 'partial';

    const matched = filter(candidates);
    const { novel, alreadySeen } = store.partition(matched);
    summary.candidateCount = candidates.length;
    summary.matchedCount = matched.length;
    summary.novelCount = novel.length;
    summary.alreadySeenCount = alreadySeen.length;

    if (novel.length === 0) {
      console.log('[run] no new listings this run');
      return;
    }

    const digest = await this.options.compose(novel);

    if (dryRun) {
      summary.dispatch = 'dry-run';
      this.options.onDryRun?.(digest);
      return;
    }

    const sent = await this.options.mailer.dispatch(digest);
    if (!sent.ok) {
      summary.dispatch = 'failed';
      summary.dispatchError = sent.reason;
      summary.status = 'partial';
      return;
    }

    summary.dispatch = 'sent';
    summary.messageId = sent.messageId;
    try {
      store.commit(novel, startedAt);
      store.save();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      summary.warnings.push(`seen store not saved after send (${message}); listings may be sent again`);
      console.error('[run] seen store save failed:', error);
    }
  }

  private async collect(): Promise<Array<{ site: SiteId; result: RunResult }>> {
    const limit = pLimit(Math.max(1, this.options.concurrency ?? 2));
    return Promise.all(
      this.options.adapters.map((adapter) =>
        limit(async () => ({ site: adapter.site, result: await this.fetchWithTimeout(adapter) }))
      )
    );
  }

  private async fetchWithTimeout(adapter: SiteAdapter): Promise<RunResult> {
    const timeoutMs = this.options.siteTimeoutMs;
    const fetching = adapter.fetchListings().catch((error: unknown) => failure(toScrapeError(error).reason));
    if (!timeoutMs) return fetching;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<RunResult>((resolve) => {
      timer = setTimeout(() => {
        console.warn(`[${adapter.site}] gave up after ${timeoutMs}ms`);
        resolve(failure('timeout'));
      }, timeoutMs);
    });
    try {
      return await Promise.race([fetching, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private recordHistory(summary: RunSummary): void {
    if (!this.options.history) return;
    try {
      this.options.history.recordRun({
        status: summary.status,
        dispatch: summary.dispatch,
        novelCount: summary.novelCount,
        failedSites: summary.failedSites,
        summary,
        startedAt: summary.startedAt,
        finishedAt: summary.finishedAt,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      summary.warnings.push(`run not recorded (${message})`);
      console.warn('[run] could not record run history:', error);
    }
  }
}

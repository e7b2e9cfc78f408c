import type { Config } from '../config.js';
import { RunLog } from '../database/index.js';
import { SeenStore } from '../dedup/seen-store.js';
import { DigestMailer, type Mailer } from '../email/client.js';
import { composeDigest, type DigestMessage } from '../email/digest.js';
import { createListingFilter, criteriaFromConfig } from '../listings/filter.js';
import { createAdapters } from '../scrapers/index.js';
import type { SiteAdapter } from '../scrapers/base.js';
import { RunController } from './run-controller.js';

export { RunController } from './run-controller.js';
export type { RunSummary, RunStatus, DispatchOutcome, SiteReport } from './run-controller.js';

export interface Pipeline {
  controller: RunController;
  store: SeenStore;
  runLog: RunLog;
  close(): void;
}

export interface PipelineOverrides {
  adapters?: SiteAdapter[];
  mailer?: Mailer;
  onDryRun?: (digest: DigestMessage) => void;
}

/**
 * Wire the configured sites, filter, seen store and SMTP mailer into a
 * run controller.
 */
export function createPipeline(config: Config, overrides: PipelineOverrides = {}): Pipeline {
  const store = new SeenStore(config.storage.path);
  const runLog = new RunLog(config.storage.runLogPath);
  let digestMailer: DigestMailer | null = null;
  let mailer: Mailer;
  if (overrides.mailer) {
    mailer = overrides.mailer;
  } else {
    digestMailer = new DigestMailer(config.email);
    mailer = digestMailer;
  }

  const controller = new RunController({
    adapters: overrides.adapters ?? createAdapters(config),
    filter: createListingFilter(criteriaFromConfig(config.search)),
    store,
    history: runLog,
    mailer,
    compose: (novel) => composeDigest(novel, { towns: config.search.towns, fromName: config.email.fromName }),
    concurrency: config.scraper.concurrency,
    siteTimeoutMs: config.scraper.timeoutMs,
    onDryRun: overrides.onDryRun,
  });

  return {
    controller,
    store,
    runLog,
    close: () => {
      digestMailer?.close();
      store.close();
      runLog.close();
    },
  };
}

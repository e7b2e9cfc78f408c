import { Command } from 'commander';
import { loadConfig, type Config } from '../../config.js';
import { createPipeline, type RunSummary } from '../../pipeline/index.js';

export function printSummary(summary: RunSummary): void {
  const icon = summary.status === 'ok' ? '✅' : summary.status === 'error' ? '❌' : '⚠️';
  console.log(`\n${icon} Run ${summary.status} (${summary.startedAt} → ${summary.finishedAt})\n`);

  for (const site of summary.sites) {
    const detail = site.ok ? `${site.listingCount} listings` : `failed: ${site.reason}`;
    console.log(`  ${site.site.padEnd(12)} ${detail}`);
  }

  console.log('');
  console.log(`  Scraped:      ${summary.candidateCount}`);
  console.log(`  Matched:      ${summary.matchedCount}`);
  console.log(`  Already seen: ${summary.alreadySeenCount}`);
  console.log(`  New:          ${summary.novelCount}`);
  console.log(`  Digest:       ${summary.dispatch}${summary.dispatchError ? ` (${summary.dispatchError})` : ''}`);

  if (summary.error) {
    console.log(`\n  Error: ${summary.error}`);
  }
  for (const warning of summary.warnings) {
    console.log(`  Warning: ${warning}`);
  }
  console.log('');
}

export const runCommand = new Command('run')
  .description('Scrape every configured site once and email new matches')
  .option('-c, --config <path>', 'Config file (default: config/config.local.yaml)')
  .option('--dry-run', 'Compose the digest but do not send it or mark listings as seen')
  .option('--json', 'Print the run summary as JSON')
  .action(async (options) => {
    let config: Config;
    try {
      config = loadConfig(options.config);
    } catch (error) {
      console.error('Run failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
    const pipeline = createPipeline(config, {
      onDryRun: (digest) => {
        console.log(`\n[Dry run - digest not sent]\nSubject: ${digest.subject}\n`);
        console.log(digest.text);
      },
    });

    try {
      const summary = await pipeline.controller.runOnce({ dryRun: Boolean(options.dryRun) });
      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        printSummary(summary);
      }
      // Site failures are expected; only an aborted run is an error exit
      process.exitCode = summary.status === 'error' ? 1 : 0;
    } finally {
      pipeline.close();
    }
  });

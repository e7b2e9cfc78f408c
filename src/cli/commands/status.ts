import { Command } from 'commander';
import { loadConfig, type Config } from '../../config.js';
import { RunLog } from '../../database/index.js';
import { SeenStore } from '../../dedup/seen-store.js';

export const statusCommand = new Command('status')
  .description('Show seen listings and recent runs')
  .option('-c, --config <path>', 'Config file (default: config/config.local.yaml)')
  .option('-n, --limit <count>', 'Number of recent runs to show', '10')
  .action((options) => {
    let config: Config;
    try {
      config = loadConfig(options.config);
    } catch (error) {
      console.error('Error getting status:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
    const inspection = new SeenStore(config.storage.path).inspect();
    const runLog = new RunLog(config.storage.runLogPath);

    try {
      if (inspection.anomaly) {
        console.log(`⚠️  Store is unreadable and will be reset on the next run: ${inspection.anomaly.reason}`);
      }

      console.log('\n📊 Apartment Watch Status\n');
      console.log(`Seen listings: ${inspection.size}`);

      if (Object.keys(inspection.bySource).length > 0) {
        console.log('\nBy Source:');
        for (const [source, count] of Object.entries(inspection.bySource)) {
          console.log(`  ${source.padEnd(20)} ${count}`);
        }
      }

      const limit = parseInt(options.limit, 10);
      const runs = runLog.getRecentRuns(Number.isNaN(limit) ? 10 : limit);
      if (runs.length > 0) {
        console.log('\nRecent Runs:');
        for (const run of runs) {
          const failed = run.failedSites.length ? `  failed: ${run.failedSites.join(', ')}` : '';
          console.log(`  ${run.startedAt}  ${run.status.padEnd(8)} ${String(run.novelCount).padStart(3)} new  ${run.dispatch}${failed}`);
        }
      }
      console.log('');
    } catch (error) {
      console.error('Error getting status:', error);
      process.exitCode = 1;
    } finally {
      runLog.close();
    }
  });

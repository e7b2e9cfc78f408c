import { Command } from 'commander';
import { loadConfig, type Config } from '../../config.js';
import { SeenStore } from '../../dedup/seen-store.js';

type CheckResult = {
  label: string;
  status: 'ok' | 'warn' | 'error';
  detail: string;
};

function printResult(result: CheckResult): void {
  const icon = result.status === 'ok' ? '✅' : result.status === 'warn' ? '⚠️' : '❌';
  console.log(`${icon} ${result.label}: ${result.detail}`);
}

export const healthCommand = new Command('health')
  .description('Check configuration, credentials and storage before scheduling')
  .option('-c, --config <path>', 'Config file (default: config/config.local.yaml)')
  .action((options) => {
    const results: CheckResult[] = [];
    let hasError = false;
    let config: Config | null = null;

    // Config check
    try {
      config = loadConfig(options.config);
      results.push({
        label: 'Config',
        status: 'ok',
        detail: `${config.sites.join(', ')} for ${config.search.towns.join(', ')} ($${config.search.priceMin}-$${config.search.priceMax}, ${config.search.bedrooms} bd)`,
      });
    } catch (error) {
      results.push({
        label: 'Config',
        status: 'error',
        detail: error instanceof Error ? error.message : 'Failed to load config',
      });
      hasError = true;
    }

    // Env check
    const requiredEnv = ['EMAIL_USER', 'EMAIL_PASSWORD', 'RECIPIENT_EMAIL'];
    const missingEnv = requiredEnv.filter((key) => !process.env[key]);
    if (missingEnv.length > 0) {
      results.push({
        label: 'Environment',
        status: 'warn',
        detail: `Missing: ${missingEnv.join(', ')} (digests will not be sent)`,
      });
    } else {
      results.push({
        label: 'Environment',
        status: 'ok',
        detail: 'Mail credentials present',
      });
    }

    // Storage check
    if (config) {
      const inspection = new SeenStore(config.storage.path).inspect();
      results.push({
        label: 'Seen store',
        status: inspection.anomaly ? 'warn' : 'ok',
        detail: inspection.anomaly
          ? `Unreadable (${inspection.anomaly.reason}); the next run will move it aside and start empty`
          : `${inspection.size} listings at ${config.storage.path}`,
      });
    }

    console.log('\n🩺 Health Check\n');
    for (const result of results) {
      printResult(result);
    }
    console.log('');

    if (hasError) {
      process.exitCode = 1;
    }
  });

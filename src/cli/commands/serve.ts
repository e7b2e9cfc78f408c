import { Command } from 'commander';
import { loadConfig, type Config } from '../../config.js';
import { createPipeline } from '../../pipeline/index.js';
import { createApp } from '../../server/app.js';
import { startScheduler } from '../../server/scheduler.js';

export const serveCommand = new Command('serve')
  .description('Run on a schedule behind a small health-check server')
  .option('-c, --config <path>', 'Config file (default: config/config.local.yaml)')
  .option('-p, --port <port>', 'Port for the health server (default: $PORT or 5000)')
  .option('--no-run-on-start', 'Wait one interval before the first run')
  .action((options) => {
    let config: Config;
    try {
      config = loadConfig(options.config);
    } catch (error) {
      console.error('Serve failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
    const port = parseInt(options.port || process.env.PORT || '5000', 10);
    if (Number.isNaN(port)) {
      console.error(`Invalid port: ${options.port}`);
      process.exit(1);
    }

    const pipeline = createPipeline(config);
    const app = createApp(pipeline.controller);
    const server = app.listen(port, () => {
      console.log(`[server] apartment-watch listening on http://localhost:${port}`);
    });

    const scheduler = startScheduler(pipeline.controller, {
      intervalMinutes: config.schedule.intervalMinutes,
      runOnStart: config.schedule.runOnStart && options.runOnStart !== false,
    });

    const shutdown = (signal: string): void => {
      console.log(`[server] ${signal} received, shutting down`);
      scheduler.stop();
      server.close(() => {
        pipeline.close();
        process.exit(0);
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

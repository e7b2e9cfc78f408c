import type { RunController } from '../pipeline/run-controller.js';

export interface ScheduleOptions {
  intervalMinutes: number;
  runOnStart: boolean;
}

export interface Scheduler {
  stop(): void;
}

/**
 * Trigger a run every interval (and once right away when asked). Overlapping
 * triggers are skipped by the controller itself.
 */
export function startScheduler(controller: RunController, options: ScheduleOptions): Scheduler {
  const trigger = (): void => {
    controller.runOnce().catch((error: unknown) => {
      console.error('[scheduler] run rejected:', error);
    });
  };

  if (options.runOnStart) trigger();
  const handle = setInterval(trigger, Math.round(options.intervalMinutes * 60_000));
  console.log(`[scheduler] running every ${options.intervalMinutes} min`);

  return {
    stop: () => clearInterval(handle),
  };
}

import type { DedupStore } from '../dedup/seen-store.js';
import { RunController } from '../pipeline/run-controller.js';

/** A controller with no sites and an in-memory store. */
export function idleController(): RunController {
  const store: DedupStore = {
    load: () => ({ size: 0, anomaly: null }),
    partition: (candidates) => ({ novel: [...candidates], alreadySeen: [] }),
    commit: () => undefined,
    save: () => undefined,
  };
  return new RunController({
    adapters: [],
    filter: (listings) => [...listings],
    store,
    mailer: { dispatch: async () => ({ ok: true, messageId: 'unused' }) },
    compose: async () => ({ subject: '', html: '', text: '', attachments: [] }),
  });
}

export { DatabaseClient } from './client.js';
export type { SeenEntry } from './client.js';
export { RunLog } from './run-log.js';
export type { NewRunLogEntry, RunHistory, RunLogEntry } from './run-log.js';

export { MemoryStateStore } from './memory-state-store.js';
export { FileStateStore, type FileStateStoreOptions } from './file-state-store.js';
export { LoggerNotificationSink } from './logger-notification-sink.js';
export {
  CompositeSmokeTestRunner,
  type SmokeCheck,
  type SmokeCheckOutcome,
  type SmokeCheckReport,
} from './composite-smoke-test.js';

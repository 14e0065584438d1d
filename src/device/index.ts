export { configHash, compareSnapshots, changesToSignals } from './config-snapshot.js';
export type { ConfigChange, ConfigChangeType, ConfigDelta } from './config-snapshot.js';

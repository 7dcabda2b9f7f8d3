export { BatchManager, createBatchManager, type BatchManagerOptions } from './batch.service';
export { toOutputRow } from './batch.output';
export { createSessionRegistry, type Session, type SessionRegistry } from './sessions';
export type {
  BatchInput,
  BatchInputLine,
  BatchSettings,
  BatchSnapshot,
  ManualMappingInput,
  OutputRow,
  Row,
  RunSummary,
} from './batch.types';

import type { TransferPreferences } from './transfer-gateway.js';
import type { TransferJob } from './transfer-job.js';

export interface TransferRepository {
  /** Queued jobs that were never admitted, in insertion order. */
  listNonTerminalPending: () => TransferJob[];
  /** Jobs that should still be owned by the external subsystem. */
  listInFlight: () => TransferJob[];
  findByCorrelationTag: (tag: string) => TransferJob | undefined;
  findById: (id: string) => TransferJob | undefined;
  insert: (job: TransferJob) => void;
  update: (job: TransferJob) => void;
  delete: (job: TransferJob) => void;
  commit: () => void;
}

export interface TransferCoordinatorConfig {
  maxActiveTransfers: number;
  transferPreferences: TransferPreferences;
}

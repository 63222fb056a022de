import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import Database from 'better-sqlite3';
import { TransferJob, type TransferBehaviors, type TransferDirection, type TransferJobSnapshot } from './runtime/transfer-job.js';
import { isInFlightStatus, isTransferStatus, type TransferStatus } from './runtime/transfer-status.js';
import type { TransferRepository } from './runtime/types.js';

interface TransferRow {
  transferId: string;
  direction: string;
  remoteUrl: string;
  localPath: string;
  filename: string;
  externalRequestId: string;
  status: string;
  totalBytes: number;
  transferredBytes: number;
  isIndeterminate: number;
  progressFraction: number;
}

interface StagedChange {
  type: 'insert' | 'update' | 'delete';
  job: TransferJob;
}

export interface TransferDatabase extends TransferRepository {
  connection: Database.Database;
  initialize: () => void;
  close: () => void;
}

const SELECT_COLUMNS = `
  transfer_id AS transferId,
  direction,
  remote_url AS remoteUrl,
  local_path AS localPath,
  filename,
  external_request_id AS externalRequestId,
  status,
  total_bytes AS totalBytes,
  transferred_bytes AS transferredBytes,
  is_indeterminate AS isIndeterminate,
  progress_fraction AS progressFraction
`;

function ensureDirectory(sqlitePath: string): string {
  const absolutePath = resolve(sqlitePath);
  mkdirSync(dirname(absolutePath), { recursive: true });
  return absolutePath;
}

function parseDirection(value: string): TransferDirection {
  if (value === 'download' || value === 'upload') {
    return value;
  }
  throw new Error(`Invalid transfer row: unknown direction ${value}`);
}

function parseStatus(value: string): TransferStatus {
  if (!isTransferStatus(value)) {
    throw new Error(`Invalid transfer row: unknown status ${value}`);
  }
  return value;
}

type TransferParameters = Record<keyof TransferRow, string | number>;

function toParameters(snapshot: TransferJobSnapshot): TransferParameters {
  return {
    transferId: snapshot.id,
    direction: snapshot.direction,
    remoteUrl: snapshot.remoteUrl,
    localPath: snapshot.localPath,
    filename: snapshot.filename,
    externalRequestId: snapshot.externalRequestId,
    status: snapshot.status,
    totalBytes: snapshot.totalBytes,
    transferredBytes: snapshot.transferredBytes,
    isIndeterminate: snapshot.isIndeterminate ? 1 : 0,
    progressFraction: snapshot.progressFraction,
  };
}

/**
 * SQLite-backed transfer repository. Rows are materialized once per id, so every caller
 * shares the same `TransferJob` instance. Changes are staged and written by `commit()`.
 */
export function createTransferDatabase(sqlitePath: string, behaviors: TransferBehaviors): TransferDatabase {
  const db = new Database(sqlitePath === ':memory:' ? sqlitePath : ensureDirectory(sqlitePath));
  const jobs = new Map<string, TransferJob>();
  const unsubscribers = new Map<string, () => void>();
  const staged = new Map<string, StagedChange>();

  const stage = (change: StagedChange): void => {
    const previous = staged.get(change.job.id)?.type;
    if (change.type === 'update' && (previous === 'insert' || previous === 'delete')) {
      return;
    }
    staged.set(change.job.id, change);
  };

  const track = (job: TransferJob): void => {
    if (unsubscribers.has(job.id)) {
      return;
    }

    unsubscribers.set(
      job.id,
      job.subscribe(() => {
        if (jobs.get(job.id) === job) {
          stage({ type: 'update', job });
        }
      }),
    );
  };

  const untrack = (job: TransferJob): void => {
    unsubscribers.get(job.id)?.();
    unsubscribers.delete(job.id);
    jobs.delete(job.id);
  };

  const hydrate = (row: TransferRow): TransferJob => {
    const existing = jobs.get(row.transferId);
    if (existing) {
      return existing;
    }

    const job = new TransferJob(
      {
        id: row.transferId,
        direction: parseDirection(row.direction),
        remoteUrl: row.remoteUrl,
        localPath: row.localPath,
        filename: row.filename,
        externalRequestId: row.externalRequestId,
        status: parseStatus(row.status),
        totalBytes: row.totalBytes,
        transferredBytes: row.transferredBytes,
        isIndeterminate: row.isIndeterminate === 1,
        progressFraction: row.progressFraction,
      },
      behaviors,
    );
    jobs.set(job.id, job);
    track(job);
    return job;
  };

  const selectAll = (): TransferJob[] => {
    const rows = db.prepare<[], TransferRow>(`SELECT ${SELECT_COLUMNS} FROM transfers ORDER BY id ASC`).all();
    return rows.map(hydrate).filter((job) => staged.get(job.id)?.type !== 'delete');
  };

  const findById = (id: string): TransferJob | undefined => {
    if (staged.get(id)?.type === 'insert') {
      return undefined;
    }

    const cached = jobs.get(id);
    if (cached) {
      return cached;
    }

    const row = db.prepare<[string], TransferRow>(`SELECT ${SELECT_COLUMNS} FROM transfers WHERE transfer_id = ?`).get(id);
    return row ? hydrate(row) : undefined;
  };

  return {
    connection: db,
    initialize: () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS transfers (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          transfer_id TEXT NOT NULL UNIQUE,
          direction TEXT NOT NULL,
          remote_url TEXT NOT NULL,
          local_path TEXT NOT NULL,
          filename TEXT NOT NULL,
          external_request_id TEXT NOT NULL DEFAULT '',
          status TEXT NOT NULL,
          total_bytes INTEGER NOT NULL DEFAULT -1,
          transferred_bytes INTEGER NOT NULL DEFAULT 0,
          is_indeterminate INTEGER NOT NULL DEFAULT 1,
          progress_fraction REAL NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
          updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
        );

        CREATE INDEX IF NOT EXISTS transfers_status ON transfers (status);
      `);
    },
    listNonTerminalPending: () => selectAll().filter((job) => job.status === 'Queued'),
    listInFlight: () =>
      selectAll().filter(
        (job) => job.externalRequestId !== '' && (isInFlightStatus(job.status) || job.status === 'None'),
      ),
    findByCorrelationTag: (tag) => findById(tag),
    findById,
    insert: (job) => {
      if (jobs.has(job.id)) {
        throw new Error(`Transfer already exists: ${job.id}`);
      }
      jobs.set(job.id, job);
      track(job);
      stage({ type: 'insert', job });
    },
    update: (job) => {
      if (jobs.get(job.id) !== job) {
        throw new Error(`Transfer is not tracked: ${job.id}`);
      }
      stage({ type: 'update', job });
    },
    delete: (job) => {
      if (jobs.get(job.id) !== job) {
        return;
      }
      if (staged.get(job.id)?.type === 'insert') {
        staged.delete(job.id);
        untrack(job);
        return;
      }
      stage({ type: 'delete', job });
    },
    commit: () => {
      if (staged.size === 0) {
        return;
      }

      const changes = [...staged.values()];
      const insert = db.prepare<[TransferParameters], unknown>(`
        INSERT INTO transfers (
          transfer_id, direction, remote_url, local_path, filename, external_request_id,
          status, total_bytes, transferred_bytes, is_indeterminate, progress_fraction
        )
        VALUES (
          @transferId, @direction, @remoteUrl, @localPath, @filename, @externalRequestId,
          @status, @totalBytes, @transferredBytes, @isIndeterminate, @progressFraction
        )
      `);
      const update = db.prepare<[TransferParameters], unknown>(`
        UPDATE transfers SET
          direction = @direction,
          remote_url = @remoteUrl,
          local_path = @localPath,
          filename = @filename,
          external_request_id = @externalRequestId,
          status = @status,
          total_bytes = @totalBytes,
          transferred_bytes = @transferredBytes,
          is_indeterminate = @isIndeterminate,
          progress_fraction = @progressFraction,
          updated_at = CURRENT_TIMESTAMP
        WHERE transfer_id = @transferId
      `);
      const remove = db.prepare<[string], unknown>('DELETE FROM transfers WHERE transfer_id = ?');

      db.transaction(() => {
        for (const change of changes) {
          if (change.type === 'insert') {
            insert.run(toParameters(change.job.toSnapshot()));
          } else if (change.type === 'update') {
            update.run(toParameters(change.job.toSnapshot()));
          } else {
            remove.run(change.job.id);
          }
        }
      })();

      staged.clear();
      for (const change of changes) {
        if (change.type === 'delete') {
          untrack(change.job);
        }
      }
    },
    close: () => {
      for (const unsubscribe of unsubscribers.values()) {
        unsubscribe();
      }
      unsubscribers.clear();
      jobs.clear();
      db.close();
    },
  };
}

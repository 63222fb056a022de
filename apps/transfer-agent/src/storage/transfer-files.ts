import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { mkdir, rename, rm } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { TransferLog } from '../log/transfer-log.js';
import { STAGING_DIRECTORY, type TransferBehaviors, type TransferJob } from '../runtime/transfer-job.js';

export interface TransferFileStore {
  rootPath: string;
  /** Absolute path for a location relative to the transfers root. */
  resolveLocation: (location: string) => string;
  ensureStagingRoot: () => void;
  behaviors: TransferBehaviors;
}

export function resolveTransferLocation(rootPath: string, location: string): string {
  return resolve(rootPath, location.replace(/^\/+/, ''));
}

export function createTransferFileStore(transfersRootPath: string, log?: TransferLog): TransferFileStore {
  const rootPath = resolve(transfersRootPath);
  const resolveLocation = (location: string): string => resolveTransferLocation(rootPath, location);

  const stagedPath = (job: TransferJob): string => resolveLocation(job.transferLocation);
  const finalPath = (job: TransferJob): string => resolveLocation(job.fullLocalPath);

  const behaviors: TransferBehaviors = {
    download: {
      prepare: (job) => {
        mkdirSync(dirname(stagedPath(job)), { recursive: true });
      },
      finalize: async (job) => {
        const source = stagedPath(job);
        if (!existsSync(source)) {
          log?.warn('files', `Downloaded file is missing: ${job.transferLocation}`, { transferId: job.id });
          return false;
        }

        const target = finalPath(job);
        await mkdir(dirname(target), { recursive: true });
        await rm(target, { force: true });
        await rename(source, target);
        log?.info('files', `Moved download into place: ${job.fullLocalPath}`, { transferId: job.id });
        return true;
      },
    },
    upload: {
      prepare: (job) => {
        const source = finalPath(job);
        if (!existsSync(source)) {
          throw new Error(`Upload source does not exist: ${job.fullLocalPath}`);
        }

        const target = stagedPath(job);
        mkdirSync(dirname(target), { recursive: true });
        copyFileSync(source, target);
      },
      finalize: async (job) => {
        await rm(stagedPath(job), { force: true });
        return true;
      },
    },
  };

  return {
    rootPath,
    resolveLocation,
    ensureStagingRoot: () => {
      mkdirSync(resolveLocation(STAGING_DIRECTORY), { recursive: true });
    },
    behaviors,
  };
}

import { describeError, TransferLog } from '../log/transfer-log.js';
import { resolveStatusReport, UnhandledTransferStatusError, type CompletionOutcome } from './status-machine.js';
import {
  TransferGatewayError,
  type GatewayRequest,
  type GatewayRequestInit,
  type TransferGateway,
} from './transfer-gateway.js';
import type { TransferJob } from './transfer-job.js';
import { isAbsoluteUrl, isWellFormedRelativePath } from './transfer-paths.js';
import { TransferQueue } from './transfer-queue.js';
import { isTerminalStatus } from './transfer-status.js';
import type { TransferCoordinatorConfig, TransferRepository } from './types.js';

export interface TransferCoordinator {
  enqueue: (job: TransferJob) => void;
  enqueueFront: (job: TransferJob) => void;
  enqueueBatch: (jobs: TransferJob[]) => void;
  cancel: (job: TransferJob) => void;
  cancelAll: () => void;
  runAdmissionLoop: () => void;
  admit: (job: TransferJob) => boolean;
  removeExternalRequest: (requestId: string) => boolean;
  /** Throws `UnhandledTransferStatusError` for success codes other than 200/206. */
  processTransfer: (request: GatewayRequest) => void;
  getActiveCount: () => number;
  getQueuedJobs: () => TransferJob[];
  /** Resolves once every pending completion hook has settled. */
  drain: () => Promise<void>;
}

export interface TransferCoordinatorOptions {
  gateway: TransferGateway;
  repository: TransferRepository;
  config: TransferCoordinatorConfig;
  log?: TransferLog;
}

function describeSubmitError(error: unknown): string {
  if (error instanceof TransferGatewayError) {
    return `${error.code}: ${error.message}`;
  }
  return describeError(error);
}

export function createTransferCoordinator(options: TransferCoordinatorOptions): TransferCoordinator {
  const { gateway, repository, config } = options;
  const log = options.log ?? new TransferLog();
  const queue = new TransferQueue();
  const pendingCompletions = new Set<Promise<void>>();
  const completingJobIds = new Set<string>();
  let activeCount = 0;
  let admitting = false;

  const finishTransfer = async (job: TransferJob): Promise<void> => {
    try {
      await job.onComplete();
      log.info('coordinator', `Transfer finished as ${job.status}`, { transferId: job.id });
    } catch (error) {
      log.error('coordinator', `Completion hook failed: ${describeError(error)}`, { transferId: job.id });
    }

    try {
      repository.commit();
    } catch (error) {
      log.error('repository', `Unable to persist completed transfer: ${describeError(error)}`, {
        transferId: job.id,
      });
    } finally {
      completingJobIds.delete(job.id);
    }
  };

  const settle = (job: TransferJob, outcome: CompletionOutcome): void => {
    switch (outcome.kind) {
      case 'succeeded': {
        // onComplete runs once per job, even if the gateway repeats its final report.
        if (completingJobIds.has(job.id)) {
          return;
        }
        completingJobIds.add(job.id);
        const completion = finishTransfer(job);
        pendingCompletions.add(completion);
        void completion.then(() => pendingCompletions.delete(completion));
        return;
      }
      case 'failed':
        job.setStatus(outcome.status);
        return;
      case 'unhandled':
        throw new UnhandledTransferStatusError(outcome.statusCode);
    }
  };

  const removeExternalRequest = (requestId: string): boolean => {
    if (!requestId) {
      return false;
    }

    const request = gateway.find(requestId);
    if (!request) {
      return false;
    }

    try {
      gateway.remove(request);
    } catch (error) {
      if (error instanceof TransferGatewayError && error.code === 'ALREADY_CANCELLED') {
        log.debug('coordinator', `Transfer request ${requestId} was already removed`, { transferId: request.tag });
      } else {
        log.error('coordinator', `Unable to remove transfer request ${requestId}: ${describeError(error)}`, {
          transferId: request.tag,
        });
      }
      return false;
    }

    activeCount -= 1;
    return true;
  };

  const attach = (request: GatewayRequest, job: TransferJob): void => {
    request.onProgress((bytesTransferred, totalBytes) => {
      job.applyProgress(bytesTransferred, totalBytes);
    });
    request.onStatusChanged((changed) => {
      processTransfer(changed);
    });
  };

  const admit = (job: TransferJob): boolean => {
    if (!job.id || !isAbsoluteUrl(job.remoteUrl) || !isWellFormedRelativePath(job.fullLocalPath)) {
      log.warn('coordinator', `Malformed transfer rejected (${job.remoteUrl} -> ${job.fullLocalPath})`, {
        transferId: job.id,
      });
      return false;
    }

    const init: GatewayRequestInit =
      job.method === 'GET'
        ? {
            tag: job.id,
            method: job.method,
            remoteUrl: job.remoteUrl,
            downloadLocation: job.transferLocation,
            transferPreferences: config.transferPreferences,
          }
        : {
            tag: job.id,
            method: job.method,
            remoteUrl: job.remoteUrl,
            uploadLocation: job.transferLocation,
            transferPreferences: config.transferPreferences,
          };

    try {
      job.onBeforeAdmit();
    } catch (error) {
      log.warn('coordinator', `Unable to prepare transfer: ${describeError(error)}`, { transferId: job.id });
      return false;
    }

    let request: GatewayRequest;
    try {
      request = gateway.submit(init);
    } catch (error) {
      log.warn('coordinator', `Unable to start transfer: ${describeSubmitError(error)}`, { transferId: job.id });
      return false;
    }

    job.setExternalRequestId(request.requestId);
    activeCount += 1;
    attach(request, job);
    log.info('coordinator', `Admitted ${job.method} ${job.remoteUrl} as ${request.requestId}`, { transferId: job.id });
    return true;
  };

  const runAdmissionLoop = (): void => {
    // A pass already running re-checks the ceiling and the queue after each admission,
    // so calls arriving from listeners or gateway callbacks meanwhile have nothing left to do.
    if (admitting) {
      return;
    }

    admitting = true;
    try {
      while (activeCount < config.maxActiveTransfers && queue.getSize() > 0) {
        const job = queue.dequeue();
        if (!job) {
          break;
        }

        const admitted = admit(job);
        if (!admitted && job.status === 'Queued') {
          job.setStatus('Failed');
        }
      }
    } finally {
      admitting = false;
    }
  };

  const processTransfer = (request: GatewayRequest): void => {
    const resolution = resolveStatusReport(request);
    if (resolution.kind === 'ignore') {
      return;
    }

    const job = repository.findByCorrelationTag(request.tag);
    if (!job) {
      log.warn('coordinator', `Removing orphaned transfer request ${request.requestId}`, { transferId: request.tag });
      removeExternalRequest(request.requestId);
      runAdmissionLoop();
      return;
    }

    try {
      if (resolution.kind === 'transition') {
        if (!isTerminalStatus(job.status)) {
          job.setStatus(resolution.status);
        }
        return;
      }

      removeExternalRequest(request.requestId);
      runAdmissionLoop();

      if (!isTerminalStatus(job.status)) {
        settle(job, resolution.outcome);
      }
    } finally {
      repository.commit();
    }
  };

  const enqueue = (job: TransferJob): void => {
    job.resetProgress();
    queue.enqueue(job);
    job.setStatus('Queued');
    runAdmissionLoop();
    repository.commit();
  };

  const cancel = (job: TransferJob): void => {
    if (queue.remove(job)) {
      job.setStatus('Canceled');
      repository.commit();
      return;
    }

    // Admitted jobs stay Queued until the gateway first reports on them.
    if (!job.externalRequestId || job.status === 'None' || isTerminalStatus(job.status)) {
      return;
    }

    // The gateway answers with a Completed report carrying a cancellation error.
    removeExternalRequest(job.externalRequestId);
  };

  const reconcile = (): void => {
    const requests = gateway.listRequests();
    const knownRequestIds = new Set(requests.map((request) => request.requestId));
    const lostJobs = repository.listInFlight().filter((job) => !knownRequestIds.has(job.externalRequestId));
    activeCount = requests.length;

    for (const request of requests) {
      const job = repository.findByCorrelationTag(request.tag);
      if (!job) {
        log.warn('coordinator', `Removing orphaned transfer request ${request.requestId}`, { transferId: request.tag });
        removeExternalRequest(request.requestId);
        continue;
      }

      attach(request, job);
      processTransfer(request);
    }

    for (const job of repository.listNonTerminalPending()) {
      queue.enqueue(job);
    }

    for (const job of lostJobs.reverse()) {
      log.warn('coordinator', `Transfer request ${job.externalRequestId} is gone, requeueing`, { transferId: job.id });
      job.setExternalRequestId('');
      queue.enqueueFront(job);
      job.setStatus('Queued');
    }

    runAdmissionLoop();
    repository.commit();
  };

  reconcile();

  return {
    enqueue,
    enqueueFront: (job) => {
      queue.enqueueFront(job);
      job.setStatus('Queued');
      runAdmissionLoop();
      repository.commit();
    },
    enqueueBatch: (jobs) => {
      for (const job of jobs) {
        job.resetProgress();
        queue.enqueue(job);
        job.setStatus('Queued');
      }
      runAdmissionLoop();
      repository.commit();
    },
    cancel,
    cancelAll: () => {
      for (const job of queue.toArray()) {
        cancel(job);
      }

      for (const request of gateway.listRequests()) {
        const job = repository.findByCorrelationTag(request.tag);
        if (job) {
          cancel(job);
        }
      }
    },
    runAdmissionLoop,
    admit,
    removeExternalRequest,
    processTransfer,
    getActiveCount: () => activeCount,
    getQueuedJobs: () => queue.toArray(),
    drain: async () => {
      await Promise.all([...pendingCompletions]);
    },
  };
}

import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { describeError, type TransferLog } from '../log/transfer-log.js';
import { resolveTransferLocation } from '../storage/transfer-files.js';
import {
  TransferGatewayError,
  type GatewayRequest,
  type GatewayRequestInit,
  type ProgressListener,
  type StatusListener,
  type TransferGateway,
  type TransferMethod,
} from './transfer-gateway.js';
import type { GatewayTransferStatus } from './transfer-status.js';

export type FetchLike = (
  url: string,
  init: { method: TransferMethod; body?: Uint8Array; signal: AbortSignal },
) => Promise<Response>;

export interface HttpTransferGatewayConfig {
  rootPath: string;
  enabled: boolean;
  maxRequests: number;
  maxRetries: number;
  retryDelayMs: number;
  fetch?: FetchLike;
}

export interface HttpTransferGateway extends TransferGateway {
  /** Aborts all work without reporting further status changes. */
  close: () => void;
}

interface TrackedRequest {
  request: GatewayRequest;
  controller: AbortController;
  progressListeners: Set<ProgressListener>;
  statusListeners: Set<StatusListener>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isDiskFullError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOSPC';
}

function parseContentLength(value: string | null): number {
  if (value === null) {
    return -1;
  }
  const length = Number(value);
  return Number.isInteger(length) && length >= 0 ? length : -1;
}

export function createHttpTransferGateway(
  config: HttpTransferGatewayConfig,
  hooks: {
    onError: (error: Error) => void;
    log?: TransferLog;
  },
): HttpTransferGateway {
  const fetchImpl: FetchLike = config.fetch ?? ((url, init) => fetch(url, init));
  const requests = new Map<string, TrackedRequest>();
  let closed = false;

  const notify = (callback: () => void): void => {
    if (closed) {
      return;
    }
    try {
      callback();
    } catch (error) {
      hooks.onError(toError(error));
    }
  };

  const reportProgress = (tracked: TrackedRequest, bytesTransferred: number, totalBytes: number): void => {
    tracked.request.bytesTransferred = bytesTransferred;
    tracked.request.totalBytes = totalBytes;
    for (const listener of [...tracked.progressListeners]) {
      notify(() => listener(bytesTransferred, totalBytes));
    }
  };

  const reportStatus = (
    tracked: TrackedRequest,
    status: GatewayTransferStatus,
    statusCode: number,
    error?: Error,
  ): void => {
    tracked.request.status = status;
    tracked.request.statusCode = statusCode;
    tracked.request.error = error;
    for (const listener of [...tracked.statusListeners]) {
      notify(() => listener(tracked.request));
    }
  };

  const reportCanceled = async (tracked: TrackedRequest, target: string, statusCode: number): Promise<void> => {
    if (tracked.request.method === 'GET') {
      await rm(target, { force: true });
    }
    reportStatus(
      tracked,
      'Completed',
      statusCode,
      new TransferGatewayError('REQUEST_CANCELED', 'The request has previously been cancelled.'),
    );
  };

  const download = async (tracked: TrackedRequest, response: Response, target: string): Promise<void> => {
    const totalBytes = parseContentLength(response.headers.get('content-length'));
    await mkdir(dirname(target), { recursive: true });
    const file = await open(target, 'w');

    try {
      reportProgress(tracked, 0, totalBytes);
      if (!response.body) {
        return;
      }

      const reader = response.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        const chunk: Uint8Array = value;
        await file.write(chunk);
        reportProgress(tracked, tracked.request.bytesTransferred + chunk.byteLength, totalBytes);
      }
    } finally {
      await file.close();
    }
  };

  const run = async (tracked: TrackedRequest): Promise<void> => {
    const { request, controller } = tracked;
    const target = resolveTransferLocation(config.rootPath, request.location);

    for (let attempt = 0; ; attempt += 1) {
      reportStatus(tracked, 'Transferring', request.statusCode);

      let response: Response;
      let body: Uint8Array | undefined;
      try {
        body = request.method === 'POST' ? await readFile(target) : undefined;
        response = await fetchImpl(request.remoteUrl, { method: request.method, body, signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted) {
          await reportCanceled(tracked, target, 0);
          return;
        }
        reportStatus(tracked, 'Completed', 0, new TransferGatewayError('TRANSPORT_ERROR', describeError(error)));
        return;
      }

      if (response.status >= 500 && response.status <= 599 && attempt < config.maxRetries) {
        hooks.log?.debug('gateway', `Server answered ${response.status}, retrying in ${config.retryDelayMs}ms`, {
          transferId: request.tag,
        });
        await response.body?.cancel();
        reportStatus(tracked, 'Waiting', response.status);
        try {
          await sleep(config.retryDelayMs, undefined, { signal: controller.signal });
        } catch (error) {
          if (!controller.signal.aborted) {
            throw error;
          }
          await reportCanceled(tracked, target, response.status);
          return;
        }
        continue;
      }

      if (response.status < 200 || response.status > 299) {
        await response.body?.cancel();
        reportStatus(
          tracked,
          'Completed',
          response.status,
          new TransferGatewayError('HTTP_ERROR', `${request.method} ${request.remoteUrl} answered ${response.status}`),
        );
        return;
      }

      try {
        if (request.method === 'GET') {
          await download(tracked, response, target);
        } else {
          const size = body?.byteLength ?? 0;
          reportProgress(tracked, size, size);
        }
      } catch (error) {
        if (controller.signal.aborted) {
          await reportCanceled(tracked, target, response.status);
          return;
        }
        const code = isDiskFullError(error) ? 'INSUFFICIENT_STORAGE' : 'TRANSPORT_ERROR';
        reportStatus(tracked, 'Completed', response.status, new TransferGatewayError(code, describeError(error)));
        return;
      }

      reportStatus(tracked, 'Completed', response.status);
      return;
    }
  };

  return {
    listRequests: () => [...requests.values()].map((tracked) => tracked.request),
    submit: (init: GatewayRequestInit) => {
      if (!config.enabled || closed) {
        throw new TransferGatewayError('SYSTEM_DISABLED', 'Background transfers are disabled');
      }

      const location = init.method === 'GET' ? init.downloadLocation : init.uploadLocation;
      if (!location) {
        throw new TransferGatewayError('INVALID_REQUEST', `A ${init.method} request needs a transfer location`);
      }

      for (const tracked of requests.values()) {
        if (tracked.request.location === location && tracked.request.status !== 'Completed') {
          throw new TransferGatewayError('DUPLICATE_REQUEST', `A request for ${location} is already active`);
        }
      }

      if (requests.size >= config.maxRequests) {
        throw new TransferGatewayError('CAPACITY_EXCEEDED', `The request limit of ${config.maxRequests} has been reached`);
      }

      const progressListeners = new Set<ProgressListener>();
      const statusListeners = new Set<StatusListener>();
      const request: GatewayRequest = {
        requestId: randomUUID(),
        tag: init.tag,
        method: init.method,
        remoteUrl: init.remoteUrl,
        location,
        transferPreferences: init.transferPreferences,
        status: 'None',
        statusCode: 0,
        error: undefined,
        bytesTransferred: 0,
        totalBytes: -1,
        onProgress: (listener) => {
          progressListeners.add(listener);
          return () => {
            progressListeners.delete(listener);
          };
        },
        onStatusChanged: (listener) => {
          statusListeners.add(listener);
          return () => {
            statusListeners.delete(listener);
          };
        },
      };

      const tracked: TrackedRequest = {
        request,
        controller: new AbortController(),
        progressListeners,
        statusListeners,
      };
      requests.set(request.requestId, tracked);

      setImmediate(() => {
        run(tracked).catch((error: unknown) => {
          hooks.onError(toError(error));
        });
      });

      return request;
    },
    find: (requestId) => requests.get(requestId)?.request,
    remove: (request) => {
      const tracked = requests.get(request.requestId);
      if (!tracked) {
        throw new TransferGatewayError('ALREADY_CANCELLED', 'The request has previously been cancelled.');
      }

      requests.delete(request.requestId);
      if (tracked.request.status !== 'Completed') {
        tracked.controller.abort();
      }
    },
    close: () => {
      closed = true;
      for (const tracked of requests.values()) {
        tracked.controller.abort();
      }
      requests.clear();
    },
  };
}

import { isCancellationError, type TransferStatusReport } from './transfer-gateway.js';
import type { TransferStatus } from './transfer-status.js';

export type CompletionOutcome =
  | { kind: 'succeeded' }
  | { kind: 'failed'; status: Extract<TransferStatus, 'Failed' | 'FailedServer' | 'Canceled'> }
  | { kind: 'unhandled'; statusCode: number };

export type StatusResolution =
  | { kind: 'ignore' }
  | { kind: 'transition'; status: TransferStatus }
  | { kind: 'completed'; outcome: CompletionOutcome };

export class UnhandledTransferStatusError extends Error {
  constructor(public statusCode: number) {
    super(`Unhandled successful transfer status: ${statusCode}`);
    this.name = 'UnhandledTransferStatusError';
  }
}

function isServerError(statusCode: number): boolean {
  return statusCode >= 500 && statusCode <= 599;
}

function isClientError(statusCode: number): boolean {
  return statusCode >= 400 && statusCode <= 499;
}

export function classifyCompletion(report: TransferStatusReport): CompletionOutcome {
  if (!report.error) {
    if (report.statusCode === 200 || report.statusCode === 206) {
      return { kind: 'succeeded' };
    }
    // Redirects are followed by the gateway, so any other success code is unexpected.
    return { kind: 'unhandled', statusCode: report.statusCode };
  }

  if (isCancellationError(report.error)) {
    return { kind: 'failed', status: 'Canceled' };
  }
  if (isClientError(report.statusCode)) {
    return { kind: 'failed', status: 'Failed' };
  }
  if (isServerError(report.statusCode)) {
    return { kind: 'failed', status: 'FailedServer' };
  }

  // 0 means the request never got a response (malformed URI, network down).
  return { kind: 'failed', status: 'Failed' };
}

export function resolveStatusReport(report: TransferStatusReport): StatusResolution {
  switch (report.status) {
    case 'None':
    case 'Paused':
    case 'Transferring':
    case 'WaitingForExternalPower':
    case 'WaitingForExternalPowerDueToBatterySaverMode':
    case 'WaitingForNonVoiceBlockingNetwork':
      return { kind: 'transition', status: report.status };
    case 'Waiting':
      return {
        kind: 'transition',
        status: isServerError(report.statusCode) ? 'WaitingForRetry' : 'Waiting',
      };
    case 'WaitingForWiFi':
      // Wi-Fi waits surface as None, not WaitingForWiFi.
      return { kind: 'transition', status: 'None' };
    case 'Unknown':
      // The handle is no longer usable once the subsystem loses track of it.
      return { kind: 'ignore' };
    case 'Completed':
      return { kind: 'completed', outcome: classifyCompletion(report) };
  }
}

import type { GatewayTransferStatus } from './transfer-status.js';

export type TransferMethod = 'GET' | 'POST';

export type TransferPreferences = 'none' | 'allowCellular' | 'allowBattery' | 'allowCellularAndBattery';

export const TRANSFER_PREFERENCES: TransferPreferences[] = [
  'none',
  'allowCellular',
  'allowBattery',
  'allowCellularAndBattery',
];

export type TransferGatewayErrorCode =
  | 'CAPACITY_EXCEEDED'
  | 'DUPLICATE_REQUEST'
  | 'SYSTEM_DISABLED'
  | 'INSUFFICIENT_STORAGE'
  | 'TRANSPORT_ERROR'
  | 'HTTP_ERROR'
  | 'REQUEST_CANCELED'
  | 'ALREADY_CANCELLED'
  | 'INVALID_REQUEST';

export class TransferGatewayError extends Error {
  constructor(
    public code: TransferGatewayErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TransferGatewayError';
  }
}

export function isCancellationError(error: Error | undefined): boolean {
  return error instanceof TransferGatewayError && error.code === 'REQUEST_CANCELED';
}

export interface TransferStatusReport {
  status: GatewayTransferStatus;
  /** HTTP status code of the last response; 0 when no response was received. */
  statusCode: number;
  error?: Error;
}

export type ProgressListener = (bytesTransferred: number, totalBytes: number) => void;

export type StatusListener = (request: GatewayRequest) => void;

export interface GatewayRequestInit {
  tag: string;
  method: TransferMethod;
  remoteUrl: string;
  downloadLocation?: string;
  uploadLocation?: string;
  transferPreferences: TransferPreferences;
}

export interface GatewayRequest extends TransferStatusReport {
  readonly requestId: string;
  readonly tag: string;
  readonly method: TransferMethod;
  readonly remoteUrl: string;
  readonly location: string;
  readonly transferPreferences: TransferPreferences;
  bytesTransferred: number;
  totalBytes: number;
  onProgress: (listener: ProgressListener) => () => void;
  onStatusChanged: (listener: StatusListener) => () => void;
}

export interface TransferGateway {
  listRequests: () => GatewayRequest[];
  /** Throws `TransferGatewayError` when the request cannot be registered. */
  submit: (init: GatewayRequestInit) => GatewayRequest;
  find: (requestId: string) => GatewayRequest | undefined;
  /** Throws `TransferGatewayError` with `ALREADY_CANCELLED` if the request was removed before. */
  remove: (request: GatewayRequest) => void;
}

export const TRANSFER_STATUSES = [
  'None',
  'Queued',
  'Transferring',
  'Waiting',
  'WaitingForRetry',
  'WaitingForWiFi',
  'WaitingForExternalPower',
  'WaitingForExternalPowerDueToBatterySaverMode',
  'WaitingForNonVoiceBlockingNetwork',
  'Paused',
  'Completed',
  'Failed',
  'FailedServer',
  'Canceled',
] as const;

export type TransferStatus = (typeof TRANSFER_STATUSES)[number];

export type TerminalTransferStatus = Extract<TransferStatus, 'Completed' | 'Failed' | 'FailedServer' | 'Canceled'>;

/** Statuses reported by the external transfer subsystem. */
export type GatewayTransferStatus =
  | 'None'
  | 'Transferring'
  | 'Waiting'
  | 'WaitingForWiFi'
  | 'WaitingForExternalPower'
  | 'WaitingForExternalPowerDueToBatterySaverMode'
  | 'WaitingForNonVoiceBlockingNetwork'
  | 'Paused'
  | 'Completed'
  | 'Unknown';

const TERMINAL_STATUSES: ReadonlySet<TransferStatus> = new Set<TransferStatus>([
  'Completed',
  'Failed',
  'FailedServer',
  'Canceled',
]);

export function isTransferStatus(value: unknown): value is TransferStatus {
  return typeof value === 'string' && TRANSFER_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: TransferStatus): status is TerminalTransferStatus {
  return TERMINAL_STATUSES.has(status);
}

/** True for statuses held while the external subsystem owns the request. */
export function isInFlightStatus(status: TransferStatus): boolean {
  return status !== 'None' && status !== 'Queued' && !isTerminalStatus(status);
}

import { randomUUID } from 'node:crypto';
import type { TransferMethod } from './transfer-gateway.js';
import { isAbsoluteUrl, isWellFormedRelativePath, normalizeLocalPath } from './transfer-paths.js';
import type { TransferStatus } from './transfer-status.js';

export type TransferDirection = 'download' | 'upload';

export const STAGING_DIRECTORY = 'shared/transfers';

export type TransferValidationErrorCode = 'INVALID_REMOTE_URL' | 'INVALID_LOCAL_PATH' | 'INVALID_FILENAME';

export class TransferValidationError extends Error {
  constructor(
    public code: TransferValidationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TransferValidationError';
  }
}

/** Direction-specific work run around the external transfer. */
export interface TransferBehavior {
  /** Runs synchronously right before submission; throwing aborts admission. */
  prepare: (job: TransferJob) => void;
  /** Places the transferred file; resolves false when the result is unusable. */
  finalize: (job: TransferJob) => Promise<boolean>;
}

export type TransferBehaviors = Record<TransferDirection, TransferBehavior>;

export type TransferJobChange =
  | { field: 'status'; job: TransferJob; previous: TransferStatus; next: TransferStatus }
  | { field: 'progress' | 'remoteUrl' | 'localPath' | 'filename' | 'externalRequestId'; job: TransferJob };

export type StatusChangeListener = (previous: TransferStatus, next: TransferStatus, job: TransferJob) => void;

export interface TransferJobInit {
  id?: string;
  direction: TransferDirection;
  remoteUrl: string;
  localPath: string;
  filename: string;
  externalRequestId?: string;
  status?: TransferStatus;
  totalBytes?: number;
  transferredBytes?: number;
  isIndeterminate?: boolean;
  progressFraction?: number;
}

export interface TransferJobSnapshot {
  id: string;
  direction: TransferDirection;
  remoteUrl: string;
  localPath: string;
  filename: string;
  externalRequestId: string;
  status: TransferStatus;
  totalBytes: number;
  transferredBytes: number;
  isIndeterminate: boolean;
  progressFraction: number;
}

export class TransferJob {
  readonly id: string;
  readonly direction: TransferDirection;
  private readonly behaviors: TransferBehaviors;
  private readonly listeners = new Set<(change: TransferJobChange) => void>();
  private remoteUrlValue = '';
  private localPathValue = '/';
  private filenameValue = '';
  private externalRequestIdValue: string;
  private statusValue: TransferStatus;
  private totalBytesValue: number;
  private transferredBytesValue: number;
  private indeterminate: boolean;
  private progressValue: number;

  constructor(init: TransferJobInit, behaviors: TransferBehaviors) {
    this.id = init.id ?? randomUUID();
    this.direction = init.direction;
    this.behaviors = behaviors;
    this.externalRequestIdValue = init.externalRequestId ?? '';
    this.statusValue = init.status ?? 'None';
    this.totalBytesValue = init.totalBytes ?? -1;
    this.transferredBytesValue = init.transferredBytes ?? 0;
    this.indeterminate = init.isIndeterminate ?? true;
    this.progressValue = init.progressFraction ?? 0;

    this.assignRemoteUrl(init.remoteUrl);
    this.assignLocalPath(init.localPath);
    this.assignFilename(init.filename);
  }

  get method(): TransferMethod {
    return this.direction === 'download' ? 'GET' : 'POST';
  }

  get remoteUrl(): string {
    return this.remoteUrlValue;
  }

  get localPath(): string {
    return this.localPathValue;
  }

  get filename(): string {
    return this.filenameValue;
  }

  get fullLocalPath(): string {
    return `${this.localPathValue}/${this.filenameValue}`;
  }

  /** Location handed to the external subsystem, relative to the transfers root. */
  get transferLocation(): string {
    return `${STAGING_DIRECTORY}${this.fullLocalPath}`;
  }

  get externalRequestId(): string {
    return this.externalRequestIdValue;
  }

  get status(): TransferStatus {
    return this.statusValue;
  }

  get totalBytes(): number {
    return this.totalBytesValue;
  }

  get transferredBytes(): number {
    return this.transferredBytesValue;
  }

  get isIndeterminate(): boolean {
    return this.indeterminate;
  }

  /** Only meaningful while `isIndeterminate` is false. */
  get progressFraction(): number {
    return this.progressValue;
  }

  setRemoteUrl(value: string): void {
    this.assignRemoteUrl(value);
    this.emit({ field: 'remoteUrl', job: this });
  }

  setLocalPath(value: string): void {
    this.assignLocalPath(value);
    this.emit({ field: 'localPath', job: this });
  }

  setFilename(value: string): void {
    this.assignFilename(value);
    this.emit({ field: 'filename', job: this });
  }

  setExternalRequestId(value: string): void {
    this.externalRequestIdValue = value;
    this.emit({ field: 'externalRequestId', job: this });
  }

  setStatus(next: TransferStatus): void {
    const previous = this.statusValue;
    if (previous === next) {
      return;
    }

    this.statusValue = next;
    if (next === 'Canceled') {
      this.clearProgress();
    }
    this.emit({ field: 'status', job: this, previous, next });
  }

  applyProgress(transferredBytes: number, totalBytes: number): void {
    this.indeterminate = totalBytes === -1 && this.statusValue === 'Transferring';
    this.totalBytesValue = totalBytes;
    this.transferredBytesValue = transferredBytes;
    this.progressValue = !this.indeterminate && totalBytes > 0 ? transferredBytes / totalBytes : 0;
    this.emit({ field: 'progress', job: this });
  }

  resetProgress(): void {
    this.clearProgress();
    this.emit({ field: 'progress', job: this });
  }

  onBeforeAdmit(): void {
    this.behaviors[this.direction].prepare(this);
  }

  /** Finalizes a successful transfer and settles the job as Completed or Failed. */
  async onComplete(): Promise<void> {
    let placed = false;
    try {
      placed = await this.behaviors[this.direction].finalize(this);
    } finally {
      if (placed) {
        this.transferredBytesValue = this.totalBytesValue;
        this.progressValue = 1;
        this.emit({ field: 'progress', job: this });
      }
      this.setStatus(placed ? 'Completed' : 'Failed');
    }
  }

  subscribe(listener: (change: TransferJobChange) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onStatusChanged(listener: StatusChangeListener): () => void {
    return this.subscribe((change) => {
      if (change.field === 'status') {
        listener(change.previous, change.next, change.job);
      }
    });
  }

  toSnapshot(): TransferJobSnapshot {
    return {
      id: this.id,
      direction: this.direction,
      remoteUrl: this.remoteUrlValue,
      localPath: this.localPathValue,
      filename: this.filenameValue,
      externalRequestId: this.externalRequestIdValue,
      status: this.statusValue,
      totalBytes: this.totalBytesValue,
      transferredBytes: this.transferredBytesValue,
      isIndeterminate: this.indeterminate,
      progressFraction: this.progressValue,
    };
  }

  private assignRemoteUrl(value: string): void {
    if (!isAbsoluteUrl(value)) {
      throw new TransferValidationError('INVALID_REMOTE_URL', `The provided remote URL is not valid (${value})`);
    }
    this.remoteUrlValue = value;
  }

  private assignLocalPath(value: string): void {
    if (!isWellFormedRelativePath(value)) {
      throw new TransferValidationError('INVALID_LOCAL_PATH', `The provided path is not valid (${value})`);
    }
    this.localPathValue = normalizeLocalPath(value);
  }

  private assignFilename(value: string): void {
    if (value.trim().length === 0 || value.includes('/') || value === '.' || value === '..') {
      throw new TransferValidationError('INVALID_FILENAME', `The provided filename is not valid (${value})`);
    }
    this.filenameValue = value;
  }

  private clearProgress(): void {
    this.transferredBytesValue = 0;
    this.indeterminate = true;
    this.progressValue = 0;
  }

  private emit(change: TransferJobChange): void {
    for (const listener of [...this.listeners]) {
      listener(change);
    }
  }
}

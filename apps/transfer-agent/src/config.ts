import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { TRANSFER_PREFERENCES, type TransferPreferences } from './runtime/transfer-gateway.js';

export interface TransferAgentConfig {
  sqlitePath: string;
  transfersRootPath: string;
  maxActiveTransfers: number;
  transferPreferences: TransferPreferences;
  gateway: {
    enabled: boolean;
    maxRequests: number;
    maxRetries: number;
    retryDelayMs: number;
  };
  log: {
    debug: boolean;
    maxEntries: number;
  };
}

const DEFAULT_CONFIG_PATH = './config/local.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Invalid config: ${key} must be a non-empty string`);
  }
  return value;
}

function optionalInteger(record: Record<string, unknown>, key: string, fallback: number, minimum: number): number {
  const value = record[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < minimum) {
    throw new Error(`Invalid config: ${key} must be an integer >= ${minimum}`);
  }
  return value;
}

function optionalBoolean(record: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = record[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid config: ${key} must be a boolean`);
  }
  return value;
}

function optionalSection(record: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = record[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error(`Invalid config: ${key} must be an object`);
  }
  return value;
}

function parseTransferPreferences(record: Record<string, unknown>): TransferPreferences {
  const value = record.transferPreferences;
  if (value === undefined) {
    return 'allowCellularAndBattery';
  }

  const preferences = TRANSFER_PREFERENCES.find((candidate) => candidate === value);
  if (!preferences) {
    throw new Error(`Invalid config: transferPreferences must be one of ${TRANSFER_PREFERENCES.join(', ')}`);
  }
  return preferences;
}

export function loadTransferAgentConfig(
  configPath = process.env.TRANSFER_AGENT_CONFIG_PATH ?? DEFAULT_CONFIG_PATH,
): TransferAgentConfig {
  const absolutePath = resolve(configPath);
  const parsed: unknown = JSON.parse(readFileSync(absolutePath, 'utf-8'));

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: expected a JSON object (${absolutePath})`);
  }

  const gateway = optionalSection(parsed, 'gateway');
  const log = optionalSection(parsed, 'log');

  return {
    sqlitePath: requireString(parsed, 'sqlitePath'),
    transfersRootPath: requireString(parsed, 'transfersRootPath'),
    maxActiveTransfers: optionalInteger(parsed, 'maxActiveTransfers', 5, 1),
    transferPreferences: parseTransferPreferences(parsed),
    gateway: {
      enabled: optionalBoolean(gateway, 'enabled', true),
      maxRequests: optionalInteger(gateway, 'maxRequests', 25, 1),
      maxRetries: optionalInteger(gateway, 'maxRetries', 3, 0),
      retryDelayMs: optionalInteger(gateway, 'retryDelayMs', 30_000, 0),
    },
    log: {
      debug: optionalBoolean(log, 'debug', false),
      maxEntries: optionalInteger(log, 'maxEntries', 5_000, 1),
    },
  };
}

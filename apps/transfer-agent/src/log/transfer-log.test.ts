import assert from 'node:assert/strict';
import test from 'node:test';
import { describeError, formatLogEntry, TransferLog, type LogEntry } from './transfer-log.js';

test('transfer log drops debug entries unless debug mode is on', () => {
  const quiet = new TransferLog();
  quiet.debug('coordinator', 'hidden');
  assert.equal(quiet.getEntries().length, 0);

  const verbose = new TransferLog({ debug: true });
  verbose.debug('coordinator', 'shown');
  assert.equal(verbose.getEntries()[0]?.message, 'shown');
});

test('transfer log keeps the newest entries up to its cap', () => {
  const log = new TransferLog({ maxEntries: 2 });
  log.info('agent', 'first');
  log.info('agent', 'second');
  log.info('agent', 'third');

  assert.deepEqual(
    log.getEntries().map((entry) => entry.message),
    ['second', 'third'],
  );

  log.clear();
  assert.equal(log.getEntries().length, 0);
});

test('transfer log emits each stored entry', () => {
  const log = new TransferLog();
  const received: LogEntry[] = [];
  log.on('entry', (entry: LogEntry) => {
    received.push(entry);
  });

  log.warn('gateway', 'slow response', { transferId: 'job-1' });

  assert.equal(received.length, 1);
  assert.equal(received[0]?.level, 'warn');
  assert.equal(received[0]?.source, 'gateway');
  assert.equal(received[0]?.transferId, 'job-1');
});

test('formatLogEntry renders level, source, transfer and details', () => {
  const line = formatLogEntry({
    id: 'entry-1',
    timestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
    level: 'error',
    source: 'files',
    message: 'move failed',
    transferId: 'job-1',
    details: 'EACCES',
  });

  assert.equal(line, '[2024-01-02T03:04:05.000Z] [ERROR] [files      ] move failed (job-1)\n  EACCES');
});

test('describeError reads messages from errors and stringifies other values', () => {
  assert.equal(describeError(new Error('boom')), 'boom');
  assert.equal(describeError('plain'), 'plain');
});

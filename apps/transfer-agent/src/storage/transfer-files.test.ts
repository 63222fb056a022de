import assert from 'node:assert/strict';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { TransferLog } from '../log/transfer-log.js';
import { TransferJob, type TransferDirection } from '../runtime/transfer-job.js';
import { createTransferFileStore, resolveTransferLocation } from './transfer-files.js';

function createStore() {
  const root = mkdtempSync(join(tmpdir(), 'transfer-files-test-'));
  const log = new TransferLog();
  const store = createTransferFileStore(root, log);
  return { root, log, store };
}

function createJob(direction: TransferDirection, behaviors: ReturnType<typeof createStore>['store']['behaviors']) {
  return new TransferJob(
    {
      id: 'job-1',
      direction,
      remoteUrl: 'https://example.com/files/notes.txt',
      localPath: 'docs',
      filename: 'notes.txt',
    },
    behaviors,
  );
}

test('resolveTransferLocation resolves locations below the root', () => {
  assert.equal(resolveTransferLocation('/srv/transfers', '/docs/notes.txt'), '/srv/transfers/docs/notes.txt');
  assert.equal(resolveTransferLocation('/srv/transfers', 'shared/transfers/a'), '/srv/transfers/shared/transfers/a');
});

test('ensureStagingRoot creates the staging directory', () => {
  const { root, store } = createStore();

  store.ensureStagingRoot();

  assert.equal(existsSync(join(root, 'shared', 'transfers')), true);
});

test('completed downloads are moved from staging into place', async () => {
  const { root, store } = createStore();
  const job = createJob('download', store.behaviors);

  job.onBeforeAdmit();
  writeFileSync(join(root, 'shared', 'transfers', 'docs', 'notes.txt'), 'hello');
  await job.onComplete();

  assert.equal(job.status, 'Completed');
  assert.equal(readFileSync(join(root, 'docs', 'notes.txt'), 'utf-8'), 'hello');
  assert.equal(existsSync(join(root, 'shared', 'transfers', 'docs', 'notes.txt')), false);
});

test('downloads without a staged file fail', async () => {
  const { store, log } = createStore();
  const job = createJob('download', store.behaviors);

  job.onBeforeAdmit();
  await job.onComplete();

  assert.equal(job.status, 'Failed');
  assert.equal(log.getEntries()[0]?.message, 'Downloaded file is missing: shared/transfers/docs/notes.txt');
});

test('uploads stage a copy of the source and remove it when finished', async () => {
  const { root, store } = createStore();
  const job = createJob('upload', store.behaviors);
  mkdirSync(join(root, 'docs'), { recursive: true });
  writeFileSync(join(root, 'docs', 'notes.txt'), 'payload');

  job.onBeforeAdmit();
  assert.equal(readFileSync(join(root, 'shared', 'transfers', 'docs', 'notes.txt'), 'utf-8'), 'payload');

  await job.onComplete();
  assert.equal(job.status, 'Completed');
  assert.equal(existsSync(join(root, 'shared', 'transfers', 'docs', 'notes.txt')), false);
  assert.equal(existsSync(join(root, 'docs', 'notes.txt')), true);
});

test('uploads without a source file cannot be prepared', () => {
  const { store } = createStore();
  const job = createJob('upload', store.behaviors);

  assert.throws(() => job.onBeforeAdmit(), /Upload source does not exist: \/docs\/notes.txt/);
});

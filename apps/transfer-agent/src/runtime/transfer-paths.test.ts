import assert from 'node:assert/strict';
import test from 'node:test';
import { isAbsoluteUrl, isWellFormedRelativePath, normalizeLocalPath } from './transfer-paths.js';

test('isAbsoluteUrl accepts http and https urls only', () => {
  assert.equal(isAbsoluteUrl('https://example.com/files/report.pdf'), true);
  assert.equal(isAbsoluteUrl('http://example.com'), true);
  assert.equal(isAbsoluteUrl('ftp://example.com/file'), false);
  assert.equal(isAbsoluteUrl('/files/report.pdf'), false);
  assert.equal(isAbsoluteUrl(''), false);
  assert.equal(isAbsoluteUrl(' https://example.com'), false);
});

test('isWellFormedRelativePath accepts plain nested paths', () => {
  assert.equal(isWellFormedRelativePath('docs'), true);
  assert.equal(isWellFormedRelativePath('/docs/reports'), true);
  assert.equal(isWellFormedRelativePath('docs/reports/'), true);
});

test('isWellFormedRelativePath rejects empty, absolute-url and traversal paths', () => {
  assert.equal(isWellFormedRelativePath(''), false);
  assert.equal(isWellFormedRelativePath('/'), false);
  assert.equal(isWellFormedRelativePath('https://example.com/docs'), false);
  assert.equal(isWellFormedRelativePath('//host/share'), false);
  assert.equal(isWellFormedRelativePath('docs//reports'), false);
  assert.equal(isWellFormedRelativePath('docs/../secrets'), false);
  assert.equal(isWellFormedRelativePath('docs?page=1'), false);
  assert.equal(isWellFormedRelativePath('docs\\reports'), false);
});

test('normalizeLocalPath adds a leading slash and drops a trailing one', () => {
  assert.equal(normalizeLocalPath('docs'), '/docs');
  assert.equal(normalizeLocalPath('docs/'), '/docs');
  assert.equal(normalizeLocalPath('/docs/reports/'), '/docs/reports');
  assert.equal(normalizeLocalPath('/docs'), '/docs');
});

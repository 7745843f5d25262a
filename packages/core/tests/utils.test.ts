import {
  redactSecrets,
  sanitizeUrl,
  summarizeError,
  truncateText,
} from '../src/utils/text.js';
import { isInternalHost, normalizeTarget, resolvePath } from '../src/utils/urls.js';
import { createConsoleLogger } from '../src/utils/logger.js';
import { raceAbort, sleep } from '../src/utils/timers.js';
import { forEachWithConcurrency } from '../src/scanner/WorkerPool.js';
import { delay } from './support.js';

test('truncateText keeps short text and marks cuts', () => {
  expect(truncateText('short', 10)).toBe('short');
  expect(truncateText('abcdefghij', 8)).toBe('abcde...');
});

test('sanitizeUrl drops query and fragment', () => {
  expect(sanitizeUrl('https://api.example.test/users?id=1&token=abc#top')).toBe(
    'https://api.example.test/users'
  );
  expect(sanitizeUrl('not a url')).toBe('not a url');
});

test('redactSecrets ignores very short values', () => {
  expect(redactSecrets('token abc and test-secret', ['abc', 'test-secret'])).toBe(
    'token abc and [redacted]'
  );
});

test('summarizeError produces one clean line', () => {
  expect(summarizeError(new TypeError('fetch failed\n  at https://x.example.test/a?k=v'))).toBe(
    'TypeError: fetch failed at https://x.example.test/a'
  );
  expect(summarizeError(new Error(''))).toBe('Error');
  expect(summarizeError('plain text')).toBe('plain text');
  expect(summarizeError('   ')).toBe('Unknown error');
  expect(summarizeError(new Error('x'.repeat(300)), [], 20)).toBe('Error: xxxxxxxxxx...');
});

test('normalizeTarget accepts http(s) only and defaults to https', () => {
  expect(normalizeTarget('api.example.test/v1')?.href).toBe('https://api.example.test/v1');
  expect(normalizeTarget(' http://localhost:8080 ')?.href).toBe('http://localhost:8080/');
  expect(normalizeTarget('ftp://files.example.test')).toBeNull();
  expect(normalizeTarget('')).toBeNull();
  expect(normalizeTarget('https://')).toBeNull();
});

test('resolvePath resolves against the origin', () => {
  const target = new URL('https://api.example.test/v1/users?x=1');
  expect(resolvePath(target, '/api/admin').href).toBe('https://api.example.test/api/admin');
});

test('isInternalHost recognises private ranges', () => {
  expect(isInternalHost('10.0.0.5')).toBe(true);
  expect(isInternalHost('172.20.1.1')).toBe(true);
  expect(isInternalHost('172.32.0.1')).toBe(false);
  expect(isInternalHost('192.168.1.10')).toBe(true);
  expect(isInternalHost('169.254.169.254')).toBe(true);
  expect(isInternalHost('localhost')).toBe(true);
  expect(isInternalHost('::1')).toBe(true);
  expect(isInternalHost('api.example.test')).toBe(false);
});

test('console logger filters by level and formats lines', () => {
  const lines: string[] = [];
  const logger = createConsoleLogger('warn', (line) => lines.push(line));

  logger.info('hidden');
  logger.warn('careful');
  logger.error('broken');

  expect(lines).toHaveLength(2);
  expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] WARN: careful$/);
  expect(lines[1]).toMatch(/\] ERROR: broken$/);
});

test('sleep rejects with the abort reason', async () => {
  const controller = new AbortController();
  setTimeout(() => controller.abort(new Error('stop now')), 5);
  await expect(sleep(1000, controller.signal)).rejects.toThrow('stop now');
});

test('raceAbort settles with the work when not aborted', async () => {
  const controller = new AbortController();
  await expect(raceAbort(Promise.resolve(7), controller.signal)).resolves.toBe(7);
});

test('worker pool never exceeds its concurrency', async () => {
  let active = 0;
  let peak = 0;
  const seen: number[] = [];

  const started = await forEachWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
    active += 1;
    peak = Math.max(peak, active);
    await delay(5);
    seen.push(item);
    active -= 1;
  });

  expect(started).toBe(5);
  expect(peak).toBe(2);
  expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
});

test('worker pool stops taking items once aborted', async () => {
  const controller = new AbortController();
  const seen: number[] = [];

  const started = await forEachWithConcurrency(
    ['a', 'b', 'c'],
    1,
    async (_item, index) => {
      seen.push(index);
      if (index === 0) controller.abort();
    },
    controller.signal
  );

  expect(started).toBe(1);
  expect(seen).toEqual([0]);
});

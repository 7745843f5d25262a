import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadScannerConfig,
  parseConfigFile,
  withDefaults,
} from '../src/scanner/ScannerConfig.js';
import { ConfigError } from '../src/scanner/ScanErrors.js';

const ENV_KEYS = [
  'SCAN_CONCURRENCY',
  'PROBE_TIMEOUT_MS',
  'ADVISOR_PROVIDER',
  'ALLOW_REMOTE_PROVIDERS',
  'ALLOWED_PROVIDERS',
  'LOG_LEVEL',
];

let workDir: string;
let savedEnv: Record<string, string | undefined>;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'apiprobe-config-'));
  savedEnv = {};
  for (const key of ENV_KEYS) {
    savedEnv[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
  for (const key of ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

test('withDefaults fills every required option', () => {
  expect(withDefaults()).toEqual({
    concurrency: 4,
    probeTimeoutMs: 30000,
    cancelGraceMs: 5000,
    maxRequestsPerSecond: 10,
    advisorProvider: 'none',
    advisorTimeoutMs: 15000,
    allowRemoteProviders: false,
    logLevel: 'info',
  });
});

test('parseConfigFile reads yaml', () => {
  const content = [
    'concurrency: 2',
    'probeTimeoutMs: 5000',
    'advisorProvider: ollama',
    'allowedProviders:',
    '  - ollama',
  ].join('\n');

  expect(parseConfigFile(content, 'scanner.yaml')).toEqual({
    concurrency: 2,
    probeTimeoutMs: 5000,
    advisorProvider: 'ollama',
    allowedProviders: ['ollama'],
  });
});

test('parseConfigFile reads json by extension', () => {
  expect(parseConfigFile('{"cancelGraceMs": 0}', 'scanner.json')).toEqual({
    cancelGraceMs: 0,
  });
});

test('an empty file is an empty configuration', () => {
  expect(parseConfigFile('', 'scanner.yaml')).toEqual({});
});

test('invalid values are rejected with their path', () => {
  expect(() => parseConfigFile('concurrency: 0', 'scanner.yaml')).toThrow(
    'Invalid configuration in scanner.yaml: concurrency: Number must be greater than 0'
  );
});

test('unknown keys are rejected', () => {
  expect(() => parseConfigFile('colour: red', 'scanner.yaml')).toThrow(
    "Invalid configuration in scanner.yaml: (root): Unrecognized key(s) in object: 'colour'"
  );
});

test('unparseable files raise ConfigError', () => {
  expect(() => parseConfigFile('{"concurrency": ', 'scanner.json')).toThrow(ConfigError);
  expect(() => parseConfigFile('{"concurrency": ', 'scanner.json')).toThrow(
    'Cannot parse scanner.json'
  );
});

test('environment overrides the file', () => {
  const path = join(workDir, 'scanner.yaml');
  writeFileSync(path, 'concurrency: 2\nadvisorProvider: ollama\n');
  process.env.SCAN_CONCURRENCY = '6';
  process.env.ALLOW_REMOTE_PROVIDERS = 'yes';
  process.env.ALLOWED_PROVIDERS = 'openai, anthropic';
  process.env.LOG_LEVEL = 'DEBUG';

  const config = loadScannerConfig(path);

  expect(config.concurrency).toBe(6);
  expect(config.advisorProvider).toBe('ollama');
  expect(config.allowRemoteProviders).toBe(true);
  expect(config.allowedProviders).toEqual(['openai', 'anthropic']);
  expect(config.logLevel).toBe('debug');
  expect(config.probeTimeoutMs).toBe(30000);
});

test('a missing file falls back to defaults', () => {
  const config = loadScannerConfig(join(workDir, 'absent.yaml'));
  expect(config.concurrency).toBe(4);
  expect(config.advisorProvider).toBe('none');
});

test('an unsupported provider in the environment is rejected', () => {
  process.env.ADVISOR_PROVIDER = 'bogus';
  expect(() => loadScannerConfig()).toThrow(
    'Unsupported ADVISOR_PROVIDER bogus; expected one of none, openai, azure-openai, anthropic, ollama'
  );
});

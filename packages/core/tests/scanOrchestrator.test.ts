import { ScanOrchestrator } from '../src/scanner/ScanOrchestrator.js';
import { ProbeRegistry } from '../src/probes/ProbeRegistry.js';
import type { ProbeDescriptor } from '../src/probes/Probe.js';
import type { PlanAdvisor } from '../src/providers/PlanAdvisor.js';
import { PROMPT_VERSION } from '../src/prompt/PromptBuilder.js';
import type { ScannerConfig } from '../src/scanner/ScannerConfig.js';
import type { ScanProgress } from '../src/types/ScanResult.js';
import {
  InvalidSelectionError,
  InvalidTargetError,
  ScanCancelledError,
} from '../src/scanner/ScanErrors.js';
import {
  delay,
  fakeFetch,
  fakeProbe,
  never,
  passedFinding,
  recordingLogger,
  vulnerableFinding,
} from './support.js';

const TARGET = 'https://api.example.test/';

const config: Partial<ScannerConfig> = {
  concurrency: 1,
  probeTimeoutMs: 1000,
  cancelGraceMs: 0,
  maxRequestsPerSecond: 0,
  advisorTimeoutMs: 1000,
};

function standardProbes(): ProbeDescriptor[] {
  return [
    fakeProbe('bola', 'API1:2023', async () => [
      vulnerableFinding('bola', 'API1:2023', 'CRITICAL'),
    ]),
    fakeProbe('auth', 'API2:2023', async () => [
      vulnerableFinding('auth', 'API2:2023', 'HIGH'),
    ]),
    fakeProbe('props', 'API3:2023', async () => [passedFinding('props', 'API3:2023')]),
  ];
}

function fixedAdvisor(priorityOrder: string[]): PlanAdvisor {
  return {
    name: 'fake:planner',
    propose: async () => ({ priorityOrder, rationale: 'auth guards everything' }),
  };
}

function testNames(findings: ReadonlyArray<{ test: string }>): string[] {
  return findings.map((finding) => finding.test);
}

test('runs every probe in registry order without an advisor', async () => {
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), { config });

  const report = await orchestrator.scan({ target: TARGET });

  expect(report.plan).toEqual({
    source: 'registry',
    order: ['bola', 'auth', 'props'],
    rationale: null,
    advisor: null,
    unavailableReason: null,
    promptVersion: null,
  });
  expect(testNames(report.snapshot.results)).toEqual(['bola', 'auth', 'props']);
  expect(report.snapshot.target).toBe(TARGET);
  expect(report.snapshot.endTime).not.toBeNull();
  expect(report.snapshot.summary).toMatchObject({
    total: 3,
    vulnerabilitiesFound: 2,
    critical: 1,
    high: 1,
    passed: 1,
  });
  expect(report.risk).toEqual({ score: 40, level: 'MEDIUM' });
  expect(report.cancelled).toBe(false);
  expect(report.outcomes.map((outcome) => outcome.status)).toEqual([
    'completed',
    'completed',
    'completed',
  ]);
});

test('an explicit plan moves its probes first', async () => {
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), { config });

  const report = await orchestrator.scan({
    target: TARGET,
    plan: { priorityOrder: ['API3', 'bola'], rationale: 'cheap checks first' },
  });

  expect(report.plan.source).toBe('request');
  expect(report.plan.order).toEqual(['props', 'bola', 'auth']);
  expect(report.plan.rationale).toBe('cheap checks first');
  expect(report.plan.promptVersion).toBeNull();
  expect(testNames(report.snapshot.results)).toEqual(['props', 'bola', 'auth']);
});

test('the advisor plan orders the scan', async () => {
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), {
    config,
    advisor: fixedAdvisor(['API2']),
  });

  const report = await orchestrator.scan({ target: TARGET });

  expect(report.plan).toEqual({
    source: 'advisor',
    order: ['auth', 'bola', 'props'],
    rationale: 'auth guards everything',
    advisor: 'fake:planner',
    unavailableReason: null,
    promptVersion: PROMPT_VERSION,
  });
});

test('a failing advisor falls back to registry order', async () => {
  const advisor: PlanAdvisor = {
    name: 'fake:planner',
    propose: async () => {
      throw new Error('model offline');
    },
  };
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), {
    config,
    advisor,
  });

  const report = await orchestrator.scan({ target: TARGET });

  expect(report.plan).toEqual({
    source: 'registry',
    order: ['bola', 'auth', 'props'],
    rationale: null,
    advisor: 'fake:planner',
    unavailableReason: 'Error: model offline',
    promptVersion: PROMPT_VERSION,
  });
  expect(report.snapshot.summary.total).toBe(3);
});

test('a slow advisor is cut off by its timeout', async () => {
  const advisor: PlanAdvisor = { name: 'fake:slow', propose: () => never() };
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), {
    config: { ...config, advisorTimeoutMs: 30 },
    advisor,
  });

  const report = await orchestrator.scan({ target: TARGET });

  expect(report.plan.source).toBe('registry');
  expect(report.plan.unavailableReason).toBe('Error: timed out after 30ms');
  expect(testNames(report.snapshot.results)).toEqual(['bola', 'auth', 'props']);
});

test('a failing probe does not stop the others', async () => {
  const probes = [
    fakeProbe('first', 'API1:2023', async () => [passedFinding('first', 'API1:2023')]),
    fakeProbe('boom', 'API2:2023', async () => {
      throw new Error('socket hang up');
    }),
    fakeProbe('last', 'API3:2023', async () => [passedFinding('last', 'API3:2023')]),
  ];
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(probes), { config });

  const report = await orchestrator.scan({ target: TARGET });

  expect(testNames(report.snapshot.results)).toEqual(['first', 'boom', 'last']);
  expect(report.snapshot.results[1]?.status).toBe('ERROR');
  expect(report.snapshot.summary.errors).toBe(1);
  expect(report.snapshot.summary.passed).toBe(2);
});

test('invalid targets and selections fail before any probe runs', async () => {
  const execute = jest.fn(async () => []);
  const registry = new ProbeRegistry([fakeProbe('only', 'API1:2023', execute)]);
  const orchestrator = new ScanOrchestrator(registry, { config });

  await expect(orchestrator.scan({ target: '' })).rejects.toThrow(InvalidTargetError);
  await expect(orchestrator.scan({ target: 'ftp://files.example.test' })).rejects.toThrow(
    'Invalid target URL: ftp://files.example.test'
  );
  await expect(orchestrator.scan({ target: TARGET, probes: ['API9'] })).rejects.toThrow(
    InvalidSelectionError
  );
  expect(execute).not.toHaveBeenCalled();
});

test('targets without a scheme default to https', async () => {
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), { config });
  const report = await orchestrator.scan({ target: 'api.example.test/v2', probes: ['props'] });
  expect(report.snapshot.target).toBe('https://api.example.test/v2');
});

test('a scan cancelled up front is rejected', async () => {
  const controller = new AbortController();
  controller.abort();
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), { config });

  await expect(
    orchestrator.scan({ target: TARGET, signal: controller.signal })
  ).rejects.toThrow(ScanCancelledError);
});

test('a scan cancelled while the advisor runs is rejected', async () => {
  const controller = new AbortController();
  const advisor: PlanAdvisor = {
    name: 'fake:slow',
    propose: () => {
      setTimeout(() => controller.abort(), 5);
      return never();
    },
  };
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), {
    config,
    advisor,
  });

  await expect(
    orchestrator.scan({ target: TARGET, signal: controller.signal })
  ).rejects.toThrow('Scan cancelled before any probe ran');
});

test('cancelling after the first probe keeps only its findings', async () => {
  const controller = new AbortController();
  const later = jest.fn(async () => [passedFinding('later', 'API2:2023')]);
  const probes = [
    fakeProbe('first', 'API1:2023', async () => [
      vulnerableFinding('first', 'API1:2023', 'HIGH'),
    ]),
    fakeProbe('later', 'API2:2023', later),
    fakeProbe('last', 'API3:2023', later),
  ];
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(probes), { config });

  const report = await orchestrator.scan({
    target: TARGET,
    signal: controller.signal,
    onProgress: (progress) => {
      if (progress.phase === 'scanning' && progress.completed === 1) {
        controller.abort();
      }
    },
  });

  expect(report.cancelled).toBe(true);
  expect(report.snapshot.endTime).not.toBeNull();
  expect(testNames(report.snapshot.results)).toEqual(['first']);
  expect(report.snapshot.summary.total).toBe(1);
  expect(report.outcomes).toHaveLength(1);
  expect(later).not.toHaveBeenCalled();
});

test('in-flight probes get the grace period, then are abandoned', async () => {
  const controller = new AbortController();
  const probes = [
    fakeProbe('quick', 'API1:2023', async () => {
      await delay(20);
      return [passedFinding('quick', 'API1:2023')];
    }),
    fakeProbe('stuck', 'API2:2023', () => never()),
    fakeProbe('queued', 'API3:2023', async () => [passedFinding('queued', 'API3:2023')]),
  ];
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(probes), {
    config: { ...config, concurrency: 2, cancelGraceMs: 100, probeTimeoutMs: 5000 },
  });

  const report = await orchestrator.scan({
    target: TARGET,
    signal: controller.signal,
    onProgress: (progress) => {
      if (progress.probe === 'stuck' && progress.completed === 0) {
        controller.abort();
      }
    },
  });

  expect(report.cancelled).toBe(true);
  expect(testNames(report.snapshot.results)).toEqual(['quick']);
  expect(
    report.outcomes.map((outcome) => [outcome.probe, outcome.status])
  ).toEqual([
    ['quick', 'completed'],
    ['stuck', 'abandoned'],
  ]);
});

test('progress is reported per phase and probe', async () => {
  const events: ScanProgress[] = [];
  const orchestrator = new ScanOrchestrator(
    new ProbeRegistry(standardProbes().slice(0, 2)),
    { config }
  );

  await orchestrator.scan({ target: TARGET, onProgress: (event) => events.push(event) });

  expect(events).toEqual([
    { phase: 'planning', probe: null, completed: 0, total: 2 },
    { phase: 'scanning', probe: 'bola', completed: 0, total: 2 },
    { phase: 'scanning', probe: 'bola', completed: 1, total: 2 },
    { phase: 'scanning', probe: 'auth', completed: 1, total: 2 },
    { phase: 'scanning', probe: 'auth', completed: 2, total: 2 },
    { phase: 'completing', probe: null, completed: 2, total: 2 },
  ]);
});

test('probes reach the target through the configured transport', async () => {
  const transport = fakeFetch(() => new Response('pong', { status: 200 }));
  const probe = fakeProbe('ping', 'API8:2023', async (context) => {
    const response = await context.request(context.target);
    return [
      {
        test: 'ping',
        category: 'API8:2023',
        status: 'INFO',
        description: `${response.status} ${response.body}`,
      },
    ];
  });
  const orchestrator = new ScanOrchestrator(new ProbeRegistry([probe]), {
    config,
    fetch: transport.fetch,
  });

  const report = await orchestrator.scan({ target: TARGET });

  expect(report.snapshot.results[0]?.description).toBe('200 pong');
  expect(transport.calls.map((call) => call.url)).toEqual([TARGET]);
});

test('a throwing progress listener does not stop the scan', async () => {
  const logger = recordingLogger();
  const orchestrator = new ScanOrchestrator(new ProbeRegistry(standardProbes()), {
    config,
    logger,
  });

  const report = await orchestrator.scan({
    target: TARGET,
    onProgress: () => {
      throw new Error('ui broke');
    },
  });

  expect(report.snapshot.endTime).not.toBeNull();
  expect(report.snapshot.summary.total).toBe(3);
  expect(report.cancelled).toBe(false);
  expect(
    logger.lines.filter((line) => line === 'WARN Progress listener failed: ui broke')
  ).toHaveLength(8);
});

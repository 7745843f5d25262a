import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parsePlan, parsePlanWithPrefill } from '../src/providers/PlanParser.js';
import { extractJsonObject } from '../src/providers/JsonExtract.js';
import { AdvisorException } from '../src/providers/PlanAdvisor.js';

function readFixture(name: string): string {
  const fixturesDir = resolve(__dirname, '..', '..', 'contracts', 'fixtures');
  return readFileSync(resolve(fixturesDir, name), 'utf8');
}

test('parsePlan extracts json from wrapped response', () => {
  const plan = parsePlan(readFixture('plan-wrapped.txt'));
  expect(plan.priorityOrder).toEqual(['API2', 'API5', 'object-level-authorization']);
  expect(plan.rationale).toBe(
    'Bearer tokens guard every route; admin paths are the next most valuable target.'
  );
});

test('parsePlan accepts the coordinator plan shape', () => {
  const plan = parsePlan(readFixture('plan-coordinator.json'));
  expect(plan).toEqual({
    priorityOrder: ['API2', 'API1', 'API10'],
    rationale: 'Authentication failures expose everything behind them.',
  });
});

test('parsePlan falls back to priority_tests ids', () => {
  const plan = parsePlan(
    '{"priority_tests":[{"test_id":"API5"},{"test_id":"API3"}],"rationale":"admin first"}'
  );
  expect(plan.priorityOrder).toEqual(['API5', 'API3']);
});

test('parsePlan trims and de-duplicates entries', () => {
  const plan = parsePlan(
    '{"priority_order":["API2"," API5 ","API2",""],"rationale":" auth first "}'
  );
  expect(plan).toEqual({ priorityOrder: ['API2', 'API5'], rationale: 'auth first' });
});

test('parsePlanWithPrefill restores the opening brace', () => {
  const plan = parsePlanWithPrefill('"priority_order":["API1"]}', '{');
  expect(plan).toEqual({ priorityOrder: ['API1'], rationale: '' });
});

test('parsePlan rejects text without json', () => {
  expect(() => parsePlan('no plan today')).toThrow(AdvisorException);
  expect(() => parsePlan('no plan today')).toThrow('Advisor response is not valid JSON');
});

test('parsePlan rejects a plan without an order', () => {
  expect(() => parsePlan('{"rationale":"nothing to do"}')).toThrow(
    'Advisor response missing priority_order'
  );
});

test('parsePlan reports unexpected shapes', () => {
  expect(() => parsePlan('{"priority_order":"API2"}')).toThrow(
    'Advisor response has an unexpected shape: priority_order: Expected array, received string'
  );
});

test('extractJsonObject skips braces inside strings', () => {
  expect(extractJsonObject('note {"a":"}{","b":1} end')).toBe('{"a":"}{","b":1}');
  expect(extractJsonObject('nothing here')).toBeNull();
});

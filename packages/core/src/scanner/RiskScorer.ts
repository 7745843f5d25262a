import type { ScanSummary } from '../types/ScanResult.js';

export type RiskLevel = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface RiskAssessment {
  /** 0..100 */
  score: number;
  level: RiskLevel;
}

export type SeverityCounts = Partial<
  Pick<ScanSummary, 'critical' | 'high' | 'medium' | 'low'>
>;

export const SEVERITY_WEIGHTS = {
  critical: 25,
  high: 15,
  medium: 8,
  low: 3,
} as const;

export const MAX_RISK_SCORE = 100;

/**
 * Weighted severity sum, capped at 100. INFO and PASSED never count.
 */
export function calculateRiskScore(counts: SeverityCounts): number {
  const score =
    count(counts.critical) * SEVERITY_WEIGHTS.critical +
    count(counts.high) * SEVERITY_WEIGHTS.high +
    count(counts.medium) * SEVERITY_WEIGHTS.medium +
    count(counts.low) * SEVERITY_WEIGHTS.low;
  return Math.min(score, MAX_RISK_SCORE);
}

export function riskLevel(score: number): RiskLevel {
  if (score >= 75) return 'CRITICAL';
  if (score >= 50) return 'HIGH';
  if (score >= 25) return 'MEDIUM';
  return 'LOW';
}

export function scoreRisk(counts: SeverityCounts): RiskAssessment {
  const score = calculateRiskScore(counts);
  return { score, level: riskLevel(score) };
}

function count(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) return 0;
  return value;
}

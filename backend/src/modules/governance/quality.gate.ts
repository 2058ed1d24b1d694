/**
 * REPORT GOVERNANCE — QUALITY GATE AGGREGATOR
 */

import { v4 as uuid } from 'uuid';
import { ValidationError } from '../../common/errors.js';
import type { CheckSeverity, QualityCheck, QualityGate, QualityGrade, QualityScore } from './governance.types.js';

const GRADE_FLOORS: ReadonlyArray<[number, QualityGrade]> = [
  [0.9, 'A'],
  [0.8, 'B'],
  [0.7, 'C'],
  [0.6, 'D'],
];

export function createQualityGate(): QualityGate {
  return { checks: [], failedCount: 0, lastCheckedAt: null };
}

export interface RecordCheckInput {
  name: string;
  checkType: string;
  passed: boolean;
  severity?: CheckSeverity;
  score?: number;
  issues?: string[];
  executedAt: string;
  executedBy: string;
}

export function recordCheck(gate: QualityGate, input: RecordCheckInput): { gate: QualityGate; check: QualityCheck } {
  const score = input.score ?? (input.passed ? 1 : 0);
  if (!Number.isFinite(score) || score < 0 || score > 1) {
    throw new ValidationError('Quality score must be within 0..1', { score });
  }

  const check: QualityCheck = {
    checkId: uuid(),
    name: input.name,
    checkType: input.checkType,
    passed: input.passed,
    severity: input.severity ?? 'INFO',
    score,
    issues: input.issues ? [...input.issues] : [],
    executedAt: input.executedAt,
    executedBy: input.executedBy,
  };

  return {
    gate: {
      checks: [...gate.checks, check],
      failedCount: gate.failedCount + (check.passed ? 0 : 1),
      lastCheckedAt: check.executedAt,
    },
    check,
  };
}

/** Vacuously true for an empty gate. */
export function allPassed(gate: QualityGate): boolean {
  return gate.checks.every((c) => c.passed);
}

export function gradeFor(score: number): QualityGrade {
  for (const [floor, grade] of GRADE_FLOORS) {
    if (score >= floor) return grade;
  }
  return 'F';
}

/**
 * Mean check score; an empty gate scores 0.
 */
export function qualityScore(gate: QualityGate, threshold: number): QualityScore {
  const count = gate.checks.length;
  const overallScore = count === 0 ? 0 : gate.checks.reduce((sum, c) => sum + c.score, 0) / count;

  return {
    overallScore,
    grade: gradeFor(overallScore),
    threshold,
    meetsThreshold: overallScore >= threshold,
    checkCount: count,
  };
}

import type { FailureStage, JobOutcome, RejectedOutcome, TargetLanguage } from '../control-plane/types.js';
import type { LedgerEntry, RunLedger, RunReport } from './types.js';

export const EXIT_CODES = {
  validated: 0,
  unexpected: 1,
  configuration: 2,
  assembling: 3,
  invoking: 4,
  extracting: 5,
  validating: 6,
} as const satisfies Record<'validated' | 'unexpected' | 'configuration' | FailureStage, number>;

export function exitCodeFor(outcomes: readonly JobOutcome[]): number {
  const firstRejected = outcomes.find((o): o is RejectedOutcome => o.status === 'rejected');
  if (!firstRejected) return EXIT_CODES.validated;
  return EXIT_CODES[firstRejected.stage];
}

interface RunHeader {
  runId: string;
  targetLanguage: TargetLanguage;
  model: string;
  expectedJobs: number;
  startedAt: string;
}

/**
 * Append-only collector for one run. The orchestrator is the single writer
 * and appends only terminal outcomes; `finalize` freezes the report.
 */
export class RunReportBuilder {
  private readonly outcomes: JobOutcome[] = [];
  private finalized = false;

  constructor(private readonly run: RunHeader) {}

  get size(): number {
    return this.outcomes.length;
  }

  append(outcome: JobOutcome): void {
    if (this.finalized) {
      throw new Error(`Run report ${this.run.runId} is finalized; cannot append ${outcome.sourcePath}`);
    }
    this.outcomes.push(outcome);
  }

  finalize(finishedAt: string): RunReport {
    this.finalized = true;
    const outcomes = Object.freeze([...this.outcomes]);
    return Object.freeze({
      ...this.run,
      finishedAt,
      outcomes,
      passed: outcomes.every((o) => o.status === 'validated'),
      exitCode: exitCodeFor(outcomes),
    });
  }
}

function toEntry(outcome: JobOutcome): LedgerEntry {
  const base = {
    sourcePath: outcome.sourcePath,
    status: outcome.status,
    states: outcome.states,
    retries: outcome.retries,
    attempts: outcome.attempts,
    durationsMs: outcome.durationsMs,
    promptHash: outcome.promptHash,
  };

  if (outcome.status === 'validated') {
    return {
      ...base,
      header: outcome.artifact.header,
      stagedPath: outcome.stagedPath,
      violations: [],
    };
  }

  return {
    ...base,
    stage: outcome.stage,
    reason: outcome.reason,
    message: outcome.message,
    violations: outcome.violations,
  };
}

/** JSON-ready view of a report. Artifact bodies are left out. */
export function buildLedger(report: RunReport): RunLedger {
  const validated = report.outcomes.filter((o) => o.status === 'validated').length;
  return {
    runId: report.runId,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    targetLanguage: report.targetLanguage,
    model: report.model,
    expectedJobs: report.expectedJobs,
    completed: report.outcomes.length === report.expectedJobs,
    validated,
    rejected: report.outcomes.length - validated,
    passed: report.passed,
    exitCode: report.exitCode,
    jobs: report.outcomes.map(toEntry),
  };
}

import type {
  AttemptRecord,
  FailureStage,
  GovernanceHeader,
  JobOutcome,
  JobState,
  RejectionReason,
  TargetLanguage,
  Violation,
} from '../control-plane/types.js';

export interface RunReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  targetLanguage: TargetLanguage;
  model: string;
  expectedJobs: number;
  outcomes: readonly JobOutcome[];
  passed: boolean;
  exitCode: number;
}

export interface LedgerEntry {
  sourcePath: string;
  status: 'validated' | 'rejected';
  states: JobState[];
  retries: number;
  attempts: AttemptRecord[];
  durationsMs: Partial<Record<JobState, number>>;
  promptHash: string | null;
  header?: GovernanceHeader;
  stagedPath?: string;
  stage?: FailureStage;
  reason?: RejectionReason;
  message?: string;
  violations: Violation[];
}

export interface RunLedger {
  runId: string;
  startedAt: string;
  finishedAt: string;
  targetLanguage: TargetLanguage;
  model: string;
  expectedJobs: number;
  completed: boolean;
  validated: number;
  rejected: number;
  passed: boolean;
  exitCode: number;
  jobs: LedgerEntry[];
}

export type TargetLanguage = 'csharp' | 'java';

export type JobState =
  | 'pending'
  | 'assembling'
  | 'invoking'
  | 'extracting'
  | 'stamping'
  | 'validating'
  | 'validated'
  | 'rejected';

export type FailureStage = 'assembling' | 'invoking' | 'extracting' | 'validating';

export type RejectionReason =
  | 'SourceUnreadable'
  | 'ExhaustedRetries'
  | 'RejectedRequest'
  | 'NoCodeBlockFound'
  | 'ValidationFailed';

export interface PromptTemplates {
  persona: string;
  task: string;
}

export interface PromptBundle {
  readonly system: string;
  readonly task: string;
  readonly source: string;
  readonly promptHash: string;
}

export type ResponseClass = 'success' | 'transient-error' | 'permanent-error';

export interface ModelResponse {
  text: string;
  latencyMs: number;
  httpStatus: number | null;
  classification: ResponseClass;
}

export interface ExtractedArtifact {
  code: string;
  promptHash: string;
  blockCount: number;
}

export interface GovernanceHeader {
  runId: string;
  sourcePath: string;
  model: string;
  generatedAt: string;
  promptHash: string;
}

export interface StampedArtifact extends ExtractedArtifact {
  header: GovernanceHeader;
  headerBlock: string;
  content: string;
}

export type ValidationCheck = 'balanced-delimiters' | 'declaration-present' | 'governance-header';

export interface Violation {
  check: ValidationCheck;
  message: string;
}

export interface ValidationOutcome {
  passed: boolean;
  violations: Violation[];
}

export interface AttemptRecord {
  httpStatus: number | null;
  classification: ResponseClass;
  latencyMs: number;
  backoffMs: number;
  error?: string;
}

interface JobOutcomeBase {
  sourcePath: string;
  targetLanguage: TargetLanguage;
  model: string;
  promptHash: string | null;
  retries: number;
  attempts: AttemptRecord[];
  states: JobState[];
  durationsMs: Partial<Record<JobState, number>>;
}

export interface ValidatedOutcome extends JobOutcomeBase {
  status: 'validated';
  artifact: StampedArtifact;
  validation: ValidationOutcome;
  stagedPath: string;
}

export interface RejectedOutcome extends JobOutcomeBase {
  status: 'rejected';
  stage: FailureStage;
  reason: RejectionReason;
  message: string;
  violations: Violation[];
}

export type JobOutcome = ValidatedOutcome | RejectedOutcome;

export interface SourceJob {
  sourcePath: string;
  outputPath?: string;
}

export interface RunRequest {
  runId: string;
  jobs: SourceJob[];
  targetLanguage: TargetLanguage;
  model: string;
  templates: PromptTemplates;
}

import { IllegalTransitionError } from './errors.js';
import { StepTimer } from '../utils/timer.js';
import type { JobState, TargetLanguage } from './types.js';

const TRANSITIONS: Record<JobState, JobState[]> = {
  pending: ['assembling'],
  assembling: ['invoking', 'rejected'],
  invoking: ['extracting', 'rejected'],
  extracting: ['stamping', 'rejected'],
  stamping: ['validating'],
  validating: ['validated', 'rejected'],
  validated: [],
  rejected: [],
};

export function isTerminal(state: JobState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class ConversionJob {
  private current: JobState = 'pending';
  private readonly history: JobState[] = ['pending'];
  private readonly durations: Partial<Record<JobState, number>> = {};
  private readonly timer = new StepTimer();
  private retryCount = 0;

  constructor(
    readonly sourcePath: string,
    readonly targetLanguage: TargetLanguage,
    readonly model: string,
    readonly retryBudget: number,
    readonly outputPath?: string
  ) {}

  get state(): JobState {
    return this.current;
  }

  get states(): JobState[] {
    return [...this.history];
  }

  get retries(): number {
    return this.retryCount;
  }

  get durationsMs(): Partial<Record<JobState, number>> {
    return { ...this.durations };
  }

  transition(next: JobState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    if (this.current !== 'pending') {
      this.durations[this.current] = this.timer.elapsed();
    }
    this.current = next;
    this.history.push(next);
    this.timer.begin();
  }

  recordRetries(count: number): void {
    if (!Number.isInteger(count) || count < 0 || count > this.retryBudget) {
      throw new RangeError(
        `Retry count ${count} outside budget 0..${this.retryBudget} for ${this.sourcePath}`
      );
    }
    this.retryCount = count;
  }
}

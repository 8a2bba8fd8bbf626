import { describe, it, expect } from 'vitest';
import { ConversionJob, isTerminal } from '../control-plane/job.js';
import { IllegalTransitionError } from '../control-plane/errors.js';

function makeJob(): ConversionJob {
  return new ConversionJob('legacy/Calculator.vb', 'csharp', 'stub-model', 3);
}

describe('ConversionJob', () => {
  it('starts pending', () => {
    const job = makeJob();
    expect(job.state).toBe('pending');
    expect(job.states).toEqual(['pending']);
    expect(job.retries).toBe(0);
  });

  it('walks the linear path to validated', () => {
    const job = makeJob();
    for (const next of ['assembling', 'invoking', 'extracting', 'stamping', 'validating', 'validated'] as const) {
      job.transition(next);
    }
    expect(job.state).toBe('validated');
    expect(job.states).toEqual([
      'pending', 'assembling', 'invoking', 'extracting', 'stamping', 'validating', 'validated',
    ]);
    expect(Object.keys(job.durationsMs)).toEqual([
      'assembling', 'invoking', 'extracting', 'stamping', 'validating',
    ]);
  });

  it('can be rejected from any failing stage', () => {
    const job = makeJob();
    job.transition('assembling');
    job.transition('invoking');
    job.transition('rejected');
    expect(job.state).toBe('rejected');
  });

  it('refuses to skip a stage', () => {
    const job = makeJob();
    expect(() => job.transition('invoking')).toThrow(IllegalTransitionError);
    expect(() => job.transition('invoking')).toThrow('Illegal job transition pending -> invoking');
    expect(job.state).toBe('pending');
  });

  it('cannot reject while stamping', () => {
    const job = makeJob();
    job.transition('assembling');
    job.transition('invoking');
    job.transition('extracting');
    job.transition('stamping');
    expect(() => job.transition('rejected')).toThrow(IllegalTransitionError);
  });

  it('never leaves a terminal state', () => {
    const job = makeJob();
    job.transition('assembling');
    job.transition('rejected');
    expect(isTerminal(job.state)).toBe(true);
    expect(() => job.transition('assembling')).toThrow(IllegalTransitionError);
  });

  it('keeps the retry counter inside the budget', () => {
    const job = makeJob();
    job.recordRetries(3);
    expect(job.retries).toBe(3);
    expect(() => job.recordRetries(4)).toThrow(RangeError);
    expect(() => job.recordRetries(-1)).toThrow(RangeError);
  });
});

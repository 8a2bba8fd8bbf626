import { describe, it, expect } from 'vitest';
import { generateRunId } from '../utils/id.js';

describe('generateRunId', () => {
  it('has the run_YYYYMMDD_hex shape', () => {
    expect(generateRunId()).toMatch(/^run_\d{8}_[a-f0-9]{6}$/);
  });

  it('takes the date from the given clock', () => {
    expect(generateRunId(new Date('2026-03-04T23:00:00.000Z'))).toMatch(/^run_20260304_/);
  });

  it('generates unique IDs', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateRunId()));
    expect(ids.size).toBe(50);
  });
});

import { randomBytes } from 'node:crypto';

export function generateRunId(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, '');
  const rand = randomBytes(3).toString('hex');
  return `run_${date}_${rand}`;
}

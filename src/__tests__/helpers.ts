import { ModelGateway, type ModelTransport, type TransportReply } from '../gateway/gateway.js';
import { RetryPolicy } from '../gateway/retry-policy.js';
import { ConcurrencyLimiter } from '../utils/limiter.js';
import { defaultOutputPath, type ArtifactSink, type StageTarget } from '../tools/staging.js';
import type { ModelRequest } from '../prompts/assembler.js';
import type { PromptTemplates, RejectedOutcome, StampedArtifact } from '../control-plane/types.js';

export const TEMPLATES: PromptTemplates = {
  persona: 'You are a careful code migration assistant.',
  task: 'Convert this Visual Basic file to {{TARGET_LANG}}. Reply with one code block.',
};

export const FIXED_NOW = new Date('2026-01-15T10:00:00.000Z');

export const CALCULATOR_VB = [
  'Public Class Calculator',
  '    Public Function Add(a As Integer, b As Integer) As Integer',
  '        Return a + b',
  '    End Function',
  '    Public Function Subtract(a As Integer, b As Integer) As Integer',
  '        Return a - b',
  '    End Function',
  'End Class',
].join('\n');

export const CALCULATOR_CS = [
  'public class Calculator',
  '{',
  '    public int Add(int a, int b)',
  '    {',
  '        return a + b;',
  '    }',
  '',
  '    public int Subtract(int a, int b)',
  '    {',
  '        return a - b;',
  '    }',
  '}',
].join('\n');

export function fenced(code: string, tag = 'csharp'): string {
  return `Here is the converted code:\n\n\`\`\`${tag}\n${code}\n\`\`\`\n\nLet me know if you need changes.`;
}

export const ok = (body: string): TransportReply => ({ status: 200, body });
export const status = (code: number, body = 'error'): TransportReply => ({ status: code, body });

export interface ScriptedTransport {
  transport: ModelTransport;
  calls: ModelRequest[];
}

/**
 * Replays the given replies in order (the last one repeats). An Error entry
 * makes that call reject, like a dropped connection.
 */
export function scriptedTransport(replies: Array<TransportReply | Error>): ScriptedTransport {
  const calls: ModelRequest[] = [];
  const transport: ModelTransport = async (request) => {
    const reply = replies[Math.min(calls.length, replies.length - 1)];
    calls.push(request);
    if (reply instanceof Error) throw reply;
    return reply;
  };
  return { transport, calls };
}

export interface TestGateway {
  gateway: ModelGateway;
  sleeps: number[];
}

export function makeGateway(transport: ModelTransport, maxRetries = 3): TestGateway {
  const sleeps: number[] = [];
  const gateway = new ModelGateway({
    transport,
    policy: new RetryPolicy({ maxRetries }),
    timeoutMs: 1_000,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    limiter: new ConcurrencyLimiter(1),
    clock: () => 0,
  });
  return { gateway, sleeps };
}

export class MemorySink implements ArtifactSink {
  readonly staged = new Map<string, string>();
  readonly rejections: RejectedOutcome[] = [];

  async stage(artifact: StampedArtifact, target: StageTarget): Promise<string> {
    const path = target.outputPath ?? defaultOutputPath(target.sourcePath, target.targetLanguage);
    this.staged.set(path, artifact.content);
    return path;
  }

  async recordRejection(outcome: RejectedOutcome): Promise<void> {
    this.rejections.push(outcome);
  }
}

export function sourceReader(files: Record<string, string>): (path: string) => Promise<string> {
  return async (path) => {
    const text = files[path];
    if (text === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return text;
  };
}

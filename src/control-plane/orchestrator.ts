import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { LANGUAGES } from '../analysis/languages.js';
import { formatViolations, validateArtifact } from '../analysis/validator.js';
import { assemblePrompt, assertTemplates } from '../prompts/assembler.js';
import { extractCode } from '../tools/extractor.js';
import { stampArtifact } from '../tools/stamper.js';
import { buildLedger, RunReportBuilder } from '../ledger/ledger.js';
import { UnsupportedLanguageError } from './errors.js';
import { ConversionJob } from './job.js';
import type { ModelGateway } from '../gateway/gateway.js';
import type { ArtifactSink } from '../tools/staging.js';
import type { RunReport } from '../ledger/types.js';
import type {
  AttemptRecord,
  FailureStage,
  JobOutcome,
  RejectedOutcome,
  RejectionReason,
  RunRequest,
  SourceJob,
  Violation,
} from './types.js';

export interface ConversionDeps {
  gateway: ModelGateway;
  sink: ArtifactSink;
  readSource?: (path: string) => Promise<string>;
  now?: () => Date;
}

interface JobContext {
  request: RunRequest;
  gateway: ModelGateway;
  sink: ArtifactSink;
  readSource: (path: string) => Promise<string>;
  now: () => Date;
}

const readUtf8 = (path: string): Promise<string> => readFile(path, 'utf-8');

/**
 * Converts every source in input order, one job at a time. Per-job failures
 * end up in the report as rejections; only configuration errors escape.
 */
export async function runConversion(request: RunRequest, deps: ConversionDeps): Promise<RunReport> {
  if (!Object.hasOwn(LANGUAGES, request.targetLanguage)) {
    throw new UnsupportedLanguageError(request.targetLanguage);
  }
  assertTemplates(request.templates);

  const ctx: JobContext = {
    request,
    gateway: deps.gateway,
    sink: deps.sink,
    readSource: deps.readSource ?? readUtf8,
    now: deps.now ?? (() => new Date()),
  };

  const builder = new RunReportBuilder({
    runId: request.runId,
    targetLanguage: request.targetLanguage,
    model: request.model,
    expectedJobs: request.jobs.length,
    startedAt: ctx.now().toISOString(),
  });

  console.log(
    `\n[legacy-convert] run=${request.runId} target=${request.targetLanguage} ` +
    `model=${request.model} files=${request.jobs.length}\n`
  );

  for (const source of request.jobs) {
    const outcome = await convertOne(source, ctx);
    builder.append(outcome);
  }

  const report = builder.finalize(ctx.now().toISOString());
  const validated = report.outcomes.filter((o) => o.status === 'validated').length;
  console.log(
    `\n[legacy-convert] ${validated}/${report.outcomes.length} validated, ` +
    `verdict=${report.passed ? 'pass' : 'fail'}`
  );
  return report;
}

async function convertOne(source: SourceJob, ctx: JobContext): Promise<JobOutcome> {
  const { request } = ctx;
  const lang = request.targetLanguage;
  const job = new ConversionJob(
    source.sourcePath,
    lang,
    request.model,
    ctx.gateway.policy.maxRetries,
    source.outputPath
  );
  let attempts: AttemptRecord[] = [];
  let promptHash: string | null = null;

  console.log(`  [run]  ${job.sourcePath}`);

  const reject = async (
    stage: FailureStage,
    reason: RejectionReason,
    message: string,
    violations: Violation[] = []
  ): Promise<RejectedOutcome> => {
    job.transition('rejected');
    const outcome: RejectedOutcome = {
      status: 'rejected',
      sourcePath: job.sourcePath,
      targetLanguage: lang,
      model: job.model,
      promptHash,
      retries: job.retries,
      attempts,
      states: job.states,
      durationsMs: job.durationsMs,
      stage,
      reason,
      message,
      violations,
    };
    console.error(`  [FAIL] ${job.sourcePath}: ${stage}/${reason}: ${message}`);
    try {
      await ctx.sink.recordRejection(outcome);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      console.warn(`  [warn] could not record rejection for ${job.sourcePath}: ${detail}`);
    }
    return outcome;
  };

  job.transition('assembling');
  let sourceText: string;
  try {
    sourceText = await ctx.readSource(job.sourcePath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return reject('assembling', 'SourceUnreadable', `Cannot read source: ${message}`);
  }
  const bundle = assemblePrompt(job, request.templates, sourceText);
  promptHash = bundle.promptHash;

  job.transition('invoking');
  const result = await ctx.gateway.invoke(bundle, job.model);
  job.recordRetries(result.retries);
  attempts = result.attempts;
  if (!result.ok) {
    return reject('invoking', result.failure.kind, result.failure.message);
  }

  job.transition('extracting');
  const extraction = extractCode(result.response.text, lang, bundle.promptHash);
  if (!extraction.ok) {
    return reject('extracting', extraction.reason, extraction.message);
  }

  job.transition('stamping');
  const stamped = stampArtifact(
    extraction.artifact,
    {
      runId: request.runId,
      sourcePath: job.sourcePath,
      model: job.model,
      generatedAt: ctx.now().toISOString(),
      promptHash: bundle.promptHash,
    },
    lang
  );

  job.transition('validating');
  const validation = validateArtifact(stamped, lang);
  if (!validation.passed) {
    return reject(
      'validating',
      'ValidationFailed',
      formatViolations(validation.violations),
      validation.violations
    );
  }

  job.transition('validated');
  const stagedPath = await ctx.sink.stage(stamped, job);
  console.log(`  [pass] ${job.sourcePath} -> ${stagedPath} (retries=${job.retries})`);

  return {
    status: 'validated',
    sourcePath: job.sourcePath,
    targetLanguage: lang,
    model: job.model,
    promptHash,
    retries: job.retries,
    attempts,
    states: job.states,
    durationsMs: job.durationsMs,
    artifact: stamped,
    validation,
    stagedPath,
  };
}

export async function writeRunReport(report: RunReport, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, `${report.runId}-report.json`);
  await writeFile(path, JSON.stringify(buildLedger(report), null, 2));
  return path;
}

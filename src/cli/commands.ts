import { Command } from 'commander';
import { formatDiagnostics, validateDirectory } from '../analysis/directory-validator.js';
import { parseTargetLanguage } from '../analysis/languages.js';
import { loadEnvironmentConfig, parseRetryBudget } from '../control-plane/config.js';
import { ConfigurationError } from '../control-plane/errors.js';
import { runConversion, writeRunReport } from '../control-plane/orchestrator.js';
import { ModelGateway } from '../gateway/gateway.js';
import { createOpenAiTransport } from '../gateway/openai-transport.js';
import { RetryPolicy } from '../gateway/retry-policy.js';
import { EXIT_CODES } from '../ledger/ledger.js';
import { loadPromptTemplates } from '../prompts/templates.js';
import { DEFAULT_GENERATED_DIR, DEFAULT_LOGS_DIR, FileSystemSink } from '../tools/staging.js';

const DEFAULT_MODEL = 'gpt-4-turbo';
export const DEFAULT_REPORT_DIR = 'out';

interface ConvertCliOptions {
  targetLang: string;
  model: string;
  output?: string;
  generatedDir: string;
  logsDir: string;
  prompts: string;
  maxRetries?: string;
  runId?: string;
  reportDir: string;
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('legacy-convert')
    .description(
      'Model-assisted legacy code conversion.\n\n' +
      'Translates Visual Basic sources to C# or Java, stamps each result with a provenance header\n' +
      'and admits it for review only if it passes deterministic structural checks.'
    )
    .version('0.1.0');

  program
    .command('convert')
    .description('Convert legacy source files and gate the generated code')
    .argument('<sources...>', 'Legacy source files, processed in the given order')
    .requiredOption('--target-lang <lang>', 'Target language: csharp or java')
    .option('--model <id>', 'Model identifier', DEFAULT_MODEL)
    .option('--output <path>', 'Output file for the generated code (single source only)')
    .option('--generated-dir <dir>', 'Staging directory for generated code', DEFAULT_GENERATED_DIR)
    .option('--logs-dir <dir>', 'Directory for rejection logs', DEFAULT_LOGS_DIR)
    .option('--prompts <dir>', 'Directory holding system_prompt.txt and task_prompt.txt', 'prompts')
    .option('--max-retries <n>', 'Gateway retry budget (overrides LLM_MAX_RETRIES)')
    .option('--run-id <id>', 'Explicit pipeline run ID')
    .option('--report-dir <dir>', 'Directory for the run report', DEFAULT_REPORT_DIR)
    .action(async (sources: string[], opts: ConvertCliOptions) => {
      const targetLanguage = parseTargetLanguage(opts.targetLang);
      if (opts.output && sources.length > 1) {
        throw new ConfigurationError('--output can only be used with a single source file');
      }

      const env = loadEnvironmentConfig();
      const maxRetries =
        opts.maxRetries !== undefined ? parseRetryBudget(opts.maxRetries) : env.maxRetries;
      const templates = await loadPromptTemplates(opts.prompts);

      const gateway = new ModelGateway({
        transport: createOpenAiTransport({
          apiKey: env.apiKey,
          endpoint: env.endpoint,
          timeoutMs: env.timeoutMs,
        }),
        policy: new RetryPolicy({ maxRetries }),
        timeoutMs: env.timeoutMs,
      });
      const sink = new FileSystemSink({ generatedDir: opts.generatedDir, logsDir: opts.logsDir });

      const report = await runConversion(
        {
          runId: opts.runId || env.runId,
          jobs: sources.map((sourcePath) => ({ sourcePath, outputPath: opts.output })),
          targetLanguage,
          model: opts.model,
          templates,
        },
        { gateway, sink }
      );

      const reportPath = await writeRunReport(report, opts.reportDir);
      console.log(`[legacy-convert] report written to ${reportPath}`);
      process.exitCode = report.exitCode;
    });

  program
    .command('validate')
    .description('Re-run structural checks on staged artifacts')
    .argument('[dir]', 'Directory of generated code', DEFAULT_GENERATED_DIR)
    .action(async (dir: string) => {
      console.log(`=== Validating ${dir} ===`);
      const result = await validateDirectory(dir);

      if (result.files.length === 0) {
        console.log('No generated code found. Skipping validation.');
        return;
      }

      for (const line of formatDiagnostics(result)) {
        console.log(line);
      }

      const failed = result.files.filter((f) => !f.passed).length;
      if (failed > 0) {
        console.error(`=== Validation Failed (${failed}/${result.files.length} files) ===`);
        process.exitCode = EXIT_CODES.unexpected;
        return;
      }
      console.log(`=== Validation Passed (${result.files.length} files) ===`);
    });

  return program;
}

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, normalize, resolve } from 'node:path';
import { LANGUAGES } from '../analysis/languages.js';
import { formatViolations } from '../analysis/validator.js';
import type { RejectedOutcome, StampedArtifact, TargetLanguage } from '../control-plane/types.js';

export interface StageTarget {
  sourcePath: string;
  targetLanguage: TargetLanguage;
  outputPath?: string;
}

/**
 * Where validated artifacts leave the core. Branch and PR creation happen
 * downstream of whatever is staged here.
 */
export interface ArtifactSink {
  stage(artifact: StampedArtifact, target: StageTarget): Promise<string>;
  recordRejection(outcome: RejectedOutcome): Promise<void>;
}

export interface FileSystemSinkOptions {
  generatedDir: string;
  logsDir: string;
}

export const DEFAULT_GENERATED_DIR = join('src', 'generated');
export const DEFAULT_LOGS_DIR = 'logs';

function sourceStem(sourcePath: string): string {
  return basename(sourcePath, extname(sourcePath));
}

export function defaultOutputPath(
  sourcePath: string,
  language: TargetLanguage,
  generatedDir: string = DEFAULT_GENERATED_DIR
): string {
  return join(generatedDir, sourceStem(sourcePath) + LANGUAGES[language].extension);
}

export function failureLogPath(sourcePath: string, logsDir: string = DEFAULT_LOGS_DIR): string {
  return join(logsDir, `failed_${sourceStem(sourcePath)}.log`);
}

/** Directory segments of a source path, minus roots and `..`. */
export function sourceSegments(sourcePath: string): string[] {
  return normalize(dirname(sourcePath))
    .split(/[\\/]+/)
    .filter((s) => s !== '' && s !== '.' && s !== '..' && !s.endsWith(':'));
}

function withSuffix(path: string, n: number): string {
  const ext = extname(path);
  return `${path.slice(0, path.length - ext.length)}_${n}${ext}`;
}

export function renderFailureLog(outcome: RejectedOutcome): string {
  const lines = [
    `Conversion failed for ${outcome.sourcePath}`,
    `Stage: ${outcome.stage}`,
    `Reason: ${outcome.reason}`,
    `Message: ${outcome.message}`,
  ];
  if (outcome.violations.length > 0) {
    lines.push(`Violations:\n  - ${formatViolations(outcome.violations)}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Writes artifacts and failure logs for one run. Sources that share a file
 * stem keep distinct outputs: the first takes the flat path, later ones are
 * nested under their own source directory (or numbered as a last resort).
 */
export class FileSystemSink implements ArtifactSink {
  private readonly owners = new Map<string, string>();

  constructor(private readonly options: FileSystemSinkOptions) {}

  async stage(artifact: StampedArtifact, target: StageTarget): Promise<string> {
    const { generatedDir } = this.options;
    const fileName = sourceStem(target.sourcePath) + LANGUAGES[target.targetLanguage].extension;
    const path = this.claim(
      target.sourcePath,
      target.outputPath !== undefined
        ? [target.outputPath]
        : [
            defaultOutputPath(target.sourcePath, target.targetLanguage, generatedDir),
            join(generatedDir, ...sourceSegments(target.sourcePath), fileName),
          ]
    );
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, artifact.content, 'utf-8');
    return path;
  }

  async recordRejection(outcome: RejectedOutcome): Promise<void> {
    const stem = sourceStem(outcome.sourcePath);
    const path = this.claim(outcome.sourcePath, [
      failureLogPath(outcome.sourcePath, this.options.logsDir),
      join(this.options.logsDir, `failed_${[...sourceSegments(outcome.sourcePath), stem].join('_')}.log`),
    ]);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, renderFailureLog(outcome), 'utf-8');
  }

  private claim(sourcePath: string, candidates: string[]): string {
    const owner = resolve(sourcePath);
    const free = (path: string): boolean => {
      const current = this.owners.get(resolve(path));
      return current === undefined || current === owner;
    };

    let path = candidates.find(free);
    if (path === undefined) {
      let n = 2;
      while (!free(withSuffix(candidates[0], n))) n++;
      path = withSuffix(candidates[0], n);
    }
    this.owners.set(resolve(path), owner);
    return path;
  }
}

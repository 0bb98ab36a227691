import path from 'node:path';
import type { Logger } from 'winston';

import { ArtifactCompilationError, describeError } from '../core/errors.js';
import { mapWithLimit, summarizeTimings, type TimingSummary } from '../pipeline/concurrency.js';
import type { TypesetResult, TypesettingEngine } from './typesetter.js';

/** One artifact to typeset. */
export interface CompileJob {
  kind: 'summary-pdf' | 'master-pdf';
  sectionId?: string;
  markupPath: string;
  /** Expected PDF location. */
  outputPath: string;
}

/** Result of compiling one artifact, after retries. */
export interface CompileOutcome {
  job: CompileJob;
  ok: boolean;
  attempts: number;
  durationMs: number;
  result: TypesetResult;
  error?: ArtifactCompilationError;
}

/** Everything the run needs from the compile stage. */
export interface CompileReport {
  sections: CompileOutcome[];
  /** `undefined` when no master job was given. */
  master?: CompileOutcome;
  timings: TimingSummary;
}

export interface ArtifactCompilerOptions {
  timeoutMs: number;
  concurrency: number;
  /** Extra attempts after a failed (non-timeout) invocation. */
  retries: number;
  logger?: Logger;
  signal?: AbortSignal;
  /** Clock used for durations. */
  now?: () => number;
}

/**
 * Drives the typesetting engine. Section artifacts compile concurrently and
 * never abort the batch; the master compiles last because it embeds them.
 */
export class ArtifactCompiler {
  private readonly now: () => number;

  constructor(
    private readonly engine: TypesettingEngine,
    private readonly options: ArtifactCompilerOptions
  ) {
    this.now = options.now ?? (() => performance.now());
  }

  async compileAll(sectionJobs: readonly CompileJob[], masterJob?: CompileJob): Promise<CompileReport> {
    const sections = await mapWithLimit(
      sectionJobs,
      this.options.concurrency,
      (job) => this.compileOne(job),
      { signal: this.options.signal }
    );

    const master = masterJob ? await this.compileOne(masterJob) : undefined;
    const outcomes = master ? [...sections, master] : sections;

    return {
      sections,
      master,
      timings: summarizeTimings(outcomes.map((outcome) => outcome.durationMs))
    };
  }

  /** Compile one artifact, retrying failures that were not timeouts. */
  async compileOne(job: CompileJob): Promise<CompileOutcome> {
    const started = this.now();
    const maxAttempts = this.options.retries + 1;
    let attempts = 0;
    let result: TypesetResult;

    do {
      attempts += 1;
      result = await this.invoke(job);
      if (result.exitCode === 0 && !result.timedOut) {
        this.options.logger?.info(`Compiled ${job.markupPath}`, { attempts });
        return { job, ok: true, attempts, durationMs: this.now() - started, result };
      }
      this.options.logger?.warn(`Compilation attempt ${attempts} of ${job.markupPath} failed`, {
        exitCode: result.exitCode,
        timedOut: result.timedOut
      });
    } while (!result.timedOut && attempts < maxAttempts);

    const error = new ArtifactCompilationError(job.markupPath, result.exitCode, result.timedOut, result.log);
    this.options.logger?.error(error.message);
    return { job, ok: false, attempts, durationMs: this.now() - started, result, error };
  }

  /** Engine call that turns an unexpected rejection into a failed result. */
  private async invoke(job: CompileJob): Promise<TypesetResult> {
    try {
      return await this.engine.compile({
        markupPath: job.markupPath,
        workingDirectory: path.dirname(job.markupPath),
        timeoutMs: this.options.timeoutMs
      });
    } catch (error) {
      return { exitCode: null, log: describeError(error), timedOut: false };
    }
  }
}

import path from 'node:path';
import type { Logger } from 'winston';

import { ArtifactCompiler, type CompileJob, type CompileOutcome } from '../compile/compiler.js';
import type { TypesettingEngine } from '../compile/typesetter.js';
import { DocumentComposer, type ComposedFile } from '../compose/composer.js';
import { planLayout, toMarkupPath, type DocumentLayout, type SectionLayout } from '../compose/layout.js';
import type { CampaignConfig } from '../config/campaign-config.js';
import { DiagnosticCollector, type Diagnostic } from '../core/diagnostics.js';
import { ConfigurationError, CompositionError, describeError, FatalInputError } from '../core/errors.js';
import {
  isRecordSection,
  type DocumentArtifact,
  type FieldType,
  type FigureReference,
  type Outline
} from '../core/record.js';
import type { FigureStore } from '../figures/figure-store.js';
import { FigureResolver } from '../figures/resolve.js';
import type { TabularSourceReader } from '../ingest/workbook-reader.js';
import { normalizeRecords, type SkippedRow } from '../ingest/normalize.js';
import { createModuleLogger, createSilentLogger } from '../logging/logger.js';
import { buildOutline } from '../outline/outline.js';
import { renderFrontMatter, renderMasterDocument, renderSummaryDocument, type MasterEntry } from '../render/documents.js';
import { renderSection, type SectionTemplate } from '../render/section.js';
import {
  RunCancelledError,
  mapWithLimit,
  throwIfCancelled,
  type TimingSummary
} from './concurrency.js';

/** Terminal run states. */
export type RunStatus = 'Done' | 'PartialFailure' | 'Failed';

/** Pipeline stages in execution order. */
export type PipelineStage = 'Ingest' | 'Normalize' | 'Outline' | 'Render' | 'Compose' | 'Compile';

/** External collaborators one run talks to. */
export interface RunCollaborators {
  reader: TabularSourceReader;
  figureStore: FigureStore;
  engine: TypesettingEngine;
}

export interface RunOptions {
  logger?: Logger;
  /** Cooperative cancellation, checked between stages and per-section tasks. */
  signal?: AbortSignal;
  /** Overrides `compile.enabled` from the configuration. */
  compile?: boolean;
}

/** A compile job that did not produce its artifact. */
export interface FailedArtifact {
  kind: CompileJob['kind'];
  sectionId?: string;
  markupPath: string;
  exitCode: number | null;
  timedOut: boolean;
  attempts: number;
  message: string;
  log: string;
}

/** Error that ended the run early. */
export interface RunFatalError {
  name: string;
  code: string;
  message: string;
}

/** Single source of truth for the outcome of one run. */
export interface RunSummary {
  status: RunStatus;
  /** Last stage entered. */
  stage: PipelineStage;
  fatalError?: RunFatalError;
  recordCount: number;
  /** Section identifiers in outline order. */
  outline: string[];
  skippedRows: SkippedRow[];
  figureWarnings: Diagnostic[];
  failedArtifacts: FailedArtifact[];
  orphanedArtifacts: string[];
  artifacts: DocumentArtifact[];
  diagnostics: Diagnostic[];
  diagnosticsBySection: Record<string, Diagnostic[]>;
  compileTimings?: TimingSummary;
}

const FIGURE_WARNING_CODES = new Set(['FIGURE_MISSING', 'FIGURE_AMBIGUOUS', 'FIGURE_UNUSABLE_NAME']);

/**
 * Execute one report run:
 * Ingest → Normalize → Outline → (per section: Resolve → Render) → Compose → Compile.
 * Pipeline errors end the run as `Failed` in the returned summary instead of
 * being thrown.
 */
export async function runReport(
  config: CampaignConfig,
  collaborators: RunCollaborators,
  options: RunOptions = {}
): Promise<RunSummary> {
  const logger = createModuleLogger(options.logger ?? createSilentLogger(), 'pipeline');
  const collector = new DiagnosticCollector();
  const summary: RunSummary = {
    status: 'Failed',
    stage: 'Ingest',
    recordCount: 0,
    outline: [],
    skippedRows: [],
    figureWarnings: [],
    failedArtifacts: [],
    orphanedArtifacts: [],
    artifacts: [],
    diagnostics: [],
    diagnosticsBySection: {}
  };

  const enter = (stage: PipelineStage): void => {
    throwIfCancelled(options.signal);
    summary.stage = stage;
    logger.info(`Stage ${stage}`);
  };

  try {
    enter('Ingest');
    const rows = await collaborators.reader.readRows();

    enter('Normalize');
    const normalized = normalizeRecords(rows, {
      identifierField: config.identifierField,
      orderingField: config.orderingField,
      groupField: config.groupField,
      fieldTypes: declaredFieldTypes(config),
      missingTokens: config.missingTokens,
      dateFormat: config.dateFormat
    });
    collector.addAll(normalized.diagnostics);
    summary.skippedRows = normalized.skippedRows;
    summary.recordCount = normalized.records.length;

    enter('Outline');
    const outline = buildOutline(normalized.records, {
      orderingField: config.orderingField,
      groupField: config.groupField,
      frontMatter: config.frontMatter
    });
    summary.outline = outline.sections.map((section) => section.id);
    const layout = planLayout(outline, config.output);

    enter('Render');
    const files = await renderAll(config, collaborators.figureStore, outline, layout, collector, options.signal);

    enter('Compose');
    const composer = new DocumentComposer(layout, {
      staleOutput: config.output.staleOutput,
      logger: createModuleLogger(logger, 'composer')
    });
    const composed = await composer.compose(files);
    collector.addAll(composed.diagnostics);
    summary.artifacts = composed.artifacts;
    summary.orphanedArtifacts = composed.orphaned;

    if (!(options.compile ?? config.compile.enabled)) {
      summary.status = 'Done';
      return finish(summary, collector, logger);
    }

    enter('Compile');
    const compiler = new ArtifactCompiler(collaborators.engine, {
      timeoutMs: config.compile.timeoutMs,
      concurrency: config.compile.concurrency,
      retries: config.compile.retries,
      logger: createModuleLogger(logger, 'compiler'),
      signal: options.signal
    });
    const report = await compiler.compileAll(summaryJobs(layout), {
      kind: 'master-pdf',
      markupPath: layout.masterFile,
      outputPath: layout.masterPdf
    });
    summary.compileTimings = report.timings;

    for (const outcome of report.master ? [...report.sections, report.master] : report.sections) {
      recordCompileOutcome(summary, collector, outcome);
    }

    if (report.master === undefined || !report.master.ok) {
      summary.status = 'Failed';
    } else {
      summary.status = report.sections.some((outcome) => !outcome.ok) ? 'PartialFailure' : 'Done';
    }
    return finish(summary, collector, logger);
  } catch (error) {
    summary.status = 'Failed';
    const fatalError = toFatalError(error);
    summary.fatalError = fatalError;
    collector.add({ code: fatalError.code, severity: 'error', message: fatalError.message });
    logger.error(`Run failed during ${summary.stage}: ${fatalError.message}`);
    return finish(summary, collector, logger);
  }
}

/** Resolve and render every section through the bounded pool, then add the master. */
async function renderAll(
  config: CampaignConfig,
  figureStore: FigureStore,
  outline: Outline,
  layout: DocumentLayout,
  collector: DiagnosticCollector,
  signal: AbortSignal | undefined
): Promise<ComposedFile[]> {
  const resolver = new FigureResolver(figureStore, {
    rootDir: config.rootDir,
    masterDir: layout.rootDir,
    categories: config.figures,
    matching: config.figureMatching,
    placeholder: config.placeholder
  });
  const template = sectionTemplate(config);
  const context = {
    project: config.project,
    title: config.title,
    recordCount: outline.sections.filter(isRecordSection).length
  };

  const perSection = await mapWithLimit(
    layout.sections,
    config.concurrency,
    async (entry): Promise<ComposedFile[]> => {
      const { section } = entry;
      if (section.kind === 'front-matter') {
        return [
          { kind: 'front-matter', sectionId: section.id, path: entry.markupFile, content: renderFrontMatter(section, context) }
        ];
      }

      const resolution = await resolver.resolve(section);
      collector.addAll(resolution.diagnostics);
      const markup = renderSection(
        { section, figures: resolution.references, summaryPdfPath: summaryPdfMarkupPath(layout, entry) },
        template
      );
      const files: ComposedFile[] = [{ kind: 'section', sectionId: section.id, path: entry.markupFile, content: markup }];
      if (entry.summaryFile) {
        files.push({
          kind: 'summary',
          sectionId: section.id,
          path: entry.summaryFile,
          content: renderSummaryDocument(section, template)
        });
      }
      return files;
    },
    { signal }
  );

  const groups = [...new Set(outline.sections.filter(isRecordSection).flatMap((section) => section.group ?? []))];
  const groupResolutions = await mapWithLimit(
    groups,
    config.concurrency,
    async (group) => ({ group, ...(await resolver.resolveGroup(group)) }),
    { signal }
  );
  const groupFigures = new Map<string, FigureReference[]>();
  for (const { group, references, diagnostics } of groupResolutions) {
    collector.addAll(diagnostics);
    if (references.length > 0) {
      groupFigures.set(group, references);
    }
  }

  const entries: MasterEntry[] = layout.sections.map((entry) =>
    entry.section.kind === 'front-matter'
      ? { kind: 'front-matter', title: entry.section.title, inputPath: toMarkupPath(layout, entry.markupFile) }
      : { kind: 'record', group: entry.section.group, inputPath: toMarkupPath(layout, entry.markupFile) }
  );
  const master = renderMasterDocument({
    ...context,
    entries,
    groupFigures,
    headerLogo: config.headerLogo === undefined ? undefined : toMarkupPath(layout, resolveFromRoot(config, config.headerLogo))
  });

  return [...perSection.flat(), { kind: 'master', path: layout.masterFile, content: master }];
}

function summaryJobs(layout: DocumentLayout): CompileJob[] {
  const jobs: CompileJob[] = [];
  for (const entry of layout.sections) {
    if (entry.summaryFile && entry.summaryPdf) {
      jobs.push({
        kind: 'summary-pdf',
        sectionId: entry.section.id,
        markupPath: entry.summaryFile,
        outputPath: entry.summaryPdf
      });
    }
  }
  return jobs;
}

function recordCompileOutcome(summary: RunSummary, collector: DiagnosticCollector, outcome: CompileOutcome): void {
  const { job } = outcome;
  if (outcome.ok) {
    const artifact: DocumentArtifact = { kind: job.kind, path: job.outputPath };
    if (job.sectionId !== undefined) {
      artifact.sectionId = job.sectionId;
    }
    summary.artifacts.push(artifact);
    return;
  }

  const message = outcome.error?.message ?? `Compilation of ${job.markupPath} failed`;
  const failed: FailedArtifact = {
    kind: job.kind,
    markupPath: job.markupPath,
    exitCode: outcome.result.exitCode,
    timedOut: outcome.result.timedOut,
    attempts: outcome.attempts,
    message,
    log: outcome.result.log
  };
  if (job.sectionId !== undefined) {
    failed.sectionId = job.sectionId;
  }
  summary.failedArtifacts.push(failed);
  collector.add({
    code: 'ARTIFACT_COMPILE_FAILED',
    severity: 'error',
    message,
    sectionId: job.sectionId
  });
}

function finish(summary: RunSummary, collector: DiagnosticCollector, logger: Logger): RunSummary {
  summary.diagnostics = collector.toArray(summary.outline);
  summary.diagnosticsBySection = collector.toRecord();
  summary.figureWarnings = summary.diagnostics.filter((diagnostic) => FIGURE_WARNING_CODES.has(diagnostic.code));
  logger.info(`Run finished with status ${summary.status}`, {
    diagnostics: summary.diagnostics.length,
    failedArtifacts: summary.failedArtifacts.length
  });
  return summary;
}

function toFatalError(error: unknown): RunFatalError {
  if (error instanceof FatalInputError || error instanceof ConfigurationError) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof CompositionError) {
    return { name: error.name, code: 'COMPOSITION_FAILED', message: error.message };
  }
  if (error instanceof RunCancelledError) {
    return { name: error.name, code: 'RUN_CANCELLED', message: error.message };
  }
  return {
    name: error instanceof Error ? error.name : 'Error',
    code: 'UNEXPECTED_ERROR',
    message: describeError(error)
  };
}

function declaredFieldTypes(config: CampaignConfig): Record<string, FieldType> {
  const types: Record<string, FieldType> = {};
  for (const field of config.fields) {
    if (field.type !== undefined) {
      types[field.name] = field.type;
    }
  }
  return types;
}

function sectionTemplate(config: CampaignConfig): SectionTemplate {
  return {
    fields: config.fields,
    identifierField: config.identifierField,
    missingToken: config.missingToken,
    precision: config.precision,
    dateFormat: config.dateFormat
  };
}

function summaryPdfMarkupPath(layout: DocumentLayout, entry: SectionLayout): string | undefined {
  return entry.summaryPdf === undefined ? undefined : toMarkupPath(layout, entry.summaryPdf);
}

function resolveFromRoot(config: CampaignConfig, relativePath: string): string {
  return path.resolve(config.rootDir, relativePath);
}

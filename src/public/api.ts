import type { Logger } from 'winston';

import { CommandTypesettingEngine } from '../compile/typesetter.js';
import { loadCampaignConfig, type CampaignConfig } from '../config/campaign-config.js';
import { ConfigurationError, describeError } from '../core/errors.js';
import { FileSystemFigureStore } from '../figures/figure-store.js';
import { WorkbookReader } from '../ingest/workbook-reader.js';
import { runReport, type RunCollaborators, type RunSummary } from '../pipeline/run.js';

export type { CampaignConfig, FieldSpec, FigureCategoryConfig } from '../config/campaign-config.js';
export { loadCampaignConfig, parseCampaignConfig } from '../config/campaign-config.js';
export type { Diagnostic, DiagnosticSeverity } from '../core/diagnostics.js';
export {
  AmbiguousFigureError,
  ArtifactCompilationError,
  CompositionError,
  ConfigurationError,
  FatalInputError,
  RecoverableRowError
} from '../core/errors.js';
export type {
  CampaignRecord,
  DocumentArtifact,
  FigureReference,
  Outline,
  RawRow,
  Section,
  SourceRow
} from '../core/record.js';
export type { FigureStore } from '../figures/figure-store.js';
export { FileSystemFigureStore } from '../figures/figure-store.js';
export type { TabularSourceReader } from '../ingest/workbook-reader.js';
export { StaticRowReader, toSourceRows, WorkbookReader } from '../ingest/workbook-reader.js';
export type { TypesetRequest, TypesetResult, TypesettingEngine } from '../compile/typesetter.js';
export { CommandTypesettingEngine } from '../compile/typesetter.js';
export { createRunLogger, type LoggerOptions } from '../logging/logger.js';
export { normalizeRecords } from '../ingest/normalize.js';
export { buildOutline } from '../outline/outline.js';
export { renderSection } from '../render/section.js';
export { runReport } from '../pipeline/run.js';
export type { FailedArtifact, RunCollaborators, RunOptions, RunStatus, RunSummary } from '../pipeline/run.js';
export { formatRunSummaryJson, formatRunSummaryMarkdown } from '../pipeline/run-report.js';

/** Options for the one-call entry point. */
export interface GenerateReportOptions {
  logger?: Logger;
  signal?: AbortSignal;
  /** Overrides `compile.enabled` from the configuration file. */
  compile?: boolean;
  /** Replace any of the file-system and process collaborators. */
  collaborators?: Partial<RunCollaborators>;
}

/** Collaborators backed by the workbook on disk, the figure directories and the configured typesetting command. */
export function createDefaultCollaborators(config: CampaignConfig): RunCollaborators {
  return {
    reader: new WorkbookReader(config.source.path, { sheet: config.source.sheet }),
    figureStore: new FileSystemFigureStore(),
    engine: new CommandTypesettingEngine({ command: config.compile.command, args: config.compile.args })
  };
}

/**
 * Load a campaign file and run the whole pipeline.
 * A configuration file that cannot be read or validated yields a `Failed`
 * summary rather than a rejection, like every other pipeline error.
 */
export async function generateReport(configPath: string, options: GenerateReportOptions = {}): Promise<RunSummary> {
  let config: CampaignConfig;
  try {
    config = await loadCampaignConfig(configPath);
  } catch (error) {
    return configurationFailure(error);
  }

  return runReport(
    config,
    { ...createDefaultCollaborators(config), ...options.collaborators },
    { logger: options.logger, signal: options.signal, compile: options.compile }
  );
}

function configurationFailure(error: unknown): RunSummary {
  const fatalError =
    error instanceof ConfigurationError
      ? { name: error.name, code: error.code, message: error.message }
      : { name: 'ConfigurationError', code: 'CONFIG_UNREADABLE', message: describeError(error) };

  return {
    status: 'Failed',
    stage: 'Ingest',
    fatalError,
    recordCount: 0,
    outline: [],
    skippedRows: [],
    figureWarnings: [],
    failedArtifacts: [],
    orphanedArtifacts: [],
    artifacts: [],
    diagnostics: [{ code: fatalError.code, severity: 'error', message: fatalError.message }],
    diagnosticsBySection: {}
  };
}

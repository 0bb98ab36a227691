import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import { ConfigurationError, describeError } from '../core/errors.js';
import type { FieldType } from '../core/record.js';
import { isGraphicsPathSafe } from '../render/latex.js';

/** What to do with section output left behind by records that no longer exist. */
export type StaleOutputPolicy = 'flag' | 'delete';

/** One column rendered into each record section's field table. */
export interface FieldSpec {
  name: string;
  label: string;
  type?: FieldType;
  precision?: number;
  unit?: string;
}

/**
 * One figure category. Record-scope categories expect one image per record;
 * `pattern` and `caption` accept `{identifier}`, `{category}`, and `{group}`.
 * Group-scope categories take every image whose name contains the expanded
 * `pattern` (default `{group}`); their captions also accept `{file}`.
 */
export interface FigureCategoryConfig {
  category: string;
  /** Directory holding this category's images, relative to the campaign root. */
  directory: string;
  pattern: string;
  caption: string;
  /** Absent means `record`. */
  scope?: 'group';
  /** Record column that disables the slot when it reads `no`, `false`, or `0`. */
  enabledField?: string;
}

/** Tolerances applied when an exact figure name is not on disk. */
export interface FigureMatchingConfig {
  extensions: string[];
  /** Campaign-specific trailing suffixes ignored when comparing names (`_final`, `_v2`). */
  suffixes: string[];
}

export interface FrontMatterConfig {
  id: string;
  title: string;
  body: string;
}

/** Typesetting engine invocation settings. */
export interface CompileConfig {
  enabled: boolean;
  command: string;
  args: string[];
  timeoutMs: number;
  concurrency: number;
  retries: number;
}

export interface OutputConfig {
  /** Absolute path of the master markup file. */
  master: string;
  /** Directory name, relative to the master's directory, holding section trees. */
  matterDir: string;
  staleOutput: StaleOutputPolicy;
}

/** Fully defaulted campaign configuration passed explicitly into each component. */
export interface CampaignConfig {
  project: string;
  title: string;
  /** Absolute directory relative paths resolve against. */
  rootDir: string;
  source: { path: string; sheet: string };
  output: OutputConfig;
  identifierField: string;
  orderingField: string;
  groupField?: string;
  fields: FieldSpec[];
  missingTokens: string[];
  missingToken: string;
  precision: number;
  dateFormat: string;
  figures: FigureCategoryConfig[];
  figureMatching: FigureMatchingConfig;
  /** Placeholder image path relative to the campaign root. */
  placeholder?: string;
  headerLogo?: string;
  frontMatter: FrontMatterConfig[];
  compile: CompileConfig;
  /** Per-section resolve/render pool size. */
  concurrency: number;
}

/** Options for building a config from an already-parsed object. */
export interface ParseCampaignConfigOptions {
  rootDir: string;
  filePath?: string;
}

export const DEFAULT_MISSING_TOKENS = ['', '-', 'N/A', 'NA'];
export const DEFAULT_FIGURE_PATTERN = '{identifier}_{category}.png';
export const DEFAULT_FIGURE_CAPTION = '{identifier} {category}';
export const DEFAULT_GROUP_FIGURE_PATTERN = '{group}';
export const DEFAULT_GROUP_FIGURE_CAPTION = '{group} {category}: {file}';
export const DEFAULT_FIGURE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.pdf'];

const DEFAULT_FRONT_MATTER: FrontMatterConfig[] = [
  {
    id: 'executive-summary',
    title: 'Executive Summary',
    body: 'This report documents the {title} for {project}.\nBelow is the breakdown of test locations covered by this campaign.'
  }
];

const DEFAULT_COMPILE: CompileConfig = {
  enabled: true,
  command: 'tectonic',
  args: ['--keep-logs', '--synctex'],
  timeoutMs: 300_000,
  concurrency: 2,
  retries: 0
};

/** Load and validate a campaign YAML file; relative paths resolve against its directory. */
export async function loadCampaignConfig(filePath: string): Promise<CampaignConfig> {
  const absolutePath = path.resolve(filePath);
  const raw = await readFile(absolutePath, 'utf8');

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigurationError('CONFIG_INVALID', `invalid YAML: ${describeError(error)}`, absolutePath);
  }

  return parseCampaignConfig(parsed, { rootDir: path.dirname(absolutePath), filePath: absolutePath });
}

/** Validate an untyped config object and fill defaults. */
export function parseCampaignConfig(input: unknown, options: ParseCampaignConfigOptions): CampaignConfig {
  const filePath = options.filePath;
  const obj = readObject(filePath, input, 'campaign configuration');
  const rootDir = path.resolve(options.rootDir);

  const source = readObject(filePath, obj.source, 'source');
  const output = readOptionalObject(filePath, obj, 'output') ?? {};

  const config: CampaignConfig = {
    project: readRequiredString(filePath, obj, 'project'),
    title: readOptionalString(filePath, obj, 'title') ?? 'Field Test Report',
    rootDir,
    source: {
      path: path.resolve(rootDir, readRequiredString(filePath, source, 'path')),
      sheet: readOptionalString(filePath, source, 'sheet') ?? 'Tests'
    },
    output: {
      master: path.resolve(rootDir, readOptionalString(filePath, output, 'master') ?? 'report.tex'),
      matterDir: readOptionalString(filePath, output, 'matterDir') ?? 'Matter',
      staleOutput: readOptionalStaleOutput(filePath, output, 'staleOutput') ?? 'flag'
    },
    identifierField: readRequiredString(filePath, obj, 'identifierField'),
    orderingField: readRequiredString(filePath, obj, 'orderingField'),
    fields: readFieldSpecs(filePath, obj, 'fields'),
    missingTokens: readOptionalStringArray(filePath, obj, 'missingTokens') ?? [...DEFAULT_MISSING_TOKENS],
    missingToken: readOptionalString(filePath, obj, 'missingToken') ?? 'N/A',
    precision: readOptionalPrecision(filePath, obj, 'precision') ?? 2,
    dateFormat: readOptionalString(filePath, obj, 'dateFormat') ?? 'yyyy-MM-dd HH:mm',
    figures: readFigureCategories(filePath, obj, 'figures'),
    figureMatching: readFigureMatching(filePath, obj, 'figureMatching'),
    frontMatter: readFrontMatter(filePath, obj, 'frontMatter'),
    compile: readCompile(filePath, obj, 'compile'),
    concurrency: readOptionalPositiveInteger(filePath, obj, 'concurrency') ?? 4
  };

  const groupField = readOptionalString(filePath, obj, 'groupField');
  if (groupField !== undefined) {
    config.groupField = groupField;
  } else if (config.figures.some((figure) => figure.scope === 'group')) {
    throw new ConfigurationError('CONFIG_INVALID', "group-scope figures need a 'groupField'", filePath);
  }
  const placeholder = readOptionalGraphicsPath(filePath, obj, 'placeholder');
  if (placeholder !== undefined) {
    config.placeholder = placeholder;
  }
  const headerLogo = readOptionalGraphicsPath(filePath, obj, 'headerLogo');
  if (headerLogo !== undefined) {
    config.headerLogo = headerLogo;
  }

  if (path.isAbsolute(config.output.matterDir) || config.output.matterDir.split(/[\\/]/).includes('..')) {
    throw new ConfigurationError(
      'CONFIG_INVALID',
      "'output.matterDir' must be a relative path inside the output root",
      filePath
    );
  }

  return config;
}

/** Parse the `fields` list; bare strings are shorthand for `{ name, label: name }`. */
function readFieldSpecs(filePath: string | undefined, obj: Record<string, unknown>, key: string): FieldSpec[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be an array`, filePath);
  }

  return value.map((entry, index) => {
    if (typeof entry === 'string' && entry.trim() !== '') {
      return { name: entry, label: entry };
    }

    const item = readObject(filePath, entry, `${key}[${index}]`);
    const name = readRequiredString(filePath, item, 'name');
    const spec: FieldSpec = { name, label: readOptionalString(filePath, item, 'label') ?? name };

    const type = readOptionalString(filePath, item, 'type');
    if (type !== undefined) {
      if (!isFieldType(type)) {
        throw new ConfigurationError('CONFIG_INVALID', `'${key}[${index}].type' must be number, date, or text`, filePath);
      }
      spec.type = type;
    }
    const precision = readOptionalPrecision(filePath, item, 'precision');
    if (precision !== undefined) {
      spec.precision = precision;
    }
    const unit = readOptionalString(filePath, item, 'unit');
    if (unit !== undefined) {
      spec.unit = unit;
    }
    return spec;
  });
}

function isFieldType(value: string): value is FieldType {
  return value === 'number' || value === 'date' || value === 'text';
}

/** Parse figure categories; category names must be unique. */
function readFigureCategories(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): FigureCategoryConfig[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be an array`, filePath);
  }

  const seen = new Set<string>();
  return value.map((entry, index) => {
    const item = readObject(filePath, entry, `${key}[${index}]`);
    const category = readRequiredString(filePath, item, 'category');
    if (seen.has(category)) {
      throw new ConfigurationError('CONFIG_INVALID', `duplicate figure category '${category}'`, filePath);
    }
    seen.add(category);

    const scope = readOptionalString(filePath, item, 'scope') ?? 'record';
    if (scope !== 'record' && scope !== 'group') {
      throw new ConfigurationError('CONFIG_INVALID', `'${key}[${index}].scope' must be record or group`, filePath);
    }
    const grouped = scope === 'group';
    const figure: FigureCategoryConfig = {
      category,
      directory: readRequiredString(filePath, item, 'directory'),
      pattern:
        readOptionalString(filePath, item, 'pattern') ?? (grouped ? DEFAULT_GROUP_FIGURE_PATTERN : DEFAULT_FIGURE_PATTERN),
      caption:
        readOptionalString(filePath, item, 'caption') ?? (grouped ? DEFAULT_GROUP_FIGURE_CAPTION : DEFAULT_FIGURE_CAPTION)
    };
    const requiredToken = grouped ? '{group}' : '{identifier}';
    if (!figure.pattern.includes(requiredToken)) {
      throw new ConfigurationError(
        'CONFIG_INVALID',
        `'${key}[${index}].pattern' must contain the ${requiredToken} token`,
        filePath
      );
    }

    const enabledField = readOptionalString(filePath, item, 'enabledField');
    if (grouped) {
      if (enabledField !== undefined) {
        throw new ConfigurationError(
          'CONFIG_INVALID',
          `'${key}[${index}].enabledField' applies to record-scope figures only`,
          filePath
        );
      }
      figure.scope = 'group';
    } else if (enabledField !== undefined) {
      figure.enabledField = enabledField;
    }
    return figure;
  });
}

function readFigureMatching(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): FigureMatchingConfig {
  const matching = readOptionalObject(filePath, obj, key) ?? {};
  const extensions = readOptionalStringArray(filePath, matching, 'extensions') ?? DEFAULT_FIGURE_EXTENSIONS;
  return {
    extensions: extensions.map((extension) => (extension.startsWith('.') ? extension : `.${extension}`).toLowerCase()),
    suffixes: readOptionalStringArray(filePath, matching, 'suffixes') ?? []
  };
}

function readFrontMatter(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): FrontMatterConfig[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return DEFAULT_FRONT_MATTER.map((entry) => ({ ...entry }));
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be an array`, filePath);
  }

  return value.map((entry, index) => {
    const item = readObject(filePath, entry, `${key}[${index}]`);
    return {
      id: readRequiredString(filePath, item, 'id'),
      title: readRequiredString(filePath, item, 'title'),
      body: readOptionalString(filePath, item, 'body') ?? ''
    };
  });
}

function readCompile(filePath: string | undefined, obj: Record<string, unknown>, key: string): CompileConfig {
  const compile = readOptionalObject(filePath, obj, key) ?? {};
  return {
    enabled: readOptionalBoolean(filePath, compile, 'enabled') ?? DEFAULT_COMPILE.enabled,
    command: readOptionalString(filePath, compile, 'command') ?? DEFAULT_COMPILE.command,
    args: readOptionalStringArray(filePath, compile, 'args') ?? [...DEFAULT_COMPILE.args],
    timeoutMs: readOptionalPositiveInteger(filePath, compile, 'timeoutMs') ?? DEFAULT_COMPILE.timeoutMs,
    concurrency: readOptionalPositiveInteger(filePath, compile, 'concurrency') ?? DEFAULT_COMPILE.concurrency,
    retries: readOptionalNonNegativeInteger(filePath, compile, 'retries') ?? DEFAULT_COMPILE.retries
  };
}

function readObject(filePath: string | undefined, value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigurationError('CONFIG_INVALID', `'${label}' must be an object`, filePath);
  }
  return value as Record<string, unknown>;
}

function readOptionalObject(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return readObject(filePath, value, key);
}

/** Read a required non-empty string field. */
function readRequiredString(filePath: string | undefined, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError('CONFIG_INVALID', `missing or invalid '${key}'`, filePath);
  }
  return value;
}

function readOptionalString(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be a string`, filePath);
  }

  return value;
}

function readOptionalStringArray(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be an array of strings`, filePath);
  }

  return value;
}

function readOptionalBoolean(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'boolean') {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be a boolean`, filePath);
  }

  return value;
}

function readOptionalNonNegativeInteger(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be a non-negative integer`, filePath);
  }

  return value;
}

function readOptionalPositiveInteger(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): number | undefined {
  const value = readOptionalNonNegativeInteger(filePath, obj, key);
  if (value === 0) {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be a positive integer`, filePath);
  }
  return value;
}

/** Image paths written into markup; see `isGraphicsPathSafe`. */
function readOptionalGraphicsPath(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): string | undefined {
  const value = readOptionalString(filePath, obj, key);
  if (value !== undefined && !isGraphicsPathSafe(value.split('\\').join('/'))) {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must not contain %, #, or braces`, filePath);
  }
  return value;
}

/** Decimal places for number formatting. */
const MAX_PRECISION = 20;

function readOptionalPrecision(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): number | undefined {
  const value = readOptionalNonNegativeInteger(filePath, obj, key);
  if (value !== undefined && value > MAX_PRECISION) {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be between 0 and ${MAX_PRECISION}`, filePath);
  }
  return value;
}

function readOptionalStaleOutput(
  filePath: string | undefined,
  obj: Record<string, unknown>,
  key: string
): StaleOutputPolicy | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (value !== 'flag' && value !== 'delete') {
    throw new ConfigurationError('CONFIG_INVALID', `'${key}' must be 'flag' or 'delete'`, filePath);
  }

  return value;
}

#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';

import { describeError } from '../core/errors.js';
import { createRunLogger } from '../logging/logger.js';
import { formatRunSummaryJson, formatRunSummaryMarkdown } from '../pipeline/run-report.js';
import type { RunStatus } from '../pipeline/run.js';
import { generateReport } from '../public/api.js';

const USAGE = `Usage: campaign-report <config.yaml> [options]

Options:
  --no-compile           Write markup only; skip the typesetting stage.
  --summary-json <path>  Write the run summary as JSON.
  --summary-md <path>    Write the run summary as markdown.
  --log-file <path>      Append log lines to a file.
  --log-level <level>    error | warn | info | debug (default: info).
  -h, --help             Show this message.
`;

/** Process exit code for each terminal run state. */
export const EXIT_CODES: Record<RunStatus, number> = {
  Done: 0,
  Failed: 1,
  PartialFailure: 2
};

/** Exit code for a command line that could not be parsed. */
export const USAGE_EXIT_CODE = 64;

export interface CliArguments {
  configPath: string;
  compile: boolean;
  summaryJson?: string;
  summaryMarkdown?: string;
  logFile?: string;
  logLevel?: string;
}

/** Parse argv (without the node and script entries); `undefined` means help was requested. */
export function parseCliArguments(argv: readonly string[]): CliArguments | undefined {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      'no-compile': { type: 'boolean', default: false },
      'summary-json': { type: 'string' },
      'summary-md': { type: 'string' },
      'log-file': { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

  if (values.help) {
    return undefined;
  }

  const [configPath, ...extra] = positionals;
  if (configPath === undefined) {
    throw new Error('Missing campaign configuration path.');
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected arguments: ${extra.join(' ')}`);
  }

  return {
    configPath,
    compile: !values['no-compile'],
    summaryJson: values['summary-json'],
    summaryMarkdown: values['summary-md'],
    logFile: values['log-file'],
    logLevel: values['log-level']
  };
}

/** Run the CLI and resolve to the process exit code. */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArguments | undefined;
  try {
    args = parseCliArguments(argv);
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n\n${USAGE}`);
    return USAGE_EXIT_CODE;
  }

  if (!args) {
    process.stdout.write(USAGE);
    return 0;
  }

  const logger = createRunLogger({ level: args.logLevel, file: args.logFile });
  const summary = await generateReport(args.configPath, { logger, compile: args.compile });
  const markdown = formatRunSummaryMarkdown(summary);

  if (args.summaryJson) {
    await writeReportFile(args.summaryJson, formatRunSummaryJson(summary));
  }
  if (args.summaryMarkdown) {
    await writeReportFile(args.summaryMarkdown, markdown);
  }

  process.stdout.write(markdown);
  logger.end();
  return EXIT_CODES[summary.status];
}

async function writeReportFile(filePath: string, content: string): Promise<void> {
  const absolutePath = path.resolve(filePath);
  await mkdir(path.dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, content, 'utf8');
}

/** True when this module is the process entry, including through an npm bin symlink. */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

if (isEntryPoint()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${describeError(error)}\n`);
      process.exitCode = 1;
    });
}

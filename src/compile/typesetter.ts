import { execFile, type ExecFileException } from 'node:child_process';
import path from 'node:path';

/** One typesetting invocation. */
export interface TypesetRequest {
  markupPath: string;
  /** Directory the engine runs in; relative includes resolve against it. */
  workingDirectory: string;
  timeoutMs: number;
}

/** Exit status and captured output of one invocation. */
export interface TypesetResult {
  /** `null` when the process never exited normally (spawn failure, signal). */
  exitCode: number | null;
  log: string;
  timedOut: boolean;
}

/** Typesetting collaborator: markup file in, exit status and log out. Never rejects for engine failures. */
export interface TypesettingEngine {
  compile(request: TypesetRequest): Promise<TypesetResult>;
}

export interface CommandEngineOptions {
  command?: string;
  args?: readonly string[];
  /** Cap on captured stdout/stderr per invocation, in bytes. */
  maxBufferBytes?: number;
}

const DEFAULT_MAX_BUFFER_BYTES = 16 * 1024 * 1024;

/** Runs an external typesetting command, `tectonic` by default, as `<command> <file> ...args`. */
export class CommandTypesettingEngine implements TypesettingEngine {
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly maxBufferBytes: number;

  constructor(options: CommandEngineOptions = {}) {
    this.command = options.command ?? 'tectonic';
    this.args = options.args ?? ['--keep-logs', '--synctex'];
    this.maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  }

  compile(request: TypesetRequest): Promise<TypesetResult> {
    const target = path.relative(request.workingDirectory, request.markupPath).split(path.sep).join('/');

    return new Promise((resolve) => {
      execFile(
        this.command,
        [target, ...this.args],
        {
          cwd: request.workingDirectory,
          timeout: request.timeoutMs,
          killSignal: 'SIGKILL',
          maxBuffer: this.maxBufferBytes,
          encoding: 'utf8'
        },
        (error, stdout, stderr) => {
          const output = joinOutput(stdout, stderr);
          if (!error) {
            resolve({ exitCode: 0, log: output, timedOut: false });
            return;
          }
          resolve(toFailedResult(error, output));
        }
      );
    });
  }
}

function toFailedResult(error: ExecFileException, output: string): TypesetResult {
  const timedOut = error.killed === true && error.signal === 'SIGKILL';
  const exitCode = typeof error.code === 'number' ? error.code : null;
  const log = output === '' ? error.message : `${output}\n${error.message}`;
  return { exitCode, log, timedOut };
}

function joinOutput(stdout: string, stderr: string): string {
  return [stdout.trimEnd(), stderr.trimEnd()].filter((part) => part !== '').join('\n');
}

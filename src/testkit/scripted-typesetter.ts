import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { TypesetRequest, TypesetResult, TypesettingEngine } from '../compile/typesetter.js';
import { replaceExtension } from '../compose/layout.js';

/** Per-call override; `undefined` means a successful compile. */
export type TypesetScript = (request: TypesetRequest, attempt: number) => Partial<TypesetResult> | undefined;

/**
 * Typesetting engine that never spawns a process. Successful calls write a
 * stub PDF beside the markup file so downstream checks see real output.
 */
export class ScriptedTypesettingEngine implements TypesettingEngine {
  readonly requests: TypesetRequest[] = [];
  private readonly attempts = new Map<string, number>();

  constructor(private readonly script: TypesetScript = () => undefined) {}

  async compile(request: TypesetRequest): Promise<TypesetResult> {
    this.requests.push(request);
    const attempt = (this.attempts.get(request.markupPath) ?? 0) + 1;
    this.attempts.set(request.markupPath, attempt);

    const result: TypesetResult = {
      exitCode: 0,
      log: `compiled ${path.basename(request.markupPath)}`,
      timedOut: false,
      ...this.script(request, attempt)
    };

    if (result.exitCode === 0 && !result.timedOut) {
      await writeFile(replaceExtension(request.markupPath, '.pdf'), '%PDF-1.4\n% stub\n', 'utf8');
    }
    return result;
  }

  /** Markup file names compiled so far, in call order. */
  compiledNames(): string[] {
    return this.requests.map((request) => path.basename(request.markupPath));
  }
}

/** Script that fails every call whose markup file name satisfies `matches`. */
export function failWhen(
  matches: (fileName: string) => boolean,
  failure: Partial<TypesetResult> = { exitCode: 1, log: 'error: scripted failure' }
): TypesetScript {
  return (request) => (matches(path.basename(request.markupPath)) ? failure : undefined);
}

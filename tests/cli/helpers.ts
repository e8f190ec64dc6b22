/**
 * Shared fixtures for CLI tests
 */

import { PassThrough, Writable } from 'node:stream';
import type { CliIO } from '../../src/cli-exec.js';

/** Writable that keeps everything written to it */
export class Collector extends Writable {
  text = '';

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.text += chunk.toString();
    callback();
  }
}

export interface TestIO extends CliIO {
  readonly output: Collector;
  readonly error: Collector;
}

/** CLI streams over an in-memory input that has already ended */
export function createTestIO(
  cwd: string,
  input = '',
  env: NodeJS.ProcessEnv = {}
): TestIO {
  const stdin = new PassThrough();
  stdin.end(input);
  return {
    input: stdin,
    output: new Collector(),
    error: new Collector(),
    cwd,
    env,
  };
}

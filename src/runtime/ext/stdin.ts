/**
 * Synchronous standard input reader used by read_input().
 */

import { readSync } from 'node:fs';

const NEWLINE = 0x0a;

/** Pause between reads while non-blocking stdin has no data */
const RETRY_DELAY_MS = 10;

/** Fills the buffer from the start; returns the byte count, 0 at end of input */
export type ByteReader = (buffer: Buffer) => number;

const readFromStdin: ByteReader = (buffer) =>
  readSync(0, buffer, 0, buffer.length, null);

const retryClock = new Int32Array(new SharedArrayBuffer(4));

function isWouldBlock(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EAGAIN';
}

/**
 * Read one line from file descriptor 0, blocking until a newline or end
 * of input. The newline is included. Returns null when input is already
 * exhausted.
 */
export function readStdinLine(read: ByteReader = readFromStdin): string | null {
  const bytes: number[] = [];
  const buffer = Buffer.alloc(1);

  for (;;) {
    let count: number;
    try {
      count = read(buffer);
    } catch (err) {
      if (isWouldBlock(err)) {
        Atomics.wait(retryClock, 0, 0, RETRY_DELAY_MS);
        continue;
      }
      throw err;
    }

    if (count === 0) break;

    const byte = buffer[0] ?? 0;
    bytes.push(byte);
    if (byte === NEWLINE) break;
  }

  if (bytes.length === 0) return null;
  return Buffer.from(bytes).toString('utf8');
}

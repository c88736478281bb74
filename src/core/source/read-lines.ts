/**
 * Line source over a readable stream (stdin by default)
 */

import * as readline from 'node:readline';
import type { Readable } from 'node:stream';

export interface ReadLinesOptions {
  /** Drop lines that are empty after trimming */
  skipBlank?: boolean;
  /** Closes the reader and detaches it from the stream, even mid-read */
  signal?: AbortSignal;
}

export async function* readLines(
  input: Readable = process.stdin,
  options: ReadLinesOptions = {},
): AsyncGenerator<string> {
  if (options.signal?.aborted) return;
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity,
    terminal: false,
    signal: options.signal,
  });
  try {
    for await (const line of rl) {
      if (options.skipBlank && line.trim() === '') continue;
      yield line;
    }
  } finally {
    rl.close();
  }
}

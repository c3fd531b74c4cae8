import { createInterface } from 'readline';
import type { Readable } from 'stream';

export interface LineReaderOptions {
  /** Lines handed to `onBatch` at a time (default: 500) */
  batchSize?: number;
}

export interface LineReaderResult {
  lineCount: number;
  batchCount: number;
}

/**
 * Callback receiving raw lines in file order. Each call settles before the
 * next batch is delivered.
 */
export type LineBatchCallback = (lines: string[]) => void | Promise<void>;

/**
 * Stream a delimited text file as raw lines. Lines are not split or trimmed;
 * only the line terminator (`\n` or `\r\n`) is dropped, and blank lines are
 * skipped.
 */
export async function readRawRows(
  stream: Readable,
  onBatch: LineBatchCallback,
  options: LineReaderOptions = {}
): Promise<LineReaderResult> {
  const batchSize = options.batchSize && options.batchSize > 0 ? options.batchSize : 500;
  const reader = createInterface({ input: stream, crlfDelay: Infinity });

  let batch: string[] = [];
  let lineCount = 0;
  let batchCount = 0;

  try {
    for await (const rawLine of reader) {
      const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
      if (line === '') continue;

      batch.push(line);
      lineCount++;

      if (batch.length >= batchSize) {
        await onBatch(batch);
        batchCount++;
        batch = [];
      }
    }

    if (batch.length > 0) {
      await onBatch(batch);
      batchCount++;
    }
  } finally {
    // Releases the file descriptor when a batch callback throws
    reader.close();
    stream.destroy();
  }

  return { lineCount, batchCount };
}

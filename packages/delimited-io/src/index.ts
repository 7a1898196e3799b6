import { once } from 'node:events';
import { createReadStream } from 'node:fs';
import { Readable, Writable } from 'node:stream';
import { parse } from 'csv-parse';
import { Row, RowSourceOptions } from '@rowfold/contracts';
import { RowfoldError } from '@rowfold/core';

export type RowSource = { path: string } | { stream: Readable };

export type RowSink = {
  write: (row: Row) => Promise<void>;
  rowsWritten: () => number;
};

const describeSource = (source: RowSource): string =>
  'path' in source ? source.path : '<stdin>';

const sourceUnavailable = (source: RowSource, error: unknown): RowfoldError =>
  new RowfoldError(
    'SourceUnavailable',
    `unable to read ${describeSource(source)}: ${error instanceof Error ? error.message : String(error)}`,
    { source: describeSource(source) }
  );

const toRow = (record: unknown): Row => {
  if (!Array.isArray(record)) {
    throw new Error('Delimited parser produced a non-array record');
  }

  return record.map((value) => String(value).trim());
};

const openSource = async (source: RowSource, highWaterMark?: number): Promise<Readable> => {
  if ('stream' in source) {
    return source.stream;
  }

  const input = createReadStream(source.path, {
    encoding: 'utf8',
    highWaterMark
  });

  try {
    await once(input, 'open');
  } catch (error) {
    throw sourceUnavailable(source, error);
  }

  return input;
};

/**
 * Streams delimited rows from a file or an already open stream. Fields are
 * trimmed; rows may differ in width. Errors from the underlying stream
 * surface as `SourceUnavailable`.
 */
export const readRows = async function* (
  source: RowSource,
  options: RowSourceOptions
): AsyncGenerator<Row> {
  const input = await openSource(source, options.highWaterMark);

  const parser = parse({
    delimiter: options.delimiter,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: options.skipEmptyLines ?? true
  });

  input.on('error', (error) => {
    parser.destroy(sourceUnavailable(source, error));
  });

  input.pipe(parser);

  try {
    for await (const record of parser) {
      yield toRow(record);
    }
  } finally {
    input.unpipe(parser);

    if ('path' in source) {
      input.destroy();
    }
  }
};

export const formatRow = (row: Row, delimiter: string): string => `${row.join(delimiter)}\n`;

export const createRowSink = (output: Writable, delimiter: string): RowSink => {
  let count = 0;

  const writerError = new Promise<never>((_resolve, reject) => {
    output.once('error', reject);
  });
  writerError.catch(() => undefined);

  return {
    async write(row: Row): Promise<void> {
      if (!output.write(formatRow(row, delimiter))) {
        await Promise.race([once(output, 'drain'), writerError]);
      }

      count += 1;
    },
    rowsWritten(): number {
      return count;
    }
  };
};

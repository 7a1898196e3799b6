import { Readable, Writable } from 'node:stream';
import { Command, CommanderError } from 'commander';
import { Logger } from 'pino';
import { OperationSummary, Row } from '@rowfold/contracts';
import { AppConfig, RowfoldError, isRowfoldError } from '@rowfold/core';
import { RowSink, RowSource, createRowSink, readRows } from '@rowfold/delimited-io';
import { parseFieldFunctions, parsePickList, parseSortKey } from './field-specs';
import { runMerge } from './merge-engine';
import { runPick } from './pick';
import { runSort } from './sort';

export const ROWFOLD_VERSION = '0.1.0';

export type CliIo = {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
};

export type CliDeps = {
  config: AppConfig;
  logger: Logger;
  io: CliIo;
};

type MergeOptions = {
  delimiter: string;
  field_function: string[] | true;
};

type PickOptions = {
  delimiter: string;
  fields: string;
};

type SortOptions = {
  delimiter: string;
  fields: string[];
};

type Operation = (rows: AsyncIterable<Row>, sink: RowSink) => Promise<OperationSummary>;

const FIELD_FUNCTION_HELP =
  'field:function merge operation for a field that is not expected to be identical ' +
  'across rows. Functions are: sum, min, max, mean, median, stdev, first, last, ignore. ' +
  'E.g., "-f 0:max". Each result is appended to the output as a new field.';

const SORT_FIELDS_HELP =
  'zero-indexed fields on which to sort, each with an optional type qualifier ' +
  '(string, int, float). E.g., "-f 3:float". The last field given is the primary key.';

export const createCliApp = (deps: CliDeps): Command => {
  const program = new Command();

  const execute = async (
    operation: string,
    filename: string | undefined,
    delimiter: string,
    run: Operation
  ): Promise<void> => {
    const source: RowSource = filename ? { path: filename } : { stream: deps.io.stdin };
    const rows = readRows(source, {
      delimiter,
      highWaterMark: deps.config.streamHighWaterMark,
      skipEmptyLines: deps.config.skipEmptyLines
    });
    const sink = createRowSink(deps.io.stdout, delimiter);

    deps.logger.debug({ operation, source: filename ?? '<stdin>', delimiter }, 'Operation started');

    const summary = await run(rows, sink);

    deps.logger.debug(
      { operation, rowsIn: summary.rowsIn, rowsOut: sink.rowsWritten() },
      'Operation finished'
    );
  };

  const requireDelimiter = (delimiter: string): string => {
    if (!delimiter) {
      throw new RowfoldError('MalformedSpec', 'delimiter must not be empty', { delimiter });
    }

    return delimiter;
  };

  program
    .name('rowfold')
    .description('Perform operations on delimited text files or input.')
    .version(ROWFOLD_VERSION, '-v, --version', 'Version information.')
    .helpOption('-h, --help', 'This usage message.')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        deps.io.stdout.write(text);
      },
      writeErr: (text) => {
        deps.io.stderr.write(text);
      }
    });

  program
    .command('merge')
    .description('Merge similar sequential lines.')
    .argument('[filename]', 'delimited input file. Default: stdin.')
    .option('-d, --delimiter <delimiter>', 'field delimiter.', deps.config.defaultDelimiter)
    .option('-f, --field_function [specs...]', FIELD_FUNCTION_HELP, [])
    .action(async (filename: string | undefined, options: MergeOptions) => {
      const delimiter = requireDelimiter(options.delimiter);
      // A bare -f means no specs.
      const specs = options.field_function === true ? [] : options.field_function;
      const bindings = parseFieldFunctions(specs);

      await execute('merge', filename, delimiter, (rows, sink) => runMerge(rows, bindings, sink));
    });

  program
    .command('pick')
    .description('Pick a field or set of fields from each row.')
    .argument('[filename]', 'delimited input file. Default: stdin.')
    .option('-d, --delimiter <delimiter>', 'field delimiter.', deps.config.defaultDelimiter)
    .requiredOption('-f, --fields <fields>', 'comma-separated list of (zero-indexed) fields.')
    .action(async (filename: string | undefined, options: PickOptions) => {
      const delimiter = requireDelimiter(options.delimiter);
      const fields = parsePickList(options.fields);

      await execute('pick', filename, delimiter, (rows, sink) => runPick(rows, fields, sink));
    });

  program
    .command('sort')
    .description('Sort rows based on the specified fields.')
    .argument('[filename]', 'delimited input file. Default: stdin.')
    .option('-d, --delimiter <delimiter>', 'field delimiter.', deps.config.defaultDelimiter)
    .requiredOption('-f, --fields <fields...>', SORT_FIELDS_HELP)
    .action(async (filename: string | undefined, options: SortOptions) => {
      const delimiter = requireDelimiter(options.delimiter);
      const keys = options.fields.map((spec) => parseSortKey(spec));

      await execute('sort', filename, delimiter, (rows, sink) => runSort(rows, keys, sink));
    });

  return program;
};

/**
 * Runs one invocation and resolves with the process exit code. Failures are
 * reported on stderr as `rowfold error: <message>` and logged with their kind.
 */
export const runCli = async (args: string[], deps: CliDeps): Promise<number> => {
  const program = createCliApp(deps);

  if (args.length === 0) {
    program.outputHelp();
    return 0;
  }

  try {
    await program.parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    deps.logger.error(
      {
        err: error,
        kind: isRowfoldError(error) ? error.kind : undefined
      },
      'Operation failed'
    );

    const message = error instanceof Error ? error.message : String(error);
    deps.io.stderr.write(`rowfold error: ${message}\n`);

    return 1;
  }
};

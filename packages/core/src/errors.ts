import { ErrorKind } from '@rowfold/contracts';

/**
 * Fatal error for a single invocation. Every failure the operations raise
 * carries one of the {@link ErrorKind} values so the CLI can report it
 * uniformly.
 */
export class RowfoldError extends Error {
  readonly kind: ErrorKind;

  readonly context: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'RowfoldError';
    this.kind = kind;
    this.context = context;
  }
}

export const isRowfoldError = (error: unknown): error is RowfoldError =>
  error instanceof RowfoldError;

export const fieldOutOfRange = (field: number, row: readonly string[]): RowfoldError =>
  new RowfoldError(
    'FieldIndexOutOfRange',
    `field ${field} is out of range for a row with ${row.length} field(s)`,
    { field, rowLength: row.length }
  );

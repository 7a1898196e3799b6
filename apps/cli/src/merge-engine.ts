import { FieldFunctionBinding, OperationSummary, Row } from '@rowfold/contracts';
import { fieldOutOfRange } from '@rowfold/core';
import { keysEqual, projectComparable } from './comparator';

export type RowWriter = {
  write: (row: Row) => Promise<void>;
};

export type MergeAccumulator = {
  consume: (row: Row) => Row | null;
  finish: () => Row | null;
  summary: () => OperationSummary;
};

/**
 * The open group: its comparable key plus, per aggregated field, every raw
 * value seen so far in input order.
 */
class GroupState {
  readonly values = new Map<number, string[]>();

  constructor(
    readonly key: readonly string[],
    row: Row,
    aggregated: ReadonlySet<number>
  ) {
    for (const field of aggregated) {
      this.values.set(field, [row[field]]);
    }
  }

  append(row: Row): void {
    for (const [field, values] of this.values) {
      values.push(row[field]);
    }
  }

  flush(bindings: readonly FieldFunctionBinding[]): Row {
    const output = [...this.key];

    for (const binding of bindings) {
      const result = binding.reduce(this.values.get(binding.field) ?? []);

      if (result !== null) {
        output.push(result);
      }
    }

    return output;
  }
}

/**
 * Folds runs of adjacent rows that agree on every non-aggregated field.
 * Only the current group is held; a row with a different key closes it.
 */
export const createMergeAccumulator = (
  bindings: readonly FieldFunctionBinding[]
): MergeAccumulator => {
  const aggregated: ReadonlySet<number> = new Set(bindings.map((binding) => binding.field));
  const widest = Math.max(-1, ...aggregated);

  let current: GroupState | null = null;
  let rowsIn = 0;
  let rowsOut = 0;

  const open = (row: Row, key = projectComparable(row, aggregated)): GroupState =>
    new GroupState(key, row, aggregated);

  const emit = (group: GroupState): Row => {
    rowsOut += 1;
    return group.flush(bindings);
  };

  return {
    consume(row: Row): Row | null {
      if (widest >= row.length) {
        throw fieldOutOfRange(widest, row);
      }

      rowsIn += 1;

      if (!current) {
        current = open(row);
        return null;
      }

      const key = projectComparable(row, aggregated);

      if (keysEqual(key, current.key)) {
        current.append(row);
        return null;
      }

      const flushed = emit(current);
      current = open(row, key);
      return flushed;
    },
    finish(): Row | null {
      if (!current) {
        return null;
      }

      const flushed = emit(current);
      current = null;
      return flushed;
    },
    summary(): OperationSummary {
      return { rowsIn, rowsOut };
    }
  };
};

export const runMerge = async (
  rows: AsyncIterable<Row>,
  bindings: readonly FieldFunctionBinding[],
  writer: RowWriter
): Promise<OperationSummary> => {
  const accumulator = createMergeAccumulator(bindings);

  for await (const row of rows) {
    const flushed = accumulator.consume(row);

    if (flushed) {
      await writer.write(flushed);
    }
  }

  const last = accumulator.finish();

  if (last) {
    await writer.write(last);
  }

  return accumulator.summary();
};

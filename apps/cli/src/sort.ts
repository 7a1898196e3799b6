import { OperationSummary, Row, SortKey } from '@rowfold/contracts';
import { RowfoldError, fieldOutOfRange } from '@rowfold/core';
import { parseFloatStrict } from './aggregations';
import { RowWriter } from './merge-engine';

const INT_PATTERN = /^[+-]?\d+$/;

type Comparable = string | number | bigint;

const parseIntStrict = (value: string): bigint => {
  const text = value.trim();

  if (!INT_PATTERN.test(text)) {
    throw new RowfoldError('NonNumericValue', `non-integer value '${value}' in int sort key`, {
      value
    });
  }

  return BigInt(text);
};

const sortValue = (row: Row, key: SortKey): Comparable => {
  if (key.field >= row.length) {
    throw fieldOutOfRange(key.field, row);
  }

  const raw = row[key.field];

  switch (key.type) {
    case 'string':
      return raw;
    case 'int':
      return parseIntStrict(raw);
    case 'float':
      return parseFloatStrict(raw, 'float sort key');
    default: {
      const unreachable: never = key.type;
      throw new Error(`Unsupported sort type: ${String(unreachable)}`);
    }
  }
};

// Code point order, so astral characters sort after U+E000..U+FFFF.
const compareText = (left: string, right: string): number => {
  const leftPoints = Array.from(left, (char) => char.codePointAt(0) ?? 0);
  const rightPoints = Array.from(right, (char) => char.codePointAt(0) ?? 0);
  const length = Math.min(leftPoints.length, rightPoints.length);

  for (let index = 0; index < length; index += 1) {
    if (leftPoints[index] !== rightPoints[index]) {
      return leftPoints[index] < rightPoints[index] ? -1 : 1;
    }
  }

  return leftPoints.length - rightPoints.length;
};

const compare = (left: Comparable, right: Comparable): number => {
  if (typeof left === 'string' && typeof right === 'string') {
    return compareText(left, right);
  }

  if (left < right) {
    return -1;
  }

  return left > right ? 1 : 0;
};

/**
 * Applies one stable sort per key, in the order given. The last key is
 * therefore the primary order and earlier keys break its ties.
 */
export const sortRows = (rows: readonly Row[], keys: readonly SortKey[]): Row[] => {
  let sorted = [...rows];

  for (const key of keys) {
    const decorated = sorted.map((row) => ({ row, value: sortValue(row, key) }));
    decorated.sort((left, right) => compare(left.value, right.value));
    sorted = decorated.map((entry) => entry.row);
  }

  return sorted;
};

export const runSort = async (
  rows: AsyncIterable<Row>,
  keys: readonly SortKey[],
  writer: RowWriter
): Promise<OperationSummary> => {
  const buffered: Row[] = [];

  for await (const row of rows) {
    buffered.push(row);
  }

  const sorted = sortRows(buffered, keys);

  for (const row of sorted) {
    await writer.write(row);
  }

  return { rowsIn: buffered.length, rowsOut: sorted.length };
};

import { Row } from '@rowfold/contracts';

export const projectComparable = (row: Row, aggregated: ReadonlySet<number>): string[] =>
  row.filter((_value, index) => !aggregated.has(index));

export const keysEqual = (left: readonly string[], right: readonly string[]): boolean =>
  left.length === right.length && left.every((value, index) => value === right[index]);

import { OperationSummary, Row } from '@rowfold/contracts';
import { fieldOutOfRange } from '@rowfold/core';
import { RowWriter } from './merge-engine';

export const pickFields = (row: Row, fields: readonly number[]): Row =>
  fields.map((field) => {
    if (field >= row.length) {
      throw fieldOutOfRange(field, row);
    }

    return row[field];
  });

export const runPick = async (
  rows: AsyncIterable<Row>,
  fields: readonly number[],
  writer: RowWriter
): Promise<OperationSummary> => {
  let rowsIn = 0;

  for await (const row of rows) {
    rowsIn += 1;
    await writer.write(pickFields(row, fields));
  }

  return { rowsIn, rowsOut: rowsIn };
};

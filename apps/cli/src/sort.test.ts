import { describe, expect, it } from 'vitest';
import { Row } from '@rowfold/contracts';
import { runSort, sortRows } from './sort';

const rowsToAsync = async function* (rows: Row[]): AsyncGenerator<Row> {
  for (const row of rows) {
    yield row;
  }
};

describe('sort', () => {
  const rows: Row[] = [
    ['b', '2'],
    ['a', '10'],
    ['c', '1']
  ];

  it('sorts numerically for int keys', () => {
    expect(sortRows(rows, [{ field: 1, type: 'int' }])).toEqual([
      ['c', '1'],
      ['b', '2'],
      ['a', '10']
    ]);
  });

  it('orders int keys beyond double precision', () => {
    expect(
      sortRows([['9007199254740993'], ['9007199254740992'], ['-12345678901234567890']], [
        { field: 0, type: 'int' }
      ])
    ).toEqual([['-12345678901234567890'], ['9007199254740992'], ['9007199254740993']]);
  });

  it('orders string keys by code point', () => {
    expect(sortRows([['😀'], ['～'], ['ab'], ['a']], [{ field: 0, type: 'string' }])).toEqual([
      ['a'],
      ['ab'],
      ['～'],
      ['😀']
    ]);
  });

  it('sorts as text for string keys', () => {
    expect(sortRows(rows, [{ field: 1, type: 'string' }])).toEqual([
      ['c', '1'],
      ['a', '10'],
      ['b', '2']
    ]);
  });

  it('sorts float keys including exponents and signs', () => {
    expect(sortRows([['1e1'], ['2.5'], ['-3']], [{ field: 0, type: 'float' }])).toEqual([
      ['-3'],
      ['2.5'],
      ['1e1']
    ]);
  });

  it('applies keys in turn so the last key is primary', () => {
    const input: Row[] = [
      ['x', '2'],
      ['y', '1'],
      ['x', '1'],
      ['y', '2']
    ];

    expect(
      sortRows(input, [
        { field: 0, type: 'string' },
        { field: 1, type: 'int' }
      ])
    ).toEqual([
      ['x', '1'],
      ['y', '1'],
      ['x', '2'],
      ['y', '2']
    ]);
  });

  it('keeps input order for equal keys', () => {
    expect(
      sortRows(
        [
          ['k', 'first'],
          ['k', 'second']
        ],
        [{ field: 0, type: 'string' }]
      )
    ).toEqual([
      ['k', 'first'],
      ['k', 'second']
    ]);
  });

  it('rejects non-integer values for int keys', () => {
    expect(() => sortRows([['1.5']], [{ field: 0, type: 'int' }])).toThrow(
      "non-integer value '1.5' in int sort key"
    );
  });

  it('rejects keys beyond the row', () => {
    expect(() => sortRows([['a']], [{ field: 1, type: 'string' }])).toThrow(
      'field 1 is out of range for a row with 1 field(s)'
    );
  });

  it('buffers the input and writes it sorted', async () => {
    const written: Row[] = [];

    const summary = await runSort(rowsToAsync(rows), [{ field: 0, type: 'string' }], {
      write: async (row) => {
        written.push(row);
      }
    });

    expect(written).toEqual([
      ['a', '10'],
      ['b', '2'],
      ['c', '1']
    ]);
    expect(summary).toEqual({ rowsIn: 3, rowsOut: 3 });
  });
});

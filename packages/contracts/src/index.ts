export type Row = readonly string[];

export const REDUCTION_NAMES = [
  'sum',
  'min',
  'max',
  'mean',
  'median',
  'stdev',
  'first',
  'last',
  'ignore'
] as const;

export type ReductionName = (typeof REDUCTION_NAMES)[number];

export type ReductionFunction = (values: readonly string[]) => string | null;

export interface FieldFunctionBinding {
  field: number;
  name: ReductionName;
  reduce: ReductionFunction;
}

export const SORT_FIELD_TYPES = ['string', 'int', 'float'] as const;

export type SortFieldType = (typeof SORT_FIELD_TYPES)[number];

export interface SortKey {
  field: number;
  type: SortFieldType;
}

export type ErrorKind =
  | 'MalformedSpec'
  | 'UnknownFunction'
  | 'NonNumericValue'
  | 'FieldIndexOutOfRange'
  | 'SourceUnavailable';

export interface RowSourceOptions {
  delimiter: string;
  highWaterMark?: number;
  skipEmptyLines?: boolean;
}

export interface OperationSummary {
  rowsIn: number;
  rowsOut: number;
}

import {
  FieldFunctionBinding,
  SORT_FIELD_TYPES,
  SortFieldType,
  SortKey
} from '@rowfold/contracts';
import { RowfoldError } from '@rowfold/core';
import { reductionFor, toReductionName } from './aggregations';

const FIELD_FUNCTION_PATTERN = /^([0-9]+):([a-z]+)$/;
const SORT_KEY_PATTERN = /^([0-9]+)(?::([a-z]+))?$/;
const FIELD_INDEX_PATTERN = /^[0-9]+$/;

const malformed = (message: string, spec: string): RowfoldError =>
  new RowfoldError('MalformedSpec', message, { spec });

const isSortFieldType = (value: string): value is SortFieldType =>
  (SORT_FIELD_TYPES as readonly string[]).includes(value);

export const parseFieldFunction = (spec: string): FieldFunctionBinding => {
  const match = FIELD_FUNCTION_PATTERN.exec(spec);

  if (!match) {
    throw malformed(`unable to interpret field:function ${spec}`, spec);
  }

  const [, field, rawName] = match;
  const name = toReductionName(rawName);

  return {
    field: Number(field),
    name,
    reduce: reductionFor(name)
  };
};

export const parseFieldFunctions = (specs: readonly string[]): FieldFunctionBinding[] =>
  specs.map((spec) => parseFieldFunction(spec));

export const parseSortKey = (spec: string): SortKey => {
  const match = SORT_KEY_PATTERN.exec(spec);

  if (!match) {
    throw malformed(`unable to interpret field ${spec}`, spec);
  }

  const [, field, type = 'string'] = match;

  if (!isSortFieldType(type)) {
    throw malformed(`unknown type for field/type pair: ${spec}`, spec);
  }

  return {
    field: Number(field),
    type
  };
};

export const parsePickList = (text: string): number[] => {
  const entries = text.split(',').map((entry) => entry.trim());

  if (entries.some((entry) => !FIELD_INDEX_PATTERN.test(entry))) {
    throw malformed(`unable to interpret field list ${text}`, text);
  }

  return entries.map(Number);
};

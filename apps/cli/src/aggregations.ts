import { REDUCTION_NAMES, ReductionFunction, ReductionName } from '@rowfold/contracts';
import { RowfoldError } from '@rowfold/core';

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^[+-]?(inf|infinity|nan)$/i;

export const parseFloatStrict = (value: string, context: string): number => {
  const text = value.trim();

  if (FLOAT_PATTERN.test(text)) {
    return Number(text);
  }

  if (SPECIAL_FLOAT_PATTERN.test(text)) {
    const negative = text.startsWith('-');
    const word = text.replace(/^[+-]/, '').toLowerCase();

    if (word === 'nan') {
      return Number.NaN;
    }

    return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }

  throw new RowfoldError('NonNumericValue', `non-numeric value '${value}' in ${context}`, {
    value,
    context
  });
};

export const renderNumber = (value: number): string =>
  Object.is(value, -0) ? '-0' : String(value);

/** Exact rational value of a finite double, kept in lowest terms. */
type Fraction = {
  num: bigint;
  den: bigint;
};

const gcd = (left: bigint, right: bigint): bigint => {
  let a = left < 0n ? -left : left;
  let b = right;

  while (b !== 0n) {
    [a, b] = [b, a % b];
  }

  return a;
};

const reduced = (num: bigint, den: bigint): Fraction => {
  const divisor = gcd(num, den);
  return divisor > 1n ? { num: num / divisor, den: den / divisor } : { num, den };
};

const toFraction = (value: number): Fraction => {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);

  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & 0xfffffffffffffn;
  const mantissa = biased === 0 ? fraction : fraction | (1n << 52n);
  const exponent = (biased === 0 ? 1 : biased) - 1075;
  const signed = bits >> 63n === 1n ? -mantissa : mantissa;

  return exponent >= 0
    ? { num: signed << BigInt(exponent), den: 1n }
    : reduced(signed, 1n << BigInt(-exponent));
};

const add = (left: Fraction, right: Fraction): Fraction =>
  reduced(left.num * right.den + right.num * left.den, left.den * right.den);

const subtract = (left: Fraction, right: Fraction): Fraction =>
  add(left, { num: -right.num, den: right.den });

const square = (value: Fraction): Fraction => ({ num: value.num * value.num, den: value.den * value.den });

const divideBy = (value: Fraction, count: number): Fraction => reduced(value.num, value.den * BigInt(count));

const bitLength = (value: bigint): number => value.toString(2).length;

const scaleByPowerOfTwo = (value: number, exponent: number): number => {
  let result = value;
  let remaining = exponent;

  while (remaining > 1000) {
    result *= 2 ** 1000;
    remaining -= 1000;
  }

  while (remaining < -1000) {
    result *= 2 ** -1000;
    remaining += 1000;
  }

  return result * 2 ** remaining;
};

// Quotient carries 55+ significant bits with the remainder folded into the
// lowest one, so Number() performs the single round-to-nearest-even.
const fractionToNumber = ({ num, den }: Fraction): number => {
  if (num === 0n) {
    return 0;
  }

  const magnitude = num < 0n ? -num : num;
  const shift = bitLength(magnitude) - bitLength(den) - 55;
  const dividend = shift >= 0 ? magnitude : magnitude << BigInt(-shift);
  const divisor = shift >= 0 ? den << BigInt(shift) : den;

  let quotient = dividend / divisor;
  if (dividend % divisor !== 0n) {
    quotient |= 1n;
  }

  const result = scaleByPowerOfTwo(Number(quotient), shift);
  return num < 0n ? -result : result;
};

const exactSum = (values: number[]): Fraction =>
  values.reduce<Fraction>((acc, value) => add(acc, toFraction(value)), { num: 0n, den: 1n });

const extremum = (values: number[], pick: (candidate: number, current: number) => boolean): number => {
  let current = values[0];

  for (const candidate of values.slice(1)) {
    if (pick(candidate, current)) {
      current = candidate;
    }
  }

  return current;
};

const sum = (values: number[]): number => values.reduce((acc, value) => acc + value, 0);

const allFinite = (values: number[]): boolean => values.every((value) => Number.isFinite(value));

const mean = (values: number[]): number => {
  if (!allFinite(values)) {
    return sum(values) / values.length;
  }

  return fractionToNumber(divideBy(exactSum(values), values.length));
};

const median = (values: number[]): number => {
  const sorted = [...values].sort((left, right) => left - right);
  const middle = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 1) {
    return sorted[middle];
  }

  return (sorted[middle - 1] + sorted[middle]) / 2;
};

// Sample deviation; a single value is paired with itself so the result is 0.
const stdev = (values: number[]): number => {
  const samples = values.length === 1 ? [values[0], values[0]] : values;

  if (!allFinite(samples)) {
    const average = sum(samples) / samples.length;
    const squares = samples.reduce((acc, value) => acc + (value - average) ** 2, 0);
    return Math.sqrt(squares / (samples.length - 1));
  }

  const average = divideBy(exactSum(samples), samples.length);
  const squares = samples.reduce<Fraction>(
    (acc, value) => add(acc, square(subtract(toFraction(value), average))),
    { num: 0n, den: 1n }
  );

  return Math.sqrt(fractionToNumber(divideBy(squares, samples.length - 1)));
};

const numeric =
  (name: ReductionName, fn: (values: number[]) => number): ReductionFunction =>
  (values) =>
    renderNumber(fn(values.map((value) => parseFloatStrict(value, `${name} aggregation`))));

export const isReductionName = (name: string): name is ReductionName =>
  (REDUCTION_NAMES as readonly string[]).includes(name);

export const reductionFor = (name: ReductionName): ReductionFunction => {
  switch (name) {
    case 'sum':
      return numeric(name, sum);
    case 'min':
      return numeric(name, (values) => extremum(values, (candidate, current) => candidate < current));
    case 'max':
      return numeric(name, (values) => extremum(values, (candidate, current) => candidate > current));
    case 'mean':
      return numeric(name, mean);
    case 'median':
      return numeric(name, median);
    case 'stdev':
      return numeric(name, stdev);
    case 'first':
      return (values) => values[0];
    case 'last':
      return (values) => values[values.length - 1];
    case 'ignore':
      return () => null;
    default: {
      const unreachable: never = name;
      throw new Error(`Unsupported reduction: ${String(unreachable)}`);
    }
  }
};

export const toReductionName = (name: string): ReductionName => {
  if (!isReductionName(name)) {
    throw new RowfoldError('UnknownFunction', `no such field:function operation: ${name}`, {
      name
    });
  }

  return name;
};

export const resolveReduction = (name: string): ReductionFunction =>
  reductionFor(toReductionName(name));

/**
 * Tabula Engine - Math & Trig Functions
 */

import { FormulaErrors } from '../../types/index.js';
import type { FunctionArgInfo, FunctionCategory, FunctionDefinition } from '../FunctionRegistry.js';
import { collectNumbers, finite, scalarArg, toInteger, toNumber } from '../values.js';

const NUMBER_LIST_ARGS: FunctionArgInfo[] = [
  { name: 'number1', description: 'Number, reference or range', optional: false, type: 'number' },
  { name: 'number2', description: 'More numbers', optional: true, repeating: true, type: 'number' },
];

/**
 * Single-number function. NaN and infinities become #NUM!.
 */
function unary(
  name: string,
  description: string,
  category: FunctionCategory,
  compute: (n: number) => number
): FunctionDefinition {
  return {
    name,
    minArgs: 1,
    maxArgs: 1,
    metadata: {
      description,
      syntax: `${name}(number)`,
      category,
      args: [{ name: 'number', description: 'Value', optional: false, type: 'number' }],
      variadic: false,
    },
    implementation: (args) => {
      const n = toNumber(scalarArg(args[0]));
      if (typeof n === 'string') return n;
      return finite(compute(n));
    },
  };
}

function aggregate(
  name: string,
  description: string,
  reduce: (numbers: number[]) => number | string
): FunctionDefinition {
  return {
    name,
    minArgs: 1,
    metadata: {
      description,
      syntax: `${name}(number1, [number2], ...)`,
      category: 'math',
      args: NUMBER_LIST_ARGS,
      variadic: true,
    },
    implementation: (args) => {
      const numbers = collectNumbers(args);
      if (typeof numbers === 'string') return numbers;
      return reduce(numbers);
    },
  };
}

/** Round half away from zero */
function roundTo(n: number, digits: number): number {
  const factor = Math.pow(10, digits);
  return Math.sign(n) * Math.round(Math.abs(n) * factor) / factor;
}

export const MATH_FUNCTIONS: FunctionDefinition[] = [
  aggregate('SUM', 'Adds its arguments', (numbers) =>
    numbers.reduce((total, n) => total + n, 0)),

  aggregate('AVERAGE', 'Arithmetic mean of its arguments', (numbers) =>
    numbers.length === 0
      ? FormulaErrors.DIV_ZERO
      : numbers.reduce((total, n) => total + n, 0) / numbers.length),

  aggregate('COUNT', 'Counts the numbers among its arguments', (numbers) => numbers.length),

  aggregate('MIN', 'Smallest number', (numbers) =>
    numbers.length === 0 ? 0 : numbers.reduce((least, n) => (n < least ? n : least))),

  aggregate('MAX', 'Largest number', (numbers) =>
    numbers.length === 0 ? 0 : numbers.reduce((most, n) => (n > most ? n : most))),

  unary('ABS', 'Absolute value', 'math', Math.abs),
  unary('FLOOR', 'Rounds down to the nearest integer', 'math', Math.floor),
  unary('CEILING', 'Rounds up to the nearest integer', 'math', Math.ceil),
  unary('INT', 'Rounds down to the nearest integer', 'math', Math.floor),
  unary('SQRT', 'Positive square root', 'math', Math.sqrt),
  unary('LN', 'Natural logarithm', 'math', (n) => (n > 0 ? Math.log(n) : NaN)),
  unary('LOG10', 'Base-10 logarithm', 'math', (n) => (n > 0 ? Math.log10(n) : NaN)),

  {
    name: 'ROUND',
    minArgs: 1,
    maxArgs: 2,
    metadata: {
      description: 'Rounds a number to a number of digits',
      syntax: 'ROUND(number, [num_digits])',
      category: 'math',
      args: [
        { name: 'number', description: 'Value', optional: false, type: 'number' },
        { name: 'num_digits', description: 'Decimal places (default 0)', optional: true, type: 'number' },
      ],
      variadic: false,
    },
    implementation: (args) => {
      const n = toNumber(scalarArg(args[0]));
      if (typeof n === 'string') return n;
      const digits = toInteger(scalarArg(args[1]));
      if (typeof digits === 'string') return digits;
      return finite(roundTo(n, digits));
    },
  },

  {
    name: 'POWER',
    minArgs: 2,
    maxArgs: 2,
    metadata: {
      description: 'Raises a number to a power',
      syntax: 'POWER(number, power)',
      category: 'math',
      args: [
        { name: 'number', description: 'Base', optional: false, type: 'number' },
        { name: 'power', description: 'Exponent', optional: false, type: 'number' },
      ],
      variadic: false,
    },
    implementation: (args) => {
      const base = toNumber(scalarArg(args[0]));
      if (typeof base === 'string') return base;
      const exponent = toNumber(scalarArg(args[1]));
      if (typeof exponent === 'string') return exponent;
      return finite(Math.pow(base, exponent));
    },
  },

  {
    name: 'MOD',
    minArgs: 2,
    maxArgs: 2,
    metadata: {
      description: 'Remainder after division; takes the sign of the divisor',
      syntax: 'MOD(number, divisor)',
      category: 'math',
      args: [
        { name: 'number', description: 'Dividend', optional: false, type: 'number' },
        { name: 'divisor', description: 'Divisor', optional: false, type: 'number' },
      ],
      variadic: false,
    },
    implementation: (args) => {
      const n = toNumber(scalarArg(args[0]));
      if (typeof n === 'string') return n;
      const d = toNumber(scalarArg(args[1]));
      if (typeof d === 'string') return d;
      if (d === 0) return FormulaErrors.DIV_ZERO;
      return finite(n - d * Math.floor(n / d));
    },
  },

  {
    name: 'PI',
    minArgs: 0,
    maxArgs: 0,
    metadata: {
      description: 'The constant pi',
      syntax: 'PI()',
      category: 'math',
      args: [],
      variadic: false,
    },
    implementation: () => Math.PI,
  },

  unary('SIN', 'Sine of an angle in radians', 'trig', Math.sin),
  unary('COS', 'Cosine of an angle in radians', 'trig', Math.cos),
  unary('TAN', 'Tangent of an angle in radians', 'trig', Math.tan),
  unary('ASIN', 'Arcsine, in radians', 'trig', Math.asin),
  unary('ACOS', 'Arccosine, in radians', 'trig', Math.acos),
  unary('ATAN', 'Arctangent, in radians', 'trig', Math.atan),
];

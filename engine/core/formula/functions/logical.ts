/**
 * Tabula Engine - Logical Functions
 *
 * All three receive error arguments instead of short-circuiting, so an
 * error in an untaken IF branch stays out of the result. Guard errors
 * (#CYCLE!, #DEPTH!, #LIMIT!) never reach them; the evaluator returns
 * those before the call.
 */

import { isFormulaError } from '../../types/index.js';
import type { FunctionDefinition } from '../FunctionRegistry.js';
import { scalarArg, toBoolean } from '../values.js';

export const LOGICAL_FUNCTIONS: FunctionDefinition[] = [
  {
    name: 'IF',
    minArgs: 2,
    maxArgs: 3,
    acceptsErrors: true,
    metadata: {
      description: 'Returns one value if a condition is true and another if it is false',
      syntax: 'IF(logical_test, value_if_true, [value_if_false])',
      category: 'logical',
      args: [
        { name: 'logical_test', description: 'Condition', optional: false, type: 'logical' },
        { name: 'value_if_true', description: 'Result when true', optional: false, type: 'any' },
        { name: 'value_if_false', description: 'Result when false (default FALSE)', optional: true, type: 'any' },
      ],
      variadic: false,
    },
    implementation: (args) => {
      const condition = toBoolean(scalarArg(args[0]));
      if (typeof condition === 'string') return condition;
      if (condition) return scalarArg(args[1]);
      return args.length > 2 ? scalarArg(args[2]) : false;
    },
  },

  {
    name: 'IFERROR',
    minArgs: 2,
    maxArgs: 2,
    acceptsErrors: true,
    metadata: {
      description: 'Returns a fallback when the value is an error',
      syntax: 'IFERROR(value, value_if_error)',
      category: 'logical',
      args: [
        { name: 'value', description: 'Value to check', optional: false, type: 'any' },
        { name: 'value_if_error', description: 'Result on error', optional: false, type: 'any' },
      ],
      variadic: false,
    },
    implementation: (args) => {
      const value = scalarArg(args[0]);
      return isFormulaError(value) ? scalarArg(args[1]) : value;
    },
  },

  {
    name: 'ISERROR',
    minArgs: 1,
    maxArgs: 1,
    acceptsErrors: true,
    metadata: {
      description: 'TRUE when the value is an error',
      syntax: 'ISERROR(value)',
      category: 'logical',
      args: [{ name: 'value', description: 'Value to check', optional: false, type: 'any' }],
      variadic: false,
    },
    implementation: (args) => {
      const value = args[0];
      return Array.isArray(value) ? value.some(isFormulaError) : isFormulaError(value);
    },
  },
];

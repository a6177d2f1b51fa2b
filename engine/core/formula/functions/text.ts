/**
 * Tabula Engine - Text Functions
 *
 * Positions are 1-based, as users write them.
 */

import { FormulaErrors, FormulaValue, isFormulaError } from '../../types/index.js';
import type { FunctionArgInfo, FunctionDefinition } from '../FunctionRegistry.js';
import {
  FunctionArg,
  firstError,
  flattenArgs,
  scalarArg,
  toBoolean,
  toInteger,
  toText,
} from '../values.js';

const TEXT_ARG: FunctionArgInfo = { name: 'text', description: 'Text', optional: false, type: 'text' };

/**
 * Resolve a scalar argument to text, passing errors through.
 */
function textArg(arg: FunctionArg | undefined): { ok: true; text: string } | { ok: false; error: string } {
  const value = scalarArg(arg);
  if (isFormulaError(value)) {
    return { ok: false, error: value };
  }
  return { ok: true, text: toText(value) };
}

function transform(
  name: string,
  description: string,
  apply: (text: string) => FormulaValue
): FunctionDefinition {
  return {
    name,
    minArgs: 1,
    maxArgs: 1,
    metadata: {
      description,
      syntax: `${name}(text)`,
      category: 'text',
      args: [TEXT_ARG],
      variadic: false,
    },
    implementation: (args) => {
      const input = textArg(args[0]);
      return input.ok ? apply(input.text) : input.error;
    },
  };
}

function toProperCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

function substituteInstance(text: string, oldText: string, newText: string, instance: number): string {
  let index = -1;
  for (let seen = 0; seen < instance; seen++) {
    index = text.indexOf(oldText, index + (seen === 0 ? 0 : oldText.length));
    if (index === -1) return text;
  }
  return text.slice(0, index) + newText + text.slice(index + oldText.length);
}

export const TEXT_FUNCTIONS: FunctionDefinition[] = [
  {
    name: 'CONCAT',
    minArgs: 1,
    metadata: {
      description: 'Joins text, numbers and ranges into one string',
      syntax: 'CONCAT(text1, [text2], ...)',
      category: 'text',
      args: [
        { name: 'text1', description: 'Text, reference or range', optional: false, type: 'text' },
        { name: 'text2', description: 'More text', optional: true, repeating: true, type: 'text' },
      ],
      variadic: true,
    },
    implementation: (args) => {
      const values = flattenArgs(args);
      const error = firstError(values);
      if (error !== undefined) return error;
      return values.map(toText).join('');
    },
  },

  transform('LEN', 'Number of characters', (text) => text.length),
  transform('UPPER', 'Converts text to uppercase', (text) => text.toUpperCase()),
  transform('LOWER', 'Converts text to lowercase', (text) => text.toLowerCase()),
  transform('PROPER', 'Capitalizes the first letter of each word', toProperCase),
  transform('TRIM', 'Removes leading and trailing spaces and collapses runs of spaces',
    (text) => text.trim().replace(/\s+/g, ' ')),

  {
    name: 'LEFT',
    minArgs: 1,
    maxArgs: 2,
    metadata: {
      description: 'First characters of a text',
      syntax: 'LEFT(text, [num_chars])',
      category: 'text',
      args: [TEXT_ARG, { name: 'num_chars', description: 'Count (default 1)', optional: true, type: 'number' }],
      variadic: false,
    },
    implementation: (args) => {
      const input = textArg(args[0]);
      if (!input.ok) return input.error;
      const count = args.length > 1 ? toInteger(scalarArg(args[1])) : 1;
      if (typeof count === 'string') return count;
      if (count < 0) return FormulaErrors.VALUE;
      return input.text.slice(0, count);
    },
  },

  {
    name: 'RIGHT',
    minArgs: 1,
    maxArgs: 2,
    metadata: {
      description: 'Last characters of a text',
      syntax: 'RIGHT(text, [num_chars])',
      category: 'text',
      args: [TEXT_ARG, { name: 'num_chars', description: 'Count (default 1)', optional: true, type: 'number' }],
      variadic: false,
    },
    implementation: (args) => {
      const input = textArg(args[0]);
      if (!input.ok) return input.error;
      const count = args.length > 1 ? toInteger(scalarArg(args[1])) : 1;
      if (typeof count === 'string') return count;
      if (count < 0) return FormulaErrors.VALUE;
      return count === 0 ? '' : input.text.slice(-count);
    },
  },

  {
    name: 'MID',
    minArgs: 3,
    maxArgs: 3,
    metadata: {
      description: 'Characters from the middle of a text',
      syntax: 'MID(text, start_num, num_chars)',
      category: 'text',
      args: [
        TEXT_ARG,
        { name: 'start_num', description: 'Start position (1-based)', optional: false, type: 'number' },
        { name: 'num_chars', description: 'Count', optional: false, type: 'number' },
      ],
      variadic: false,
    },
    implementation: (args) => {
      const input = textArg(args[0]);
      if (!input.ok) return input.error;
      const start = toInteger(scalarArg(args[1]));
      if (typeof start === 'string') return start;
      const count = toInteger(scalarArg(args[2]));
      if (typeof count === 'string') return count;
      if (start < 1 || count < 0) return FormulaErrors.VALUE;
      return input.text.slice(start - 1, start - 1 + count);
    },
  },

  {
    name: 'REPLACE',
    minArgs: 4,
    maxArgs: 4,
    metadata: {
      description: 'Replaces part of a text by position',
      syntax: 'REPLACE(old_text, start_num, num_chars, new_text)',
      category: 'text',
      args: [
        { name: 'old_text', description: 'Text', optional: false, type: 'text' },
        { name: 'start_num', description: 'Start position (1-based)', optional: false, type: 'number' },
        { name: 'num_chars', description: 'Characters to replace', optional: false, type: 'number' },
        { name: 'new_text', description: 'Replacement', optional: false, type: 'text' },
      ],
      variadic: false,
    },
    implementation: (args) => {
      const input = textArg(args[0]);
      if (!input.ok) return input.error;
      const start = toInteger(scalarArg(args[1]));
      if (typeof start === 'string') return start;
      const count = toInteger(scalarArg(args[2]));
      if (typeof count === 'string') return count;
      const replacement = textArg(args[3]);
      if (!replacement.ok) return replacement.error;
      if (start < 1 || count < 0) return FormulaErrors.VALUE;
      return input.text.slice(0, start - 1) + replacement.text + input.text.slice(start - 1 + count);
    },
  },

  {
    name: 'SUBSTITUTE',
    minArgs: 3,
    maxArgs: 4,
    metadata: {
      description: 'Replaces occurrences of a text, or only the given occurrence',
      syntax: 'SUBSTITUTE(text, old_text, new_text, [instance_num])',
      category: 'text',
      args: [
        TEXT_ARG,
        { name: 'old_text', description: 'Text to find', optional: false, type: 'text' },
        { name: 'new_text', description: 'Replacement', optional: false, type: 'text' },
        { name: 'instance_num', description: 'Which occurrence (default all)', optional: true, type: 'number' },
      ],
      variadic: false,
    },
    implementation: (args) => {
      const input = textArg(args[0]);
      if (!input.ok) return input.error;
      const oldText = textArg(args[1]);
      if (!oldText.ok) return oldText.error;
      const newText = textArg(args[2]);
      if (!newText.ok) return newText.error;

      if (oldText.text === '') return input.text;

      const instanceArg = scalarArg(args[3]);
      if (instanceArg === null) {
        return input.text.split(oldText.text).join(newText.text);
      }
      const instance = toInteger(instanceArg);
      if (typeof instance === 'string') return instance;
      if (instance < 1) return FormulaErrors.VALUE;
      return substituteInstance(input.text, oldText.text, newText.text, instance);
    },
  },

  {
    name: 'TEXTJOIN',
    minArgs: 3,
    metadata: {
      description: 'Joins values with a delimiter',
      syntax: 'TEXTJOIN(delimiter, ignore_empty, text1, [text2], ...)',
      category: 'text',
      args: [
        { name: 'delimiter', description: 'Separator', optional: false, type: 'text' },
        { name: 'ignore_empty', description: 'Skip empty values (default TRUE when left blank)', optional: false, type: 'logical' },
        { name: 'text1', description: 'Text, reference or range', optional: false, type: 'text' },
        { name: 'text2', description: 'More text', optional: true, repeating: true, type: 'text' },
      ],
      variadic: true,
    },
    implementation: (args) => {
      const delimiter = textArg(args[0]);
      if (!delimiter.ok) return delimiter.error;

      const ignoreArg = scalarArg(args[1]);
      const ignoreEmpty = ignoreArg === null ? true : toBoolean(ignoreArg);
      if (typeof ignoreEmpty === 'string') return ignoreEmpty;

      const values = flattenArgs(args.slice(2));
      const error = firstError(values);
      if (error !== undefined) return error;

      const parts = values.map(toText);
      return (ignoreEmpty ? parts.filter(part => part !== '') : parts).join(delimiter.text);
    },
  },
];

/**
 * Tabula Engine - Bridge Functions
 *
 * Functions answered by another subsystem over the module bus. The
 * engine only knows the operation key; whichever package registered a
 * handler for it computes the result.
 */

import { isFormulaError } from '../../types/index.js';
import type { FunctionDefinition } from '../FunctionRegistry.js';
import { scalarArg, toText } from '../values.js';

export const DEFAULT_CIPHER = 'ENGLISH (TQ)';

export const BRIDGE_FUNCTIONS: FunctionDefinition[] = [
  {
    name: 'GEMATRIA',
    minArgs: 1,
    maxArgs: 2,
    metadata: {
      description: 'Letter-value sum of a text under a named cipher',
      syntax: 'GEMATRIA(text, [cipher])',
      category: 'bridge',
      args: [
        { name: 'text', description: 'Text or reference', optional: false, type: 'text' },
        { name: 'cipher', description: `Cipher name (default ${DEFAULT_CIPHER})`, optional: true, type: 'text' },
      ],
      variadic: false,
      examples: ['=GEMATRIA("LIGHT")', '=GEMATRIA(A1, "English (Ordinal)")'],
    },
    implementation: (args, context) => {
      const text = scalarArg(args[0]);
      if (isFormulaError(text)) return text;

      const cipherArg = scalarArg(args[1]);
      if (isFormulaError(cipherArg)) return cipherArg;
      const cipher = cipherArg === null ? DEFAULT_CIPHER : toText(cipherArg);

      const input = toText(text);
      if (input === '') return 0;

      return context.bus.request(cipher.toUpperCase(), input);
    },
  },
];

/**
 * Tabula Ciphers
 *
 * Letter-value ciphers, answered over any channel with a
 * register(key, handler) method. The formula engine's ModuleBus is one
 * such channel; this package does not depend on it.
 *
 * @example
 * const bus = new ModuleBus();
 * registerCipherHandlers(bus);
 * bus.request('ENGLISH (TQ)', 'LIGHT'); // 24
 */

import { CipherCalculator } from './CipherCalculator.js';
import { loadCipherTables } from './CipherTables.js';

export * from './CipherCalculator.js';
export * from './CipherTables.js';

/** Anything handlers can be registered on */
export interface OperationChannel {
  register(operationKey: string, handler: (input: string) => number): () => void;
}

let calculators: Map<string, CipherCalculator> | null = null;

function getCalculators(): Map<string, CipherCalculator> {
  if (!calculators) {
    calculators = new Map(
      loadCipherTables().map(definition => {
        const calculator = new CipherCalculator(definition);
        return [calculator.key, calculator];
      })
    );
  }
  return calculators;
}

/**
 * Calculator for a cipher name, matched case-insensitively.
 */
export function getCipher(name: string): CipherCalculator | null {
  return getCalculators().get(name.trim().toUpperCase()) ?? null;
}

/** Display names of every bundled cipher, in table order */
export function listCipherNames(): string[] {
  return Array.from(getCalculators().values(), calculator => calculator.name);
}

/**
 * Register one handler per cipher, keyed by its uppercase name.
 * @returns a function removing every registration made here
 */
export function registerCipherHandlers(channel: OperationChannel): () => void {
  const disposers = Array.from(getCalculators().values(), calculator =>
    channel.register(calculator.key, input => calculator.calculate(input))
  );
  return () => {
    for (const dispose of disposers) {
      dispose();
    }
  };
}

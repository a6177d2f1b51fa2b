/**
 * Tabula Engine - Built-in Functions
 */

import { FunctionRegistry, FunctionDefinition } from '../FunctionRegistry.js';
import { MATH_FUNCTIONS } from './math.js';
import { LOGICAL_FUNCTIONS } from './logical.js';
import { TEXT_FUNCTIONS } from './text.js';
import { BRIDGE_FUNCTIONS } from './bridge.js';

export { DEFAULT_CIPHER } from './bridge.js';

export const BUILTIN_FUNCTIONS: ReadonlyArray<FunctionDefinition> = [
  ...MATH_FUNCTIONS,
  ...LOGICAL_FUNCTIONS,
  ...TEXT_FUNCTIONS,
  ...BRIDGE_FUNCTIONS,
];

/**
 * A new registry holding the built-ins. Use this when a sheet needs
 * functions of its own on top of the standard set.
 */
export function createRegistryWithBuiltins(): FunctionRegistry {
  const registry = new FunctionRegistry();
  registry.registerAll(BUILTIN_FUNCTIONS);
  return registry;
}

/** Process-wide registry used when none is configured */
export const defaultRegistry: FunctionRegistry = createRegistryWithBuiltins();

/**
 * Tabula Engine - Function Registry
 *
 * Case-insensitive table of callable formula functions, with the metadata
 * an editor needs for hints (syntax, argument list, category).
 *
 * Registries are append-only. Registering a name twice is a programming
 * fault and throws.
 */

import type { FormulaValue } from '../types/index.js';
import type { ModuleBus } from '../dispatch/ModuleBus.js';
import type { FunctionArg } from './values.js';

// =============================================================================
// Types
// =============================================================================

export type FunctionCategory = 'math' | 'trig' | 'logical' | 'text' | 'bridge';

export interface FunctionArgInfo {
  name: string;
  description: string;
  optional: boolean;
  /** Argument may repeat (SUM(number1, number2, ...)) */
  repeating?: boolean;
  type: 'number' | 'text' | 'logical' | 'reference' | 'any';
}

export interface FunctionMetadata {
  description: string;
  syntax: string;
  category: FunctionCategory;
  args: FunctionArgInfo[];
  variadic: boolean;
  examples?: string[];
}

/**
 * What an implementation can reach while it runs.
 */
export interface FunctionContext {
  /** Evaluate content (formula text or a literal) against the same grid */
  evaluate(content: string): FormulaValue;
  /** Cross-module request channel */
  bus: ModuleBus;
}

export type FunctionImplementation = (
  args: FunctionArg[],
  context: FunctionContext
) => FormulaValue;

export interface FunctionDefinition {
  /** Uppercase name */
  name: string;
  implementation: FunctionImplementation;
  metadata: FunctionMetadata;
  minArgs?: number;
  maxArgs?: number;
  /**
   * Receive error arguments instead of short-circuiting on the first one.
   * Only error-inspecting functions (IFERROR, ISERROR) set this.
   */
  acceptsErrors?: boolean;
}

// =============================================================================
// Registry
// =============================================================================

export class FunctionRegistry {
  private definitions: Map<string, FunctionDefinition> = new Map();

  /**
   * Add a definition.
   * @throws Error if the name is empty or already registered
   */
  register(definition: FunctionDefinition): void {
    const name = definition.name.trim().toUpperCase();
    if (name === '') {
      throw new Error('Function name must not be empty');
    }
    if (this.definitions.has(name)) {
      throw new Error(`Function already registered: ${name}`);
    }
    this.definitions.set(name, { ...definition, name });
  }

  registerAll(definitions: Iterable<FunctionDefinition>): void {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  get(name: string): FunctionDefinition | undefined {
    return this.definitions.get(name.toUpperCase());
  }

  has(name: string): boolean {
    return this.definitions.has(name.toUpperCase());
  }

  getMetadata(name: string): FunctionMetadata | undefined {
    return this.get(name)?.metadata;
  }

  /** All definitions, sorted by name */
  list(): FunctionDefinition[] {
    return Array.from(this.definitions.values())
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  listByCategory(category: FunctionCategory): FunctionDefinition[] {
    return this.list().filter(def => def.metadata.category === category);
  }

  get size(): number {
    return this.definitions.size;
  }
}

/**
 * Tabula Engine - Module Bus
 *
 * Synchronous request/response channel between the formula engine and
 * subsystems it must not import. A subsystem registers one handler per
 * operation key; formula functions send requests by key and always get a
 * value back, never an exception.
 *
 * Keys are case-insensitive.
 */

import { FormulaValue, FormulaErrors } from '../types/index.js';

/**
 * Handles one operation. Returning an error sentinel (a string starting
 * with "#") reports a failure to the caller.
 */
export type OperationHandler = (input: string, operationKey: string) => FormulaValue;

export class ModuleBus {
  private handlers: Map<string, OperationHandler> = new Map();

  /**
   * Register the handler for an operation key.
   * @returns a function that removes the registration
   * @throws Error if the key already has a handler
   */
  register(operationKey: string, handler: OperationHandler): () => void {
    const key = normalizeKey(operationKey);
    if (key === '') {
      throw new Error('Operation key must not be empty');
    }
    if (this.handlers.has(key)) {
      throw new Error(`Handler already registered for operation: ${key}`);
    }
    this.handlers.set(key, handler);

    return () => {
      if (this.handlers.get(key) === handler) {
        this.handlers.delete(key);
      }
    };
  }

  unregister(operationKey: string): boolean {
    return this.handlers.delete(normalizeKey(operationKey));
  }

  has(operationKey: string): boolean {
    return this.handlers.has(normalizeKey(operationKey));
  }

  /** Registered keys, sorted */
  listOperations(): string[] {
    return Array.from(this.handlers.keys()).sort();
  }

  /**
   * Send a request and return the handler's response.
   *
   * - No handler: #OP?
   * - Handler throws: logged, then #ERROR!
   */
  request(operationKey: string, input: string): FormulaValue {
    const key = normalizeKey(operationKey);
    const handler = this.handlers.get(key);
    if (!handler) {
      return FormulaErrors.UNKNOWN_OPERATION;
    }

    try {
      return handler(input, key);
    } catch (error) {
      console.error(`Module bus handler error (${key}):`, error);
      return FormulaErrors.ERROR;
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}

function normalizeKey(operationKey: string): string {
  return operationKey.trim().toUpperCase();
}

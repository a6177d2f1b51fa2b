import { describe, it, expect, beforeEach } from 'vitest';
import { FunctionRegistry, FunctionDefinition } from './FunctionRegistry.js';
import { BUILTIN_FUNCTIONS, createRegistryWithBuiltins, defaultRegistry } from './functions/index.js';

function definition(name: string, category: FunctionDefinition['metadata']['category'] = 'math'): FunctionDefinition {
  return {
    name,
    implementation: () => 1,
    metadata: { description: name, syntax: `${name}()`, category, args: [], variadic: false },
  };
}

describe('FunctionRegistry', () => {
  let registry: FunctionRegistry;

  beforeEach(() => {
    registry = new FunctionRegistry();
  });

  it('should look names up case-insensitively', () => {
    registry.register(definition('double'));

    expect(registry.has('DOUBLE')).toBe(true);
    expect(registry.has('Double')).toBe(true);
    expect(registry.get('double')?.name).toBe('DOUBLE');
    expect(registry.getMetadata('DOUBLE')?.syntax).toBe('double()');
  });

  it('should reject duplicate and empty names', () => {
    registry.register(definition('ONE'));
    expect(() => registry.register(definition('one'))).toThrow('Function already registered: ONE');
    expect(() => registry.register(definition('  '))).toThrow('Function name must not be empty');
  });

  it('should list definitions sorted by name', () => {
    registry.registerAll([definition('ZETA'), definition('ALPHA', 'text'), definition('MID', 'text')]);

    expect(registry.list().map(d => d.name)).toEqual(['ALPHA', 'MID', 'ZETA']);
    expect(registry.listByCategory('text').map(d => d.name)).toEqual(['ALPHA', 'MID']);
    expect(registry.size).toBe(3);
  });

  it('should return undefined for unknown names', () => {
    expect(registry.get('NOPE')).toBeUndefined();
    expect(registry.getMetadata('NOPE')).toBeUndefined();
  });

  describe('built-ins', () => {
    it('should register every built-in once', () => {
      expect(BUILTIN_FUNCTIONS).toHaveLength(38);
      expect(defaultRegistry.size).toBe(38);
    });

    it('should group built-ins by category', () => {
      const builtins = createRegistryWithBuiltins();
      expect(builtins.listByCategory('logical').map(d => d.name)).toEqual(['IF', 'IFERROR', 'ISERROR']);
      expect(builtins.listByCategory('bridge').map(d => d.name)).toEqual(['GEMATRIA']);
      expect(builtins.listByCategory('trig')).toHaveLength(6);
    });

    it('should give each registry its own table', () => {
      const builtins = createRegistryWithBuiltins();
      builtins.register(definition('CUSTOM'));
      expect(defaultRegistry.has('CUSTOM')).toBe(false);
    });
  });
});

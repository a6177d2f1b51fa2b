/**
 * Tabula Ciphers - Cipher Tables
 *
 * Loads the cipher definitions shipped in cipher-tables.json and checks
 * their shape before any calculator is built from them.
 */

import { readFileSync } from 'node:fs';
import { CipherDefinition, CipherScript } from './CipherCalculator.js';

const TABLES_URL = new URL('./cipher-tables.json', import.meta.url);

const SCRIPTS: ReadonlySet<string> = new Set<CipherScript>(['latin', 'hebrew', 'greek']);

export class CipherTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CipherTableError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScript(value: unknown): value is CipherScript {
  return typeof value === 'string' && SCRIPTS.has(value);
}

function parseDefinition(raw: unknown, index: number): CipherDefinition {
  if (!isRecord(raw)) {
    throw new CipherTableError(`Cipher ${index} is not an object`);
  }
  const { name, script, values } = raw;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new CipherTableError(`Cipher ${index} has no name`);
  }
  if (!isScript(script)) {
    throw new CipherTableError(`Cipher "${name}" has unknown script: ${String(script)}`);
  }
  if (!isRecord(values)) {
    throw new CipherTableError(`Cipher "${name}" has no value table`);
  }

  const table: Record<string, number> = {};
  for (const [letter, value] of Object.entries(values)) {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new CipherTableError(`Cipher "${name}" maps "${letter}" to a non-integer`);
    }
    table[letter] = value;
  }
  return { name, script, values: table };
}

/**
 * Validate parsed JSON as a list of cipher definitions.
 * @throws CipherTableError on a malformed document or a repeated name
 */
export function parseCipherTables(document: unknown): CipherDefinition[] {
  if (!isRecord(document) || !Array.isArray(document.ciphers)) {
    throw new CipherTableError('Cipher tables must be an object with a "ciphers" array');
  }

  const definitions = document.ciphers.map(parseDefinition);
  const seen = new Set<string>();
  for (const { name } of definitions) {
    const key = name.toUpperCase();
    if (seen.has(key)) {
      throw new CipherTableError(`Duplicate cipher name: ${name}`);
    }
    seen.add(key);
  }
  return definitions;
}

/** Read and validate the bundled tables */
export function loadCipherTables(): CipherDefinition[] {
  const document: unknown = JSON.parse(readFileSync(TABLES_URL, 'utf8'));
  return parseCipherTables(document);
}

import { describe, it, expect } from 'vitest';
import { UsageError, hasFailures, parseArgs } from './CliArgs.js';

describe('parseArgs', () => {
  it('returns empty config for no arguments', () => {
    expect(parseArgs([])).toEqual({ config: {}, help: false, interactive: false });
  });

  it('reads output and execution flags', () => {
    const args = parseArgs(['--pretty', '--stop-on-error', '--echo', '-v', '--no-ciphers']);
    expect(args.config).toEqual({
      outputFormat: 'pretty',
      stopOnError: true,
      echoCommands: true,
      verbose: true,
      registerCiphers: false,
    });
  });

  it('reads --max-steps', () => {
    expect(parseArgs(['--max-steps', '50']).config.maxStepsPerScript).toBe(50);
  });

  it('rejects a missing or invalid --max-steps value', () => {
    expect(() => parseArgs(['--max-steps'])).toThrow(UsageError);
    expect(() => parseArgs(['--max-steps', '0'])).toThrow('--max-steps requires a positive integer');
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--golden'])).toThrow('Unknown option: --golden');
  });

  it('reads help and interactive flags', () => {
    expect(parseArgs(['-h', '-i'])).toMatchObject({ help: true, interactive: true });
  });
});

describe('hasFailures', () => {
  it('is true for errors and failed assertions only', () => {
    expect(hasFailures([{ type: 'echo', timestamp: 0, message: 'x' }])).toBe(false);
    expect(hasFailures([{ type: 'error', timestamp: 0, message: 'x' }])).toBe(true);
    expect(hasFailures([
      { type: 'assert', timestamp: 0, passed: false, expected: 1, actual: 2 },
    ])).toBe(true);
    expect(hasFailures([
      { type: 'assert', timestamp: 0, passed: true, expected: 1, actual: 1 },
    ])).toBe(false);
  });
});

/**
 * Tabula Harness - CLI Arguments
 */

import { HarnessConfig, Output } from './types.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

export interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  interactive: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = { config: {}, help: false, interactive: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        break;
      case '--no-ciphers':
        result.config.registerCiphers = false;
        break;
      case '--max-steps': {
        const value = args[++i];
        if (value === undefined || !/^\d+$/.test(value) || parseInt(value, 10) < 1) {
          throw new UsageError('--max-steps requires a positive integer');
        }
        result.config.maxStepsPerScript = parseInt(value, 10);
        break;
      }
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

/** True when the run should exit non-zero */
export function hasFailures(outputs: Output[]): boolean {
  return outputs.some(output =>
    output.type === 'error' || (output.type === 'assert' && !output.passed)
  );
}

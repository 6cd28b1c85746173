/**
 * Command-line argument parsing for the digest CLI
 */

export interface CliArgs {
  folder?: string;
  urls: string[];
  output: string;
}

export const DEFAULT_OUTPUT_DIR = 'output';

export const USAGE = 'Usage: npm run digest -- --folder <dir> [--urls <url> ...] [--output <dir>]';

/**
 * `--urls` takes every following value up to the next flag
 *
 * @throws Error on an unknown flag or a flag missing its value
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { urls: [], output: DEFAULT_OUTPUT_DIR };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === '--folder' || arg === '--output') {
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`${arg} requires a value`);
      }
      if (arg === '--folder') {
        parsed.folder = next;
      } else {
        parsed.output = next;
      }
      i++;
    } else if (arg === '--urls') {
      while (i + 1 < args.length) {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) break;
        parsed.urls.push(value);
        i++;
      }
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return parsed;
}

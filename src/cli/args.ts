/**
 * Command-line flag parsing for the `extract` and `parse` commands
 */

export interface ExtractArgs {
  input?: string;
  query?: string;
  prompt?: string;
  out?: string;
  providers?: string[];
  concurrency?: number;
  sample?: number;
}

export interface ParseArgs {
  providerDir: string;
  identity?: string;
  out?: string;
}

function positiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Split `--name value` / `--name=value` pairs and positional arguments
 */
function collectFlags(args: readonly string[], known: readonly string[]): { flags: Map<string, string>; positional: string[] } {
  const flags = new Map<string, string>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const [name = '', inlineValue] = arg.slice(2).split(/=(.*)/s, 2);
    if (!known.includes(name)) {
      throw new Error(`Unknown option: --${name}`);
    }

    const value = inlineValue ?? args[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
      throw new Error(`Option --${name} requires a value`);
    }
    if (inlineValue === undefined) {
      i++;
    }

    flags.set(name, value);
  }

  return { flags, positional };
}

export function parseExtractArgs(args: readonly string[]): ExtractArgs {
  const { flags, positional } = collectFlags(args, ['input', 'query', 'prompt', 'out', 'providers', 'concurrency', 'sample']);

  if (positional.length > 0) {
    throw new Error(`Unexpected argument: ${positional[0]}`);
  }
  if (flags.has('input') && flags.has('query')) {
    throw new Error('Use either --input or --query, not both');
  }

  const providers = flags.get('providers');
  const concurrency = flags.get('concurrency');
  const sample = flags.get('sample');

  return {
    input: flags.get('input'),
    query: flags.get('query'),
    prompt: flags.get('prompt'),
    out: flags.get('out'),
    providers: providers
      ?.split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
    concurrency: concurrency !== undefined ? positiveInt('--concurrency', concurrency) : undefined,
    sample: sample !== undefined ? positiveInt('--sample', sample) : undefined,
  };
}

export function parseParseArgs(args: readonly string[]): ParseArgs {
  const { flags, positional } = collectFlags(args, ['identity', 'out']);
  const [providerDir, ...rest] = positional;

  if (!providerDir) {
    throw new Error('Provider output directory is required');
  }
  if (rest.length > 0) {
    throw new Error(`Unexpected argument: ${rest[0]}`);
  }

  return {
    providerDir,
    identity: flags.get('identity'),
    out: flags.get('out'),
  };
}

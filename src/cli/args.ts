/** Bad invocation: unknown command, missing argument or malformed flag. Exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type FlagValue = string | true;

/**
 * Positional command path plus `--flag value`, `--flag=value` and bare
 * boolean `--flag`. A flag followed by another flag or nothing is boolean.
 * Everything after `--` is positional.
 */
export class ParsedArgs {
  constructor(
    readonly positionals: string[],
    readonly flags: ReadonlyMap<string, FlagValue>,
  ) {}

  get json(): boolean {
    return this.flags.get('json') === true;
  }

  has(name: string): boolean {
    return this.flags.has(name);
  }

  bool(name: string): boolean {
    const value = this.flags.get(name);
    return value === true || value === 'true' || value === '1';
  }

  string(name: string): string | undefined {
    const value = this.flags.get(name);
    if (value === undefined) return undefined;
    if (value === true) throw new UsageError(`--${name} needs a value`);
    return value;
  }

  requireString(name: string): string {
    const value = this.string(name);
    if (!value) throw new UsageError(`missing --${name}`);
    return value;
  }

  int(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    if (!/^-?\d+$/.test(value)) throw new UsageError(`--${name} must be an integer, got "${value}"`);
    return Number(value);
  }

  requireInt(name: string): number {
    const value = this.int(name);
    if (value === undefined) throw new UsageError(`missing --${name}`);
    return value;
  }

  list(name: string): string[] {
    return (this.string(name) ?? '').split(',').map((s) => s.trim()).filter(Boolean);
  }

  positional(index: number, what: string): string {
    const value = this.positionals[index];
    if (value === undefined) throw new UsageError(`missing ${what}`);
    return value;
  }

  /** Same flags, positionals shifted past the command path. */
  shift(count: number): ParsedArgs {
    return new ParsedArgs(this.positionals.slice(count), this.flags);
  }
}

// Never take the next word as their value.
const BOOLEAN_FLAGS = new Set(['json', 'all', 'help', 'test', 'disabled']);

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, FlagValue>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--') || arg === '-') {
      positionals.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      flags.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--') && !BOOLEAN_FLAGS.has(body)) {
      flags.set(body, next);
      i++;
    } else {
      flags.set(body, true);
    }
  }
  return new ParsedArgs(positionals, flags);
}

/**
 * Shared CLI Utilities
 *
 * Argument parsing and usage text for the doxedit command line.
 * Long options take `--key=value` or `--key value`; short options bundle
 * (`-dv`, `-dd`) and take attached or separate values (`-ohtml`, `-o html`).
 */

import { UsageError } from './errors.ts';

export type OptionKind = 'flag' | 'count' | 'string';

export interface OptionSpec {
  long: string;
  short: string[];
  kind: OptionKind;
  description: string;
  valueName?: string;
}

export const OPTION_SPECS: OptionSpec[] = [
  { long: 'help', short: ['h', '?'], kind: 'flag', description: 'Display usage information (this text)' },
  { long: 'debug', short: ['d'], kind: 'count', description: 'Enable debug reporting (repeat for more)' },
  { long: 'verbose', short: ['v'], kind: 'count', description: 'Enable verbose reporting (repeat for more)' },
  {
    long: 'userMainPage',
    short: ['m'],
    kind: 'count',
    description: "Main page supplied by user (elsewhere); do *not* alias 'main.html' to 'components.html'",
  },
  {
    long: 'htmlDir',
    short: ['o'],
    kind: 'string',
    valueName: 'htmlDir',
    description: 'Output directory (home of generated files); default: ./html',
  },
  {
    long: 'baseTitle',
    short: ['b'],
    kind: 'string',
    valueName: 'baseTitle',
    description: 'Base HTML title; an empty string disables title injection',
  },
  { long: 'ci', short: [], kind: 'flag', description: 'Plain output without colors' },
];

/**
 * Parsed CLI arguments.
 * Named options are stored under their long name; count options hold the
 * number of times they were given. Positional arguments are stored in
 * _positional.
 */
export interface ParsedCliArgs {
  _positional: string[];
  [key: string]: string | number | boolean | string[];
}

/**
 * Convert kebab-case to camelCase
 */
export function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

function findLong(name: string, specs: OptionSpec[]): OptionSpec {
  const key = kebabToCamel(name);
  const spec = specs.find(s => s.long === key);
  if (!spec) throw new UsageError(`unknown option: --${name}`);
  return spec;
}

function findShort(letter: string, specs: OptionSpec[]): OptionSpec {
  const spec = specs.find(s => s.short.includes(letter));
  if (!spec) throw new UsageError(`unknown option: -${letter}`);
  return spec;
}

function setSwitch(opts: ParsedCliArgs, spec: OptionSpec): void {
  if (spec.kind === 'count') {
    const current = opts[spec.long];
    opts[spec.long] = (typeof current === 'number' ? current : 0) + 1;
  } else {
    opts[spec.long] = true;
  }
}

/**
 * Parse CLI arguments against the option table. Everything after a bare
 * `--` is positional.
 */
export function parseCliArgs(argv: string[], specs: OptionSpec[] = OPTION_SPECS): ParsedCliArgs {
  const opts: ParsedCliArgs = { _positional: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      opts._positional.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith('--')) {
      const raw = arg.slice(2);
      const eqIdx = raw.indexOf('=');
      const name = eqIdx === -1 ? raw : raw.slice(0, eqIdx);
      const spec = findLong(name, specs);

      if (spec.kind !== 'string') {
        if (eqIdx !== -1) throw new UsageError(`option --${name} does not take a value`);
        setSwitch(opts, spec);
      } else if (eqIdx !== -1) {
        // --key=value format
        opts[spec.long] = raw.slice(eqIdx + 1);
      } else {
        // --key value format
        const next = argv[i + 1];
        if (next === undefined) throw new UsageError(`option --${name} requires a value`);
        opts[spec.long] = next;
        i++;
      }
      continue;
    }

    if (arg.startsWith('-') && arg.length > 1) {
      for (let j = 1; j < arg.length; j++) {
        const spec = findShort(arg[j], specs);
        if (spec.kind !== 'string') {
          setSwitch(opts, spec);
          continue;
        }
        const attached = arg.slice(j + 1);
        if (attached !== '') {
          opts[spec.long] = attached;
        } else {
          const next = argv[i + 1];
          if (next === undefined) throw new UsageError(`option -${arg[j]} requires a value`);
          opts[spec.long] = next;
          i++;
        }
        break;
      }
      continue;
    }

    opts._positional.push(arg);
  }

  return opts;
}

export function formatUsage(prog: string, specs: OptionSpec[] = OPTION_SPECS): string {
  const rows = specs.map(spec => {
    const value = spec.valueName ? ` <${spec.valueName}>` : '';
    const short = spec.short.length > 0 ? ` | -${spec.short[0]}${value}` : '';
    return `  ${`--${spec.long}${short}`.padEnd(28)} ${spec.description}`;
  });

  return `
Usage: ${prog} -h | [-d] [-v] [-m] [-o <htmlDir>] [-b <baseTitle>]

${rows.join('\n')}
`;
}

/**
 * Run Configuration
 *
 * Merges command-line options over environment defaults (DOXEDIT_*; the CLI
 * entry loads a .env file into the environment first) and validates the
 * result. The config is built once at startup and passed down explicitly.
 */

import { z } from 'zod';
import { parseCliArgs } from './cli.ts';
import { UsageError } from './errors.ts';

export const DEFAULT_HTML_DIR = 'html';
export const DEFAULT_BASE_TITLE = 'API Documentation';

const runConfigSchema = z.object({
  help: z.boolean(),
  debugLevel: z.number().int().min(0),
  verboseLevel: z.number().int().min(0),
  userMainPage: z.boolean(),
  ciMode: z.boolean(),
  htmlDir: z.string().min(1, 'no output directory'),
  baseTitle: z.string(),
});

export type RunConfig = z.infer<typeof runConfigSchema>;

const envSchema = z.object({
  DOXEDIT_HTML_DIR: z.string().optional(),
  DOXEDIT_BASE_TITLE: z.string().optional(),
  DOXEDIT_DEBUG: z.coerce.number().int().min(0).optional(),
  DOXEDIT_VERBOSE: z.coerce.number().int().min(0).optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function countOpt(val: unknown): number | undefined {
  return typeof val === 'number' ? val : undefined;
}

function stringOpt(val: unknown): string | undefined {
  return typeof val === 'string' ? val : undefined;
}

/**
 * Build the run configuration. Throws UsageError for anything the user
 * needs to fix on the command line or in the environment.
 */
export function loadRunConfig(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
): RunConfig {
  const opts = parseCliArgs(argv);
  if (opts._positional.length > 0) {
    throw new UsageError(`unexpected argument: ${opts._positional[0]}`);
  }

  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new UsageError(`bad environment: ${formatIssues(envResult.error)}`);
  }
  const fromEnv = envResult.data;

  const candidate = {
    help: opts.help === true,
    debugLevel: countOpt(opts.debug) ?? fromEnv.DOXEDIT_DEBUG ?? 0,
    verboseLevel: countOpt(opts.verbose) ?? fromEnv.DOXEDIT_VERBOSE ?? 0,
    userMainPage: (countOpt(opts.userMainPage) ?? 0) > 0,
    ciMode: opts.ci === true || env.CI === 'true',
    htmlDir: stringOpt(opts.htmlDir) ?? (fromEnv.DOXEDIT_HTML_DIR || DEFAULT_HTML_DIR),
    baseTitle: stringOpt(opts.baseTitle) ?? fromEnv.DOXEDIT_BASE_TITLE ?? DEFAULT_BASE_TITLE,
  };

  const result = runConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new UsageError(formatIssues(result.error));
  }
  return result.data;
}

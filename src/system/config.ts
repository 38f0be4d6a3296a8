import {parseArgs} from 'node:util';
import {z} from 'zod';
import {LOG_LEVELS} from './log';

/** The environment variable that sets the log level when no flag does. */
export const LOG_LEVEL_ENV = 'SUDOKU_LOG_LEVEL';

export const USAGE = `\
Usage: sudoku-solve [file] [options]

Reads a puzzle of 81 cells (1-9 for clues, 0 or . for blanks) from the file,
or from standard input when the file is absent or "-", and prints its
solutions.

Options:
  --all              Print every solution (the default)
  --first            Stop at the first solution
  --limit N          Print at most N solutions
  --compact          Print rows without spaces between cells
  --no-propagate     Do not fill in cells left with a single candidate
  --no-hidden-singles
                     Do not fill in numerals left with a single place in a
                     row, column or box
  --log-level LEVEL  One of ${LOG_LEVELS.join(', ')} (default error; also ${LOG_LEVEL_ENV})
  -h, --help         Show this message`;

const configSchema = z
  .object({
    mode: z.enum(['first', 'all']).default('all'),
    limit: z.coerce
      .number()
      .int()
      .positive()
      .max(Number.MAX_SAFE_INTEGER)
      .optional(),
    spaced: z.boolean().default(true),
    propagate: z.boolean().default(true),
    hiddenSingles: z.boolean().default(true),
    logLevel: z.enum(LOG_LEVELS).default('error'),
    file: z.string().min(1).optional(),
    help: z.boolean().default(false),
  })
  .refine(config => config.mode === 'all' || config.limit === undefined, {
    message: '--limit cannot be combined with --first',
    path: ['limit'],
  });

/** The settings of one run of the command-line solver. */
export type Config = z.output<typeof configSchema>;

/** The command line or environment asked for something that makes no sense. */
export class ConfigError extends Error {
  readonly code = 'CONFIG';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid options: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Works out the settings for a run from its arguments (not including the
 * program name) and environment.  Flags take precedence over the environment.
 *
 * @throws ConfigError if the arguments are not understood or not valid.
 */
export function loadConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): Config {
  let parsed;
  try {
    parsed = parseArgs({
      args: [...argv],
      options: {
        all: {type: 'boolean'},
        first: {type: 'boolean'},
        limit: {type: 'string'},
        compact: {type: 'boolean'},
        'no-propagate': {type: 'boolean'},
        'no-hidden-singles': {type: 'boolean'},
        'log-level': {type: 'string'},
        help: {type: 'boolean', short: 'h'},
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (e: unknown) {
    throw new ConfigError([e instanceof Error ? e.message : String(e)]);
  }
  const {values, positionals} = parsed;
  if (positionals.length > 1) {
    throw new ConfigError([
      `expected at most one puzzle file, got ${positionals.length}`,
    ]);
  }
  if (values.first && values.all) {
    throw new ConfigError(['--first and --all cannot be combined']);
  }
  const result = configSchema.safeParse({
    mode: values.first ? 'first' : values.all ? 'all' : undefined,
    limit: values.limit,
    spaced: values.compact ? false : undefined,
    propagate: values['no-propagate'] ? false : undefined,
    hiddenSingles: values['no-hidden-singles'] ? false : undefined,
    logLevel: values['log-level'] ?? (env[LOG_LEVEL_ENV] || undefined),
    file: positionals[0] === '-' ? undefined : positionals[0],
    help: values.help,
  });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        issue => `${issue.path.join('.') || 'options'}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

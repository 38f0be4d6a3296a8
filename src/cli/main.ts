import {readFile} from 'node:fs/promises';
import {PuzzleError, PuzzleErrorCode} from '../game/errors';
import {ensureExhaustiveSwitch} from '../game/utils';
import {formatSolution, formatSummary} from '../io/format';
import {parsePuzzle} from '../io/parse';
import {runSearch, Solver} from '../solver/solver';
import {
  type Config,
  ConfigError,
  LOG_LEVEL_ENV,
  loadConfig,
  USAGE,
} from '../system/config';
import {EventType, logEvent, setLogLevel} from '../system/log';

/** What the process exit status says about a run. */
export enum ExitCode {
  SOLVED = 0,
  NO_SOLUTION = 1,
  INVALID_INPUT = 2,
  USAGE_ERROR = 3,
  INTERNAL_ERROR = 4,
}

/** The outside world, as the command line sees it. */
export interface CliIo {
  readonly env: Readonly<Record<string, string | undefined>>;
  readStdin(): Promise<string>;
  readFile(path: string): Promise<string>;
  writeOut(text: string): void;
  writeErr(text: string): void;
}

/**
 * Runs the solver over the puzzle named by the arguments, printing each
 * solution as soon as it is found and then a summary, and returns the status
 * the process should exit with.
 */
export async function run(
  argv: readonly string[],
  io: CliIo,
): Promise<ExitCode> {
  let config: Config;
  try {
    config = loadConfig(argv, io.env);
  } catch (e: unknown) {
    if (!(e instanceof ConfigError)) throw e;
    io.writeErr(`${e.message}\n\n${USAGE}\n`);
    return ExitCode.USAGE_ERROR;
  }
  if (config.help) {
    io.writeOut(`${USAGE}\n`);
    return ExitCode.SOLVED;
  }
  setLogLevel(config.logLevel);
  logEvent(EventType.ACTION, {
    category: 'solve requested',
    detail: `${config.file ?? 'stdin'}, ${config.mode}`,
  });

  let text: string;
  try {
    text = config.file
      ? await io.readFile(config.file)
      : await io.readStdin();
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    logEvent(EventType.ERROR, {category: 'read failed', detail: message});
    io.writeErr(`Cannot read ${config.file ?? 'standard input'}: ${message}\n`);
    return ExitCode.USAGE_ERROR;
  }

  let solver: Solver;
  try {
    solver = new Solver(parsePuzzle(text));
  } catch (e: unknown) {
    if (!(e instanceof PuzzleError)) throw e;
    return reportPuzzleError(e, io);
  }
  const search = solver.search({
    mode: config.mode,
    maxSolutions: config.limit,
    propagateSingles: config.propagate,
    propagateHiddenSingles: config.hiddenSingles,
  });
  const format = {spaced: config.spaced};
  runSearch(search, solution => {
    const ordinal = search.stats.solutions;
    io.writeOut(`${formatSolution(solution, ordinal, format)}\n\n`);
  });
  const found = search.stats.solutions;
  io.writeOut(`${formatSummary(found, search.complete)}\n`);
  return found ? ExitCode.SOLVED : ExitCode.NO_SOLUTION;
}

function reportPuzzleError(e: PuzzleError, io: CliIo): ExitCode {
  const code = e.code;
  switch (code) {
    case PuzzleErrorCode.MALFORMED_INPUT:
    case PuzzleErrorCode.CONTRADICTORY_GIVENS:
      logEvent(EventType.ERROR, {category: code, detail: e.message});
      io.writeErr(`${e.message}\n`);
      return ExitCode.INVALID_INPUT;
    default:
      return ensureExhaustiveSwitch(code);
  }
}

/** The real process's streams and files. */
export const PROCESS_IO: CliIo = {
  env: {[LOG_LEVEL_ENV]: process.env[LOG_LEVEL_ENV]},
  async readStdin() {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
  },
  readFile(path) {
    return readFile(path, 'utf8');
  },
  writeOut(text) {
    process.stdout.write(text);
  },
  writeErr(text) {
    process.stderr.write(text);
  },
};

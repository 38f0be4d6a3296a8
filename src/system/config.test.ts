import {ConfigError, loadConfig, LOG_LEVEL_ENV, USAGE} from './config';

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (e: unknown) {
    if (e instanceof ConfigError) return e.issues;
    throw e;
  }
  throw new Error('Expected a ConfigError');
}

describe(`loadConfig`, () => {
  it(`has defaults for everything`, () => {
    expect(loadConfig([])).toEqual({
      mode: 'all',
      spaced: true,
      propagate: true,
      hiddenSingles: true,
      logLevel: 'error',
      help: false,
    });
  });

  it(`reads every flag`, () => {
    expect(
      loadConfig([
        'puzzle.txt',
        '--first',
        '--compact',
        '--no-propagate',
        '--no-hidden-singles',
        '--log-level',
        'debug',
      ]),
    ).toEqual({
      mode: 'first',
      spaced: false,
      propagate: false,
      hiddenSingles: false,
      logLevel: 'debug',
      file: 'puzzle.txt',
      help: false,
    });
  });

  it(`turns a limit into a number`, () => {
    expect(loadConfig(['--all', '--limit', '5']).limit).toBe(5);
  });

  it(`takes a limit as large as the largest safe integer`, () => {
    expect(loadConfig(['--limit', '9007199254740991']).limit).toBe(
      Number.MAX_SAFE_INTEGER,
    );
  });

  it(`reads standard input for "-"`, () => {
    expect(loadConfig(['-']).file).toBe(undefined);
  });

  it(`takes the log level from the environment unless a flag sets it`, () => {
    const env = {[LOG_LEVEL_ENV]: 'info'};
    expect(loadConfig([], env).logLevel).toBe('info');
    expect(loadConfig(['--log-level', 'silent'], env).logLevel).toBe('silent');
    expect(loadConfig([], {[LOG_LEVEL_ENV]: ''}).logLevel).toBe('error');
  });

  it(`recognizes -h`, () => {
    expect(loadConfig(['-h']).help).toBe(true);
    expect(USAGE).toContain('--limit N');
  });

  describe(`rejects`, () => {
    it(`a limit that is not a positive integer`, () => {
      expect(issuesOf(() => loadConfig(['--limit', '0']))).toEqual([
        'limit: Number must be greater than 0',
      ]);
      expect(issuesOf(() => loadConfig(['--limit', '2.5']))).toEqual([
        'limit: Expected integer, received float',
      ]);
    });

    it(`a limit beyond the largest safe integer`, () => {
      expect(issuesOf(() => loadConfig(['--limit', '9007199254740992']))).toEqual(
        ['limit: Number must be less than or equal to 9007199254740991'],
      );
    });

    it(`a limit in first mode`, () => {
      expect(issuesOf(() => loadConfig(['--first', '--limit', '2']))).toEqual([
        'limit: --limit cannot be combined with --first',
      ]);
    });

    it(`first and all together`, () => {
      expect(issuesOf(() => loadConfig(['--first', '--all']))).toEqual([
        '--first and --all cannot be combined',
      ]);
    });

    it(`an unknown log level`, () => {
      const issues = issuesOf(() => loadConfig(['--log-level', 'loud']));
      expect(issues.length).toBe(1);
      expect(issues[0]).toMatch(/^logLevel: Invalid enum value/);
    });

    it(`unknown flags`, () => {
      expect(() => loadConfig(['--bogus'])).toThrow(ConfigError);
    });

    it(`more than one file`, () => {
      expect(issuesOf(() => loadConfig(['a.txt', 'b.txt']))).toEqual([
        'expected at most one puzzle file, got 2',
      ]);
    });
  });
});

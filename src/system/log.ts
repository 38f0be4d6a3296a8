/**
 * All the kinds of events we log.
 */
export enum EventType {
  // The person did something.
  ACTION = 'sd_action', // "sd" = sudoku

  // The computer did something.
  SYSTEM = 'sd_system',

  // Something bad happened.
  ERROR = 'sd_error',

  // Detail that only helps when chasing a problem.
  DEBUG = 'sd_debug',
}

/**
 * Extra information we might include with an event.
 */
export declare interface EventParams {
  category?: string;
  detail?: string;
  elapsedMs?: number;
}

/** How much gets logged, from nothing to everything. */
export const LOG_LEVELS = ['silent', 'error', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Receives each logged event as a single line of JSON. */
export type LogSink = (line: string) => void;

const LEVEL_OF_EVENT: Record<EventType, LogLevel> = {
  [EventType.ERROR]: 'error',
  [EventType.ACTION]: 'info',
  [EventType.SYSTEM]: 'info',
  [EventType.DEBUG]: 'debug',
};

let currentLevel: LogLevel = 'error';
let currentSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

/**
 * Redirects logged events, returning the sink that was in place so it can be
 * put back.
 */
export function setLogSink(sink: LogSink): LogSink {
  const prev = currentSink;
  currentSink = sink;
  return prev;
}

/** Tells whether events of the given type get through the current level. */
export function isLogged(event: EventType): boolean {
  return (
    LOG_LEVELS.indexOf(LEVEL_OF_EVENT[event]) <= LOG_LEVELS.indexOf(currentLevel)
  );
}

/**
 * Logs something that happened.
 * @param event What happened.
 */
export function logEvent(event: EventType, params: EventParams = {}) {
  if (!isLogged(event)) return;
  currentSink(JSON.stringify({event, ...params}));
}

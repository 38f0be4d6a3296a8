#!/usr/bin/env node
import {EventType, logEvent} from '../system/log';
import {ExitCode, PROCESS_IO, run} from './main';

run(process.argv.slice(2), PROCESS_IO).then(
  code => {
    process.exitCode = code;
  },
  (e: unknown) => {
    const detail = e instanceof Error ? (e.stack ?? e.message) : String(e);
    logEvent(EventType.ERROR, {category: 'uncaught error', detail});
    process.stderr.write(`${detail}\n`);
    process.exitCode = ExitCode.INTERNAL_ERROR;
  },
);

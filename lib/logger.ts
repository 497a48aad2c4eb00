import pino from 'pino';
import pretty from 'pino-pretty';

/**
 * Process-wide logger. Lines go to stdout through pino-pretty in sync mode,
 * so nothing is left buffered when the CLI sets its exit code and returns.
 */
const stream = pretty({
  colorize: true,
  sync: true,
  destination: 1,
  ignore: 'pid,hostname',
  translateTime: 'SYS:HH:MM:ss',
});

const logger = pino({ level: process.env.LOG_LEVEL || 'info' }, stream);

export default logger;

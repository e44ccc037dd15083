import { pino, type Logger } from 'pino';
import { join } from 'path';
import { getGlobalDir } from '../utils/platform.js';

export function createLogger(name: string = 'shelf', verbose: boolean = false): Logger {
  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino({
    name,
    level: 'info',
    transport: {
      target: 'pino/file',
      options: { destination: join(getGlobalDir(), 'logs', 'shelf.log'), mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}

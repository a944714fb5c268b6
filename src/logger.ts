import pino, { type DestinationStream, type Logger } from 'pino';

import type { LogLevel } from './config';

export type { Logger } from 'pino';

export type LoggerOptions = {
  level: LogLevel;
  /**
   * Output stream; pino writes to stdout when omitted.
   */
  destination?: DestinationStream;
};

/**
 * Creates the bridge's root logger.
 *
 * Secret-bearing payloads are never logged: only paths, counts and kinds
 * reach the log, and `inputs`/`outputs` bindings are redacted as a backstop.
 */
export function createLogger(options: LoggerOptions): Logger {
  const config = {
    level: options.level,
    base: { service: 'provider-bridge' },
    redact: {
      paths: ['inputs', 'outputs', '*.inputs', '*.outputs'],
      censor: '[secret]'
    }
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}

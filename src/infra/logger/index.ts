/**
 * Root pino logger for the aggregator. Each source adapter and the bundle
 * manager log through a child tagged with its `component`.
 */

import pinoLib, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  /** pino-pretty output instead of JSON lines */
  pretty: boolean;
}

export const SERVICE_NAME = 'cpi-aggregator';

/** Bindings that may carry source credentials */
export const REDACTED_PATHS = ['apiKey', '*.apiKey', 'api_key', '*.api_key'];

/**
 * A destination stream bypasses pino-pretty, so tests can read the JSON lines.
 */
export const createLogger = (config: LoggerConfig, destination?: DestinationStream): Logger => {
  const options: LoggerOptions = {
    name: SERVICE_NAME,
    level: config.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  if (destination !== undefined) {
    return pinoLib(options, destination);
  }

  if (config.pretty && config.level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,name',
        messageFormat: '{component} {msg}',
      },
    };
  }

  return pinoLib(options);
};

export const createComponentLogger = (
  parent: Logger,
  component: string,
  bindings: Record<string, unknown> = {}
): Logger => parent.child({ component, ...bindings });

export { type Logger } from 'pino';

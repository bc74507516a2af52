/**
 * Subsystem Logging
 *
 * Hands out pino child loggers tagged with the name of the component
 * that owns them. The root logger is created lazily from the environment
 * so importing a component never opens a transport on its own.
 */

import { pino, type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type LogMetadata = Record<string, unknown>;

export interface SubsystemLogger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
  fatal(message: string, metadata?: LogMetadata): void;
}

export interface RootLoggerOptions {
  level: LevelWithSilent;
  pretty: boolean;
  /** JSON output target; defaults to stdout. Not used with the pretty transport. */
  destination?: DestinationStream;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

let rootLogger: Logger | undefined;

function isLevel(value: string | undefined): value is LevelWithSilent {
  return LEVELS.some(level => level === value);
}

function optionsFromEnv(env: NodeJS.ProcessEnv): RootLoggerOptions {
  return {
    level: isLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info',
    pretty: env.NODE_ENV === 'development',
  };
}

/**
 * Replaces the root logger. Subsystem loggers rebind to the new root on
 * their next call.
 */
export function configureRootLogger(options: RootLoggerOptions): Logger {
  if (options.pretty) {
    rootLogger = pino({
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss Z',
        },
      },
    });
  } else if (options.destination) {
    rootLogger = pino({ level: options.level }, options.destination);
  } else {
    rootLogger = pino({ level: options.level });
  }
  return rootLogger;
}

function getRootLogger(): Logger {
  return rootLogger ?? configureRootLogger(optionsFromEnv(process.env));
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let boundRoot: Logger | undefined;
  let child: Logger | undefined;

  const current = (): Logger => {
    const root = getRootLogger();
    if (child && boundRoot === root) {
      return child;
    }
    const next = root.child({ subsystem });
    child = next;
    boundRoot = root;
    return next;
  };

  const emit = (level: 'debug' | 'info' | 'warn' | 'error' | 'fatal') =>
    (message: string, metadata?: LogMetadata): void => {
      const logger = current();
      if (metadata) {
        logger[level](metadata, message);
      } else {
        logger[level](message);
      }
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal'),
  };
}

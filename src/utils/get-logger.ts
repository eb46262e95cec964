import pino from 'pino';
import pretty from 'pino-pretty';
import { z } from 'zod';

const terminalLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LoggerOptions = {
  /** Append JSON log lines (every level down to debug) to this file. */
  logFile?: string;
};

export const getLogger = (options: LoggerOptions = {}) => {
  const environment = process.env.NODE_ENV ?? 'development';
  const isProduction = environment === 'production';
  const parsedLevel = terminalLevelSchema.safeParse(process.env.LOG_LEVEL ?? 'info');
  const terminalLevel = parsedLevel.success ? parsedLevel.data : 'info';

  const loggerConfig: pino.LoggerOptions = {
    level: terminalLevel,
    base: {
      service: 'folder-consolidator',
      environment,
    },
  };

  // Pretty output goes to stderr so it does not interleave with prompts and the summary
  const terminalStream = isProduction
    ? pino.destination(2)
    : pretty({
      colorize: true,
      singleLine: true,
      translateTime: 'yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname,service,environment',
      destination: process.stderr,
    });

  if (!options.logFile) {
    return pino(loggerConfig, terminalStream);
  }

  const fileStream = pino.destination({
    dest: options.logFile,
    append: true,
    mkdir: true,
    sync: true,
  });

  if (terminalLevel === 'silent') {
    return pino({ ...loggerConfig, level: 'debug' }, fileStream);
  }

  return pino(
    { ...loggerConfig, level: terminalLevel === 'trace' ? 'trace' : 'debug' },
    pino.multistream([
      { level: terminalLevel, stream: terminalStream },
      { level: 'debug', stream: fileStream },
    ]),
  );
};

export type Logger = ReturnType<typeof getLogger>;

/** The slice of a logger the services write progress lines to. */
export type ServiceLogger = Pick<Logger, 'info' | 'debug'>;


import pino from 'pino';

const LOG_LEVELS: Record<string, pino.LevelWithSilent> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  WARNING: 'warn',
  ERROR: 'error',
  SILENT: 'silent',
};

const envLevel = (process.env.LOGPRISM_LOG_LEVEL || 'WARN').toUpperCase();

// stdout carries rendered records, so diagnostics go to stderr. Synchronous
// writes keep the fatal line ahead of process.exit().
export const logger = pino(
  {
    name: 'logprism',
    level: LOG_LEVELS[envLevel] || 'warn',
    base: null,
  },
  pino.destination({ dest: 2, sync: true }),
);

export default logger;

import pino from 'pino';

/** Unknown values fall back to info; config validation reports them later. */
export function resolveLogLevel(raw: string | undefined): string {
  if (raw === 'silent' || (raw !== undefined && Object.hasOwn(pino.levels.values, raw))) return raw;
  return 'info';
}

const level = resolveLogLevel(process.env.LOG_LEVEL);
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  name: 'tipbot',
  level,
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss' },
        },
      }
    : {}),
});

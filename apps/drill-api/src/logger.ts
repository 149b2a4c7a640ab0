import pino from 'pino';

/** Pretty output for local runs; JSON tagged with the service name in production. */
export function createLogger(level: pino.LevelWithSilent, production: boolean): pino.Logger {
  if (production) {
    return pino({ level, base: { service: 'drill-api' } });
  }
  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });
}

/** Shared by every module; `buildDrillApi` sets its level from `DrillApiConfig.logLevel`. */
export const logger = createLogger('info', process.env['NODE_ENV'] === 'production');

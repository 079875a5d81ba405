import { pino, type Logger } from 'pino';

export type { Logger };

function usePrettyTransport(): boolean {
  return process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development';
}

/**
 * Component logger. Every call site passes a structured object with a dotted
 * `event` name first, then a human message.
 */
export function createLogger(component: string): Logger {
  const level = process.env.LOG_LEVEL || 'info';

  if (usePrettyTransport()) {
    return pino({
      level,
      base: { component },
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level, base: { component } });
}

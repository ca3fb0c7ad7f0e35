import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

const level = process.env['LOG_LEVEL'] ?? (process.env['VITEST'] ? 'silent' : 'info');

export const logger: Logger = pino({ name: 'mind-rooms', level });

export const log = {
  server: logger.child({ module: 'server' }),
  room: logger.child({ module: 'room' }),
  lifecycle: logger.child({ module: 'lifecycle' }),
};

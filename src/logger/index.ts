import pino from 'pino';
import { env } from '../config/env';

const level =
  env.NODE_ENV === 'test' ? 'silent' : env.NODE_ENV === 'development' ? 'debug' : env.LOG_LEVEL;

// stdout is reserved for the weather report, so logs go to stderr
export const logger =
  env.NODE_ENV === 'development'
    ? pino({
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { pid: process.pid },
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      })
    : pino(
        {
          level,
          timestamp: pino.stdTimeFunctions.isoTime,
          base: { pid: process.pid },
        },
        pino.destination(2)
      );

import pino from 'pino';
import { config } from '../config.js';

const env = process.env.NODE_ENV;

// stdout carries JSON-RPC under the stdio transport, so every log line goes to stderr
const options: pino.LoggerOptions = {
  name: config.NAME,
  level: env === 'test' ? 'silent' : env === 'development' ? 'debug' : config.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { pid: process.pid },
  transport: env === 'development'
    ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        destination: 2,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    }
    : undefined,
};

export const logger = options.transport
  ? pino(options)
  : pino(options, pino.destination(2));

import pino from 'pino';

const isTest = process.env['NODE_ENV'] === 'test';

export const logger = isTest
  ? pino({
      name: 'cambridge-lsp-resolver',
      level: 'silent',
    })
  : pino({
      name: 'cambridge-lsp-resolver',
      level: process.env['LOG_LEVEL'] || 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss.l',
          // stdout carries the CLI's JSON output
          destination: 2,
        },
      },
    });

import pino from 'pino';

const level = process.env.BRIDGE_LOG_LEVEL ?? 'info';
const isDev = process.env.NODE_ENV !== 'production';

// stdout belongs to the MCP stdio transport, so every log line goes to stderr.
export const logger =
  isDev && level !== 'silent'
    ? pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss.l',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      })
    : pino({ level }, pino.destination(2));

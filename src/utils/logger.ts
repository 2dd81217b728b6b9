import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Custom format for development (human-readable)
 */
const devFormat = combine(
  colorize(),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
  })
);

/**
 * Custom format for production (JSON for log aggregation)
 */
const prodFormat = combine(timestamp(), json());

/**
 * Determine log level from environment
 */
function getLogLevel(): string {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && LOG_LEVELS.includes(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Create transports based on environment
 *
 * stdout carries the MCP protocol, so every console level is routed to stderr.
 */
function getTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: LOG_LEVELS }),
  ];

  const logFile = process.env.LOG_FILE;
  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        format: combine(timestamp(), json()),
      })
    );
  }

  return transports;
}

/**
 * Main application logger
 */
export const logger = winston.createLogger({
  level: getLogLevel(),
  format: process.env.NODE_ENV === 'production' ? prodFormat : devFormat,
  transports: getTransports(),
  defaultMeta: { service: 'container-tool-bridge' },
});

/**
 * Audit line for a dispatched tool call
 * Only argument keys are recorded; values may carry payloads or secrets
 */
export function auditToolCall(entry: {
  tool: string;
  argumentKeys: string[];
  outcome: 'ok' | 'unknown_tool' | 'invalid_arguments' | 'error';
  durationMs: number;
}): void {
  logger.info('Tool call', {
    type: 'audit',
    ...entry,
  });
}

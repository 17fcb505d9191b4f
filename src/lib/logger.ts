import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warning: (message: string) => void;
  error: (message: string) => void;
}

type LogFn = (level: LogLevel, message: string) => void;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

const MAX_FAILURE_WARNINGS = 10;

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

// Local time, "2025-05-22 09:05:03,007"
export function formatTimestamp(date: Date): string {
  const day = `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  date: Date
): string {
  return `${formatTimestamp(date)} - ${level.toUpperCase()} - ${message}`;
}

function buildLogger(log: LogFn): Logger {
  return {
    debug: (message: string): void => {
      log('debug', message);
    },
    info: (message: string): void => {
      log('info', message);
    },
    warning: (message: string): void => {
      log('warning', message);
    },
    error: (message: string): void => {
      log('error', message);
    },
  };
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
  now?: () => Date;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info';
  const write =
    options.write ??
    ((line: string): void => {
      console.error(line);
    });
  const now = options.now ?? ((): Date => new Date());

  return buildLogger((level, message) => {
    if (!isEnabled(level, minLevel)) return;
    write(formatLogLine(level, message, now()));
  });
}

/** The parts of an MCP server the logger talks to. */
export type McpLoggingTarget = Pick<McpServer, 'isConnected'> & {
  server: Pick<McpServer['server'], 'sendLoggingMessage'>;
};

/**
 * Logger that forwards to the connected MCP client as logging notifications.
 * Messages the client cannot take go to `fallback` instead.
 */
export function createMcpLogger(
  server: McpLoggingTarget,
  fallback: Logger,
  level: LogLevel = 'info'
): Logger {
  let failureCount = 0;

  return buildLogger((messageLevel, message) => {
    if (!isEnabled(messageLevel, level)) return;
    if (!server.isConnected()) {
      fallback[messageLevel](message);
      return;
    }

    server.server
      .sendLoggingMessage({
        level: messageLevel,
        data: message,
        logger: 'rule-msg-finder',
      })
      .catch(() => {
        failureCount++;
        fallback[messageLevel](message);

        if (failureCount === MAX_FAILURE_WARNINGS) {
          fallback.error(
            'MCP logging failed 10 times. Further failures will not be reported.'
          );
        }
      });
  });
}

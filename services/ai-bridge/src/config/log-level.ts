import { Logger, LogLevel } from '@nestjs/common';

export const BRIDGE_LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type BridgeLogLevel = (typeof BRIDGE_LOG_LEVELS)[number];

export function isBridgeLogLevel(value: string): value is BridgeLogLevel {
  return BRIDGE_LOG_LEVELS.some((level) => level === value);
}

/**
 * Nest logger levels enabled for a bridge log level (inclusive of everything more severe)
 */
export function toNestLogLevels(level: BridgeLogLevel): LogLevel[] {
  switch (level) {
    case 'debug':
      return ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];
    case 'info':
      return ['fatal', 'error', 'warn', 'log'];
    case 'warn':
      return ['fatal', 'error', 'warn'];
    case 'error':
      return ['fatal', 'error'];
  }
}

export function applyLogLevel(level: BridgeLogLevel): void {
  Logger.overrideLogger(toNestLogLevels(level));
}

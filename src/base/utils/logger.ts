/**
 * Structured logging module
 *
 * Lines look like `[timestamp] Skill:warn - message [file="..." reason="..."]`.
 * Debug lines are gated per component by the CAPREG_DEBUG* switches.
 */

import { getDebugConfig, type DebugComponent } from './debug.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Where formatted lines go. Defaults to the console.
 */
export interface LogSink {
  write(level: LogLevel, line: string): void;
}

const consoleSink: LogSink = {
  write(level, line) {
    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.log(line);
        break;
    }
  },
};

let sink: LogSink = consoleSink;

/**
 * Replace the log sink; pass nothing to restore console output
 */
export function setLogSink(next?: LogSink): void {
  sink = next ?? consoleSink;
}

/**
 * Format context object for readable output
 */
export function formatContext(context: LogContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return '';
  }

  const formatted = entries
    .map(([key, value]) => {
      if (typeof value === 'string') {
        return `${key}="${value}"`;
      }
      if (value === undefined || value === null) {
        return `${key}=${value}`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

/**
 * Log a message with structured context
 *
 * @param component - Component tag printed on the line (e.g. 'Skill', 'Discovery')
 * @param debugComponent - Debug switch consulted for DEBUG lines; the global switch when omitted
 */
export function log(
  level: LogLevel,
  component: string,
  message: string,
  context?: LogContext,
  debugComponent?: DebugComponent
): void {
  if (level === LogLevel.DEBUG) {
    const config = getDebugConfig();
    const enabled = debugComponent ? config.components[debugComponent] >= 1 : config.enabled;
    if (!enabled) return;
  }

  const timestamp = new Date().toISOString();
  const contextStr = context ? formatContext(context) : '';
  sink.write(level, `[${timestamp}] ${component}:${level} - ${message}${contextStr}`);
}

export interface ComponentLogger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

/**
 * Logger bound to one component tag and debug switch
 */
export function createLogger(component: string, debugComponent?: DebugComponent): ComponentLogger {
  return {
    error: (message, context) => log(LogLevel.ERROR, component, message, context),
    warn: (message, context) => log(LogLevel.WARN, component, message, context),
    info: (message, context) => log(LogLevel.INFO, component, message, context),
    debug: (message, context) => log(LogLevel.DEBUG, component, message, context, debugComponent),
  };
}

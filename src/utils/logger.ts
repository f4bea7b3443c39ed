import path from 'path';
import { loadConfig } from './config/config';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

interface LogEntry {
  fileName: string;
  functionName: string;
  scenario?: string;
  level: LogLevel;
  message: string;
}

type ExtraInformation = Record<string, unknown>;

/**
 * Extracts caller information from the call stack
 * @param depth How deep in the call stack to look (2 = caller of caller)
 */
function getCallerInfo(depth: number = 2): { fileName: string; functionName: string } {
  const originalPrepareStackTrace = Error.prepareStackTrace;

  try {
    Error.prepareStackTrace = (_, stack) => stack;
    const stack = new Error().stack as unknown as NodeJS.CallSite[];

    if (stack && stack.length > depth) {
      const caller = stack[depth];
      const fileName = caller.getFileName();
      const functionName = caller.getFunctionName();

      return {
        fileName: fileName ? path.basename(fileName, '.ts') : 'unknown',
        functionName: functionName || 'anonymous',
      };
    }
  } finally {
    Error.prepareStackTrace = originalPrepareStackTrace;
  }

  return {
    fileName: 'unknown',
    functionName: 'unknown',
  };
}

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    value !== null &&
    typeof value === 'object' &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

export function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' | ');
}

/**
 * Builds the single output line for a log call.
 *
 * Format: `[scenario | ]LEVEL | file:function | message[ | key: value | ...]`
 */
export function formatLogLine(entry: LogEntry, extraInformation?: ExtraInformation): string {
  const parts: string[] = [];

  if (entry.scenario) {
    parts.push(entry.scenario);
  }
  parts.push(entry.level);
  parts.push(`${entry.fileName}:${entry.functionName}`);
  parts.push(entry.message);

  if (extraInformation) {
    parts.push(formatExtraInformation(extraInformation));
  }

  return parts.join(' | ');
}

/**
 * Main logging function
 * @param level Log level
 * @param args Message parts and optional extraInformation
 */
function logMessage(level: LogLevel, ...args: unknown[]): void {
  const { fileName, functionName } = getCallerInfo(3); // 3 because we go through helper methods
  const { scenario } = loadConfig();

  // A trailing plain object is treated as key/value details rather than message text
  let extraInformation: ExtraInformation | undefined;
  let messageParts = args;
  const lastArg = args[args.length - 1];
  if (args.length > 0 && isExtraInformation(lastArg)) {
    extraInformation = lastArg;
    messageParts = args.slice(0, -1);
  }

  const message = messageParts
    .map((part) => (typeof part === 'string' ? part : part instanceof Error ? part.message : JSON.stringify(part)))
    .join(' ');

  const fullOutput = formatLogLine({ fileName, functionName, scenario, level, message }, extraInformation);

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
    default:
      console.log(fullOutput);
  }
}

/**
 * Debug level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Skipping segment', { segment: 'bad' })
 */
export function debug(...args: unknown[]): void {
  logMessage(LogLevel.DEBUG, ...args);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Job', id, 'completed', { runs: 2500 })
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging - accepts multiple message parts like console.log
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging - accepts multiple message parts like console.log
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}

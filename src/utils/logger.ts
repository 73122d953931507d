import fs from 'fs';
import path from 'path';

let logFile: string | null = null;

const logToFile = (message: string): void => {
  if (!logFile) return;
  try {
    fs.appendFileSync(logFile, `${message}\n`, { encoding: 'utf8' });
  } catch (error) {
    console.error(`Error writing to log file: ${error instanceof Error ? error.message : String(error)}`);
  }
};

const format = (level: string, message: string): string =>
  `[${new Date().toISOString()}] ${level}: ${message}`;

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Name of a run's log file, e.g. dupe-sweep_20240131_142501.log
 */
export const logFileName = (now: Date = new Date()): string =>
  `dupe-sweep_${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
  `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}.log`;

/**
 * Start copying every log line to a file under logDir. Pass null to stop.
 */
export const enableFileLog = (logDir: string | null): string | null => {
  if (logDir === null) {
    logFile = null;
    return null;
  }
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logFile = path.join(logDir, logFileName());
  return logFile;
};

export const logger = {
  info: (message: string): void => {
    const logEntry = format('INFO', message);
    console.log(logEntry);
    logToFile(logEntry);
  },

  warn: (message: string): void => {
    const logEntry = format('WARN', message);
    console.warn(logEntry);
    logToFile(logEntry);
  },

  error: (message: string, error?: unknown): void => {
    const errorMessage = error === undefined ? '' : error instanceof Error ? error.message : String(error);
    const logEntry = format('ERROR', `${message}${errorMessage ? `: ${errorMessage}` : ''}`);
    console.error(logEntry);
    logToFile(logEntry);
  },

  debug: (message: string): void => {
    if (process.env.NODE_ENV === 'development') {
      const logEntry = format('DEBUG', message);
      console.log(logEntry);
      logToFile(logEntry);
    }
  }
};

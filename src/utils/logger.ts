/**
 * @fileoverview Sistema de logging centralizado del cliente (electron-log, entrada Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child) y operaciones cronometradas.
 * Como librería no escribe a archivo hasta que el host llama a configureLogger con un
 * fileLevel; la consola queda en 'warn' (silenciosa bajo Jest).
 */

import log from 'electron-log/node';
import DEFAULT_CONFIG from '../config';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface ConfigureLoggerOptions {
  fileLevel?: LogLevel | false;
  consoleLevel?: LogLevel | false;
  maxSize?: number;
}

log.transports.file.level = DEFAULT_CONFIG.logging.fileLevel;
log.transports.console.level = DEFAULT_CONFIG.logging.consoleLevel;
log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  verbose: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  silly: (..._args: unknown[]) => void;
  startOperation: (_operation: string) => (_result?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: LogLevel) =>
    (...args: unknown[]) =>
      baseChildLog[method](...args);

  const extendedChildLog: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    verbose: logMethod('verbose'),
    debug: logMethod('debug'),
    silly: logMethod('silly'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.info(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

/**
 * Configura el logger global (archivo y consola).
 * Por defecto: fileLevel 'info', consoleLevel 'warn', maxSize 5 MB.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): typeof log {
  const { fileLevel = 'info', consoleLevel = 'warn', maxSize = 5 * 1024 * 1024 } = options;

  log.transports.file.level = fileLevel;
  log.transports.file.maxSize = maxSize;

  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
  log.transports.console.level = consoleLevel;

  if (fileLevel !== false) {
    log.info(`Logger inicializado, archivo: ${getLogFilePath() ?? 'No disponible'}`);
  }
  return log;
}

/** Ruta absoluta del archivo de log actual, o null si no está configurado. */
export function getLogFilePath(): string | null {
  const file = log.transports.file.getFile();
  return file?.path ?? null;
}

export interface LoggerInstance {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  child: (_scope: string) => ScopedLogger;
  configure: typeof configureLogger;
  getFilePath: typeof getLogFilePath;
}

export const logger: LoggerInstance = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  child: (scope: string) => createScopedLogger(scope),
  configure: configureLogger,
  getFilePath: getLogFilePath,
};

export { log as electronLog };

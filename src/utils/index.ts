/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 */

export {
  logger,
  configureLogger,
  createScopedLogger,
  getLogFilePath,
  electronLog,
  type LogLevel,
  type ScopedLogger,
} from './logger';

export { DfuClientError, errorCodeOf, errorMessageOf } from './errors';
export * as schemas from './schemas';

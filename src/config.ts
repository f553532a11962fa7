/**
 * Configuración por defecto del cliente DFU (valores de runtime).
 *
 * Aquí se definen las capacidades de los buffers de petición/respuesta, el tamaño
 * máximo de fragmento, el puerto y la familia de direcciones del transporte,
 * la política de reintentos del runner y los niveles de log. El host puede pasar
 * overrides parciales a resolveClientConfig; se validan con zod antes de usarse.
 *
 * @module config
 */

import { clientConfigSchema, validate } from './utils/schemas';
import { DfuClientError } from './utils/errors';
import { ERROR_CODES } from './constants/errors';
import type { LogLevel } from './utils/logger';

export interface DfuBufferConfig {
  /** Capacidad del buffer de petición (bytes). La petición formateada debe caber entera. */
  maxRequestSize: number;
  /** Capacidad del buffer de respuesta (bytes): cabeceras + un fragmento completo. */
  maxResponseSize: number;
  /** Ventana de cada petición Range: bytes que se piden por fragmento. */
  maxFragmentSize: number;
}

export interface NetworkConfig {
  port: number;
  family: 4 | 6;
  connectTimeout: number;
}

export interface RunnerConfig {
  maxRetries: number;
  retryDelay: number;
  maxRetryDelay: number;
  /** Espera máxima por datos entre dos llamadas a process(). */
  pollInterval: number;
}

export interface LoggingConfig {
  consoleLevel: LogLevel | false;
  fileLevel: LogLevel | false;
}

export interface ClientConfig {
  dfu: DfuBufferConfig;
  network: NetworkConfig;
  runner: RunnerConfig;
  logging: LoggingConfig;
}

export type ClientConfigOverrides = {
  [K in keyof ClientConfig]?: Partial<ClientConfig[K]>;
};

const DEFAULT_CONFIG: ClientConfig = {
  dfu: {
    maxRequestSize: 256,
    maxResponseSize: 2048,
    maxFragmentSize: 1024,
  },

  network: {
    port: 80,
    family: 4,
    connectTimeout: 10000,
  },

  runner: {
    maxRetries: 3,
    retryDelay: 1000,
    maxRetryDelay: 30000,
    pollInterval: 50,
  },

  logging: {
    consoleLevel: process.env.NODE_ENV === 'test' ? false : 'warn',
    fileLevel: false,
  },
};

/**
 * Mezcla los overrides sobre DEFAULT_CONFIG y valida el resultado.
 *
 * @throws DfuClientError con código EINVAL si algún valor no es válido.
 */
export function resolveClientConfig(overrides: ClientConfigOverrides = {}): ClientConfig {
  const merged = {
    dfu: { ...DEFAULT_CONFIG.dfu, ...overrides.dfu },
    network: { ...DEFAULT_CONFIG.network, ...overrides.network },
    runner: { ...DEFAULT_CONFIG.runner, ...overrides.runner },
    logging: { ...DEFAULT_CONFIG.logging, ...overrides.logging },
  };

  const result = validate(clientConfigSchema, merged);
  if (!result.success || !result.data) {
    throw new DfuClientError(ERROR_CODES.INVALID_ARGUMENT, result.error);
  }
  return result.data;
}

export default DEFAULT_CONFIG;

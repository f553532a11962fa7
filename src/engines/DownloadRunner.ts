/**
 * Bucle de la aplicación alrededor de DfuClient: conecta, inicia la descarga, llama a
 * process() cuando el transporte tiene datos y, ante un error, desconecta y reanuda desde
 * el último downloadSize aceptado con backoff exponencial. El núcleo no reintenta nada;
 * esta es la política de reintentos del lado de la aplicación.
 *
 * @module engines/DownloadRunner
 */

import { ERROR_CODES } from '../constants/errors';
import { logger } from '../utils/logger';
import { sleep } from '../utils/timers';
import { STATE, isTerminalState } from './DownloadStateMachine';
import type { DfuClient } from './DfuClient';

const log = logger.child('DownloadRunner');

export type RunOutcome = 'complete' | 'halted' | 'failed' | 'aborted';

export interface RunResult {
  outcome: RunOutcome;
  downloadSize: number;
  firmwareSize: number;
  /** Intentos de conexión + descarga realizados (1 si no hubo reintentos). */
  attempts: number;
  /** Último error directo (connect/download) si la descarga no se completó. */
  error?: string;
}

export interface RunOptions {
  signal?: AbortSignal;
  maxRetries?: number;
  retryDelay?: number;
  maxRetryDelay?: number;
  pollInterval?: number;
}

/** Backoff exponencial: retryDelay * 2^(attempt - 1), acotado a maxRetryDelay. */
export function retryDelayFor(attempt: number, retryDelay: number, maxRetryDelay: number): number {
  return Math.min(retryDelay * Math.pow(2, Math.max(attempt - 1, 0)), maxRetryDelay);
}

/**
 * Conduce la descarga hasta un estado final. Siempre desconecta antes de resolver.
 * init() se llama si la sesión no se inicializó todavía (la primera vez).
 */
export async function runDownload(client: DfuClient, options: RunOptions = {}): Promise<RunResult> {
  const maxRetries = options.maxRetries ?? client.config.runner.maxRetries;
  const retryDelay = options.retryDelay ?? client.config.runner.retryDelay;
  const maxRetryDelay = options.maxRetryDelay ?? client.config.runner.maxRetryDelay;
  const pollInterval = options.pollInterval ?? client.config.runner.pollInterval;
  const signal = options.signal;

  const finish = async (
    outcome: RunOutcome,
    attempts: number,
    error?: string
  ): Promise<RunResult> => {
    await client.disconnect();
    const result: RunResult = {
      outcome,
      downloadSize: client.downloadSize,
      firmwareSize: client.firmwareSize,
      attempts,
    };
    if (error !== undefined) result.error = error;
    log.info(
      `Descarga ${client.resource}: ${outcome} (${client.downloadSize} bytes, ${attempts} intentos)`
    );
    return result;
  };

  if (client.status === STATE.IDLE && client.handle === null) {
    const init = client.init();
    if (!init.success) {
      return finish('failed', 0, init.error);
    }
  }

  const endOperation = log.startOperation(`descarga de ${client.host}${client.resource}`);
  let attempts = 0;
  let lastError: string | undefined;

  while (attempts <= maxRetries) {
    if (signal?.aborted) {
      endOperation('abortada');
      return finish('aborted', attempts);
    }

    if (attempts > 0) {
      const delay = retryDelayFor(attempts, retryDelay, maxRetryDelay);
      log.warn(
        `Reintentando desde el byte ${client.downloadSize} en ${delay}ms (intento ${attempts}/${maxRetries})`
      );
      await client.disconnect();
      await sleep(delay, signal);
      if (signal?.aborted) continue;
    }
    attempts++;

    const connected = await client.connect();
    if (!connected.success) {
      lastError = connected.error;
      continue;
    }

    const started = await client.download();
    if (!started.success) {
      // la petición no cabe en el buffer: reintentar no lo arregla
      if (started.code === ERROR_CODES.BUFFER_TOO_SMALL) {
        endOperation('fallida');
        return finish('failed', attempts, started.error);
      }
      lastError = started.error;
      continue;
    }

    while (!isTerminalState(client.status) && !signal?.aborted) {
      await client.waitReadable(pollInterval);
      await client.process();
    }

    if (client.status === STATE.COMPLETE) {
      endOperation('completada');
      return finish('complete', attempts);
    }
    if (client.status === STATE.HALTED) {
      endOperation('detenida por la aplicación');
      return finish('halted', attempts);
    }
    if (client.status === STATE.ERROR) {
      lastError = `error de transporte en el byte ${client.downloadSize}`;
    }
  }

  if (signal?.aborted) {
    endOperation('abortada');
    return finish('aborted', attempts);
  }
  endOperation('fallida');
  return finish('failed', attempts, lastError);
}

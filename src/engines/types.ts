/**
 * Tipos y contratos compartidos por el cliente DFU.
 *
 * Define el contrato del transporte (ITransport) que el cliente consume sin saber
 * nada de DNS ni sockets, los eventos que recibe el callback de la aplicación y el
 * resultado del parser de respuestas.
 *
 * @module engines/types
 */

import type { StateValue } from './DownloadStateMachine';

/** Handle opaco de una conexión abierta por el transporte. */
export type TransportHandle = number;

export type ReceiveResult =
  /** `length` 0 indica que el servidor cerró la conexión. */
  | { status: 'ok'; length: number }
  | { status: 'would-block' }
  | { status: 'failed'; code: string };

/**
 * Contrato del transporte (permite inyectar un fake en tests).
 *
 * connect rechaza con un error que trae `code` si no puede abrir la conexión;
 * send rechaza si el socket falla.
 */
export interface ITransport {
  connect: (_host: string) => Promise<TransportHandle>;
  send: (_handle: TransportHandle, _data: Buffer) => Promise<number>;
  /** Copia hasta `buffer.length` bytes en `buffer`; con `peek` no los consume. */
  receive: (_handle: TransportHandle, _buffer: Buffer, _peek: boolean) => Promise<ReceiveResult>;
  close: (_handle: TransportHandle) => Promise<void>;
  /** Espera a que haya algo que leer (datos, fin o error). Opcional. */
  waitReadable?: (_handle: TransportHandle, _timeoutMs: number) => Promise<boolean>;
}

/** Tipos de evento que recibe el callback de la aplicación. */
export const DfuEventType = Object.freeze({
  ERROR: 'error',
  FRAGMENT: 'fragment',
  DONE: 'done',
} as const);

export type DfuEvent =
  | { type: typeof DfuEventType.ERROR; status: string }
  /**
   * `fragment` es una vista sobre el buffer de respuesta: solo es válida durante la
   * llamada al callback. Copiarla si se necesita más tarde.
   */
  | { type: typeof DfuEventType.FRAGMENT; fragment: Buffer; size: number }
  | { type: typeof DfuEventType.DONE };

/**
 * Callback de eventos. Devuelve 0 si el evento se procesó; cualquier otro valor
 * rechaza el fragmento (detiene la descarga) o el fin de descarga (reintenta el último).
 */
export type DfuEventHandler<TClient = unknown> = (
  _client: TClient,
  _event: DfuEvent
) => number | Promise<number>;

/** Resultado del parser de respuestas HTTP parciales. */
export type ParseResult =
  | { kind: 'incomplete' }
  | {
      kind: 'payload-pending';
      payloadSize: number;
      totalSize: number;
      rangeStart: number | null;
      connectionClose: boolean;
    }
  | {
      kind: 'ready';
      payloadOffset: number;
      payloadSize: number;
      totalSize: number;
      rangeStart: number | null;
      connectionClose: boolean;
    };

/** Contexto de la descarga que el parser necesita para decidir si el fragmento está listo. */
export interface ParseContext {
  downloadSize: number;
  firmwareSize: number;
  maxFragmentSize: number;
}

/** Resultado de las operaciones síncronas/directas (init, connect, download). */
export type OperationResult = { success: true } | { success: false; code: string; error: string };

export interface StateChangePayload {
  from: StateValue;
  to: StateValue;
}

export interface ProgressPayload {
  downloadSize: number;
  firmwareSize: number;
  percent: number;
}

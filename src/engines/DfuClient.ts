/**
 * Sesión de descarga de firmware por fragmentos HTTP Range.
 *
 * Reúne el registro de sesión (host, recurso, buffers, contadores, estado, handle) y la
 * máquina de estados que lo hace avanzar. El ciclo lo conduce la aplicación:
 *
 *   init() -> connect() -> download() -> process() ... -> disconnect()
 *
 * Cada process() hace como mucho un receive con peek y vuelve; nunca espera datos en bucle.
 * Los datos solo se consumen del transporte cuando el fragmento está completo y el
 * callback lo aceptó (flush antes de la siguiente petición). Hay una sola petición
 * pendiente en el transporte en todo momento.
 *
 * @module engines/DfuClient
 */

import EventEmitter from 'events';
import { resolveClientConfig, type ClientConfig, type ClientConfigOverrides } from '../config';
import { DFU_ERRORS, ERROR_CODES } from '../constants/errors';
import { configureLogger, logger } from '../utils/logger';
import { DfuClientError, errorCodeOf, errorMessageOf } from '../utils/errors';
import { sleep } from '../utils/timers';
import { validateDownloadOffset, validateSessionOptions } from '../utils/schemas';
import { STATE, canTransition, type StateValue } from './DownloadStateMachine';
import { buildRangeRequest } from './RequestBuilder';
import { parseResponse } from './ResponseParser';
import {
  DfuEventType,
  type DfuEvent,
  type DfuEventHandler,
  type ITransport,
  type OperationResult,
  type ProgressPayload,
  type ReceiveResult,
  type StateChangePayload,
  type TransportHandle,
} from './types';

const log = logger.child('DfuClient');

/** Tamaño total aún no conocido (sesión sin descarga iniciada). */
export const FIRMWARE_SIZE_UNKNOWN = 0;
/** Descarga iniciada, el servidor todavía no informó el tamaño total. */
export const FIRMWARE_SIZE_PENDING = -1;

export interface DfuClientOptions {
  host: string;
  resource: string;
  callback: DfuEventHandler<DfuClient>;
  transport: ITransport;
  config?: ClientConfigOverrides;
}

export interface DownloadOptions {
  /** Offset desde el que reanudar; por defecto el downloadSize actual. */
  offset?: number;
}

interface FragmentRequestOptions {
  flush: boolean;
  connectionClose: boolean;
}

function failure(code: string, error: string): OperationResult {
  return { success: false, code, error };
}

const SUCCESS: OperationResult = { success: true };
const DETACHED: OperationResult = failure(ERROR_CODES.NOT_CONNECTED, DFU_ERRORS.DETACHED);

export class DfuClient extends EventEmitter {
  readonly host: string;
  readonly resource: string;
  readonly config: ClientConfig;
  /** Buffer de peticiones. La aplicación puede leerlo, nunca escribirlo. */
  readonly requestBuffer: Buffer;
  /** Buffer de respuestas. La aplicación puede leerlo, nunca escribirlo. */
  readonly responseBuffer: Buffer;

  private readonly callback: DfuEventHandler<DfuClient>;
  private readonly transport: ITransport;
  private initialized = false;
  private _handle: TransportHandle | null = null;
  private _status: StateValue = STATE.IDLE;
  private _firmwareSize = FIRMWARE_SIZE_UNKNOWN;
  private _downloadSize = 0;
  private _fragment: Buffer | null = null;
  private _fragmentSize = 0;

  /**
   * @throws DfuClientError (EINVAL) si los overrides de configuración no son válidos.
   */
  constructor(options: DfuClientOptions) {
    super();
    this.host = options.host;
    this.resource = options.resource;
    this.callback = options.callback;
    this.transport = options.transport;
    this.config = resolveClientConfig(options.config);
    if (options.config?.logging) {
      configureLogger({
        consoleLevel: this.config.logging.consoleLevel,
        fileLevel: this.config.logging.fileLevel,
      });
    }
    this.requestBuffer = Buffer.alloc(this.config.dfu.maxRequestSize);
    this.responseBuffer = Buffer.alloc(this.config.dfu.maxResponseSize);
  }

  get status(): StateValue {
    return this._status;
  }

  get handle(): TransportHandle | null {
    return this._handle;
  }

  get firmwareSize(): number {
    return this._firmwareSize;
  }

  get downloadSize(): number {
    return this._downloadSize;
  }

  /** Vista del último fragmento dentro de responseBuffer; inválida tras el siguiente process(). */
  get fragment(): Buffer | null {
    return this._fragment;
  }

  get fragmentSize(): number {
    return this._fragmentSize;
  }

  /**
   * Valida host, recurso y callback y deja la sesión en IDLE sin conexión.
   * Si falla, no se debe usar ninguna otra operación de la sesión.
   */
  init(): OperationResult {
    if (this._handle !== null) {
      return failure(ERROR_CODES.ALREADY_CONNECTED, DFU_ERRORS.ALREADY_ACTIVE);
    }

    const validation = validateSessionOptions({
      host: this.host,
      resource: this.resource,
      callback: this.callback,
    });
    if (!validation.success) {
      log.error(`init(): ${DFU_ERRORS.INVALID_SESSION} - ${validation.error ?? ''}`);
      return failure(
        ERROR_CODES.INVALID_ARGUMENT,
        validation.error ?? DFU_ERRORS.INVALID_SESSION
      );
    }

    this._status = STATE.IDLE;
    this.initialized = true;
    log.debug(`init(): ${this.host}${this.resource}`);
    return SUCCESS;
  }

  /**
   * Abre la conexión con el servidor. Un fallo se devuelve directamente (sin evento);
   * en ese caso no se debe llamar a download().
   */
  async connect(): Promise<OperationResult> {
    if (!this.initialized) {
      return failure(ERROR_CODES.INVALID_STATE, DFU_ERRORS.NOT_INITIALIZED);
    }

    if (this._handle !== null) {
      if (this._status === STATE.CONNECTED) {
        log.warn(`connect(): ya conectado, handle ${this._handle}`);
        return SUCCESS;
      }
      return failure(ERROR_CODES.ALREADY_CONNECTED, DFU_ERRORS.ALREADY_ACTIVE);
    }

    if (this._status !== STATE.IDLE) {
      return failure(ERROR_CODES.INVALID_STATE, DFU_ERRORS.ALREADY_ACTIVE);
    }

    try {
      this._handle = await this.transport.connect(this.host);
    } catch (error) {
      log.error(`connect(): ${DFU_ERRORS.CONNECT_FAILED} ${this.host}: ${errorMessageOf(error)}`);
      return failure(errorCodeOf(error, ERROR_CODES.CONNECTION_RESET), DFU_ERRORS.CONNECT_FAILED);
    }

    this.transition(STATE.CONNECTED);
    log.info(`connect(): conectado a ${this.host}, handle ${this._handle}`);
    return SUCCESS;
  }

  /**
   * Envía la primera petición Range en downloadSize (o en `offset` si se reanuda).
   * Si falla, la aplicación debe desconectar, reconectar y volver a empezar.
   */
  async download(options: DownloadOptions = {}): Promise<OperationResult> {
    if (this._handle === null || this._status !== STATE.CONNECTED) {
      return failure(ERROR_CODES.NOT_CONNECTED, DFU_ERRORS.NOT_CONNECTED);
    }

    if (options.offset !== undefined) {
      const offset = validateDownloadOffset(options.offset);
      if (!offset.success || offset.data === undefined) {
        return failure(ERROR_CODES.INVALID_ARGUMENT, offset.error ?? DFU_ERRORS.INVALID_OFFSET);
      }
      this._downloadSize = offset.data;
    }

    this._firmwareSize = FIRMWARE_SIZE_PENDING;
    log.info(`download(): ${this.resource} desde el byte ${this._downloadSize}`);

    const result = await this.fragmentRequest({ flush: false, connectionClose: false });
    if (!result.success && this.inState(STATE.IN_PROGRESS)) {
      this.transition(STATE.ERROR);
    }
    return result;
  }

  /**
   * Avanza la descarga: un receive con peek, interpretación de la respuesta y, si el
   * fragmento está completo, entrega al callback y siguiente petición o evento final.
   * Fuera de IN_PROGRESS no hace nada.
   */
  async process(): Promise<void> {
    const handle = this._handle;
    if (handle === null || this._status !== STATE.IN_PROGRESS) {
      return;
    }

    this._fragment = null;
    this.responseBuffer.fill(0);

    let received: ReceiveResult;
    try {
      received = await this.transport.receive(handle, this.responseBuffer, true);
    } catch (error) {
      received = { status: 'failed', code: errorCodeOf(error) };
    }

    if (this.isDetached() || received.status === 'would-block') {
      return;
    }
    if (received.status === 'failed') {
      await this.fail(ERROR_CODES.NOT_CONNECTED, `${DFU_ERRORS.RECEIVE_FAILED} (${received.code})`);
      return;
    }
    if (received.length === 0) {
      await this.fail(ERROR_CODES.CONNECTION_RESET, DFU_ERRORS.PEER_CLOSED);
      return;
    }

    const length = received.length;
    log.debug(`process(): respuesta de ${length} bytes, estado ${this._status}`);

    const parsed = parseResponse(this.responseBuffer, length, {
      downloadSize: this._downloadSize,
      firmwareSize: this._firmwareSize,
      maxFragmentSize: this.config.dfu.maxFragmentSize,
    });

    if (parsed.kind === 'incomplete') {
      return;
    }

    if (parsed.totalSize !== 0) {
      if (this._firmwareSize === FIRMWARE_SIZE_PENDING) {
        this._firmwareSize = parsed.totalSize;
        log.debug(`Tamaño total del firmware: ${parsed.totalSize}`);
      } else if (this._firmwareSize !== parsed.totalSize) {
        await this.fail(
          ERROR_CODES.PROTOCOL_INCONSISTENCY,
          `${DFU_ERRORS.FIRMWARE_SIZE_CHANGED}: de ${this._firmwareSize} a ${parsed.totalSize}`
        );
        return;
      }
    }

    if (parsed.kind === 'payload-pending') {
      log.debug(`Esperando payload de ${parsed.payloadSize} bytes`);
      return;
    }

    if (parsed.rangeStart !== null && parsed.rangeStart !== this._downloadSize) {
      log.warn(`Content-Range empieza en ${parsed.rangeStart}, se esperaba ${this._downloadSize}`);
    }

    if (this._firmwareSize > 0 && this._downloadSize + parsed.payloadSize > this._firmwareSize) {
      await this.fail(
        ERROR_CODES.PROTOCOL_INCONSISTENCY,
        `${DFU_ERRORS.FRAGMENT_OVERFLOW}: ${this._downloadSize} + ${parsed.payloadSize} > ${this._firmwareSize}`
      );
      return;
    }

    if (parsed.connectionClose) {
      log.info('El servidor cerrará la conexión; se reconectará antes de la siguiente petición');
    }

    const payloadSize = parsed.payloadSize;
    this._fragment = this.responseBuffer.subarray(
      parsed.payloadOffset,
      parsed.payloadOffset + payloadSize
    );
    this._fragmentSize = payloadSize;

    const fragmentAck = await this.dispatch({
      type: DfuEventType.FRAGMENT,
      fragment: this._fragment,
      size: payloadSize,
    });
    if (fragmentAck !== 0) {
      log.warn(`Fragmento en ${this._downloadSize} rechazado por la aplicación (${fragmentAck})`);
      if (!this.isDetached()) this.transition(STATE.HALTED);
      return;
    }

    this._downloadSize += payloadSize;
    this.emitProgress();
    // desconectada desde el callback: el fragmento cuenta, la petición en curso se abandona
    if (this.isDetached()) return;

    const next: FragmentRequestOptions = { flush: true, connectionClose: parsed.connectionClose };

    if (this._downloadSize !== this._firmwareSize) {
      await this.requestOrFail(next);
      return;
    }

    this.transition(STATE.COMPLETE);
    const doneAck = await this.dispatch({ type: DfuEventType.DONE });
    if (doneAck !== 0) {
      log.warn(`Fin de descarga rechazado (${doneAck}); se repite el último fragmento`);
      this._downloadSize -= payloadSize;
      this.emitProgress();
      if (this.isDetached()) return;
      await this.requestOrFail(next);
      return;
    }

    log.info(`Descarga completa: ${this._downloadSize} bytes`);
    if (this.isDetached()) return;
    const flushed = await this.flushReceived();
    if (!flushed.success) {
      await this.fail(flushed.code, flushed.error);
    }
  }

  /**
   * Espera hasta `timeoutMs` a que el transporte tenga algo que leer. Si el transporte no
   * implementa waitReadable se limita a esperar `timeoutMs` y devuelve true.
   */
  async waitReadable(timeoutMs: number): Promise<boolean> {
    const handle = this._handle;
    if (handle === null) return false;
    if (this.transport.waitReadable) {
      return this.transport.waitReadable(handle, timeoutMs);
    }
    await sleep(timeoutMs);
    return true;
  }

  /**
   * Cierra la conexión y vuelve a IDLE. Se puede llamar en cualquier estado; la descarga
   * se reanuda con connect() + download() desde downloadSize.
   */
  async disconnect(): Promise<void> {
    this._fragment = null;
    if (this._status !== STATE.IDLE) {
      this.transition(STATE.IDLE);
    }
    await this.closeHandle();
  }

  /**
   * Vacía los datos pendientes, reconecta si el servidor pidió Connection: close y envía
   * la petición del siguiente fragmento en downloadSize.
   */
  private async fragmentRequest(options: FragmentRequestOptions): Promise<OperationResult> {
    if (options.flush) {
      const flushed = await this.flushReceived();
      if (!flushed.success) return flushed;
      if (this.isDetached()) return DETACHED;
    }

    if (options.connectionClose) {
      await this.closeHandle();
      let reopened: TransportHandle;
      try {
        reopened = await this.transport.connect(this.host);
      } catch (error) {
        log.error(`${DFU_ERRORS.RECONNECT_FAILED}: ${errorMessageOf(error)}`);
        return failure(ERROR_CODES.CONNECTION_RESET, DFU_ERRORS.RECONNECT_FAILED);
      }
      if (this.isDetached()) {
        this._handle = reopened;
        await this.closeHandle();
        return DETACHED;
      }
      this._handle = reopened;
      log.debug(`Reconectado a ${this.host}, handle ${reopened}`);
    }

    const built = buildRangeRequest(
      this.requestBuffer,
      this.host,
      this.resource,
      this._downloadSize,
      this.config.dfu.maxFragmentSize
    );
    if (!built.success) {
      log.error(built.error);
      return failure(built.code, built.error);
    }

    this.transition(STATE.IN_PROGRESS);

    const handle = this._handle;
    if (handle === null) {
      return failure(ERROR_CODES.NOT_CONNECTED, DFU_ERRORS.NOT_CONNECTED);
    }

    log.debug(`Petición de ${built.length} bytes: bytes=${this._downloadSize}-`);
    try {
      await this.transport.send(handle, built.request);
    } catch (error) {
      log.error(`${DFU_ERRORS.SEND_FAILED}: ${errorMessageOf(error)}`);
      return failure(errorCodeOf(error, ERROR_CODES.NOT_CONNECTED), DFU_ERRORS.SEND_FAILED);
    }
    return SUCCESS;
  }

  private async requestOrFail(options: FragmentRequestOptions): Promise<void> {
    const result = await this.fragmentRequest(options);
    if (!result.success) {
      await this.fail(result.code, result.error);
    }
  }

  /** Consume lo que quede en el socket (respuesta ya entregada) y limpia el buffer. */
  private async flushReceived(): Promise<OperationResult> {
    const handle = this._handle;
    if (handle === null || this._status === STATE.IDLE) {
      return SUCCESS;
    }

    let result: OperationResult = SUCCESS;
    try {
      const flushed = await this.transport.receive(handle, this.responseBuffer, false);
      if (flushed.status === 'failed') {
        result = failure(flushed.code, DFU_ERRORS.FLUSH_FAILED);
      } else {
        log.debug(
          `flush: ${flushed.status === 'ok' ? `${flushed.length} bytes` : 'sin datos pendientes'}`
        );
      }
    } catch (error) {
      result = failure(errorCodeOf(error), `${DFU_ERRORS.FLUSH_FAILED}: ${errorMessageOf(error)}`);
    }

    this._fragment = null;
    this.responseBuffer.fill(0);
    return result;
  }

  private async closeHandle(): Promise<void> {
    const handle = this._handle;
    if (handle === null) return;
    this._handle = null;
    try {
      await this.transport.close(handle);
    } catch (error) {
      log.warn(`Error cerrando handle ${handle}: ${errorMessageOf(error)}`);
    }
  }

  private async fail(code: string, message: string): Promise<void> {
    if (this.isDetached()) {
      log.debug(`Sesión desconectada, se descarta el error: ${message} [${code}]`);
      return;
    }
    log.error(`${message} [${code}]`);
    this.transition(STATE.ERROR);
    await this.dispatch({ type: DfuEventType.ERROR, status: code });
  }

  /** Entrega el evento a la aplicación; un callback que lanza cuenta como rechazo. */
  private async dispatch(event: DfuEvent): Promise<number> {
    try {
      return await this.callback(this, event);
    } catch (error) {
      log.error(`El callback lanzó procesando '${event.type}': ${errorMessageOf(error)}`);
      return -1;
    }
  }

  /** disconnect() pasa a IDLE antes de cerrar: en IDLE la operación en vuelo se abandona. */
  private isDetached(): boolean {
    return this._status === STATE.IDLE;
  }

  /** Lee el estado actual fuera del narrowing de un guard anterior a un await. */
  private inState(state: StateValue): boolean {
    return this._status === state;
  }

  private transition(to: StateValue): void {
    const from = this._status;
    if (!canTransition(from, to)) {
      throw new DfuClientError(ERROR_CODES.INVALID_STATE, `Transición inválida: ${from} -> ${to}`);
    }
    this._status = to;
    if (from !== to) {
      const payload: StateChangePayload = { from, to };
      this.emit('stateChange', payload);
    }
  }

  private emitProgress(): void {
    const payload: ProgressPayload = {
      downloadSize: this._downloadSize,
      firmwareSize: this._firmwareSize,
      percent: this._firmwareSize > 0 ? (this._downloadSize / this._firmwareSize) * 100 : 0,
    };
    this.emit('progress', payload);
  }
}

export default DfuClient;

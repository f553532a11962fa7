/**
 * Transporte TCP sobre node:net para el cliente DFU.
 *
 * Cada conexión tiene una cola de bytes recibidos; receive() copia de la cola al buffer
 * del cliente y solo la consume si no es peek. La resolución DNS y la familia de
 * direcciones las resuelve Node con la configuración `network`.
 *
 * @module transport/NetTransport
 */

import net from 'net';
import DEFAULT_CONFIG, { type NetworkConfig } from '../config';
import { ERROR_CODES, TRANSPORT_ERRORS } from '../constants/errors';
import { logger } from '../utils/logger';
import { DfuClientError, errorCodeOf } from '../utils/errors';
import type { ITransport, ReceiveResult, TransportHandle } from '../engines/types';

const log = logger.child('NetTransport');

interface SocketEntry {
  socket: net.Socket;
  pending: Buffer;
  ended: boolean;
  errorCode: string | null;
  /** Resolutores de waitReadable a la espera de actividad. */
  waiters: Set<() => void>;
}

export class NetTransport implements ITransport {
  private readonly options: NetworkConfig;
  private readonly sockets = new Map<TransportHandle, SocketEntry>();
  private nextHandle = 1;

  constructor(options: Partial<NetworkConfig> = {}) {
    this.options = { ...DEFAULT_CONFIG.network, ...options };
  }

  connect(host: string): Promise<TransportHandle> {
    const { port, family, connectTimeout } = this.options;

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port, family });
      let settled = false;

      const onConnectError = (err: Error): void => {
        if (settled) return;
        settled = true;
        socket.destroy();
        reject(new DfuClientError(errorCodeOf(err, ERROR_CODES.CONNECTION_RESET), err.message));
      };

      socket.setTimeout(connectTimeout);
      socket.once('timeout', () => {
        onConnectError(
          new DfuClientError(ERROR_CODES.CONNECT_TIMEOUT, TRANSPORT_ERRORS.CONNECT_TIMEOUT)
        );
      });
      socket.once('error', onConnectError);

      socket.once('connect', () => {
        if (settled) return;
        settled = true;
        socket.setTimeout(0);
        socket.removeListener('error', onConnectError);

        const handle = this.nextHandle++;
        this.track(handle, socket);
        log.debug(`Conectado a ${host}:${port} (IPv${family}), handle ${handle}`);
        resolve(handle);
      });
    });
  }

  async send(handle: TransportHandle, data: Buffer): Promise<number> {
    const entry = this.entry(handle);
    if (entry.errorCode !== null) {
      throw new DfuClientError(entry.errorCode, TRANSPORT_ERRORS.SOCKET_CLOSED);
    }

    return new Promise((resolve, reject) => {
      entry.socket.write(Buffer.from(data), err => {
        if (err) {
          reject(new DfuClientError(errorCodeOf(err), err.message));
          return;
        }
        resolve(data.length);
      });
    });
  }

  async receive(handle: TransportHandle, buffer: Buffer, peek: boolean): Promise<ReceiveResult> {
    const entry = this.sockets.get(handle);
    if (!entry) {
      return { status: 'failed', code: ERROR_CODES.BAD_HANDLE };
    }

    if (entry.pending.length > 0) {
      const available = Math.min(buffer.length, entry.pending.length);
      const length = entry.pending.copy(buffer, 0, 0, available);
      if (!peek) {
        entry.pending = entry.pending.subarray(length);
      }
      return { status: 'ok', length };
    }

    if (entry.errorCode !== null) {
      return { status: 'failed', code: entry.errorCode };
    }
    if (entry.ended) {
      return { status: 'ok', length: 0 };
    }
    return { status: 'would-block' };
  }

  async close(handle: TransportHandle): Promise<void> {
    const entry = this.sockets.get(handle);
    if (!entry) return;
    this.sockets.delete(handle);
    entry.socket.destroy();
    this.wake(entry);
    log.debug(`Handle ${handle} cerrado`);
  }

  waitReadable(handle: TransportHandle, timeoutMs: number): Promise<boolean> {
    const entry = this.sockets.get(handle);
    if (!entry) return Promise.resolve(false);
    if (entry.pending.length > 0 || entry.ended || entry.errorCode !== null) {
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      const waiter = (): void => {
        clearTimeout(timer);
        entry.waiters.delete(waiter);
        resolve(this.sockets.has(handle));
      };
      const timer = setTimeout(() => {
        entry.waiters.delete(waiter);
        resolve(false);
      }, timeoutMs);
      entry.waiters.add(waiter);
    });
  }

  /** Cierra todas las conexiones abiertas. */
  async closeAll(): Promise<void> {
    await Promise.all([...this.sockets.keys()].map(handle => this.close(handle)));
  }

  private track(handle: TransportHandle, socket: net.Socket): void {
    const entry: SocketEntry = {
      socket,
      pending: Buffer.alloc(0),
      ended: false,
      errorCode: null,
      waiters: new Set(),
    };

    socket.on('data', (chunk: Buffer) => {
      entry.pending = Buffer.concat([entry.pending, chunk]);
      this.wake(entry);
    });
    socket.on('end', () => {
      entry.ended = true;
      this.wake(entry);
    });
    socket.on('error', (err: Error) => {
      entry.errorCode = errorCodeOf(err, ERROR_CODES.NOT_CONNECTED);
      log.warn(`Error en handle ${handle}: ${err.message}`);
      this.wake(entry);
    });
    socket.on('close', () => {
      entry.ended = true;
      this.wake(entry);
    });

    this.sockets.set(handle, entry);
  }

  private wake(entry: SocketEntry): void {
    for (const waiter of [...entry.waiters]) {
      waiter();
    }
  }

  private entry(handle: TransportHandle): SocketEntry {
    const entry = this.sockets.get(handle);
    if (!entry) {
      throw new DfuClientError(ERROR_CODES.BAD_HANDLE, TRANSPORT_ERRORS.UNKNOWN_HANDLE);
    }
    return entry;
  }
}

export default NetTransport;

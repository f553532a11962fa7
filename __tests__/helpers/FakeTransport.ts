/**
 * Transporte en memoria para tests del cliente DFU.
 *
 * Registra las conexiones y peticiones enviadas; el test inyecta las respuestas con
 * respond() y decide cuándo el servidor cierra o el socket falla.
 */
import type { ITransport, ReceiveResult, TransportHandle } from '../../src/engines/types';
import { DfuClientError } from '../../src/utils/errors';

interface FakeConnection {
  host: string;
  pending: Buffer;
  ended: boolean;
  closed: boolean;
  failCode: string | null;
}

export class FakeTransport implements ITransport {
  connections = new Map<TransportHandle, FakeConnection>();
  sent: Array<{ handle: TransportHandle; text: string }> = [];
  closedHandles: TransportHandle[] = [];
  connectFailures: string[] = [];
  private nextHandle = 10;

  async connect(host: string): Promise<TransportHandle> {
    const failure = this.connectFailures.shift();
    if (failure) {
      throw new DfuClientError(failure, `connect ${host} failed`);
    }
    const handle = this.nextHandle++;
    this.connections.set(handle, {
      host,
      pending: Buffer.alloc(0),
      ended: false,
      closed: false,
      failCode: null,
    });
    return handle;
  }

  async send(handle: TransportHandle, data: Buffer): Promise<number> {
    const conn = this.open(handle);
    if (conn.failCode) {
      throw new DfuClientError(conn.failCode, 'send failed');
    }
    this.sent.push({ handle, text: data.toString('latin1') });
    return data.length;
  }

  async receive(handle: TransportHandle, buffer: Buffer, peek: boolean): Promise<ReceiveResult> {
    const conn = this.connections.get(handle);
    if (!conn || conn.closed) {
      return { status: 'failed', code: 'EBADF' };
    }
    if (conn.failCode) {
      return { status: 'failed', code: conn.failCode };
    }
    if (conn.pending.length > 0) {
      const length = conn.pending.copy(buffer, 0, 0, Math.min(buffer.length, conn.pending.length));
      if (!peek) conn.pending = conn.pending.subarray(length);
      return { status: 'ok', length };
    }
    if (conn.ended) {
      return { status: 'ok', length: 0 };
    }
    return { status: 'would-block' };
  }

  async close(handle: TransportHandle): Promise<void> {
    const conn = this.connections.get(handle);
    if (!conn || conn.closed) return;
    conn.closed = true;
    this.closedHandles.push(handle);
  }

  /** Handle abierto más reciente. */
  get currentHandle(): TransportHandle {
    const open = [...this.connections.entries()].filter(([, conn]) => !conn.closed);
    const last = open[open.length - 1];
    if (!last) throw new Error('no hay conexiones abiertas');
    return last[0];
  }

  get connectCount(): number {
    return this.connections.size;
  }

  /** Peticiones enviadas (texto), en orden. */
  get requests(): string[] {
    return this.sent.map(entry => entry.text);
  }

  respond(data: Buffer | string, handle: TransportHandle = this.currentHandle): void {
    const conn = this.open(handle);
    const chunk = typeof data === 'string' ? Buffer.from(data, 'latin1') : data;
    conn.pending = Buffer.concat([conn.pending, chunk]);
  }

  end(handle: TransportHandle = this.currentHandle): void {
    this.open(handle).ended = true;
  }

  fail(code: string, handle: TransportHandle = this.currentHandle): void {
    this.open(handle).failCode = code;
  }

  pendingBytes(handle: TransportHandle = this.currentHandle): number {
    return this.open(handle).pending.length;
  }

  private open(handle: TransportHandle): FakeConnection {
    const conn = this.connections.get(handle);
    if (!conn || conn.closed) throw new Error(`handle ${handle} no está abierto`);
    return conn;
  }
}

export interface RangeResponseOptions {
  start: number;
  payload: Buffer;
  total: number | '*';
  connectionClose?: boolean;
  /** Content-Length distinto de payload.length (respuestas anómalas). */
  contentLength?: number;
}

export function rangeHeaders(options: RangeResponseOptions): string {
  const length = options.contentLength ?? options.payload.length;
  const end = options.start + options.payload.length - 1;
  return (
    'HTTP/1.1 206 Partial Content\r\n' +
    `Content-Range: bytes ${options.start}-${end}/${options.total}\r\n` +
    `Content-Length: ${length}\r\n` +
    (options.connectionClose ? 'Connection: close\r\n' : 'Connection: keep-alive\r\n') +
    '\r\n'
  );
}

export function rangeResponse(options: RangeResponseOptions): Buffer {
  return Buffer.concat([Buffer.from(rangeHeaders(options), 'latin1'), options.payload]);
}

/** Payload determinista: byte i = (seed + i) % 256. */
export function payloadOf(size: number, seed = 0): Buffer {
  const buffer = Buffer.alloc(size);
  for (let i = 0; i < size; i++) buffer[i] = (seed + i) % 256;
  return buffer;
}

export function rangeRequest(host: string, resource: string, start: number, end: number): string {
  return (
    `GET ${resource} HTTP/1.1\r\n` +
    `Host: ${host}\r\n` +
    'Connection: keep-alive\r\n' +
    `Range: bytes=${start}-${end}\r\n\r\n`
  );
}

/**
 * FakeTransport que responde solo a cada petición Range con el trozo de `firmware`
 * pedido. Las peticiones cuyo índice esté en `dropRequests` se contestan cerrando la
 * conexión, como un servidor que se cae a mitad de descarga.
 */
export class AutoRangeTransport extends FakeTransport {
  dropRequests = new Set<number>();
  private requestIndex = 0;

  constructor(private readonly firmware: Buffer) {
    super();
  }

  async send(handle: TransportHandle, data: Buffer): Promise<number> {
    const length = await super.send(handle, data);
    const match = /Range: bytes=(\d+)-(\d+)/.exec(data.toString('latin1'));
    if (!match) return length;

    const index = this.requestIndex++;
    if (this.dropRequests.has(index)) {
      this.end(handle);
      return length;
    }

    const start = Number(match[1]);
    const end = Math.min(Number(match[2]) + 1, this.firmware.length);
    this.respond(
      rangeResponse({
        start,
        payload: this.firmware.subarray(start, end),
        total: this.firmware.length,
      }),
      handle
    );
    return length;
  }
}

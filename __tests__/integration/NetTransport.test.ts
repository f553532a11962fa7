/**
 * Tests de integración: NetTransport y DfuClient contra un servidor HTTP Range mínimo
 * levantado con net en 127.0.0.1 (puerto efímero).
 */
import net from 'net';
import DfuClient from '../../src/engines/DfuClient';
import { runDownload } from '../../src/engines/DownloadRunner';
import { DfuEventType } from '../../src/engines/types';
import { NetTransport } from '../../src/transport/NetTransport';
import { DfuClientError } from '../../src/utils/errors';
import { payloadOf } from '../helpers/FakeTransport';

interface TestServer {
  port: number;
  requests: string[];
  close: () => Promise<void>;
}

type Handler = (socket: net.Socket, server: TestServer) => void;

async function startServer(handler: Handler): Promise<TestServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer();
  const state: TestServer = {
    port: 0,
    requests: [],
    close: () =>
      new Promise(resolve => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };

  server.on('connection', socket => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    handler(socket, state);
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('el servidor de pruebas no tiene puerto');
  }
  state.port = address.port;
  return state;
}

/** Servidor de rangos sobre `firmware`; con closeEach responde Connection: close y cierra. */
function rangeServer(firmware: Buffer, closeEach = false): Handler {
  return (socket, server) => {
    let received = '';
    socket.on('data', chunk => {
      received += chunk.toString('latin1');
      let end = received.indexOf('\r\n\r\n');
      while (end >= 0) {
        const request = received.slice(0, end + 4);
        received = received.slice(end + 4);
        server.requests.push(request);

        const match = /Range: bytes=(\d+)-(\d+)/.exec(request);
        if (match) {
          const start = Number(match[1]);
          const last = Math.min(Number(match[2]), firmware.length - 1);
          const body = firmware.subarray(start, last + 1);
          const head =
            'HTTP/1.1 206 Partial Content\r\n' +
            `Content-Range: bytes ${start}-${last}/${firmware.length}\r\n` +
            `Content-Length: ${body.length}\r\n` +
            `Connection: ${closeEach ? 'close' : 'keep-alive'}\r\n\r\n`;
          socket.write(Buffer.concat([Buffer.from(head, 'latin1'), body]));
          if (closeEach) socket.end();
        }
        end = received.indexOf('\r\n\r\n');
      }
    });
  };
}

describe('NetTransport (integración)', () => {
  let server: TestServer | null = null;
  let transport: NetTransport;

  beforeEach(() => {
    transport = new NetTransport({ connectTimeout: 2000 });
  });

  afterEach(async () => {
    await transport.closeAll();
    if (server) {
      await server.close();
      server = null;
    }
  });

  it('debe rechazar connect con ECONNREFUSED si no hay servidor', async () => {
    const closed = await startServer(() => undefined);
    const port = closed.port;
    await closed.close();

    const refused = new NetTransport({ port, connectTimeout: 2000 });
    await expect(refused.connect('127.0.0.1')).rejects.toMatchObject({
      code: 'ECONNREFUSED',
    });
  });

  it('debe rechazar handles desconocidos', async () => {
    await expect(transport.receive(99, Buffer.alloc(8), true)).resolves.toEqual({
      status: 'failed',
      code: 'EBADF',
    });
    await expect(transport.send(99, Buffer.from('x'))).rejects.toBeInstanceOf(DfuClientError);
  });

  it('debe respetar peek y detectar el cierre del servidor', async () => {
    server = await startServer(socket => {
      socket.end('hello');
    });
    transport = new NetTransport({ port: server.port, connectTimeout: 2000 });
    const handle = await transport.connect('127.0.0.1');
    const buffer = Buffer.alloc(16);

    expect(await transport.waitReadable(handle, 1000)).toBe(true);
    expect(await transport.receive(handle, buffer, true)).toEqual({ status: 'ok', length: 5 });
    expect(await transport.receive(handle, buffer, true)).toEqual({ status: 'ok', length: 5 });
    expect(buffer.toString('latin1', 0, 5)).toBe('hello');
    expect(await transport.receive(handle, buffer, false)).toEqual({ status: 'ok', length: 5 });

    await transport.waitReadable(handle, 1000);
    expect(await transport.receive(handle, buffer, true)).toEqual({ status: 'ok', length: 0 });
  });

  it('debe devolver would-block mientras no llegan datos', async () => {
    server = await startServer(() => undefined);
    transport = new NetTransport({ port: server.port, connectTimeout: 2000 });
    const handle = await transport.connect('127.0.0.1');

    expect(await transport.receive(handle, Buffer.alloc(8), true)).toEqual({
      status: 'would-block',
    });
    expect(await transport.waitReadable(handle, 20)).toBe(false);
  });

  it.each([
    { label: 'keep-alive', closeEach: false },
    { label: 'Connection: close', closeEach: true },
  ])('debe descargar un firmware completo ($label)', async ({ closeEach }) => {
    const firmware = payloadOf(5000, 17);
    const rangeHost = await startServer(rangeServer(firmware, closeEach));
    server = rangeHost;
    transport = new NetTransport({ port: rangeHost.port, connectTimeout: 2000 });

    const chunks: Buffer[] = [];
    const client = new DfuClient({
      host: '127.0.0.1',
      resource: '/firmware/app.bin',
      transport,
      callback: (_client, event) => {
        if (event.type === DfuEventType.FRAGMENT) chunks.push(Buffer.from(event.fragment));
        return 0;
      },
    });

    const result = await runDownload(client, { pollInterval: 20, retryDelay: 1 });

    expect(result).toEqual({
      outcome: 'complete',
      downloadSize: 5000,
      firmwareSize: 5000,
      attempts: 1,
    });
    expect(Buffer.concat(chunks)).toEqual(firmware);
    expect(rangeHost.requests).toHaveLength(5);
    expect(rangeHost.requests[4]).toContain('Range: bytes=4096-5119\r\n');
  });
});

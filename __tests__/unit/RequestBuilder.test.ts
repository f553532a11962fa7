/**
 * Tests unitarios para src/engines/RequestBuilder.ts
 */
import { buildRangeRequest, formatRangeRequest } from '../../src/engines/RequestBuilder';

describe('RequestBuilder', () => {
  describe('formatRangeRequest', () => {
    it('debe formatear GET con Host, keep-alive y rango inclusivo', () => {
      expect(formatRangeRequest('fw.example.test', '/images/app.bin', 0, 1024)).toBe(
        'GET /images/app.bin HTTP/1.1\r\n' +
          'Host: fw.example.test\r\n' +
          'Connection: keep-alive\r\n' +
          'Range: bytes=0-1023\r\n\r\n'
      );
    });

    it('debe calcular el final de la ventana desde el offset', () => {
      const request = formatRangeRequest('h', '/r', 2048, 256);
      expect(request).toContain('Range: bytes=2048-2303\r\n');
    });
  });

  describe('buildRangeRequest', () => {
    it('debe escribir la petición al inicio del buffer y devolver una vista de su longitud', () => {
      const target = Buffer.alloc(128, 0x41);
      const result = buildRangeRequest(target, 'h', '/r', 0, 16);
      const expected = 'GET /r HTTP/1.1\r\nHost: h\r\nConnection: keep-alive\r\nRange: bytes=0-15\r\n\r\n';

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.length).toBe(expected.length);
      expect(result.request.toString('latin1')).toBe(expected);
      // El resto del buffer queda limpio
      expect(target[expected.length]).toBe(0);
      expect(target[127]).toBe(0);
    });

    it('debe fallar con ENOBUFS si la petición no cabe y no tocar el buffer', () => {
      const target = Buffer.alloc(32, 0x41);
      const result = buildRangeRequest(target, 'fw.example.test', '/images/app.bin', 0, 1024);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.code).toBe('ENOBUFS');
      expect(result.requiredSize).toBe(
        formatRangeRequest('fw.example.test', '/images/app.bin', 0, 1024).length
      );
      expect(target.every(byte => byte === 0x41)).toBe(true);
    });

    it('debe aceptar una petición que ocupa exactamente la capacidad', () => {
      const text = formatRangeRequest('h', '/r', 0, 16);
      const target = Buffer.alloc(text.length);
      const result = buildRangeRequest(target, 'h', '/r', 0, 16);
      expect(result.success).toBe(true);
    });
  });
});

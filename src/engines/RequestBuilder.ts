/**
 * Construcción de peticiones GET con cabecera Range para la siguiente ventana.
 *
 * @module engines/RequestBuilder
 */

import { DFU_ERRORS, ERROR_CODES } from '../constants/errors';

export type BuildRequestResult =
  | { success: true; request: Buffer; length: number }
  | { success: false; code: string; error: string; requiredSize: number };

/** Texto de la petición: GET con Host, keep-alive y el rango inclusivo [start, start + window - 1]. */
export function formatRangeRequest(
  host: string,
  resource: string,
  startOffset: number,
  windowSize: number
): string {
  const endOffset = startOffset + windowSize - 1;
  return (
    `GET ${resource} HTTP/1.1\r\n` +
    `Host: ${host}\r\n` +
    'Connection: keep-alive\r\n' +
    `Range: bytes=${startOffset}-${endOffset}\r\n\r\n`
  );
}

/**
 * Escribe la petición en `target` (el buffer de petición de la sesión, de capacidad fija).
 * El buffer se limpia antes de escribir. Si la petición no cabe es un error de
 * configuración: hay que ampliar maxRequestSize o acortar host/resource.
 */
export function buildRangeRequest(
  target: Buffer,
  host: string,
  resource: string,
  startOffset: number,
  windowSize: number
): BuildRequestResult {
  const text = formatRangeRequest(host, resource, startOffset, windowSize);
  const length = Buffer.byteLength(text, 'utf8');

  if (length > target.length) {
    return {
      success: false,
      code: ERROR_CODES.BUFFER_TOO_SMALL,
      error: `${DFU_ERRORS.REQUEST_TOO_LARGE} (${length} > ${target.length})`,
      requiredSize: length,
    };
  }

  target.fill(0);
  target.write(text, 0, 'utf8');
  return { success: true, request: target.subarray(0, length), length };
}

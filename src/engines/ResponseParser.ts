/**
 * Parser de respuestas HTTP parciales para fragmentos de firmware.
 *
 * Trabaja sobre el contenido del buffer de respuesta tal como lo deja un receive con peek:
 * puede contener solo parte de las cabeceras, las cabeceras completas y parte del cuerpo,
 * o la respuesta entera. Las cabeceras se tokenizan por líneas (`\r\n`) y se toma la
 * primera aparición de cada nombre; una línea sin `\r\n` final todavía no cuenta.
 *
 * @module engines/ResponseParser
 */

import type { ParseContext, ParseResult } from './types';

const HEADER_TERMINATOR = '\r\n\r\n';
const LINE_TERMINATOR = '\r\n';

export interface ScannedHeaders {
  statusCode: number | null;
  /** Nombres en minúsculas; primera aparición de cada cabecera. */
  headers: Map<string, string>;
  /** Offset del primer byte del cuerpo, o null si aún no llegó el separador. */
  payloadOffset: number | null;
}

export interface ContentRange {
  start: number | null;
  /** 0 si el servidor no informa el total (`/*`). */
  total: number;
}

/**
 * Tokeniza las cabeceras completas presentes en `buffer[0, length)`.
 */
export function scanHeaders(buffer: Buffer, length: number): ScannedHeaders {
  const text = buffer.toString('latin1', 0, Math.min(length, buffer.length));
  const terminatorIndex = text.indexOf(HEADER_TERMINATOR);

  let headerSection: string;
  let payloadOffset: number | null = null;
  if (terminatorIndex >= 0) {
    headerSection = text.slice(0, terminatorIndex);
    payloadOffset = terminatorIndex + HEADER_TERMINATOR.length;
  } else {
    const lastLineEnd = text.lastIndexOf(LINE_TERMINATOR);
    headerSection = lastLineEnd >= 0 ? text.slice(0, lastLineEnd) : '';
  }

  const headers = new Map<string, string>();
  let statusCode: number | null = null;

  const lines = headerSection.length > 0 ? headerSection.split(LINE_TERMINATOR) : [];
  for (const [index, line] of lines.entries()) {
    if (index === 0 && line.startsWith('HTTP/')) {
      const code = Number.parseInt(line.split(' ')[1] ?? '', 10);
      statusCode = Number.isNaN(code) ? null : code;
      continue;
    }
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const name = line.slice(0, colon).trim().toLowerCase();
    if (!headers.has(name)) {
      headers.set(name, line.slice(colon + 1).trim());
    }
  }

  return { statusCode, headers, payloadOffset };
}

/** Entero decimal inicial de `value` (como atoi); NaN si no empieza por dígitos. */
function leadingInt(value: string): number {
  return Number.parseInt(value.trim(), 10);
}

/**
 * Interpreta `Content-Range: bytes <start>-<end>/<total>`.
 * Devuelve null si la cabecera no es un rango en bytes.
 */
export function parseContentRange(value: string): ContentRange | null {
  const match = /^bytes\b(.*)$/i.exec(value);
  if (!match) return null;

  const rest = match[1];
  const start = leadingInt(rest);
  const slash = rest.indexOf('/');
  const total = slash >= 0 ? leadingInt(rest.slice(slash + 1)) : Number.NaN;

  return {
    start: Number.isNaN(start) ? null : start,
    total: Number.isNaN(total) ? 0 : total,
  };
}

/**
 * Clasifica la respuesta presente en el buffer.
 *
 * - incomplete: falta Content-Range o Content-Length.
 * - payload-pending: cabeceras interpretadas pero el fragmento no se entrega todavía.
 * - ready: el cuerpo completo del fragmento está en el buffer.
 *
 * Un fragmento solo se entrega si mide exactamente maxFragmentSize o si es el último
 * (downloadSize + payloadSize === total). Cualquier otro tamaño queda en payload-pending.
 */
export function parseResponse(buffer: Buffer, length: number, context: ParseContext): ParseResult {
  const scanned = scanHeaders(buffer, length);

  const rangeHeader = scanned.headers.get('content-range');
  const range = rangeHeader !== undefined ? parseContentRange(rangeHeader) : null;
  if (!range) {
    return { kind: 'incomplete' };
  }

  const lengthHeader = scanned.headers.get('content-length');
  if (lengthHeader === undefined) {
    return { kind: 'incomplete' };
  }
  const parsedLength = leadingInt(lengthHeader);
  const payloadSize = Number.isNaN(parsedLength) ? 0 : parsedLength;

  const connectionClose = /close/i.test(scanned.headers.get('connection') ?? '');
  const facts = {
    payloadSize,
    totalSize: range.total,
    rangeStart: range.start,
    connectionClose,
  };

  const expectedTotal = range.total !== 0 ? range.total : context.firmwareSize;
  const deliverable =
    payloadSize === context.maxFragmentSize ||
    context.downloadSize + payloadSize === expectedTotal;

  if (!deliverable || scanned.payloadOffset === null) {
    return { kind: 'payload-pending', ...facts };
  }

  const received = length - scanned.payloadOffset;
  if (received !== payloadSize) {
    return { kind: 'payload-pending', ...facts };
  }

  return { kind: 'ready', payloadOffset: scanned.payloadOffset, ...facts };
}

import { ERROR_CODES, type DfuErrorCode } from '../constants/errors';

/**
 * Error del cliente DFU con código errno-like.
 */
export class DfuClientError extends Error {
  public readonly code: DfuErrorCode | string;

  constructor(code: DfuErrorCode | string, message?: string) {
    super(message ?? code);
    this.name = this.constructor.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Extrae el código de un error de socket/transporte; si no trae uno, se usa `fallback`.
 * Se comprueba la forma y no `instanceof Error`: los errores de Node pueden venir de otro realm.
 */
export function errorCodeOf(error: unknown, fallback: string = ERROR_CODES.NOT_CONNECTED): string {
  if (error instanceof DfuClientError) return error.code;
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : fallback;
  }
  return fallback;
}

export function errorMessageOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    if (typeof error.message === 'string') return error.message;
  }
  return String(error);
}

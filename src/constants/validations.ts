/**
 * @fileoverview Mensajes de validación usados por los schemas Zod.
 * @module constants/validations
 */

const SESSION_VALIDATIONS: Record<string, string> = {
  HOST_REQUIRED: 'El host no puede estar vacío',
  RESOURCE_REQUIRED: 'El recurso no puede estar vacío',
  CALLBACK_REQUIRED: 'El callback de eventos es obligatorio',
};

const SIZE_VALIDATIONS: Record<string, string> = {
  MUST_BE_INTEGER: 'El tamaño debe ser un número entero',
  MUST_BE_POSITIVE: 'El tamaño debe ser positivo',
  RESPONSE_TOO_SMALL:
    'maxResponseSize debe ser mayor que maxFragmentSize (cabeceras + fragmento completo)',
  OFFSET_NOT_NEGATIVE: 'El offset no puede ser negativo',
};

const NETWORK_VALIDATIONS: Record<string, string> = {
  PORT_RANGE: 'El puerto debe estar entre 1 y 65535',
  FAMILY_INVALID: 'La familia de direcciones debe ser 4 o 6',
};

const GENERIC_VALIDATIONS: Record<string, string> = {
  VALIDATION_ERROR: 'Error de validación',
};

export const VALIDATIONS = {
  SESSION: SESSION_VALIDATIONS,
  SIZE: SIZE_VALIDATIONS,
  NETWORK: NETWORK_VALIDATIONS,
  GENERIC: GENERIC_VALIDATIONS,
};

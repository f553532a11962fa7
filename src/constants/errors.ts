/**
 * @fileoverview Códigos y mensajes de error del cliente DFU.
 * @module constants/errors
 *
 * Los códigos siguen la nomenclatura errno de Node (ECONNRESET, ENOTCONN...) porque
 * son los mismos que entrega el transporte; el callback de la aplicación los recibe
 * tal cual en el evento 'error'.
 */

export const ERROR_CODES = {
  /** Parámetros o configuración inválidos (host/resource/callback, overrides). */
  INVALID_ARGUMENT: 'EINVAL',
  /** La petición formateada no cabe en el buffer de petición. */
  BUFFER_TOO_SMALL: 'ENOBUFS',
  /** El servidor cerró la conexión o no se pudo reabrir. */
  CONNECTION_RESET: 'ECONNRESET',
  /** Error de lectura/escritura en un socket que ya no está conectado. */
  NOT_CONNECTED: 'ENOTCONN',
  /** Respuesta incoherente con la descarga en curso (tamaño total cambiante). */
  PROTOCOL_INCONSISTENCY: 'EFAULT',
  /** Operación pedida en un estado que no la admite. */
  INVALID_STATE: 'EPERM',
  /** connect() con una conexión ya activa para una descarga. */
  ALREADY_CONNECTED: 'EISCONN',
  /** Timeout de conexión en el transporte. */
  CONNECT_TIMEOUT: 'ETIMEDOUT',
  /** Handle de transporte desconocido o ya cerrado. */
  BAD_HANDLE: 'EBADF',
} as const;

export type DfuErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// =====================
// MENSAJES DEL CLIENTE
// =====================

export const DFU_ERRORS: Record<string, string> = {
  INVALID_SESSION: 'Sesión DFU inválida: host, resource y callback son obligatorios',
  NOT_INITIALIZED: 'La sesión no está inicializada',
  ALREADY_ACTIVE: 'Ya existe una conexión activa; desconecte antes de reconectar',
  CONNECT_FAILED: 'No se pudo conectar con el servidor',
  NOT_CONNECTED: 'La sesión no está conectada',
  INVALID_OFFSET: 'El offset de reanudación debe ser un entero no negativo',
  REQUEST_TOO_LARGE: 'No se puede crear la petición, buffer demasiado pequeño',
  SEND_FAILED: 'Error enviando la petición de fragmento',
  RECONNECT_FAILED: 'No se pudo reabrir la conexión tras Connection: close',
  FIRMWARE_SIZE_CHANGED: 'El tamaño del firmware cambió durante la descarga',
  FRAGMENT_OVERFLOW: 'El fragmento excede el tamaño total del firmware',
  RECEIVE_FAILED: 'Error de lectura en el socket',
  PEER_CLOSED: 'El servidor cerró la conexión',
  FLUSH_FAILED: 'Error vaciando datos pendientes del socket',
  DETACHED: 'La sesión se desconectó durante la operación',
};

// =====================
// MENSAJES DEL TRANSPORTE
// =====================

export const TRANSPORT_ERRORS: Record<string, string> = {
  UNKNOWN_HANDLE: 'Handle de transporte desconocido',
  CONNECT_TIMEOUT: 'Timeout conectando con el servidor',
  SOCKET_CLOSED: 'El socket ya está cerrado',
};

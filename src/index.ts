export * from './engines';
export { NetTransport } from './transport/NetTransport';
export { default as DEFAULT_CONFIG, resolveClientConfig } from './config';
export type { ClientConfig, ClientConfigOverrides } from './config';
export { ERROR_CODES, type DfuErrorCode } from './constants/errors';
export { DfuClientError, configureLogger, logger } from './utils';

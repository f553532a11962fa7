/**
 * Índice del cliente DFU: sesión, máquina de estados, builder/parser HTTP y runner.
 *
 * @module engines
 */

export {
  DfuClient,
  FIRMWARE_SIZE_UNKNOWN,
  FIRMWARE_SIZE_PENDING,
  type DfuClientOptions,
  type DownloadOptions,
} from './DfuClient';
export { STATE, canTransition, isTerminalState, TERMINAL_STATES } from './DownloadStateMachine';
export type { StateKey, StateValue } from './DownloadStateMachine';
export { buildRangeRequest, formatRangeRequest, type BuildRequestResult } from './RequestBuilder';
export { parseResponse, parseContentRange, scanHeaders } from './ResponseParser';
export { runDownload, retryDelayFor, type RunOptions, type RunResult } from './DownloadRunner';
export { DfuEventType } from './types';
export type {
  DfuEvent,
  DfuEventHandler,
  ITransport,
  OperationResult,
  ParseContext,
  ParseResult,
  ProgressPayload,
  ReceiveResult,
  StateChangePayload,
  TransportHandle,
} from './types';

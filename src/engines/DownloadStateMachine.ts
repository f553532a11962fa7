/**
 * Máquina de estados explícita de la sesión DFU.
 *
 * Define las transiciones permitidas entre estados. El cliente solo cambia de estado
 * a través de transition(), que rechaza cualquier transición que no esté en la tabla.
 *
 * @module DownloadStateMachine
 */

/** Estados de la sesión. IDLE es también el estado inicial y el de desconexión. */
export const STATE = {
  IDLE: 'idle',
  CONNECTED: 'connected',
  IN_PROGRESS: 'in_progress',
  COMPLETE: 'complete',
  HALTED: 'halted',
  ERROR: 'error',
} as const;

export type StateKey = keyof typeof STATE;
export type StateValue = (typeof STATE)[StateKey];

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 * IN_PROGRESS -> IN_PROGRESS es la petición del siguiente fragmento;
 * COMPLETE -> IN_PROGRESS es el reintento tras rechazar el fin de descarga.
 * Cualquier estado vuelve a IDLE al desconectar.
 */
const TRANSITIONS: Record<StateValue, readonly StateValue[]> = {
  [STATE.IDLE]: [STATE.IDLE, STATE.CONNECTED],
  [STATE.CONNECTED]: [STATE.IDLE, STATE.IN_PROGRESS],
  [STATE.IN_PROGRESS]: [
    STATE.IDLE,
    STATE.IN_PROGRESS,
    STATE.COMPLETE,
    STATE.HALTED,
    STATE.ERROR,
  ],
  [STATE.COMPLETE]: [STATE.IDLE, STATE.IN_PROGRESS, STATE.ERROR],
  [STATE.HALTED]: [STATE.IDLE],
  [STATE.ERROR]: [STATE.IDLE],
};

export function canTransition(fromState: StateValue, toState: StateValue): boolean {
  return TRANSITIONS[fromState].includes(toState);
}

/** Estados en los que la aplicación debe dejar de llamar a process(). */
export const TERMINAL_STATES: readonly StateValue[] = [STATE.COMPLETE, STATE.HALTED, STATE.ERROR];

export function isTerminalState(state: StateValue): boolean {
  return TERMINAL_STATES.includes(state);
}

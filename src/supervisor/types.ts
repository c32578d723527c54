/**
 * Supervisor related types
 */

import type { SupervisorConfig } from '../config';
import type { LogSink } from '../sinks';

/**
 * created -> running -(cancel)-> stopping -> stopped
 */
export type SupervisorStatus = 'created' | 'running' | 'stopping' | 'stopped';

export interface SupervisorState {
  status: SupervisorStatus;
  running: boolean;
  intervalSeconds: number;
  errorBackoffSeconds: number;
  lastHeartbeatAt?: Date;
  tickCount: number;
  consecutiveFailures: number;
  lastError?: string;
}

export interface TickContext {
  /** 1-based tick number */
  tick: number;
  /** Aborted when the supervisor is cancelled */
  signal: AbortSignal;
}

/**
 * Work done on every tick. Throwing (or rejecting) counts as a failed tick.
 */
export type TickHandler = (context: TickContext) => void | Promise<void>;

export interface SupervisorOptions {
  config?: Partial<SupervisorConfig>;
  sink: LogSink;
  tick?: TickHandler;
  clock?: () => Date;
}

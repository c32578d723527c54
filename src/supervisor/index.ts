/**
 * Supervisor module
 */

export { describeError, TickError } from './errors';
export { sleep } from './sleep';
export { HeartbeatSupervisor, startSupervisor } from './supervisor';
export type {
  SupervisorOptions,
  SupervisorState,
  SupervisorStatus,
  TickContext,
  TickHandler,
} from './types';

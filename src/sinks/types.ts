/**
 * Logging sink contract for supervisor events
 */

export type EventLevel = 'INFO' | 'ERROR';

export type AgentEventKind = 'started' | 'heartbeat' | 'stopping' | 'error';

export const EVENT_SOURCE = 'AgentCore';

export interface AgentEvent {
  timestamp: Date;
  level: EventLevel;
  source: typeof EVENT_SOURCE;
  kind: AgentEventKind;
  message: string;
}

export interface LogSink {
  /**
   * Record one event
   */
  write(event: AgentEvent): Promise<void>;

  /**
   * Initialize the sink (connect, authenticate, etc.)
   */
  start(): Promise<void>;

  /**
   * Cleanup resources (disconnect, flush, etc.)
   */
  stop(): Promise<void>;
}

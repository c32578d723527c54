/**
 * Sinks module
 *
 * Destinations for supervisor events:
 * - Logger (console + JSON log file, default)
 * - Slack (via Bolt framework with Socket Mode)
 */

export { createSink } from './factory';
export { FanoutSink } from './fanout';
export { LoggerSink } from './logger';
export { formatEvent, SlackSink, type SlackSinkConfig } from './slack';
export {
  type AgentEvent,
  type AgentEventKind,
  EVENT_SOURCE,
  type EventLevel,
  type LogSink,
} from './types';

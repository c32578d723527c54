/**
 * Logger sink - writes events to the console and the JSON log file
 */

import { LogEventType, type Logger, logger as rootLogger } from '../utils';
import type { AgentEvent, AgentEventKind, LogSink } from './types';

const eventTypes: Record<AgentEventKind, LogEventType> = {
  started: LogEventType.STARTED,
  heartbeat: LogEventType.HEARTBEAT,
  stopping: LogEventType.STOPPING,
  error: LogEventType.TICK_ERROR,
};

export class LoggerSink implements LogSink {
  private logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger;
  }

  async write(event: AgentEvent): Promise<void> {
    const meta = {
      eventType: eventTypes[event.kind],
      timestamp: event.timestamp.toISOString(),
    };
    if (event.level === 'ERROR') {
      this.logger.error(event.message, meta);
    } else {
      this.logger.info(event.message, meta);
    }
  }

  async start(): Promise<void> {
    this.logger.debug('Logger sink ready');
  }

  async stop(): Promise<void> {
    this.logger.debug('Logger sink stopped');
  }
}

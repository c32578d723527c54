/**
 * Fan-out sink - forwards every call to each wrapped sink
 */

import type { AgentEvent, LogSink } from './types';

async function forEachSink(
  sinks: readonly LogSink[],
  action: (sink: LogSink) => Promise<void>,
  description: string
): Promise<void> {
  const results = await Promise.allSettled(sinks.map(action));
  const errors = results.flatMap((result) =>
    result.status === 'rejected' ? [result.reason] : []
  );
  if (errors.length > 0) {
    throw new AggregateError(
      errors,
      `${errors.length} of ${sinks.length} sinks failed to ${description}`
    );
  }
}

export class FanoutSink implements LogSink {
  private sinks: readonly LogSink[];

  constructor(sinks: readonly LogSink[]) {
    this.sinks = sinks;
  }

  write(event: AgentEvent): Promise<void> {
    return forEachSink(this.sinks, (sink) => sink.write(event), 'write');
  }

  start(): Promise<void> {
    return forEachSink(this.sinks, (sink) => sink.start(), 'start');
  }

  stop(): Promise<void> {
    return forEachSink(this.sinks, (sink) => sink.stop(), 'stop');
  }
}

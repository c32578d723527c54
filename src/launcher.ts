/**
 * Shutdown helpers for the process entry point
 */

import type { LogSink } from './sinks';
import { LogEventType, logger, serializeError } from './utils';

/**
 * Stop the sink chain after the supervisor has finished.
 *
 * Resolves false, after logging, when a sink fails to stop.
 */
export async function stopSink(sink: LogSink): Promise<boolean> {
  try {
    await sink.stop();
    return true;
  } catch (error) {
    logger.error('Failed to stop sinks during shutdown', {
      eventType: LogEventType.SINK_LIFECYCLE,
      error: serializeError(error),
    });
    return false;
  }
}

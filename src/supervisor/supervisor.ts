/**
 * Heartbeat supervisor
 *
 * Runs the agent's tick loop until cancelled. A failing tick is logged and
 * retried after a backoff; it never ends the loop.
 */

import { resolveSupervisorConfig } from '../config';
import {
  type AgentEvent,
  type AgentEventKind,
  EVENT_SOURCE,
  type EventLevel,
  type LogSink,
} from '../sinks';
import { getLogger, LogEventType, serializeError } from '../utils';
import { TickError } from './errors';
import { settleWithin, sleep } from './sleep';
import type {
  SupervisorOptions,
  SupervisorState,
  SupervisorStatus,
  TickHandler,
} from './types';

const logger = getLogger('Supervisor');

const noopTick: TickHandler = () => {};

export class HeartbeatSupervisor {
  private state: SupervisorState;
  private sink: LogSink;
  private tick: TickHandler;
  private clock: () => Date;
  private controller = new AbortController();
  private runPromise?: Promise<void>;

  /**
   * @throws ConfigError when either interval is not a positive number of
   * seconds within the timer limit
   */
  constructor(options: SupervisorOptions) {
    const config = resolveSupervisorConfig(options.config);
    this.sink = options.sink;
    this.tick = options.tick ?? noopTick;
    this.clock = options.clock ?? (() => new Date());
    this.state = {
      status: 'created',
      running: false,
      intervalSeconds: config.intervalSeconds,
      errorBackoffSeconds: config.errorBackoffSeconds,
      tickCount: 0,
      consecutiveFailures: 0,
    };
  }

  get status(): SupervisorStatus {
    return this.state.status;
  }

  getState(): SupervisorState {
    return { ...this.state };
  }

  /**
   * Run the loop. Resolves once the supervisor has stopped.
   *
   * Aborting `signal` has the same effect as calling stop().
   */
  start(signal?: AbortSignal): Promise<void> {
    if (this.runPromise) {
      logger.warn('Supervisor already running');
      return this.runPromise;
    }
    if (this.state.status === 'stopped') {
      logger.warn('Supervisor was stopped and cannot be restarted');
      return Promise.resolve();
    }

    this.state.status = 'running';
    this.state.running = true;
    const onAbort = () => this.stop();
    if (signal?.aborted) {
      this.stop();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    this.runPromise = this.run().finally(() => {
      signal?.removeEventListener('abort', onAbort);
    });
    return this.runPromise;
  }

  /**
   * Request cancellation. Safe to call any number of times.
   */
  stop(): void {
    if (this.controller.signal.aborted) {
      return;
    }
    if (this.state.status === 'created') {
      this.state.status = 'stopped';
    }
    this.controller.abort();
  }

  private async run(): Promise<void> {
    const { signal } = this.controller;
    const intervalMs = Math.round(this.state.intervalSeconds * 1000);
    const backoffMs = Math.round(this.state.errorBackoffSeconds * 1000);

    await this.emit('started', 'INFO', 'Agent Core started');

    while (await sleep(intervalMs, signal)) {
      const failure = await this.runTick(signal);
      if (failure) {
        await this.emit('error', 'ERROR', failure.message);
        if (!(await sleep(backoffMs, signal))) {
          break;
        }
      } else {
        await this.emit('heartbeat', 'INFO', 'Agent heartbeat');
      }
    }

    this.state.status = 'stopping';
    await this.emit('stopping', 'INFO', 'Agent stopping');
    this.state.running = false;
    this.state.status = 'stopped';
  }

  /**
   * Run one tick body, returning the failure if it threw
   */
  private async runTick(signal: AbortSignal): Promise<TickError | undefined> {
    this.state.tickCount += 1;
    const tick = this.state.tickCount;
    try {
      await this.tick({ tick, signal });
    } catch (error) {
      const failure = new TickError(tick, error);
      this.state.consecutiveFailures += 1;
      this.state.lastError = failure.message;
      return failure;
    }
    this.state.lastHeartbeatAt = this.clock();
    this.state.consecutiveFailures = 0;
    return undefined;
  }

  /**
   * Hand an event to the sink without letting a stalled write hold the loop.
   *
   * While running, the wait ends on cancellation. Once cancelled, it is
   * bounded by the error backoff.
   */
  private async emit(
    kind: AgentEventKind,
    level: EventLevel,
    message: string
  ): Promise<void> {
    const event: AgentEvent = {
      timestamp: this.clock(),
      level,
      source: EVENT_SOURCE,
      kind,
      message,
    };

    let write: Promise<void>;
    try {
      write = this.sink.write(event);
    } catch (error) {
      write = Promise.reject(error);
    }
    const written = write.catch((error: unknown) => {
      logger.error(`Sink rejected ${kind} event`, {
        eventType: LogEventType.SINK_ERROR,
        error: serializeError(error),
      });
    });

    const { signal } = this.controller;
    const settled = await settleWithin(
      written,
      signal.aborted
        ? { timeoutMs: Math.round(this.state.errorBackoffSeconds * 1000) }
        : { signal }
    );
    if (!settled) {
      logger.warn(`Sink did not finish ${kind} event, moving on`, {
        eventType: LogEventType.SINK_ERROR,
      });
    }
  }
}

/**
 * Construct a supervisor and run it until cancelled
 *
 * Rejects with ConfigError, before any event is emitted, when the
 * configuration is invalid.
 */
export async function startSupervisor(
  options: SupervisorOptions,
  signal?: AbortSignal
): Promise<HeartbeatSupervisor> {
  const supervisor = new HeartbeatSupervisor(options);
  await supervisor.start(signal);
  return supervisor;
}

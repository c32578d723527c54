/**
 * Slack sink using Bolt framework with Socket Mode
 */

import { App, LogLevel } from '@slack/bolt';
import { getLogger, LogEventType, serializeError } from '../utils';
import type { AgentEvent, EventLevel, LogSink } from './types';

const logger = getLogger('SlackSink');

const POST_TIMEOUT_MS = 10_000;

const levelRank: Record<EventLevel, number> = { INFO: 0, ERROR: 1 };

export interface SlackSinkConfig {
  botToken: string;
  appToken: string;
  channel: string;
  minLevel?: EventLevel;
}

export class SlackSink implements LogSink {
  private app: App;
  private channel: string;
  private minLevel: EventLevel;

  constructor(config: SlackSinkConfig) {
    this.channel = config.channel;
    this.minLevel = config.minLevel ?? 'ERROR';
    this.app = new App({
      token: config.botToken,
      appToken: config.appToken,
      socketMode: true,
      // One attempt per post, bounded by POST_TIMEOUT_MS
      clientOptions: {
        retryConfig: { retries: 0 },
        timeout: POST_TIMEOUT_MS,
      },
      logLevel:
        process.env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.DEBUG,
    });
  }

  /**
   * Whether an event of this level is posted
   */
  accepts(level: EventLevel): boolean {
    return levelRank[level] >= levelRank[this.minLevel];
  }

  async write(event: AgentEvent): Promise<void> {
    if (!this.accepts(event.level)) {
      return;
    }

    try {
      const result = await this.app.client.chat.postMessage({
        channel: this.channel,
        text: formatEvent(event),
        mrkdwn: true,
      });
      logger.debug(`Event sent to Slack channel ${this.channel}`, {
        ts: result.ts,
      });
    } catch (error) {
      logger.error('Failed to send Slack message', {
        eventType: LogEventType.SINK_ERROR,
        error: serializeError(error),
      });
      throw error;
    }
  }

  async start(): Promise<void> {
    try {
      logger.info('Starting Slack Bolt app (Socket Mode)...');
      await this.app.start();
      logger.success('Slack Bolt app connected via Socket Mode');
      logger.info(`Events will be sent to channel: ${this.channel}`);
    } catch (error) {
      logger.error('Failed to start Slack Bolt app', {
        eventType: LogEventType.SINK_LIFECYCLE,
        error: serializeError(error),
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    try {
      await this.app.stop();
      logger.info('Slack Bolt app stopped');
    } catch (error) {
      logger.error('Failed to stop Slack Bolt app', {
        eventType: LogEventType.SINK_LIFECYCLE,
        error: serializeError(error),
      });
      throw error;
    }
  }
}

export function formatEvent(event: AgentEvent): string {
  return `[${event.source}] ${event.level} ${event.timestamp.toISOString()} ${event.message}`;
}

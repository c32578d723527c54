/**
 * Sink factory - builds the sink chain from configuration
 */

import type { AppConfig } from '../config';
import { getLogger, LogEventType, serializeError } from '../utils';
import { FanoutSink } from './fanout';
import { LoggerSink } from './logger';
import { SlackSink } from './slack';
import type { LogSink } from './types';

const logger = getLogger('SinkFactory');

export function createSink(config: AppConfig): LogSink {
  const loggerSink = new LoggerSink();
  const slackConfig = config.notifications?.slack;

  if (!slackConfig?.enabled) {
    logger.info('Using logger sink (Slack not enabled)');
    return loggerSink;
  }

  if (!slackConfig.botToken || !slackConfig.appToken) {
    logger.warn(
      'Slack sink is enabled but tokens are missing. Falling back to logger sink.'
    );
    logger.warn(
      'Please set SLACK_BOT_TOKEN and SLACK_APP_TOKEN environment variables.'
    );
    return loggerSink;
  }

  try {
    logger.info(`Creating Slack sink for channel: ${slackConfig.channel}`);
    const slackSink = new SlackSink({
      botToken: slackConfig.botToken,
      appToken: slackConfig.appToken,
      channel: slackConfig.channel,
      minLevel: slackConfig.minLevel,
    });
    return new FanoutSink([loggerSink, slackSink]);
  } catch (error) {
    logger.error('Failed to create Slack sink, falling back to logger sink', {
      eventType: LogEventType.SINK_LIFECYCLE,
      error: serializeError(error),
    });
    return loggerSink;
  }
}

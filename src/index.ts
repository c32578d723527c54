/**
 * Agent Core - long-running agent process
 *
 * Entry point: loads configuration, wires signals and runs the supervisor
 */

import 'dotenv/config';

import { ConfigError, loadConfig } from './config';
import { stopSink } from './launcher';
import { createSink } from './sinks';
import { HeartbeatSupervisor } from './supervisor';
import { LogEventType, logger, serializeError } from './utils';

async function main() {
  const config = loadConfig(process.env);
  logger.configure({ dir: config.logging.dir, level: config.logging.level });

  const sink = createSink(config);
  const supervisor = new HeartbeatSupervisor({
    config: config.supervisor,
    sink,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.info('Received SIGINT, shutting down...');
    controller.abort();
  });
  process.once('SIGTERM', () => {
    logger.info('Received SIGTERM, shutting down...');
    controller.abort();
  });

  await sink.start();
  logger.info(
    `Heartbeat every ${config.supervisor.intervalSeconds}s, press Ctrl+C to stop`
  );

  try {
    await supervisor.start(controller.signal);
  } finally {
    if (!(await stopSink(sink))) {
      process.exitCode = 1;
    }
  }
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    logger.error(`Invalid configuration: ${error.message}`, {
      eventType: LogEventType.CONFIG_ERROR,
      key: error.key,
    });
  } else {
    logger.error('Failed to start Agent Core', {
      error: serializeError(error),
    });
  }
  process.exit(1);
});

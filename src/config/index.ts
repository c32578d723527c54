/**
 * Configuration types, defaults and environment loading
 */

import type { EventLevel } from '../sinks/types';
import { DEFAULT_LOG_DIR, LogLevel, parseLogLevel } from '../utils';
import { ConfigError } from './errors';

export { ConfigError } from './errors';

export interface SupervisorConfig {
  intervalSeconds: number;
  errorBackoffSeconds: number;
}

export interface LoggingConfig {
  dir: string | null; // null: console only
  level: LogLevel;
}

export interface SlackConfig {
  enabled: boolean;
  botToken: string; // xoxb-...
  appToken: string; // xapp-...
  channel: string; // Channel ID or name
  minLevel: EventLevel;
}

export interface NotificationConfig {
  slack?: SlackConfig;
}

export interface AppConfig {
  supervisor: SupervisorConfig;
  logging: LoggingConfig;
  notifications?: NotificationConfig;
}

export const DEFAULT_SUPERVISOR_CONFIG: Readonly<SupervisorConfig> = {
  intervalSeconds: 10,
  errorBackoffSeconds: 5,
};

// Longest delay setTimeout honors; larger delays fire after 1ms
export const MAX_TIMER_MS = 2_147_483_647;

function requirePositive(key: keyof SupervisorConfig, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(key, value, 'must be a positive number');
  }
  if (value > MAX_TIMER_MS / 1000) {
    throw new ConfigError(
      key,
      value,
      `must be at most ${MAX_TIMER_MS / 1000} seconds`
    );
  }
  return value;
}

/**
 * Merge overrides over the defaults and validate the result
 */
export function resolveSupervisorConfig(
  overrides: Partial<SupervisorConfig> = {}
): SupervisorConfig {
  const merged = { ...DEFAULT_SUPERVISOR_CONFIG, ...overrides };
  return {
    intervalSeconds: requirePositive('intervalSeconds', merged.intervalSeconds),
    errorBackoffSeconds: requirePositive(
      'errorBackoffSeconds',
      merged.errorBackoffSeconds
    ),
  };
}

function readSeconds(
  env: NodeJS.ProcessEnv,
  name: string
): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(name, raw, 'must be a number of seconds');
  }
  return value;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.AGENT_CORE_LOG_LEVEL;
  if (!raw) return LogLevel.DEBUG;
  const level = parseLogLevel(raw);
  if (level === undefined) {
    throw new ConfigError(
      'AGENT_CORE_LOG_LEVEL',
      raw,
      'must be one of debug, info, warn, error'
    );
  }
  return level;
}

function readEventLevel(env: NodeJS.ProcessEnv): EventLevel {
  const raw = env.SLACK_MIN_LEVEL;
  const level = raw?.trim().toUpperCase();
  if (!level) return 'ERROR';
  if (level !== 'INFO' && level !== 'ERROR') {
    throw new ConfigError('SLACK_MIN_LEVEL', raw, 'must be INFO or ERROR');
  }
  return level;
}

/**
 * Build the application config from environment variables
 *
 * @throws ConfigError when a value is present but unusable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const intervalSeconds = readSeconds(env, 'AGENT_HEARTBEAT_INTERVAL_SECONDS');
  const errorBackoffSeconds = readSeconds(env, 'AGENT_ERROR_BACKOFF_SECONDS');

  return {
    supervisor: resolveSupervisorConfig({
      ...(intervalSeconds !== undefined && { intervalSeconds }),
      ...(errorBackoffSeconds !== undefined && { errorBackoffSeconds }),
    }),
    logging: {
      dir:
        env.AGENT_CORE_LOG_DIR === undefined
          ? DEFAULT_LOG_DIR
          : env.AGENT_CORE_LOG_DIR || null,
      level: readLogLevel(env),
    },
    notifications: {
      slack: {
        enabled: env.SLACK_ENABLED === 'true',
        botToken: env.SLACK_BOT_TOKEN || '',
        appToken: env.SLACK_APP_TOKEN || '',
        channel: env.SLACK_CHANNEL || '#notifications',
        minLevel: readEventLevel(env),
      },
    },
  };
}

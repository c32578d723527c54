/**
 * Invalid startup configuration. Fatal: nothing ticks after this is thrown.
 */
export class ConfigError extends Error {
  readonly key: string;
  readonly value: unknown;

  constructor(key: string, value: unknown, reason: string) {
    const shown = typeof value === 'string' ? `"${value}"` : String(value);
    super(`${key} ${reason} (got ${shown})`);
    this.name = 'ConfigError';
    this.key = key;
    this.value = value;
  }
}

/**
 * Configuration loading and management
 */

import { ClientError, EXIT_CODES } from '../commands/errors.js';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = Record<string, unknown>;

/**
 * Load configuration from environment and defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: RawConfig = {};

  // Load from environment variables
  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined) {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  // Parse and validate
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ClientError(`Configuration validation failed:\n${errors.join('\n')}`, {
      exitCode: EXIT_CODES.CONFIG,
    });
  }

  return result.data;
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): unknown {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Integer
  if (/^-?\d+$/.test(value)) return Number(value);

  // String
  return value;
}

/**
 * Base URL of every known server instance. `server.url` overrides the entry
 * of the configured instance, and is the only way to reach an instance
 * missing from the table.
 */
export function instanceUrls(config: Config): Record<string, string> {
  const urls: Record<string, string> = { ...config.server.instances };
  if (config.server.url) {
    urls[config.server.instance] = config.server.url;
  }
  return urls;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    version: config.app.version,
    instance: config.server.instance,
    logFile: config.logging.fileName,
    upload: config.upload.enabled ? 'enabled' : 'disabled',
    plugins: config.plugins.modules,
  };
}

// Re-export types
export type { Config } from './schema.js';

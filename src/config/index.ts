import { resolve } from 'path';
import { BridgeConfigSchema, formatIssues, type BridgeConfig } from './schema.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * Parse an integer from environment variable with a default value
 */
export function parseIntWithDefault(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Substitute the project placeholder in a container name
 * `{DDEV_PROJECT}` is accepted as a legacy spelling of `{project}`
 */
export function interpolateContainerName(template: string, project: string): string {
  return template.replace(/\{project\}|\{DDEV_PROJECT\}/g, project);
}

/**
 * Load and validate bridge configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const rawConfig = {
    project: env.DDEV_PROJECT || undefined,
    hostProjectRoot: env.HOST_PROJECT_ROOT || undefined,
    containerProjectRoot: env.CONTAINER_PROJECT_ROOT || undefined,
    toolsConfigDir: resolve(env.TOOLS_CONFIG_DIR || 'tools-config'),
    containerTemplate: env.CONTAINER_NAME_TEMPLATE || undefined,
    siteLabel: env.SANDBOX_SITE_LABEL || undefined,
    dockerPath: env.DOCKER_PATH || undefined,
    maxBufferKb: parseIntWithDefault(env.COMMAND_MAX_BUFFER_KB, 10240),
  };

  const result = BridgeConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(`Invalid bridge configuration: ${formatIssues(result.error)}`);
  }

  return result.data;
}

export type { BridgeConfig };

/**
 * framecalc application support.
 *
 * Logger and configuration loading shared by the CLI and programmatic use.
 *
 * @module framecalc/app
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { pino, type Logger } from 'pino';
import { checkConfig, parseConfig, type Config } from './core/config/schema.js';

// ============================================================================
// Logger Setup
// ============================================================================

/**
 * Create application logger with sensible defaults.
 */
export function createLogger(level?: string, prettyPrint = true): Logger {
  if (prettyPrint) {
    return pino({
      level: level ?? process.env['LOG_LEVEL'] ?? 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({
    level: level ?? process.env['LOG_LEVEL'] ?? 'info',
  });
}

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_CONFIG_PATH = './config/config.yaml';

/**
 * Read a YAML file from disk and parse it.
 */
export async function readYamlFile(path: string): Promise<unknown> {
  const content = await readFile(resolve(path), 'utf-8');
  return parseYaml(content);
}

/**
 * Load and validate configuration.
 *
 * A missing file is not an error: every setting has a default.
 *
 * @throws ZodError when the file does not match the schema
 * @throws Error when the start timecode is invalid at the configured rate
 */
export async function loadConfig(configPath: string, logger?: Logger): Promise<Config> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    logger?.debug({ path: absolutePath }, 'Configuration file not found, using defaults');
    return parseConfig({});
  }

  const result = checkConfig(await readYamlFile(absolutePath));
  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.errors.join('; ')}`);
  }

  logger?.debug({ path: absolutePath }, 'Configuration loaded');
  return result.config;
}

/**
 * Configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root, with the process environment taking precedence.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger, type Logger } from '@tokweave/logger';
import { z } from 'zod';
import type { RenderOptions } from './diagnostics/report';
import type { EngineOptions } from './lexer/engine';

const configSchema = z.object({
  environment: z.enum(['test', 'development', 'production']).default('development'),
  color: z.enum(['auto', 'always', 'never']).default('auto'),
  maxStalledRounds: z
    .union([
      z.literal('Infinity').transform(() => Infinity),
      z.coerce.number().int().nonnegative(),
    ])
    .default(1),
});

export type TokweaveConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load the nearest .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath) && fs.statSync(envPath).isFile()) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Load configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * A non-empty `NO_COLOR` forces colour off.
 *
 * @throws {ConfigError} If a value is not valid
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): TokweaveConfig {
  const merged: Record<string, string | undefined> = { ...findEnvFile(cwd) };
  for (const key of ['TOKWEAVE_ENV', 'TOKWEAVE_COLOR', 'TOKWEAVE_MAX_STALLED_ROUNDS', 'NO_COLOR']) {
    if (nonEmpty(env[key]) !== undefined) {
      merged[key] = env[key];
    }
  }

  const parsed = configSchema.safeParse({
    environment: nonEmpty(merged.TOKWEAVE_ENV),
    color: nonEmpty(merged.NO_COLOR) !== undefined ? 'never' : nonEmpty(merged.TOKWEAVE_COLOR),
    maxStalledRounds: nonEmpty(merged.TOKWEAVE_MAX_STALLED_ROUNDS),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return parsed.data;
}

export function engineOptionsFromConfig(config: TokweaveConfig, logger?: Logger): EngineOptions {
  return {
    maxStalledRounds: config.maxStalledRounds,
    logger: logger ?? createLogger({ environment: config.environment }),
  };
}

export function renderOptionsFromConfig(config: TokweaveConfig): RenderOptions {
  if (config.color === 'auto') return {};
  return { color: config.color === 'always' };
}

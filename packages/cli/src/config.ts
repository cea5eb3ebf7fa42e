/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import { isEnvironment, isLogLevel, type Environment, type LogLevel } from '@exprcc/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface ExprccConfig {
  environment: Environment;
  logLevel?: LogLevel;
  color: boolean;
}

/** Variables exprcc reads; anything else in a .env file belongs to other tools */
const CONFIG_KEYS = ['EXPRCC_ENV', 'EXPRCC_LOG_LEVEL', 'NO_COLOR'] as const;

type ConfigKey = (typeof CONFIG_KEYS)[number];

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

function unquote(value: string): string {
  const quote = value[0];
  if (value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Pick the exprcc variables out of a .env file
 *
 * `KEY=value` per line; `#` starts a comment line and values may be quoted.
 */
export function parseEnvFile(content: string): Partial<Record<ConfigKey, string>> {
  const result: Partial<Record<ConfigKey, string>> = {};

  for (const line of content.split(/\r?\n/)) {
    const match = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=(.*)$/.exec(line);
    if (!match) {
      continue;
    }
    const [, key, value] = match;
    if (isConfigKey(key)) {
      result[key] = unquote(value.trim());
    }
  }

  return result;
}

/**
 * Find and load .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Partial<Record<ConfigKey, string>> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      try {
        return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
      } catch {
        // Unreadable (e.g. a directory named .env); keep searching upward
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function applyVariables(config: ExprccConfig, vars: Record<string, string | undefined>): void {
  const environment = vars.EXPRCC_ENV;
  if (environment && isEnvironment(environment)) {
    config.environment = environment;
  }

  const logLevel = vars.EXPRCC_LOG_LEVEL;
  if (logLevel && isLogLevel(logLevel)) {
    config.logLevel = logLevel;
  }

  if (vars.NO_COLOR) {
    config.color = false;
  }
}

/**
 * Load exprcc configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * Unrecognised values are ignored.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): ExprccConfig {
  const config: ExprccConfig = { environment: 'production', color: true };

  const envFile = findEnvFile(cwd);
  if (envFile) {
    applyVariables(config, envFile);
  }

  applyVariables(config, env);

  return config;
}

import fs from 'fs';
import path from 'path';
import envPaths from 'env-paths';
import { z } from 'zod';
import { logger } from '../lib/logger';
import { ConfigurationError, formatIssues } from '../lib/errors';
import {
  APP_NAME,
  APP_VERSION,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_TIME_ZONE,
  GITHUB_API
} from './constants';

interface ConfigShape {
  token?: string;
}

export interface GitHubConfig {
  /** Personal access token; validated per request by {@link requireToken} */
  readonly token: string | undefined;
  readonly apiBaseUrl: string;
  readonly userAgent: string;
}

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
}

export interface TimeConfig {
  readonly defaultTimeZone: string;
}

/**
 * Process-wide configuration, loaded once at start and never mutated
 */
export interface AppConfig {
  readonly github: GitHubConfig;
  readonly server: ServerConfig;
  readonly time: TimeConfig;
}

const paths = envPaths(APP_NAME);
const configFile = path.join(paths.config, 'config.json');

const EnvSchema = z.object({
  GITHUB_API_URL: z.string().url().optional(),
  HOST: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  DEFAULT_TIME_ZONE: z.string().min(1).optional()
});

/**
 * Gets the absolute path to the configuration file
 *
 * @returns Absolute path to config.json in the user's config directory
 */
export function getConfigPath() {
  return configFile;
}

/**
 * Reads the configuration file from disk
 *
 * Returns an empty object if the file doesn't exist, isn't JSON, or holds
 * something other than an object.
 */
export function readConfig(): ConfigShape {
  try {
    const data = fs.readFileSync(configFile, 'utf8');
    const json: unknown = JSON.parse(data);
    if (typeof json !== 'object' || json === null) return {};
    const token = 'token' in json && typeof json.token === 'string' ? json.token : undefined;
    return token === undefined ? {} : { token };
  } catch (error) {
    logger.debug('Failed to read config file', { error });
    return {};
  }
}

/**
 * Retrieves GitHub token from environment variables
 *
 * Checks both GITHUB_TOKEN and GH_TOKEN environment variables.
 */
export function getTokenFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.GITHUB_TOKEN || env.GH_TOKEN;
}

/**
 * Retrieves stored GitHub token from config file
 */
export function getStoredToken(): string | undefined {
  return readConfig().token;
}

/**
 * Ensures a usable token is present
 *
 * Called before every GitHub request so that a missing credential fails the
 * call without any network activity.
 *
 * @throws {ConfigurationError} If the token is absent or blank
 * @example
 * ```typescript
 * const token = requireToken(config.github.token);
 * ```
 */
export function requireToken(token: string | undefined): string {
  if (token === undefined || token === '') {
    throw new ConfigurationError('GITHUB_TOKEN environment variable is not set');
  }
  if (token.trim() === '') {
    throw new ConfigurationError('GITHUB_TOKEN environment variable is empty');
  }
  return token;
}

/**
 * Builds the application configuration from the environment
 *
 * The token comes from GITHUB_TOKEN, then GH_TOKEN, then the stored config
 * file. A missing token is not an error here: the time tools work without one
 * and the GitHub tools reject each call through {@link requireToken}.
 *
 * @throws {ConfigurationError} If an environment value is malformed
 * @example
 * ```typescript
 * const config = loadConfig();
 * console.log(`Listening on ${config.server.host}:${config.server.port}`);
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse({
    GITHUB_API_URL: env.GITHUB_API_URL || undefined,
    HOST: env.HOST || undefined,
    PORT: env.PORT || undefined,
    DEFAULT_TIME_ZONE: env.DEFAULT_TIME_ZONE || undefined
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error.issues)}`);
  }
  const values = parsed.data;

  const config: AppConfig = {
    github: Object.freeze({
      token: getTokenFromEnv(env) ?? getStoredToken(),
      apiBaseUrl: (values.GITHUB_API_URL ?? GITHUB_API.BASE_URL).replace(/\/+$/, ''),
      userAgent: `${APP_NAME}/${APP_VERSION}`
    }),
    server: Object.freeze({
      host: values.HOST ?? DEFAULT_HOST,
      port: values.PORT ?? DEFAULT_PORT
    }),
    time: Object.freeze({
      defaultTimeZone: values.DEFAULT_TIME_ZONE ?? DEFAULT_TIME_ZONE
    })
  };

  logger.debug('Configuration loaded', {
    apiBaseUrl: config.github.apiBaseUrl,
    hasToken: config.github.token !== undefined,
    host: config.server.host,
    port: config.server.port
  });

  return Object.freeze(config);
}

/**
 * Strings Demo Configuration
 *
 * Environment-based configuration for the token URI demo and CLI.
 */

import { z } from 'zod';
import { MAX_FIXED_HEX_DIGITS } from '@uint256-strings/core';

export const DEFAULT_TOKEN_URI_BASE = 'https://api.example.com/token';
export const DEFAULT_TOKEN_URI_HEX_WIDTH = 8;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface StringsDemoConfig {
  /** Base URL that token ids are appended to */
  tokenUriBase: string;

  /** Minimum hex digits of the `hex=` query value */
  tokenUriHexWidth: number;

  /** Log level */
  logLevel: LogLevel;
}

/**
 * Raised when an environment variable fails validation
 */
export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    reason: string
  ) {
    super(`Invalid ${variable}: ${reason}`);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  TOKEN_URI_BASE: z
    .string()
    .url('must be a URL')
    .refine((url) => /^https?:\/\//.test(url), 'must be an http(s) URL')
    .default(DEFAULT_TOKEN_URI_BASE),
  TOKEN_URI_HEX_WIDTH: z
    .string()
    .regex(/^[0-9]+$/, 'must be a non-negative integer')
    .transform(Number)
    .pipe(z.number().max(MAX_FIXED_HEX_DIGITS, `must not exceed ${MAX_FIXED_HEX_DIGITS}`))
    .default(String(DEFAULT_TOKEN_URI_HEX_WIDTH)),
  LOG_LEVEL: z
    .enum(LOG_LEVELS, { errorMap: () => ({ message: `must be one of ${LOG_LEVELS.join(', ')}` }) })
    .default('info'),
});

/**
 * Load configuration from environment variables
 *
 * @throws ConfigError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StringsDemoConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const [issue] = result.error.issues;
    const variable = issue ? String(issue.path[0]) : 'environment';
    throw new ConfigError(variable, issue ? issue.message : result.error.message);
  }

  return {
    tokenUriBase: result.data.TOKEN_URI_BASE,
    tokenUriHexWidth: result.data.TOKEN_URI_HEX_WIDTH,
    logLevel: result.data.LOG_LEVEL,
  };
}

/**
 * Validate the configuration
 *
 * Token ids are appended as a path segment followed by a query string, so
 * the base URL must not carry its own query or fragment.
 */
export function validateConfig(config: StringsDemoConfig): void {
  const url = new URL(config.tokenUriBase);

  if (url.search !== '' || url.hash !== '') {
    throw new ConfigError('TOKEN_URI_BASE', 'must not contain a query string or fragment');
  }
}

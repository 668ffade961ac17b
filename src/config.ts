import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError } from './errors.js';

// Load environment variables
dotenvConfig();

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/** Largest delay setTimeout honours; longer ones fire after 1ms */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Read a number that must be finite, greater than zero and at most `max`
 */
function getEnvPositiveNumber(env: Env, key: string, defaultValue: number, max: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Environment variable ${key} must be a positive number`);
  }
  if (parsed > max) {
    throw new ConfigurationError(`Environment variable ${key} must not exceed ${max}`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

export const DEFAULT_REVIEW_API_ENDPOINT =
  'https://practicum.yandex.ru/api/user_api/homework_statuses/';

const REQUIRED_CREDENTIALS = ['PRACTICUM_TOKEN', 'TELEGRAM_TOKEN', 'TELEGRAM_CHAT_ID'] as const;

export interface AppConfig {
  reviewApi: {
    token: string;
    endpoint: string;
    requestTimeoutMs: number;
  };
  telegram: {
    botToken: string;
    chatId: string;
    requestTimeoutMs: number;
  };
  poller: {
    /** Pause between two iterations of the loop */
    retryPeriodMs: number;
  };
}

/**
 * Logging settings are read on import and never fail,
 * so the logger is usable before credentials are checked.
 */
export const loggingConfig = {
  level: getEnvVar(process.env, 'LOG_LEVEL', 'info'),
  fileEnabled: getEnvBoolean(process.env, 'LOG_FILE_ENABLED', true),
  dir: getEnvVar(process.env, 'LOG_DIR', 'logs'),
} as const;

/**
 * Build the application configuration from the environment.
 * Throws ConfigurationError listing every missing credential at once.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missing = REQUIRED_CREDENTIALS.filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing
    );
  }

  const requestTimeoutMs = getEnvPositiveNumber(env, 'REQUEST_TIMEOUT_MS', 10000, MAX_TIMER_MS);
  const retryPeriodSeconds = getEnvPositiveNumber(
    env,
    'RETRY_PERIOD_SECONDS',
    600,
    Math.floor(MAX_TIMER_MS / 1000)
  );

  return {
    reviewApi: {
      token: getEnvVar(env, 'PRACTICUM_TOKEN', ''),
      endpoint: getEnvVar(env, 'REVIEW_API_ENDPOINT', DEFAULT_REVIEW_API_ENDPOINT),
      requestTimeoutMs,
    },
    telegram: {
      botToken: getEnvVar(env, 'TELEGRAM_TOKEN', ''),
      chatId: getEnvVar(env, 'TELEGRAM_CHAT_ID', ''),
      requestTimeoutMs,
    },
    poller: {
      retryPeriodMs: retryPeriodSeconds * 1000,
    },
  };
}

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../lib/errors/bridge-errors.js';

export const DEFAULT_SUBSCRIBE_PATH = '/ws/subscribe/presentation';

export interface BridgeConfig {
  /** host:port of the OpenSong server */
  address: string;
  wsUrl: string;
  apiBaseUrl: string;
  subscribePath: string;
  retryDelayMs: number;
  titleFile: string;
  verseFile: string;
  fetchTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface LoadConfigOptions {
  /** Env file to read; values already present in `env` take precedence */
  envFile?: string;
  /** Defaults to process.env (with ./.env loaded when present) */
  env?: NodeJS.ProcessEnv;
}

// Unset and blank values both fall back to the default
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const addressSchema = z
  .string({ required_error: 'is required' })
  .trim()
  .regex(/^[^\s:/]+:\d{1,5}$/, 'must be host:port')
  .refine(value => {
    const port = Number(value.slice(value.lastIndexOf(':') + 1));
    return port > 0 && port <= 65_535;
  }, 'port must be between 1 and 65535');

const envSchema = z.object({
  OPENSONG_ADDRESS: z.preprocess(blankToUndefined, addressSchema),
  OPENSONG_SUBSCRIBE_PATH: z.preprocess(
    blankToUndefined,
    z.string().trim().startsWith('/', 'must start with /').default(DEFAULT_SUBSCRIBE_PATH)
  ),
  RETRY_DELAY_SECONDS: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive('must be greater than 0').default(0.5)
  ),
  TITLE_FILE: z.preprocess(blankToUndefined, z.string({ required_error: 'is required' }).trim()),
  VERSE_FILE: z.preprocess(blankToUndefined, z.string({ required_error: 'is required' }).trim()),
  FETCH_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(5000)),
  CONNECT_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(5000)),
});

function readEnv(options: LoadConfigOptions): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(options.env ?? process.env)) {
    if (value !== undefined) env[key] = value;
  }

  if (options.envFile !== undefined) {
    const result = dotenv.config({ path: options.envFile, processEnv: env });
    if (result.error) {
      throw new ConfigError(`Cannot read configuration file ${options.envFile}: ${result.error.message}`);
    }
  } else if (options.env === undefined) {
    dotenv.config({ processEnv: env });
  }

  return env;
}

/**
 * Load and validate the bridge configuration.
 * Throws ConfigError listing every invalid or missing value.
 */
export function loadConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const parsed = envSchema.safeParse(readEnv(options));

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const env = parsed.data;
  return {
    address: env.OPENSONG_ADDRESS,
    wsUrl: `ws://${env.OPENSONG_ADDRESS}/ws`,
    apiBaseUrl: `http://${env.OPENSONG_ADDRESS}`,
    subscribePath: env.OPENSONG_SUBSCRIBE_PATH,
    retryDelayMs: Math.round(env.RETRY_DELAY_SECONDS * 1000),
    titleFile: env.TITLE_FILE,
    verseFile: env.VERSE_FILE,
    fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
    connectTimeoutMs: env.CONNECT_TIMEOUT_MS,
  };
}

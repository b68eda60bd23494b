import z from 'zod';
import type { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Service version sent as `x-ms-version` unless configured otherwise. */
export const DEFAULT_API_VERSION = '2018-03-28';

/** Transport timeout applied to every request unless configured otherwise. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  pretty: z.boolean().default(false),
});

export const ClientConfigSchema = z.object({
  accountName: z.string().regex(/^[a-z0-9]{3,24}$/, 'account name must be 3-24 lowercase letters or digits'),
  /** Overrides `https://<accountName>.blob.core.windows.net`, e.g. for an emulator. */
  blobEndpoint: z.string().url().optional(),
  apiVersion: z.string().min(1).default(DEFAULT_API_VERSION),
  requestTimeoutMs: z.union([z.number().int().positive(), z.literal(false)]).default(DEFAULT_REQUEST_TIMEOUT_MS),
  /** Extra default headers; `null` removes a built-in default. */
  headers: z.record(z.string(), z.string().nullable()).optional(),
  logging: LoggingConfigSchema.default({}),
});

/** Parsed client configuration, defaults applied. */
export type ClientConfig = z.output<typeof ClientConfigSchema>;
/** Client configuration as accepted before defaults are applied. */
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/**
 * Validates raw configuration and applies defaults.
 */
export function parseClientConfig(input: unknown): SafeWrapAsync<ValidationError, ClientConfig> {
  return validator(input, ClientConfigSchema);
}

function parseTimeout(value: string | undefined): number | false | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }

  if (value === 'false' || value === '0') {
    return false;
  }

  return Number(value);
}

/**
 * Reads the client configuration from environment variables:
 * `STORAGE_ACCOUNT_NAME`, `STORAGE_BLOB_ENDPOINT`, `STORAGE_API_VERSION`,
 * `STORAGE_REQUEST_TIMEOUT_MS`, `LOG_LEVEL` and `LOG_PRETTY`.
 */
export function loadClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SafeWrapAsync<ValidationError, ClientConfig> {
  return parseClientConfig({
    accountName: env.STORAGE_ACCOUNT_NAME,
    blobEndpoint: env.STORAGE_BLOB_ENDPOINT || undefined,
    apiVersion: env.STORAGE_API_VERSION || undefined,
    requestTimeoutMs: parseTimeout(env.STORAGE_REQUEST_TIMEOUT_MS),
    logging: {
      level: env.LOG_LEVEL || undefined,
      pretty: env.LOG_PRETTY === undefined ? undefined : env.LOG_PRETTY === 'true' || env.LOG_PRETTY === '1',
    },
  });
}

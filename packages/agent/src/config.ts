import { hostname } from 'node:os';
import { type ZodError, z } from 'zod';

const DEFAULT_RETRY_ON_STATUS_CODES = [
  429,
  ...Array.from({ length: 100 }, (_, index) => 500 + index),
];
const HttpStatusCodeSchema = z.number().int().min(100).max(599);

export const DEFAULT_ENDPOINT = 'https://push.vigil.dev';

/**
 * Agent configuration schema
 */
export const ConfigSchema = z.object({
  /** Whether the agent should start its backend at all */
  active: z.boolean().default(false),

  /** Push API key identifying the application to the collector */
  pushApiKey: z.string().min(1),

  /** Application name reported with every payload */
  name: z.string().min(1).optional(),

  /** Application environment, e.g. production or staging */
  environment: z.string().min(1).default('development'),

  /** Collector endpoint used by the HTTP backend */
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),

  /** Backend used to deliver metrics and errors */
  transport: z.enum(['http', 'stdio']).default('http'),

  /** Host name reported with probe metrics */
  hostname: z
    .string()
    .min(1)
    .default(() => hostname()),

  /** Deployed revision, attached to error submissions */
  revision: z.string().min(1).optional(),

  /** Log level for the agent's own logger */
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  /** Error kinds that are never submitted */
  ignoreErrors: z.array(z.string()).default([]),

  /** Transaction namespaces that are never submitted */
  ignoreNamespaces: z.array(z.string()).default([]),

  /** Context keys whose values are replaced before submission */
  filterParameters: z.array(z.string()).default(['password', 'password_confirmation']),

  /** Whether the default probes run on the probe interval */
  enableMinutelyProbes: z.boolean().default(true),

  /** Interval between probe runs in milliseconds */
  probeIntervalMs: z.number().int().positive().default(60000),

  /** Maximum number of queued actions delivered in one batch */
  batchSize: z.number().int().positive().default(50),

  /** Interval between backend queue drains in milliseconds */
  flushIntervalMs: z.number().int().positive().default(1000),

  /** Request timeout in milliseconds */
  requestTimeout: z.number().positive().default(30000),

  /** Maximum number of retry attempts */
  maxRetries: z.number().int().nonnegative().default(3),

  /** Initial delay between retries in milliseconds */
  initialRetryDelay: z.number().positive().default(1000),

  /** Maximum delay between retries in milliseconds */
  maxRetryDelay: z.number().positive().default(60000),

  /** Multiplier for exponential backoff */
  retryMultiplier: z.number().positive().default(2.0),

  /** Status codes that should trigger retries */
  retryOnStatusCodes: z.array(HttpStatusCodeSchema).default([...DEFAULT_RETRY_ON_STATUS_CODES]),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration accepted from code, before defaults are applied
 */
export type ConfigOptions = Partial<z.input<typeof ConfigSchema>>;

export type ConfigResolution = {
  /** Whether the agent is administratively enabled, independent of validity */
  active: boolean;
  result: { success: true; config: Config } | { success: false; error: ZodError };
};

/**
 * Creates a validated configuration object by merging provided options with
 * environment variables and defaults.
 *
 * @throws {z.ZodError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   pushApiKey: process.env.VIGIL_PUSH_API_KEY,
 *   name: 'checkout',
 *   environment: 'production',
 * });
 * ```
 */
export function createConfig(options?: ConfigOptions): Config {
  return ConfigSchema.parse(collectConfigInput(options));
}

/**
 * Resolves configuration without throwing, keeping the administrative
 * `active` flag apart from the validation outcome.
 */
export function resolveConfig(options?: ConfigOptions): ConfigResolution {
  const input = collectConfigInput(options);
  const parsed = ConfigSchema.safeParse(input);

  return {
    active: input.active,
    result: parsed.success
      ? { success: true, config: parsed.data }
      : { success: false, error: parsed.error },
  };
}

/**
 * Formats validation issues as `path: message` lines
 */
export function describeConfigError(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function collectConfigInput(options?: ConfigOptions): ConfigOptions & { active: boolean } {
  const env = process.env;
  const pushApiKey = options?.pushApiKey ?? nonEmpty(env.VIGIL_PUSH_API_KEY);

  return {
    ...options,
    active: options?.active ?? parseBooleanEnv(env.VIGIL_ACTIVE) ?? Boolean(pushApiKey),
    pushApiKey,
    name: options?.name ?? nonEmpty(env.VIGIL_APP_NAME),
    environment: options?.environment ?? nonEmpty(env.VIGIL_APP_ENV),
    endpoint: options?.endpoint ?? nonEmpty(env.VIGIL_ENDPOINT),
    transport: options?.transport ?? parseTransportEnv(env.VIGIL_TRANSPORT),
    hostname: options?.hostname ?? nonEmpty(env.VIGIL_HOSTNAME),
    revision: options?.revision ?? nonEmpty(env.VIGIL_REVISION),
    logLevel: options?.logLevel ?? parseLogLevelEnv(env.VIGIL_LOG_LEVEL),
    ignoreErrors: options?.ignoreErrors ?? parseListEnv(env.VIGIL_IGNORE_ERRORS),
    ignoreNamespaces: options?.ignoreNamespaces ?? parseListEnv(env.VIGIL_IGNORE_NAMESPACES),
    filterParameters: options?.filterParameters ?? parseListEnv(env.VIGIL_FILTER_PARAMETERS),
    enableMinutelyProbes:
      options?.enableMinutelyProbes ?? parseBooleanEnv(env.VIGIL_ENABLE_MINUTELY_PROBES),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  return undefined;
}

function parseListEnv(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }

  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return entries.length > 0 ? entries : undefined;
}

function parseTransportEnv(value: string | undefined): Config['transport'] | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'http' || normalized === 'stdio' ? normalized : undefined;
}

function parseLogLevelEnv(value: string | undefined): Config['logLevel'] {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return undefined;
  }
}

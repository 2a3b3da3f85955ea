/**
 * @fileoverview Server configuration loading.
 *
 * Sources are merged in priority order: CLI flags, environment, YAML file,
 * defaults. The merged result is validated with Zod.
 */

import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import {
  ConfigError,
  DEFAULT_HOST,
  DEFAULT_IDLE_TIMEOUT_SECONDS,
  DEFAULT_MAX_FRAME_BYTES,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT_THRESHOLD_SECONDS,
  describeError,
  formatIssues,
  MAX_FRAME_BYTES_LIMIT,
  MAX_TIMEOUT_SECONDS,
} from '@step-relay/shared';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

/**
 * Accept numbers as-is and numeric strings from flags or the environment.
 */
function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    schema
  );
}

// Schema for server configuration
const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: numeric(z.number().int().min(0).max(65535)),
  timeoutThresholdSeconds: numeric(z.number().finite().nonnegative()),
  idleTimeoutSeconds: numeric(z.number().finite().positive().max(MAX_TIMEOUT_SECONDS)),
  maxFrameBytes: numeric(z.number().int().positive().max(MAX_FRAME_BYTES_LIMIT)),
  firstStepId: numeric(z.number().int().nonnegative()).optional(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

const ConfigFileSchema = ServerConfigSchema.partial().strict();

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  timeoutThresholdSeconds: DEFAULT_TIMEOUT_THRESHOLD_SECONDS,
  idleTimeoutSeconds: DEFAULT_IDLE_TIMEOUT_SECONDS,
  maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
};

export interface ConfigSources {
  /** Command line arguments without the node and script paths */
  readonly argv?: readonly string[];
  readonly env?: NodeJS.ProcessEnv;
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function parseCliFlags(argv: readonly string[]) {
  try {
    const { values } = parseArgs({
      args: [...argv],
      options: {
        host: { type: 'string' },
        port: { type: 'string' },
        timeout: { type: 'string' },
        'idle-timeout': { type: 'string' },
        'max-frame-bytes': { type: 'string' },
        'first-step-id': { type: 'string' },
        config: { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    });
    return values;
  } catch (error) {
    throw new ConfigError(`Invalid command line: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Load and validate a partial configuration from a YAML file.
 */
export function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${configPath}: ${formatIssues(result.error)}`);
  }
  return definedOnly(result.data);
}

/**
 * Load the server configuration.
 * @throws {ConfigError} if any source holds an invalid value
 */
export function loadServerConfig(sources: ConfigSources = {}): ServerConfig {
  const argv = sources.argv ?? process.argv.slice(2);
  const env = sources.env ?? process.env;
  const flags = parseCliFlags(argv);

  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const configPath = flags.config ?? env['CONFIG_PATH'];
  const fromFile = configPath ? readConfigFile(configPath) : {};

  const fromEnv = definedOnly({
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    host: env['STEP_SERVER_HOST'],
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    port: env['PORT'],
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    timeoutThresholdSeconds: env['STEP_TIMEOUT_THRESHOLD'],
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    idleTimeoutSeconds: env['STEP_IDLE_TIMEOUT'],
  });

  const fromFlags = definedOnly({
    host: flags.host,
    port: flags.port,
    timeoutThresholdSeconds: flags.timeout,
    idleTimeoutSeconds: flags['idle-timeout'],
    maxFrameBytes: flags['max-frame-bytes'],
    firstStepId: flags['first-step-id'],
  });

  const result = ServerConfigSchema.safeParse({
    ...DEFAULT_SERVER_CONFIG,
    ...fromFile,
    ...fromEnv,
    ...fromFlags,
  });
  if (!result.success) {
    throw new ConfigError(`Invalid server configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

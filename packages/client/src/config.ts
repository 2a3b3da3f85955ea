/**
 * @fileoverview Client command line parsing.
 */

import { parseArgs } from 'node:util';
import {
  ConfigError,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_RESPONSE_TIMEOUT_SECONDS,
  describeError,
  formatIssues,
  MAX_TIMEOUT_SECONDS,
} from '@step-relay/shared';
import { z } from 'zod';
import { FIXTURE_DATASETS } from './fixtures.js';

const ClientArgsSchema = z.object({
  data: z.enum(FIXTURE_DATASETS),
  fixture: z.string().min(1).optional(),
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  responseTimeoutSeconds: z.coerce.number().finite().positive().max(MAX_TIMEOUT_SECONDS),
});

export type ClientArgs = z.infer<typeof ClientArgsSchema>;

function parseCliFlags(argv: readonly string[]) {
  try {
    const { values } = parseArgs({
      args: [...argv],
      options: {
        data: { type: 'string', default: 'success' },
        fixture: { type: 'string' },
        host: { type: 'string', default: DEFAULT_HOST },
        port: { type: 'string', default: String(DEFAULT_PORT) },
        'response-timeout': {
          type: 'string',
          default: String(DEFAULT_RESPONSE_TIMEOUT_SECONDS),
        },
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
 * Parse client command line arguments.
 * @throws {ConfigError} on unknown flags or invalid values
 */
export function parseClientArgs(argv: readonly string[]): ClientArgs {
  const values = parseCliFlags(argv);

  const result = ClientArgsSchema.safeParse({
    data: values.data,
    fixture: values.fixture,
    host: values.host,
    port: values.port,
    responseTimeoutSeconds: values['response-timeout'],
  });
  if (!result.success) {
    throw new ConfigError(`Invalid client configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

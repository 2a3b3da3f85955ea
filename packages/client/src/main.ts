import { describeError, logger } from '@step-relay/shared';
import { parseClientArgs } from './config.js';
import { loadFixture, resolveFixturePath } from './fixtures.js';
import { StepClient } from './StepClient.js';

async function main(): Promise<number> {
  const args = parseClientArgs(process.argv.slice(2));
  const fixturePath = args.fixture ?? resolveFixturePath(args.data);

  logger.info('Loading fixture', { path: fixturePath });
  const steps = await loadFixture(fixturePath);

  const client = new StepClient({
    host: args.host,
    port: args.port,
    responseTimeoutMs: args.responseTimeoutSeconds * 1000,
  });
  const report = await client.run(steps);

  return report.ok ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Step client failed', { error: describeError(error) });
    process.exitCode = 1;
  }
);

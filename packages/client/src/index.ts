/**
 * @fileoverview Step relay client driver.
 */

export { type ClientArgs, parseClientArgs } from './config.js';
export { FramedConnection, type RecvResult } from './FramedConnection.js';
export {
  FIXTURE_DATASETS,
  type FixtureDataset,
  type FixtureStep,
  loadFixture,
  parseFixture,
  resolveFixturePath,
} from './fixtures.js';
export {
  type ClientConfig,
  type ClientFailure,
  type ClientReport,
  type ClientSuccess,
  DEFAULT_CLIENT_CONFIG,
  FAILURE_DESCRIPTIONS,
  type FailureCode,
  StepClient,
} from './StepClient.js';

/**
 * @fileoverview Fixture loading for the client driver.
 *
 * A fixture is a JSON document holding the ordered steps to replay, either as
 * a top-level array or as `{ "steps": [...] }`. Each step uses the wire field
 * names plus an optional `think_seconds` pause.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import {
  FixtureError,
  formatIssues,
  type StepRecord,
  StepRecordFromWire,
  WireStepRecord,
} from '@step-relay/shared';
import { z } from 'zod';

export const FIXTURE_DATASETS = ['success', 'failure'] as const;
export type FixtureDataset = (typeof FIXTURE_DATASETS)[number];

const FixtureStepSchema = WireStepRecord.extend({
  think_seconds: z.number().finite().nonnegative().optional(),
}).strict();

const FixtureDocumentSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { steps: value } : value),
  z.object({ steps: z.array(FixtureStepSchema).min(1) })
);

/**
 * One step of a fixture: the record to send and the pause before sending it.
 */
export interface FixtureStep {
  readonly record: StepRecord;
  readonly thinkSeconds: number;
}

/**
 * Validate a parsed fixture document.
 * @param source - Where the document came from, used in error messages
 * @throws {FixtureError} naming the offending step index and field
 */
export function parseFixture(raw: unknown, source: string): FixtureStep[] {
  const result = FixtureDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new FixtureError(source, formatIssues(result.error));
  }

  return result.data.steps.map(({ think_seconds, ...wire }) => {
    const record = StepRecordFromWire.parse(wire);
    return { record, thinkSeconds: think_seconds ?? record.waitSeconds };
  });
}

/**
 * Read and validate a fixture file.
 */
export async function loadFixture(path: string): Promise<FixtureStep[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new FixtureError(path, 'cannot be read', { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new FixtureError(path, 'is not valid JSON', { cause: error });
  }

  return parseFixture(raw, path);
}

/**
 * Path of a bundled fixture data set.
 */
export function resolveFixturePath(dataset: FixtureDataset): string {
  return fileURLToPath(new URL(`../fixtures/${dataset}_data.json`, import.meta.url));
}

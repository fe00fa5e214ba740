/**
 * Backfill job
 *
 * Fans out over the roster, waits for the pool to drain, aggregates and
 * writes the artifact once. Nothing is written when no symbol produced data.
 */

import type { FetchConfig } from './config';
import { aggregateResults, fanOutRoster } from './engine';
import type { FanOutDeps } from './engine';
import { writeArtifact } from './output';
import type { Artifact, Roster, SymbolHistory, SymbolReport } from './types';

export interface JobDeps extends FanOutDeps {
  writeArtifact?: (artifact: Artifact, path: string) => Promise<void>;
}

export type JobOutcome =
  | { kind: 'written'; path: string; symbols: number; candles: number; reports: SymbolReport[] }
  | { kind: 'empty'; reports: SymbolReport[] };

export async function runCandleJob(
  roster: Roster,
  config: FetchConfig,
  deps: JobDeps
): Promise<JobOutcome> {
  const reports = await fanOutRoster(roster, config, deps);

  const histories: SymbolHistory[] = [];
  for (const report of reports) {
    if (report.status === 'ok') histories.push(report.history);
  }

  const artifact = aggregateResults(histories, config.outputFormat);
  if (artifact.kind === 'empty') {
    return { kind: 'empty', reports };
  }

  const write = deps.writeArtifact ?? writeArtifact;
  await write(artifact, config.outputPath);

  return {
    kind: 'written',
    path: config.outputPath,
    symbols: histories.length,
    candles: histories.reduce((sum, history) => sum + history.candles.length, 0),
    reports,
  };
}

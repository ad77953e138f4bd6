/**
 * runTest: run a property to completion and turn the runner's findings
 * into either a summary or the error the caller should see.
 */

import type { ConjectureResult } from '../data/conjecture-data.js';
import { originKey, originsEqual } from '../data/origin.js';
import { Status } from '../data/status.js';
import {
  Flaky,
  MultipleFailures,
  PropertyFailed,
  Unsatisfiable,
} from '../types/errors.js';
import {
  resolveSettings,
  type EngineSettings,
  type ResolvedSettings,
} from '../types/options.js';
import { bytesToHex, compareTapes } from '../util/bytes.js';
import type { MetricsSnapshot } from '../util/metrics.js';
import type { ExampleDatabase } from './database.js';
import {
  ConjectureRunner,
  ExitReason,
  type Executor,
  type Reporter,
  type RunnerOptions,
} from './runner.js';

export interface RunTestOptions {
  database?: ExampleDatabase;
  reporter?: Reporter;
  learnedDfas?: RunnerOptions['learnedDfas'];
}

export interface RunSummary {
  exitReason: ExitReason;
  callCount: number;
  validExamples: number;
  paretoFrontSize: number;
  statistics: MetricsSnapshot;
}

export function runTest(
  executor: Executor,
  settings: EngineSettings | ResolvedSettings = {},
  options: RunTestOptions = {}
): RunSummary {
  const resolved = resolveSettings(settings);
  const reporter = options.reporter ?? (() => undefined);
  const runner = new ConjectureRunner(executor, resolved, {
    database: options.database,
    reporter,
    learnedDfas: options.learnedDfas,
  });
  const exitReason = runner.run();

  if (exitReason === ExitReason.FLAKY) {
    throw new Flaky({
      message: 'A stored failure did not reproduce when replayed',
      context: { callCount: runner.callCount },
    });
  }

  const minimal = [...runner.interestingExamples.values()].sort(compareFailures);
  if (minimal.length === 0) {
    if (resolved.phases.includes('generate') && runner.validExamples === 0) {
      throw new Unsatisfiable({
        message: `Unable to satisfy assumptions: no valid example in ${runner.callCount} calls`,
        context: { callCount: runner.callCount, exitReason },
      });
    }
    return {
      exitReason,
      callCount: runner.callCount,
      validExamples: runner.validExamples,
      paretoFrontSize: runner.paretoFront.size,
      statistics: runner.statistics,
    };
  }

  const failures = minimal.map((example) => {
    const replayed = runner.replay(example.buffer);
    if (
      replayed.status !== Status.INTERESTING ||
      !originsEqual(replayed.interestingOrigin, example.interestingOrigin)
    ) {
      throw new Flaky({
        message: 'A minimal failure did not reproduce on its final replay',
        context: { value: bytesToHex(example.buffer) },
      });
    }
    return toPropertyFailed(replayed);
  });

  if (resolved.verbosity !== 'quiet') {
    for (const failure of failures) {
      reporter(`Falsifying example (${originKey(failure.origin)}): ${bytesToHex(failure.buffer)}`);
      if (failure.output) reporter(failure.output);
    }
  }

  const [first] = failures;
  if (first && (failures.length === 1 || !resolved.reportMultipleBugs)) throw first;
  throw new MultipleFailures({
    message: `Found ${failures.length} distinct failures`,
    failures,
  });
}

function compareFailures(a: ConjectureResult, b: ConjectureResult): number {
  const byTape = compareTapes(a.buffer, b.buffer);
  if (byTape !== 0) return byTape;
  const left = a.interestingOrigin ? originKey(a.interestingOrigin) : '';
  const right = b.interestingOrigin ? originKey(b.interestingOrigin) : '';
  return left < right ? -1 : left > right ? 1 : 0;
}

function toPropertyFailed(result: ConjectureResult): PropertyFailed {
  const origin = result.interestingOrigin ?? { kind: 'unknown', location: '<none>' };
  const reason =
    result.failure instanceof Error ? `: ${result.failure.message}` : '';
  return new PropertyFailed({
    message: `Property failed with ${originKey(origin)}${reason}`,
    buffer: result.buffer,
    origin,
    failure: result.failure,
    output: result.output,
  });
}

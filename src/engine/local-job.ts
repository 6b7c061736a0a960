import type { JobSpec, ReducePhase, ResultTuple } from '../types.js';
import { JobTimeoutError } from '../errors.js';
import { systemNow } from '../config.js';
import type { Now } from '../config.js';

export interface RunJobOptions {
  timeoutMs: number;
  now?: Now;
}

function applyReduce(results: ResultTuple[], phase: ReducePhase): ResultTuple[] {
  if (phase.kind === 'sort') {
    return [...results].sort(phase.compare);
  }
  return results.slice(phase.start, phase.end);
}

/**
 * Runs a job in-process over documents supplied by a store adapter.
 *
 * Without reduce phases, matches are yielded as documents arrive. Reduce
 * phases need the full map output, so it is buffered, reduced in phase order
 * and then yielded. The timeout bounds the job's own work: time spent by the
 * consumer between pulls is not counted.
 */
export async function* runJob(
  job: JobSpec,
  documents: AsyncIterable<ResultTuple>,
  options: RunJobOptions,
): AsyncGenerator<ResultTuple> {
  const now = options.now ?? systemNow;
  let spent = 0;
  let resumedAt = now();
  const checkDeadline = (): void => {
    if (spent + (now() - resumedAt) > options.timeoutMs) throw new JobTimeoutError(options.timeoutMs);
  };
  // the clock is paused while suspended at a yield
  const pause = (): void => {
    spent += now() - resumedAt;
  };
  const resume = (): void => {
    resumedAt = now();
  };

  const { predicate } = job.map;
  if (job.reduce.length === 0) {
    for await (const tuple of documents) {
      checkDeadline();
      if (predicate.test(tuple[1])) {
        pause();
        yield tuple;
        resume();
      }
    }
    return;
  }

  let mapped: ResultTuple[] = [];
  for await (const tuple of documents) {
    checkDeadline();
    if (predicate.test(tuple[1])) mapped.push(tuple);
  }
  for (const phase of job.reduce) {
    mapped = applyReduce(mapped, phase);
  }
  checkDeadline();
  yield* mapped;
}

/**
 * Statistics over reconstructed reading sessions and brightness history.
 * Aggregates over nothing are errors, never zeros: a caller asking for the
 * average of no sessions gets `EmptyInputError`, not a misleading number.
 */

import type { BrightnessEvent, LightMode, OrphanSpan, ReadingMetric, ReadingSession } from '@shared/types';
import { secondsBetween } from '@shared/time';
import { EmptyInputError, InvalidArgumentError } from './errors';

export function metricValue(session: ReadingSession, metric: ReadingMetric): number | null {
  switch (metric) {
    case 'duration':
      return session.durationSeconds;
    case 'pagesTurned':
      return session.pagesTurned;
    case 'secondsRead':
      return session.reported?.secondsRead ?? null;
    case 'reportedPagesTurned':
      return session.reported?.pagesTurned ?? null;
    case 'buttonPressCount':
      return session.reported?.buttonPressCount ?? null;
    case 'progressDelta':
      return session.startProgress !== undefined && session.endProgress !== undefined
        ? session.endProgress - session.startProgress
        : null;
    default: {
      const exhaustive: never = metric;
      return exhaustive;
    }
  }
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new EmptyInputError();
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

function assertQuantiles(quantiles: readonly number[]) {
  for (const p of quantiles) {
    if (typeof p !== 'number' || !Number.isFinite(p) || p < 0 || p > 1) {
      throw new InvalidArgumentError(`Quantile must be within [0, 1], got ${String(p)}`);
    }
  }
}

/**
 * Linear interpolation between closest ranks: for quantile p over n sorted
 * values the rank is p * (n - 1), interpolated between its floor and ceiling.
 */
export function interpolatedPercentiles(values: readonly number[], quantiles: readonly number[]): number[] {
  assertQuantiles(quantiles);
  if (values.length === 0) throw new EmptyInputError();

  const sorted = [...values].sort((a, b) => a - b);
  const last = sorted.length - 1;
  return quantiles.map((p) => {
    const rank = p * last;
    const lower = Math.floor(rank);
    const upper = Math.ceil(rank);
    const low = sorted[lower];
    const high = sorted[upper];
    return low + (high - low) * (rank - lower);
  });
}

/** Sessions of one parse, with the orphan spans kept beside them for auditing. */
export class ReadingSessions {
  readonly sessions: readonly ReadingSession[];
  readonly orphans: readonly OrphanSpan[];

  constructor(sessions: readonly ReadingSession[], orphans: readonly OrphanSpan[] = []) {
    this.sessions = sessions;
    this.orphans = orphans;
  }

  count(): number {
    return this.sessions.length;
  }

  values(metric: ReadingMetric): number[] {
    const values: number[] = [];
    for (const session of this.sessions) {
      const value = metricValue(session, metric);
      if (value !== null) values.push(value);
    }
    return values;
  }

  average(metric: ReadingMetric): number {
    return mean(this.values(metric));
  }

  percentile(metric: ReadingMetric, quantiles: readonly number[]): number[] {
    return interpolatedPercentiles(this.values(metric), quantiles);
  }

  atLeast(minSeconds: number): ReadingSessions {
    if (!Number.isFinite(minSeconds) || minSeconds < 0) {
      throw new InvalidArgumentError(`Minimum session length must be a non-negative number, got ${minSeconds}`);
    }
    return new ReadingSessions(
      this.sessions.filter((session) => session.durationSeconds >= minSeconds),
      this.orphans
    );
  }

  forBook(bookId: string): ReadingSessions {
    return new ReadingSessions(
      this.sessions.filter((session) => session.bookId === bookId),
      this.orphans.filter((orphan) => orphan.bookId === bookId)
    );
  }
}

export class BrightnessHistory {
  constructor(readonly events: readonly BrightnessEvent[]) { }

  forMode(mode: LightMode): BrightnessHistory {
    return new BrightnessHistory(this.events.filter((event) => event.mode === mode));
  }

  /**
   * Average light level weighted by how long each level stayed set, i.e. the
   * seconds until the next change. The last level has no known end and only
   * counts when nothing else does.
   */
  timeWeightedAverage(): number {
    if (this.events.length === 0) throw new EmptyInputError('No brightness changes recorded');
    const last = this.events[this.events.length - 1];
    if (this.events.length === 1) return last.value;

    let weightedSum = 0;
    let totalSeconds = 0;
    for (let i = 0; i < this.events.length - 1; i++) {
      const current = this.events[i];
      const next = this.events[i + 1];
      const seconds = secondsBetween(current.timestamp, next.timestamp);
      if (seconds > 0) {
        weightedSum += current.value * seconds;
        totalSeconds += seconds;
      }
    }

    return totalSeconds === 0 ? last.value : weightedSum / totalSeconds;
  }

  percentile(quantiles: readonly number[]): number[] {
    return interpolatedPercentiles(
      this.events.map((event) => event.value),
      quantiles
    );
  }
}

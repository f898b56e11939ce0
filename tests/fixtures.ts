import type { ClassifiedEvent, RawEvent, ReadingSession } from '@shared/types';
import { EventClassifier } from '../src/backend/eventClassifier';

export const BASE_MS = Date.UTC(2024, 2, 1, 20, 0, 0);

export function at(seconds: number) {
  return new Date(BASE_MS + seconds * 1000);
}

export function raw(
  typeTag: string,
  seconds: number,
  bookId: string | null = 'B1',
  fields: Record<string, unknown> = {}
): RawEvent {
  return { typeTag, timestamp: at(seconds), bookId, fields };
}

export function classifyAll(rows: RawEvent[]): ClassifiedEvent[] {
  const classifier = new EventClassifier();
  return rows.map((row, index) => classifier.classify(row, index));
}

export function session(durationSeconds: number, pagesTurned = 0, extra: Partial<ReadingSession> = {}): ReadingSession {
  return {
    bookId: 'B1',
    startTime: at(0),
    endTime: at(durationSeconds),
    durationSeconds,
    pagesTurned,
    implicitlyClosed: false,
    ...extra
  };
}

import type {
  ClassifiedEvent,
  OrphanSpan,
  PageTurnEvent,
  ReadingSession,
  SessionEndEvent,
  SessionStartEvent
} from '@shared/types';
import { secondsBetween } from '@shared/time';

export type SessionEvent = SessionStartEvent | SessionEndEvent | PageTurnEvent;

export type ReaderState =
  | { kind: 'idle' }
  | { kind: 'in-session'; start: SessionStartEvent; pagesTurned: number };

export type ReaderStep = {
  state: ReaderState;
  session?: ReadingSession;
  orphan?: OrphanSpan;
};

export type SessionReconstruction = {
  sessions: ReadingSession[];
  orphans: OrphanSpan[];
};

const IDLE: ReaderState = { kind: 'idle' };

function closeSession(
  state: Extract<ReaderState, { kind: 'in-session' }>,
  endTime: Date,
  end: SessionEndEvent | null
): ReadingSession {
  const { start, pagesTurned } = state;
  const session: ReadingSession = {
    bookId: start.bookId,
    startTime: start.timestamp,
    endTime,
    durationSeconds: Math.max(0, secondsBetween(start.timestamp, endTime)),
    pagesTurned,
    implicitlyClosed: end === null
  };
  if (start.title) session.bookTitle = start.title;
  if (start.progress !== undefined) session.startProgress = start.progress;
  if (end?.progress !== undefined) session.endProgress = end.progress;
  if (end) {
    const reported = {
      ...(end.secondsRead !== undefined ? { secondsRead: end.secondsRead } : {}),
      ...(end.pagesTurned !== undefined ? { pagesTurned: end.pagesTurned } : {}),
      ...(end.buttonPressCount !== undefined ? { buttonPressCount: end.buttonPressCount } : {})
    };
    if (Object.keys(reported).length > 0) session.reported = reported;
  }
  return session;
}

/**
 * One transition of the per-book reading state machine. A start that arrives
 * while a session is open closes that session at the new start's timestamp and
 * marks it `implicitlyClosed`, so reading time before a lost end marker is kept
 * and sessions of one book never overlap.
 */
export function stepReaderState(state: ReaderState, event: SessionEvent): ReaderStep {
  switch (event.kind) {
    case 'session-start':
      if (state.kind === 'idle') {
        return { state: { kind: 'in-session', start: event, pagesTurned: 0 } };
      }
      return {
        state: { kind: 'in-session', start: event, pagesTurned: 0 },
        session: closeSession(state, event.timestamp, null)
      };
    case 'page-turn':
      if (state.kind === 'idle') return { state };
      return { state: { ...state, pagesTurned: state.pagesTurned + 1 } };
    case 'session-end':
      if (state.kind === 'idle') {
        return {
          state,
          orphan: { kind: 'dangling-end', bookId: event.bookId, timestamp: event.timestamp, pagesTurned: 0 }
        };
      }
      return { state: IDLE, session: closeSession(state, event.timestamp, event) };
    default: {
      const exhaustive: never = event;
      return exhaustive;
    }
  }
}

function isSessionEvent(event: ClassifiedEvent): event is SessionEvent {
  return event.kind === 'session-start' || event.kind === 'session-end' || event.kind === 'page-turn';
}

function byTimestamp(a: SessionEvent, b: SessionEvent) {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.index - b.index;
}

/**
 * Pairs session starts with their ends, book by book. Events of other kinds are
 * ignored; each book's events are walked in timestamp order, ties kept in row
 * order.
 */
export class SessionReconstructor {
  reconstruct(events: readonly ClassifiedEvent[]): SessionReconstruction {
    const byBook = new Map<string, SessionEvent[]>();
    for (const event of events) {
      if (!isSessionEvent(event)) continue;
      const bucket = byBook.get(event.bookId);
      if (bucket) {
        bucket.push(event);
      } else {
        byBook.set(event.bookId, [event]);
      }
    }

    const sessions: Array<{ session: ReadingSession; bookOrder: number }> = [];
    const orphans: Array<{ orphan: OrphanSpan; bookOrder: number }> = [];
    let bookOrder = 0;

    for (const bookEvents of byBook.values()) {
      const result = this.reconstructBook([...bookEvents].sort(byTimestamp));
      for (const session of result.sessions) sessions.push({ session, bookOrder });
      for (const orphan of result.orphans) orphans.push({ orphan, bookOrder });
      bookOrder += 1;
    }

    sessions.sort((a, b) => a.session.startTime.getTime() - b.session.startTime.getTime() || a.bookOrder - b.bookOrder);
    orphans.sort((a, b) => a.orphan.timestamp.getTime() - b.orphan.timestamp.getTime() || a.bookOrder - b.bookOrder);

    return {
      sessions: sessions.map((entry) => entry.session),
      orphans: orphans.map((entry) => entry.orphan)
    };
  }

  private reconstructBook(events: SessionEvent[]): SessionReconstruction {
    const sessions: ReadingSession[] = [];
    const orphans: OrphanSpan[] = [];
    let state: ReaderState = IDLE;

    for (const event of events) {
      const step = stepReaderState(state, event);
      state = step.state;
      if (step.session) sessions.push(step.session);
      if (step.orphan) orphans.push(step.orphan);
    }

    if (state.kind === 'in-session') {
      orphans.push({
        kind: 'open-session',
        bookId: state.start.bookId,
        timestamp: state.start.timestamp,
        pagesTurned: state.pagesTurned
      });
    }

    return { sessions, orphans };
  }
}

import type { Book, RawEvent } from '@shared/types';

export type RowSource = {
  /** Rows in arrival order; `tags` narrows them to those type tags when set. */
  readEvents(tags: ReadonlySet<string> | null): RawEvent[];
  readBooks(bookIds: ReadonlySet<string>): Book[];
};

export class MemoryRowSource implements RowSource {
  constructor(
    private readonly events: readonly RawEvent[],
    private readonly books: readonly Book[] = []
  ) { }

  readEvents(tags: ReadonlySet<string> | null): RawEvent[] {
    if (!tags) return [...this.events];
    return this.events.filter((event) => tags.has(event.typeTag));
  }

  readBooks(bookIds: ReadonlySet<string>): Book[] {
    return this.books.filter((book) => bookIds.has(book.id));
  }
}

import { SubtitleError, TransactionError } from './errors';
import { Position } from './types';

/**
 * Mutable subtitle text owned by one editing session.
 * All structure is derived from the text on demand.
 */
export class SubtitleDocument {
  private content: string;
  private snapshot: string | null = null;

  constructor(text: string = '') {
    this.content = text;
  }

  get text(): string {
    return this.content;
  }

  get length(): number {
    return this.content.length;
  }

  /** True while a transaction is open */
  get inTransaction(): boolean {
    return this.snapshot !== null;
  }

  slice(start: Position, end?: Position): string {
    return this.content.slice(start, end);
  }

  insert(pos: Position, value: string): void {
    this.replace(pos, pos, value);
  }

  delete(start: Position, end: Position): void {
    this.replace(start, end, '');
  }

  replace(start: Position, end: Position, value: string): void {
    if (start < 0 || end > this.content.length || start > end) {
      throw new RangeError(`Invalid range ${start}..${end} for document of length ${this.content.length}`);
    }
    this.content = this.content.slice(0, start) + value + this.content.slice(end);
  }

  /**
   * Runs a multi-step edit as one change group. If `edit` throws, the text is
   * restored to what it was before the outermost transaction began.
   * Engine errors are rethrown as they are, anything else is wrapped in a
   * TransactionError. Nested calls join the outer transaction.
   */
  transact<T>(edit: () => T): T {
    if (this.snapshot !== null) {
      return edit();
    }

    this.snapshot = this.content;
    try {
      return edit();
    } catch (error) {
      this.content = this.snapshot;
      if (error instanceof SubtitleError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransactionError(`Edit rolled back: ${reason}`, error);
    } finally {
      this.snapshot = null;
    }
  }
}

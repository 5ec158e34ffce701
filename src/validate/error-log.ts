/**
 * ErrorLog: the violation accumulator threaded through every check.
 *
 * Owned by the runner and handed to one check at a time. Checks report
 * violations either by `push`, or by throwing from inside `collect`, which
 * turns the thrown error into one message and moves on to the next item.
 */

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ErrorLog {
  private readonly messages: string[] = [];

  push(message: string): void {
    this.messages.push(message);
  }

  /**
   * Apply `fn` to every item. An error thrown for one item is recorded and
   * does not stop the iteration.
   */
  collect<T>(items: Iterable<T>, fn: (item: T) => void): void {
    for (const item of items) {
      try {
        fn(item);
      } catch (err) {
        this.push(errorMessage(err));
      }
    }
  }

  get size(): number {
    return this.messages.length;
  }

  /** Messages deduplicated by exact text and sorted. */
  finalize(): string[] {
    return [...new Set(this.messages)].sort();
  }
}
